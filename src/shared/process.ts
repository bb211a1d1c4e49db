/**
 * External process capability.
 *
 * The harness never calls `child_process` directly from its stages; it
 * goes through a {@link ProcessRunner} so builds and tool invocations
 * can be exercised with canned output in tests.
 */
import { spawn, type ChildProcess } from "node:child_process";
import { delimiter } from "node:path";
import type { CapturedOutput } from "./types/harness.js";
import { isNodeSystemError } from "./errors.js";

/** One process to run. */
export interface ProcessRequest {
  command: string;
  args: string[];
  cwd: string;
  /** Full environment for the child; defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
  /** Kill the child after this many milliseconds; `0` or absent disables it. */
  timeoutMs?: number;
}

/** Runs a process to completion and returns its merged output. */
export type ProcessRunner = (request: ProcessRequest) => Promise<CapturedOutput>;

const GROUP_KILL = process.platform !== "win32";

/** SIGKILL the child and, where supported, its whole process group. */
function killTree(child: ChildProcess): void {
  if (GROUP_KILL && child.pid !== undefined) {
    try {
      process.kill(-child.pid, "SIGKILL");
      return;
    } catch (err) {
      // ESRCH: the group is already gone; anything else falls back to the child alone
      if (isNodeSystemError(err) && err.code === "ESRCH") return;
    }
  }
  child.kill("SIGKILL");
}

/** True when the process started and exited with status 0. */
export function succeeded(output: CapturedOutput): boolean {
  return output.exitCode === 0 && !output.timedOut && output.error === undefined;
}

/**
 * Spawn-based {@link ProcessRunner}.
 *
 * stdout and stderr are both piped and appended to one buffer as chunks
 * arrive, which is the `2>&1` view of the output.  Spawn failures
 * (missing or non-executable command) resolve with `exitCode: null` and
 * the error text in both `error` and `text`.
 *
 * On POSIX the child leads its own process group, so a timeout kills
 * everything it started.  The promise settles at the kill rather than
 * at "close", which would wait for any grandchild still holding a pipe.
 */
export const spawnProcess: ProcessRunner = (request) =>
  new Promise((resolve) => {
    const chunks: Buffer[] = [];
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    let settled = false;

    const child = spawn(request.command, request.args, {
      cwd: request.cwd,
      env: request.env ?? process.env,
      stdio: ["ignore", "pipe", "pipe"],
      detached: GROUP_KILL,
    });

    const finish = (output: CapturedOutput): void => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      resolve(output);
    };

    child.stdout.on("data", (chunk: Buffer) => chunks.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => chunks.push(chunk));

    if (request.timeoutMs && request.timeoutMs > 0) {
      timer = setTimeout(() => {
        timedOut = true;
        killTree(child);
        child.stdout.destroy();
        child.stderr.destroy();
        finish({
          text: Buffer.concat(chunks).toString("utf-8"),
          exitCode: null,
          signal: "SIGKILL",
          timedOut,
        });
      }, request.timeoutMs);
    }

    child.on("error", (err) => {
      const message = `${request.command}: ${err.message}`;
      finish({
        text: `${Buffer.concat(chunks).toString("utf-8")}${message}\n`,
        exitCode: null,
        signal: null,
        timedOut,
        error: message,
      });
    });

    // "close" fires after both pipes are drained
    child.on("close", (code, signal) => {
      finish({
        text: Buffer.concat(chunks).toString("utf-8"),
        exitCode: code,
        signal,
        timedOut,
      });
    });
  });

/**
 * Copy of `env` with `dir` appended to its `PATH`.
 *
 * The inherited search path is kept in front; an empty or absent `PATH`
 * becomes just `dir`.
 */
export function appendToPath(env: NodeJS.ProcessEnv, dir: string): NodeJS.ProcessEnv {
  const current = env.PATH;
  return {
    ...env,
    PATH: current ? `${current}${delimiter}${dir}` : dir,
  };
}

/** Render a command line for echoing (`$ cmd arg …`). */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args]
    .map((part) => (/^[\w@%+=:,./-]+$/.test(part) ? part : `'${part.replace(/'/g, `'\\''`)}'`))
    .join(" ");
}
