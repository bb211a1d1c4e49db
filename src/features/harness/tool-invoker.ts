/**
 * Tool invoker.
 *
 * Runs the tracing tool under test in one of its two modes:
 *
 * - **resolve-only**: `<tool> trace --resolve-only --bin <target>`,
 *   run beside the active-configuration file.  A nonzero exit is part
 *   of the behaviour under test and is returned, not raised.
 * - **replay**: `<tool> replay --trace-file <trace>`, with the
 *   tool-bin directory appended to `PATH`.  Replaying a recorded trace
 *   must succeed; anything else raises {@link ReplayInvocationFailure}.
 */
import { existsSync, statSync } from "node:fs";
import { dirname, resolve } from "node:path";
import type { ActiveConfiguration, CapturedOutput } from "../../shared/types/harness.js";
import { HarnessError, ReplayInvocationFailure } from "../../shared/errors.js";
import { type ProcessRunner, appendToPath, succeeded } from "../../shared/process.js";

/** A tool invocation: subcommand plus its flags. */
export type ToolRequest =
  | { mode: "resolve-only"; target: string; active: ActiveConfiguration }
  | { mode: "replay"; traceFile: string; name: string };

/** Options shared by every invocation. */
export interface InvokeOptions {
  /** Absolute path to the tool binary. */
  tool: string;
  /** Fixtures root; replay runs here. */
  root: string;
  /** Directory appended to `PATH` for replay. */
  toolBinDir: string;
  runner: ProcessRunner;
  timeoutMs?: number;
  /** Base environment; defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
}

/**
 * Resolve the tool path given on the command line to an absolute path.
 *
 * @throws {HarnessError} when it does not name an existing file.
 */
export function resolveToolPath(tool: string): string {
  const abs = resolve(tool);
  if (!existsSync(abs) || !statSync(abs).isFile()) {
    throw new HarnessError(`Tool binary not found: ${abs}`);
  }
  return abs;
}

/** Subcommand and flags for a request. */
export function toolArgs(request: ToolRequest): string[] {
  switch (request.mode) {
    case "resolve-only":
      return ["trace", "--resolve-only", "--bin", request.target];
    case "replay":
      return ["replay", "--trace-file", request.traceFile];
  }
}

/**
 * Invoke the tool and capture its merged output.
 *
 * @throws {ReplayInvocationFailure} when a replay does not exit 0.
 */
export async function invokeTool(request: ToolRequest, opts: InvokeOptions): Promise<CapturedOutput> {
  const base = opts.env ?? process.env;
  const env = request.mode === "replay" ? appendToPath(base, opts.toolBinDir) : base;

  const output = await opts.runner({
    command: opts.tool,
    args: toolArgs(request),
    cwd: request.mode === "resolve-only" ? dirname(request.active.path) : opts.root,
    env,
    timeoutMs: opts.timeoutMs,
  });

  if (request.mode === "replay" && !succeeded(output)) {
    throw new ReplayInvocationFailure(request.name, output);
  }
  return output;
}
