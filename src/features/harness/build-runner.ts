/**
 * Build runner.
 *
 * Runs the configured build command for one binary target.  A failed
 * build never fails the harness: the tool under test is expected to
 * surface compilation problems in its own output, and that output is
 * what gets checked.
 */
import { dirname } from "node:path";
import Handlebars from "handlebars";
import type { ActiveConfiguration, CapturedOutput } from "../../shared/types/harness.js";
import { type ProcessRunner, succeeded } from "../../shared/process.js";

/** Variables available to build command templates. */
export interface BuildContext {
  binary: string;
  manifest: string;
  root: string;
}

/** Options for {@link buildBinary}. */
export interface BuildOptions {
  /** Build command argv; each element is a Handlebars template. */
  command: string[];
  /** Fixtures root, exposed to templates as `root`. */
  root: string;
  runner: ProcessRunner;
  timeoutMs?: number;
}

/** Result of one build. */
export interface BuildOutcome {
  ok: boolean;
  command: string;
  args: string[];
  output: CapturedOutput;
}

/**
 * Expand the build command templates for a context.
 *
 * Templates are compiled in strict mode, so a reference to an unknown
 * variable throws instead of expanding to an empty argument.
 */
export function renderBuildCommand(templates: string[], ctx: BuildContext): string[] {
  return templates.map((tpl) => Handlebars.compile(tpl, { noEscape: true, strict: true })(ctx));
}

/** Build `binary` in the directory holding the active configuration. */
export async function buildBinary(
  binary: string,
  active: ActiveConfiguration,
  opts: BuildOptions,
): Promise<BuildOutcome> {
  const [command, ...args] = renderBuildCommand(opts.command, {
    binary,
    manifest: active.manifest,
    root: opts.root,
  });
  if (command === undefined) {
    throw new Error("Build command is empty");
  }

  const output = await opts.runner({
    command,
    args,
    cwd: dirname(active.path),
    timeoutMs: opts.timeoutMs,
  });
  return { ok: succeeded(output), command, args, output };
}
