/**
 * Harness error classes and CLI error-formatting helpers.
 *
 * Every fatal condition the harness raises is a {@link HarnessError};
 * the CLI entry point turns anything else into a readable message with
 * {@link formatCliError}.
 */
import type { CapturedOutput, ExpectedLine, Fixture } from "./types/harness.js";

// ── Harness errors ────────────────────────────────────────────────────

/** Base class for all fatal harness conditions. */
export class HarnessError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** An expected-output fixture required by the naming convention is absent. */
export class MissingFixtureError extends HarnessError {
  constructor(
    readonly fixture: Pick<Fixture, "kind" | "name">,
    readonly expectedPath: string,
  ) {
    super(`Missing expected-output fixture for ${fixture.kind} "${fixture.name}": ${expectedPath}`);
  }
}

/** An expected-output fixture is malformed under the active blank-line policy. */
export class InvalidFixtureError extends HarnessError {
  constructor(
    readonly path: string,
    readonly lineNumber: number,
    reason: string,
  ) {
    super(`Invalid expected-output fixture ${path}:${lineNumber}: ${reason}`);
  }
}

/** Replay of a trace fixture did not exit successfully. */
export class ReplayInvocationFailure extends HarnessError {
  constructor(
    readonly trace: string,
    readonly output: CapturedOutput,
  ) {
    super(`Replay of trace "${trace}" failed (${describeExit(output)})`);
  }
}

/** A captured output lacks one of its expected lines. */
export class ExpectationMismatch extends HarnessError {
  constructor(
    readonly fixture: Fixture,
    readonly missing: ExpectedLine,
    readonly output: CapturedOutput,
  ) {
    super(
      `Expected line not found in output of ${fixture.kind} "${fixture.name}" ` +
        `(${fixture.expectedPath}:${missing.lineNumber}): ${JSON.stringify(missing.text)}`,
    );
  }
}

/** The harness configuration file cannot be used. */
export class ConfigError extends HarnessError {
  constructor(
    readonly path: string,
    readonly problems: string[],
  ) {
    super(`Invalid configuration ${path}:\n${problems.map((p) => `  - ${p}`).join("\n")}`);
  }
}

/** Short human-readable description of how a process ended. */
export function describeExit(output: CapturedOutput): string {
  if (output.error) return output.error;
  if (output.timedOut) return "timed out";
  if (output.signal) return `killed by ${output.signal}`;
  return `exit code ${output.exitCode}`;
}

// ── CLI error formatting ──────────────────────────────────────────────

/**
 * Node.js system error shape (ENOENT, EACCES, EPERM, etc.).
 * Not all Error objects carry these, so we use a type guard.
 */
interface NodeSystemError extends Error {
  code: string;
  path?: string;
  syscall?: string;
}

export function isNodeSystemError(err: unknown): err is NodeSystemError {
  return err instanceof Error && typeof (err as NodeSystemError).code === "string";
}

/**
 * js-yaml YAMLException shape.
 * We detect by `name` rather than importing the class to keep coupling low.
 */
interface YAMLExceptionLike extends Error {
  name: "YAMLException";
  reason?: string;
  mark?: { name?: string | null; line?: number; column?: number; snippet?: string };
}

export function isYAMLException(err: unknown): err is YAMLExceptionLike {
  return err instanceof Error && err.name === "YAMLException";
}

/**
 * Format an error into a user-friendly CLI message.
 *
 * Categories handled:
 * - YAML parse errors  → clean "Failed to parse YAML" with location
 * - ENOENT             → "File not found" with path
 * - EACCES / EPERM     → "Permission denied" with path
 * - Everything else    → the error message without a stack trace
 */
export function formatCliError(err: unknown): string {
  // 1. YAML parse errors (harness config)
  if (isYAMLException(err)) {
    const reason = err.reason ?? "invalid YAML syntax";
    const mark = err.mark;
    if (mark && mark.line != null) {
      const file = mark.name ? `${mark.name} ` : "";
      // js-yaml lines are 0-based; display as 1-based
      const location = `line ${mark.line + 1}, column ${(mark.column ?? 0) + 1}`;
      let msg = `Failed to parse YAML: ${reason} (${file}${location})`;
      if (mark.snippet) {
        msg += `\n${mark.snippet}`;
      }
      return msg;
    }
    return `Failed to parse YAML: ${reason}`;
  }

  // 2. Node.js filesystem / system errors
  if (isNodeSystemError(err)) {
    const filePath = err.path ? ` "${err.path}"` : "";
    switch (err.code) {
      case "ENOENT":
        return `File not found:${filePath}. Check that the path exists and --root points at the fixture tree.`;
      case "EACCES":
      case "EPERM":
        return `Permission denied:${filePath}. Check file permissions.`;
      case "EISDIR":
        return `Expected a file but found a directory:${filePath}.`;
      default:
        return `System error (${err.code}):${filePath}: ${err.message}`;
    }
  }

  // 3. Generic errors, harness errors included: just the message
  if (err instanceof Error) {
    return err.message;
  }

  return String(err);
}
