/**
 * Core type definitions for the golden-output harness.
 *
 * These types describe the fixture tree, the values that flow between
 * the harness stages, and the result of a whole run.
 */

// ── Fixtures ──────────────────────────────────────────────────────────

/** The three kinds of fixture a suite iterates over. */
export type FixtureKind = "binary" | "manifest" | "trace";

/** A single fixture discovered on disk. */
export interface Fixture {
  kind: FixtureKind;
  /** File stem, e.g. `general` for `manifests/general.toml`. */
  name: string;
  /** Absolute path to the fixture file itself. */
  path: string;
  /** Absolute path to the expected-output file for this fixture. */
  expectedPath: string;
}

/** Every fixture of a fixture root, discovered once at startup. */
export interface FixtureCatalog {
  /** Absolute fixtures root. */
  root: string;
  binaries: Fixture[];
  manifests: Fixture[];
  traces: Fixture[];
}

/** One literal expectation read from an expected-output file. */
export interface ExpectedLine {
  text: string;
  /** 1-based line number within the expected-output file. */
  lineNumber: number;
}

/** The parsed contents of an expected-output file. */
export interface ExpectedOutput {
  path: string;
  lines: ExpectedLine[];
}

/** How blank or whitespace-only expectation lines are treated. */
export type BlankLinePolicy = "ignore" | "reject";

// ── Processes ─────────────────────────────────────────────────────────

/** Merged output and exit status of one external process. */
export interface CapturedOutput {
  /** stdout and stderr interleaved in arrival order. */
  text: string;
  /** Exit code, or `null` when the process was killed or never started. */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  /** Set when the process could not be spawned at all. */
  error?: string;
}

// ── Configuration ─────────────────────────────────────────────────────

/** The manifest currently installed at the active-configuration path. */
export interface ActiveConfiguration {
  /** Name of the manifest fixture that was copied in. */
  manifest: string;
  /** Absolute path of the active-configuration file. */
  path: string;
}

/** Effective harness configuration after defaults are applied. */
export interface HarnessConfig {
  /** Active-configuration file name, relative to the fixtures root. */
  activeConfig: string;
  /** Manifest activated before the per-binary suite. */
  generalManifest: string;
  /** Binary target resolved by the per-manifest suite. */
  resolveTarget: string;
  /** Build command argv; each element is a Handlebars template. */
  buildCommand: string[];
  /** Directory appended to `PATH` for replay invocations. */
  toolBinDir: string;
  /** Per-invocation timeout in milliseconds; `0` disables it. */
  timeoutMs: number;
  blankLines: BlankLinePolicy;
}

// ── Results ───────────────────────────────────────────────────────────

/** Suite names, in the order they run. */
export type SuiteName = "binary" | "manifest" | "trace";

export const SUITE_ORDER: readonly SuiteName[] = ["binary", "manifest", "trace"];

/** Outcome of checking one captured output against its expectations. */
export type MatchResult =
  | { ok: true }
  | { ok: false; missing: ExpectedLine };
