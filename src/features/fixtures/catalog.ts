/**
 * Fixture catalog.
 *
 * Enumerates the fixture tree once and resolves the expected-output
 * file of every fixture by naming convention:
 *
 *   <root>/
 *     src/bin/<name>.rs        ← binary fixture   → out/<name>.run
 *     manifests/<name>.toml    ← manifest fixture → out/<name>.run
 *     traces/<name>.trace      ← trace fixture    → out/trace-<name>.run
 *
 * A fixture whose expected-output file is absent is a setup defect and
 * stops the harness with a {@link MissingFixtureError}.
 */
import { readdirSync, existsSync, statSync } from "node:fs";
import { join, basename, extname } from "node:path";
import type { Fixture, FixtureCatalog, FixtureKind } from "../../shared/types/harness.js";
import { MissingFixtureError } from "../../shared/errors.js";
import {
  BINARY_EXT,
  MANIFEST_EXT,
  TRACE_EXT,
  EXPECTED_EXT,
  TRACE_EXPECTED_PREFIX,
  binariesDir,
  manifestsDir,
  tracesDir,
  expectedDir,
} from "../../shared/paths.js";

// ── Discovery ─────────────────────────────────────────────────────────

/**
 * List fixture files with the given extension in a directory
 * (non-recursive), sorted by file name.  Skips dotfiles.
 * A missing directory yields an empty list.
 */
function listFixtureFiles(dir: string, ext: string): string[] {
  if (!existsSync(dir)) return [];
  return readdirSync(dir)
    .filter((f) => extname(f) === ext && !f.startsWith("."))
    .sort()
    .map((f) => join(dir, f));
}

/** File stems of the fixtures in `dir`, in discovery order. */
function listNames(dir: string, ext: string): string[] {
  return listFixtureFiles(dir, ext).map((f) => basename(f, ext));
}

/** Names of the binary fixtures (`src/bin/*.rs`). */
export function listBinaryFixtures(root: string): string[] {
  return listNames(binariesDir(root), BINARY_EXT);
}

/** Names of the manifest fixtures (`manifests/*.toml`). */
export function listManifestFixtures(root: string): string[] {
  return listNames(manifestsDir(root), MANIFEST_EXT);
}

/** Names of the trace fixtures (`traces/*.trace`). */
export function listTraceFixtures(root: string): string[] {
  return listNames(tracesDir(root), TRACE_EXT);
}

// ── Naming convention ─────────────────────────────────────────────────

/** Absolute path the expected output of a fixture must live at. */
export function expectedPathFor(root: string, kind: FixtureKind, name: string): string {
  const file = kind === "trace"
    ? `${TRACE_EXPECTED_PREFIX}${name}${EXPECTED_EXT}`
    : `${name}${EXPECTED_EXT}`;
  return join(expectedDir(root), file);
}

/** Absolute path of the fixture file itself. */
function fixturePathFor(root: string, kind: FixtureKind, name: string): string {
  switch (kind) {
    case "binary":
      return join(binariesDir(root), `${name}${BINARY_EXT}`);
    case "manifest":
      return join(manifestsDir(root), `${name}${MANIFEST_EXT}`);
    case "trace":
      return join(tracesDir(root), `${name}${TRACE_EXT}`);
  }
}

/**
 * Resolve the expected-output file of a fixture.
 *
 * @throws {MissingFixtureError} when the file does not exist (or is
 *   not a regular file).
 */
export function expectedOutputFor(root: string, kind: FixtureKind, name: string): string {
  const expected = expectedPathFor(root, kind, name);
  if (!existsSync(expected) || !statSync(expected).isFile()) {
    throw new MissingFixtureError({ kind, name }, expected);
  }
  return expected;
}

/** Build a {@link Fixture} by naming convention alone; the expected file may be absent. */
export function describeFixture(root: string, kind: FixtureKind, name: string): Fixture {
  return {
    kind,
    name,
    path: fixturePathFor(root, kind, name),
    expectedPath: expectedPathFor(root, kind, name),
  };
}

/** Build a fully-resolved {@link Fixture}. */
export function resolveFixture(root: string, kind: FixtureKind, name: string): Fixture {
  return { ...describeFixture(root, kind, name), expectedPath: expectedOutputFor(root, kind, name) };
}

// ── Catalog ───────────────────────────────────────────────────────────

/**
 * Discover every fixture under `root` and resolve its expected output.
 *
 * Resolution is eager: a missing expected-output file anywhere in the
 * tree throws before any suite runs.
 */
export function loadFixtureCatalog(root: string): FixtureCatalog {
  return {
    root,
    binaries: listBinaryFixtures(root).map((n) => resolveFixture(root, "binary", n)),
    manifests: listManifestFixtures(root).map((n) => resolveFixture(root, "manifest", n)),
    traces: listTraceFixtures(root).map((n) => resolveFixture(root, "trace", n)),
  };
}

/**
 * Discover every fixture under `root` without requiring its expected
 * output to exist.  For inspecting a tree that the harness would refuse.
 */
export function scanFixtureCatalog(root: string): FixtureCatalog {
  return {
    root,
    binaries: listBinaryFixtures(root).map((n) => describeFixture(root, "binary", n)),
    manifests: listManifestFixtures(root).map((n) => describeFixture(root, "manifest", n)),
    traces: listTraceFixtures(root).map((n) => describeFixture(root, "trace", n)),
  };
}
