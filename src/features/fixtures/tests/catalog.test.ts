/**
 * Tests for fixture discovery and the expected-output naming convention.
 *
 * Builds a temporary fixture tree and checks ordering, extension
 * stripping, dotfile skipping and the missing-fixture hard stop.
 */
import { mkdirSync, writeFileSync, rmSync } from "node:fs";
import { join, dirname } from "node:path";
import { tmpdir } from "node:os";
import {
  listBinaryFixtures,
  listManifestFixtures,
  listTraceFixtures,
  expectedOutputFor,
  loadFixtureCatalog,
  scanFixtureCatalog,
} from "../catalog.js";
import { MissingFixtureError } from "../../../shared/errors.js";

// ── Helpers ───────────────────────────────────────────────────────────

let passed = 0;
let failed = 0;

function assert(label: string, condition: boolean, detail?: string) {
  if (condition) {
    console.log(`  OK: ${label}`);
    passed++;
  } else {
    console.error(`FAIL: ${label}${detail ? ` — ${detail}` : ""}`);
    failed++;
  }
}

const roots: string[] = [];

/** Create a temp fixture root holding `files` (relative path → content). */
function makeRoot(suffix: string, files: Record<string, string>): string {
  const root = join(tmpdir(), `golden-trace-catalog-${suffix}-${Date.now()}`);
  roots.push(root);
  mkdirSync(root, { recursive: true });
  for (const [rel, content] of Object.entries(files)) {
    const path = join(root, rel);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content, "utf-8");
  }
  return root;
}

// ── Tests ─────────────────────────────────────────────────────────────

try {
  console.log("\n=== Discovery ===");
  const root = makeRoot("discovery", {
    "src/bin/general.rs": "fn main() {}\n",
    "src/bin/alpha.rs": "fn main() {}\n",
    "src/bin/v1.2.rs": "fn main() {}\n",
    "src/bin/.hidden.rs": "fn main() {}\n",
    "src/bin/notes.txt": "not a fixture\n",
    "manifests/general.toml": "[package]\n",
    "manifests/bad-dev.toml": "[package]\n",
    "traces/foo.trace": "trace\n",
    "out/general.run": "x\n",
    "out/alpha.run": "x\n",
    "out/v1.2.run": "x\n",
    "out/bad-dev.run": "x\n",
    "out/trace-foo.run": "x\n",
  });

  const binaries = listBinaryFixtures(root);
  assert("binaries sorted, extension stripped", binaries.join(",") === "alpha,general,v1.2", binaries.join(","));
  assert("manifests sorted", listManifestFixtures(root).join(",") === "bad-dev,general");
  assert("traces listed", listTraceFixtures(root).join(",") === "foo");

  console.log("\n=== Naming convention ===");
  assert(
    "binary maps to out/<name>.run",
    expectedOutputFor(root, "binary", "alpha") === join(root, "out", "alpha.run"),
  );
  assert(
    "manifest maps to out/<name>.run",
    expectedOutputFor(root, "manifest", "bad-dev") === join(root, "out", "bad-dev.run"),
  );
  assert(
    "trace maps to out/trace-<name>.run",
    expectedOutputFor(root, "trace", "foo") === join(root, "out", "trace-foo.run"),
  );

  console.log("\n=== Catalog ===");
  const catalog = loadFixtureCatalog(root);
  assert("catalog root", catalog.root === root);
  assert("catalog has 3 binaries", catalog.binaries.length === 3);
  assert("first binary is alpha", catalog.binaries[0]?.name === "alpha");
  assert("binary path", catalog.binaries[0]?.path === join(root, "src", "bin", "alpha.rs"));
  assert("binary kind", catalog.binaries[0]?.kind === "binary");
  assert("manifest path", catalog.manifests[1]?.path === join(root, "manifests", "general.toml"));
  assert("trace path", catalog.traces[0]?.path === join(root, "traces", "foo.trace"));
  assert("trace expected path", catalog.traces[0]?.expectedPath === join(root, "out", "trace-foo.run"));

  console.log("\n=== Missing directories ===");
  const empty = makeRoot("empty", { "out/unused.run": "x\n" });
  assert("no src/bin → no binaries", listBinaryFixtures(empty).length === 0);
  const emptyCatalog = loadFixtureCatalog(empty);
  assert(
    "empty catalog",
    emptyCatalog.binaries.length === 0 && emptyCatalog.manifests.length === 0 && emptyCatalog.traces.length === 0,
  );

  console.log("\n=== Missing expected output ===");
  const missing = makeRoot("missing", {
    "src/bin/general.rs": "fn main() {}\n",
    "traces/bar.trace": "trace\n",
    "out/general.run": "x\n",
    // trace-bar.run deliberately absent; general.run must not satisfy it
    "out/bar.run": "x\n",
  });
  let caught: unknown;
  try {
    loadFixtureCatalog(missing);
  } catch (err) {
    caught = err;
  }
  assert("throws MissingFixtureError", caught instanceof MissingFixtureError);
  if (caught instanceof MissingFixtureError) {
    assert("error names the trace", caught.fixture.kind === "trace" && caught.fixture.name === "bar");
    assert("error carries the expected path", caught.expectedPath === join(missing, "out", "trace-bar.run"));
  }

  const dirInstead = makeRoot("dir", { "manifests/general.toml": "[package]\n" });
  mkdirSync(join(dirInstead, "out", "general.run"), { recursive: true });
  let dirErr: unknown;
  try {
    expectedOutputFor(dirInstead, "manifest", "general");
  } catch (err) {
    dirErr = err;
  }
  assert("directory at expected path is missing", dirErr instanceof MissingFixtureError);

  console.log("\n=== Scan without expected output ===");
  const scanned = scanFixtureCatalog(missing);
  assert("scan does not throw on missing expected file", scanned.traces.length === 1);
  assert("scan keeps the conventional path", scanned.traces[0]?.expectedPath === join(missing, "out", "trace-bar.run"));
  assert("scan lists binaries too", scanned.binaries[0]?.expectedPath === join(missing, "out", "general.run"));

} finally {
  for (const root of roots) rmSync(root, { recursive: true, force: true });
}

// ── Summary ───────────────────────────────────────────────────────────
console.log(`\n${passed} passed, ${failed} failed`);
if (failed > 0) process.exit(1);
