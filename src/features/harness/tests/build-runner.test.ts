/**
 * Tests for the build runner: command templating and failure tolerance.
 */
import { buildBinary, renderBuildCommand } from "../build-runner.js";
import type { ProcessRequest, ProcessRunner } from "../../../shared/process.js";
import type { ActiveConfiguration } from "../../../shared/types/harness.js";

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

const ACTIVE: ActiveConfiguration = { manifest: "general", path: "/fixtures/Cargo.toml" };
const CTX = { binary: "blinky", manifest: "general", root: "/fixtures" };

console.log("\n=== Templating ===");
assert(
  "default cargo command",
  renderBuildCommand(["cargo", "build", "--bin", "{{binary}}"], CTX).join(" ") === "cargo build --bin blinky",
);
assert(
  "root and manifest available",
  renderBuildCommand(["{{root}}/logs/{{manifest}}-{{binary}}.log"], CTX)[0] === "/fixtures/logs/general-blinky.log",
);
assert(
  "no HTML escaping",
  renderBuildCommand(["{{binary}}"], { ...CTX, binary: "a&b<c>" })[0] === "a&b<c>",
);
let unknownErr: unknown;
try {
  renderBuildCommand(["--target={{target}}"], CTX);
} catch (err) {
  unknownErr = err;
}
assert("unknown variable throws", unknownErr instanceof Error);

console.log("\n=== Running ===");
const calls: ProcessRequest[] = [];
function exitingWith(exitCode: number | null, error?: string): ProcessRunner {
  return async (request) => {
    calls.push(request);
    return { text: "compiling…\n", exitCode, signal: null, timedOut: false, error };
  };
}

const ok = await buildBinary("blinky", ACTIVE, {
  command: ["cargo", "build", "--bin", "{{binary}}"],
  root: "/fixtures",
  runner: exitingWith(0),
  timeoutMs: 250,
});
assert("exit 0 is ok", ok.ok);
assert("command split from args", ok.command === "cargo" && ok.args.join(" ") === "build --bin blinky");
assert("runs in fixtures root", calls[0]?.cwd === "/fixtures");
assert("passes timeout", calls[0]?.timeoutMs === 250);
assert("output returned", ok.output.text === "compiling…\n");

const broken = await buildBinary("broken", ACTIVE, {
  command: ["cargo", "build", "--bin", "{{binary}}"],
  root: "/fixtures",
  runner: exitingWith(101),
});
assert("nonzero exit reported, not thrown", !broken.ok);
assert("broken build args", broken.args.join(" ") === "build --bin broken");

const missing = await buildBinary("blinky", ACTIVE, {
  command: ["no-such-build-tool"],
  root: "/fixtures",
  runner: exitingWith(null, "no-such-build-tool: spawn no-such-build-tool ENOENT"),
});
assert("spawn failure reported, not thrown", !missing.ok && missing.args.length === 0);

// ── Summary ───────────────────────────────────────────────────────────
console.log(`\n${passed} passed, ${failed} failed`);
if (failed > 0) process.exit(1);
