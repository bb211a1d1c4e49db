/**
 * `golden-trace run <tool>` command (the default): run the suites.
 *
 * Loads config and the fixture catalog, enters the fixtures root, runs
 * binary → manifest → trace and exits 1 on the first failure.  On
 * failure the captured tool output is echoed to stderr before the
 * failing expectation.
 */
import { type Command as Cmd, InvalidArgumentError, Option } from "commander";
import type { SuiteName } from "../../../shared/types/harness.js";
import { SUITE_ORDER } from "../../../shared/types/harness.js";
import {
  ExpectationMismatch,
  ReplayInvocationFailure,
  describeExit,
} from "../../../shared/errors.js";
import { fixturesRoot } from "../../../shared/paths.js";
import { type ProcessRunner, formatCommand, spawnProcess } from "../../../shared/process.js";
import { withWorkingDirectory } from "../../../shared/workdir.js";
import { loadHarnessConfig } from "../../config/config.js";
import { loadFixtureCatalog } from "../../fixtures/catalog.js";
import { resolveToolPath } from "../tool-invoker.js";
import { runSuites, type HarnessEvent, type SuiteResult } from "../suite-runner.js";

interface RunOptions {
  root?: string;
  config?: string;
  suite?: string[];
  timeout?: number;
  verbose?: boolean;
}

const SUITE_TITLES: Record<SuiteName, string> = {
  binary: "Per-binary resolve",
  manifest: "Per-manifest resolve",
  trace: "Trace replay",
};

function isSuiteName(value: string): value is SuiteName {
  return SUITE_ORDER.some((s) => s === value);
}

/** Parse `--timeout`: a non-negative integer number of milliseconds. */
function parseTimeout(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer (milliseconds).");
  }
  return ms;
}

/** Wrap a runner so every command line is echoed before it runs. */
function echoing(runner: ProcessRunner): ProcessRunner {
  return (request) => {
    console.log(`$ ${formatCommand(request.command, request.args)}`);
    return runner(request);
  };
}

/** Print one progress event. */
function reportEvent(event: HarnessEvent, verbose: boolean): void {
  switch (event.type) {
    case "suite-start":
      console.log(`\n${SUITE_TITLES[event.suite]} (${event.fixtures} fixture(s))`);
      break;
    case "activate":
      if (verbose) console.log(`Activated manifest ${event.active.manifest} → ${event.active.path}`);
      break;
    case "build-failed":
      console.warn(`⚠  Build of ${event.fixture.name} failed (${describeExit(event.build.output)}); checking tool output anyway`);
      if (verbose) console.warn(event.build.output.text.trimEnd());
      break;
    case "resolve-nonzero":
      if (verbose) {
        console.log(`  resolve-only exited unsuccessfully (${describeExit(event.output)}):`);
        console.log(event.output.text.trimEnd());
      }
      break;
    case "fixture-passed":
      console.log(`✓ ${event.suite} ${event.fixture.name}`);
      break;
  }
}

/** Print the captured output (when there is one) and the failing cause. */
function reportAbort(result: Extract<SuiteResult, { status: "aborted" }>): void {
  const { error } = result;
  if (error instanceof ExpectationMismatch || error instanceof ReplayInvocationFailure) {
    console.error(`\n--- captured output: ${result.suite} ${result.fixture} ---`);
    console.error(error.output.text.trimEnd());
    console.error("--- end of captured output ---");
  }
  console.error(`\n✗ ${SUITE_TITLES[result.suite]} aborted at ${result.fixture}: ${error.message}`);
}

/** Register the `run` subcommand (default). */
export function registerRun(program: Cmd): void {
  program
    .command("run", { isDefault: true })
    .description("Run the golden-output suites against a tool binary")
    .argument("<tool>", "Path to the tool binary under test")
    .option("-r, --root <path>", "Override fixtures root")
    .option("-c, --config <path>", "Harness config file (default: <root>/golden-trace.yml)")
    .addOption(
      new Option("-s, --suite <names...>", "Only run these suites, in the usual order")
        .choices([...SUITE_ORDER]),
    )
    .option("--timeout <ms>", "Kill any process running longer than this", parseTimeout)
    .option("-v, --verbose", "Echo every command and nonzero resolve output")
    .action(async (tool: string, opts: RunOptions) => {
      const verbose = Boolean(opts.verbose);
      const root = fixturesRoot(opts.root);
      const loaded = loadHarnessConfig({ root, configPath: opts.config });
      const config = opts.timeout === undefined ? loaded : { ...loaded, timeoutMs: opts.timeout };

      // Resolve before entering the fixtures root
      const toolPath = resolveToolPath(tool);
      const catalog = loadFixtureCatalog(root);

      const result = await withWorkingDirectory(root, () =>
        runSuites(catalog, {
          config,
          tool: toolPath,
          runner: verbose ? echoing(spawnProcess) : spawnProcess,
          suites: opts.suite?.filter(isSuiteName),
          onEvent: (event) => reportEvent(event, verbose),
        }),
      );

      if (result.status === "aborted") {
        reportAbort(result);
        process.exit(1);
      }
      console.log(`\n✓ All ${result.checked} fixture(s) matched their expected output.`);
    });
}
