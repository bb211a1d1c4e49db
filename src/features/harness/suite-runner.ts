/**
 * Suite runner.
 *
 * Runs the three golden-output suites strictly in sequence:
 *
 * 1. **binary**   : activate the general manifest once, then per binary
 *                   fixture: build → resolve-only → match.
 * 2. **manifest** : per manifest fixture: activate → resolve-only of the
 *                   fixed target → match.
 * 3. **trace**    : per trace fixture: replay → match.
 *
 * The first fatal condition anywhere ends the run as `aborted`; no later
 * fixture or suite is touched.  Build failures and nonzero resolve-only
 * exits are not fatal and are only published as events.
 */
import type {
  ActiveConfiguration,
  CapturedOutput,
  Fixture,
  FixtureCatalog,
  HarnessConfig,
  SuiteName,
} from "../../shared/types/harness.js";
import { SUITE_ORDER } from "../../shared/types/harness.js";
import { ExpectationMismatch, HarnessError } from "../../shared/errors.js";
import { type ProcessRunner, succeeded } from "../../shared/process.js";
import { rootRelative } from "../../shared/paths.js";
import { readExpectedOutput } from "../fixtures/expected-output.js";
import { activateManifest } from "./manifest-switcher.js";
import { buildBinary, type BuildOutcome } from "./build-runner.js";
import { invokeTool, type InvokeOptions } from "./tool-invoker.js";
import { checkExpectations } from "./matcher.js";

// ── Types ─────────────────────────────────────────────────────────────

/** Progress notifications published while the suites run. */
export type HarnessEvent =
  | { type: "suite-start"; suite: SuiteName; fixtures: number }
  | { type: "activate"; active: ActiveConfiguration }
  | { type: "build-failed"; fixture: Fixture; build: BuildOutcome }
  | { type: "resolve-nonzero"; fixture: Fixture; output: CapturedOutput }
  | { type: "fixture-passed"; suite: SuiteName; fixture: Fixture };

/** Everything a run needs besides the catalog. */
export interface SuiteDeps {
  config: HarnessConfig;
  /** Absolute path to the tool binary under test. */
  tool: string;
  runner: ProcessRunner;
  /** Suites to run; defaults to all three.  Order is always binary → manifest → trace. */
  suites?: readonly SuiteName[];
  /** Base environment for tool invocations; defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
  onEvent?: (event: HarnessEvent) => void;
}

/** Overall result of a run. */
export type SuiteResult =
  | { status: "passed"; checked: number }
  | { status: "aborted"; suite: SuiteName; fixture: string; error: HarnessError };

// ── Runner ────────────────────────────────────────────────────────────

class SuiteRun {
  private readonly invokeOpts: InvokeOptions;

  constructor(
    private readonly catalog: FixtureCatalog,
    private readonly deps: SuiteDeps,
  ) {
    this.invokeOpts = {
      tool: deps.tool,
      root: catalog.root,
      toolBinDir: deps.config.toolBinDir,
      runner: deps.runner,
      timeoutMs: deps.config.timeoutMs,
      env: deps.env,
    };
  }

  emit(event: HarnessEvent): void {
    this.deps.onEvent?.(event);
  }

  fixtures(suite: SuiteName): Fixture[] {
    switch (suite) {
      case "binary":
        return this.catalog.binaries;
      case "manifest":
        return this.catalog.manifests;
      case "trace":
        return this.catalog.traces;
    }
  }

  activate(manifest: Fixture): ActiveConfiguration {
    const active = activateManifest(manifest, this.catalog.root, this.deps.config.activeConfig);
    this.emit({ type: "activate", active });
    return active;
  }

  /** Install the general manifest ahead of the per-binary suite. */
  activateGeneral(): ActiveConfiguration {
    const name = this.deps.config.generalManifest;
    const general = this.catalog.manifests.find((m) => m.name === name);
    if (!general) {
      throw new HarnessError(`General manifest "${name}" not found in manifests/`);
    }
    return this.activate(general);
  }

  /** Match captured output against a fixture's expected output; throw on the first miss. */
  match(fixture: Fixture, output: CapturedOutput): void {
    const expected = readExpectedOutput(fixture.expectedPath, this.deps.config.blankLines);
    const result = checkExpectations(output.text, expected.lines);
    if (!result.ok) {
      throw new ExpectationMismatch(fixture, result.missing, output);
    }
  }

  async resolveOnly(fixture: Fixture, target: string, active: ActiveConfiguration): Promise<CapturedOutput> {
    const output = await invokeTool({ mode: "resolve-only", target, active }, this.invokeOpts);
    if (!succeeded(output)) {
      this.emit({ type: "resolve-nonzero", fixture, output });
    }
    return output;
  }

  async binary(fixture: Fixture, active: ActiveConfiguration): Promise<void> {
    const build = await buildBinary(fixture.name, active, {
      command: this.deps.config.buildCommand,
      root: this.catalog.root,
      runner: this.deps.runner,
      timeoutMs: this.deps.config.timeoutMs,
    });
    if (!build.ok) {
      this.emit({ type: "build-failed", fixture, build });
    }
    this.match(fixture, await this.resolveOnly(fixture, fixture.name, active));
  }

  async manifest(fixture: Fixture): Promise<void> {
    const active = this.activate(fixture);
    this.match(fixture, await this.resolveOnly(fixture, this.deps.config.resolveTarget, active));
  }

  async trace(fixture: Fixture): Promise<void> {
    const output = await invokeTool(
      { mode: "replay", traceFile: rootRelative(fixture.path, this.catalog.root), name: fixture.name },
      this.invokeOpts,
    );
    this.match(fixture, output);
  }

  /** Run one suite to completion; throws on the first fatal condition. */
  async suite(suite: SuiteName, onFixture: (name: string) => void): Promise<number> {
    const fixtures = this.fixtures(suite);
    this.emit({ type: "suite-start", suite, fixtures: fixtures.length });

    const general = suite === "binary" ? this.activateGeneral() : undefined;
    for (const fixture of fixtures) {
      onFixture(fixture.name);
      if (general) await this.binary(fixture, general);
      else if (suite === "manifest") await this.manifest(fixture);
      else await this.trace(fixture);
      this.emit({ type: "fixture-passed", suite, fixture });
    }
    return fixtures.length;
  }
}

/**
 * Run the selected suites against `catalog`.
 *
 * Resolves to `aborted` on the first {@link HarnessError}; any other
 * error propagates unchanged.
 */
export async function runSuites(catalog: FixtureCatalog, deps: SuiteDeps): Promise<SuiteResult> {
  const run = new SuiteRun(catalog, deps);
  const selected = new Set<SuiteName>(deps.suites ?? SUITE_ORDER);
  let checked = 0;

  for (const suite of SUITE_ORDER) {
    if (!selected.has(suite)) continue;
    // "(setup)" until the first fixture of the suite starts
    let current = "(setup)";
    try {
      checked += await run.suite(suite, (name) => {
        current = name;
      });
    } catch (err) {
      if (err instanceof HarnessError) {
        return { status: "aborted", suite, fixture: current, error: err };
      }
      throw err;
    }
  }

  return { status: "passed", checked };
}
