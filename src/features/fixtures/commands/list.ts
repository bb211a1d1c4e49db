/**
 * `golden-trace list` command: list the fixture catalog.
 *
 * Displays every fixture the suites would run, in run order, with its
 * fixture file and expected-output file.  Expected-output files that do
 * not exist are marked rather than treated as errors.
 */
import { existsSync } from "node:fs";
import { type Command as Cmd, Option } from "commander";
import type { FixtureCatalog, FixtureKind } from "../../../shared/types/harness.js";
import { fixturesRoot, rootRelative } from "../../../shared/paths.js";
import { scanFixtureCatalog } from "../catalog.js";

const MISSING_MARK = " (missing)";

/** A row in the list output table. */
interface ListRow {
  kind: string;
  name: string;
  fixture: string;
  expected: string;
}

/** Flatten the catalog into rows, suites in run order. */
export function collectRows(catalog: FixtureCatalog): ListRow[] {
  return [...catalog.binaries, ...catalog.manifests, ...catalog.traces].map((f) => ({
    kind: f.kind,
    name: f.name,
    fixture: rootRelative(f.path, catalog.root),
    expected: rootRelative(f.expectedPath, catalog.root) + (existsSync(f.expectedPath) ? "" : MISSING_MARK),
  }));
}

/** Print rows as an aligned text table. */
function printTable(rows: ListRow[]): void {
  if (rows.length === 0) {
    console.log("No fixtures found.");
    return;
  }

  const header = { kind: "KIND", name: "NAME", fixture: "FIXTURE", expected: "EXPECTED" };
  const allRows = [header, ...rows];

  const widths = {
    kind: Math.max(...allRows.map((r) => r.kind.length)),
    name: Math.max(...allRows.map((r) => r.name.length)),
    fixture: Math.max(...allRows.map((r) => r.fixture.length)),
  };

  for (const row of allRows) {
    console.log([
      row.kind.padEnd(widths.kind),
      row.name.padEnd(widths.name),
      row.fixture.padEnd(widths.fixture),
      row.expected,
    ].join("  "));
  }
}

/** Register the `list` subcommand. */
export function registerList(program: Cmd): void {
  program
    .command("list")
    .description("List fixtures and their expected-output files")
    .addOption(
      new Option("-k, --kind <kind>", "Filter by fixture kind").choices(["binary", "manifest", "trace"] satisfies FixtureKind[]),
    )
    .option("-r, --root <path>", "Override fixtures root")
    .action((opts: { kind?: string; root?: string }) => {
      const catalog = scanFixtureCatalog(fixturesRoot(opts.root));
      let rows = collectRows(catalog);

      if (opts.kind) {
        rows = rows.filter((r) => r.kind === opts.kind);
      }

      console.log(`\n${rows.length} fixture(s) found:\n`);
      printTable(rows);
    });
}
