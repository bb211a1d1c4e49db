/**
 * `golden-trace config` command: print the effective configuration.
 */
import type { Command as Cmd } from "commander";
import { fixturesRoot } from "../../../shared/paths.js";
import { stringifyYaml } from "../../../shared/yaml.js";
import { loadHarnessConfig } from "../config.js";

/** Register the `config` subcommand. */
export function registerConfig(program: Cmd): void {
  program
    .command("config")
    .description("Print the effective harness configuration as YAML")
    .option("-c, --config <path>", "Harness config file (default: <root>/golden-trace.yml)")
    .option("-r, --root <path>", "Override fixtures root")
    .action((opts: { config?: string; root?: string }) => {
      const config = loadHarnessConfig({ root: fixturesRoot(opts.root), configPath: opts.config });
      process.stdout.write(stringifyYaml(config));
    });
}
