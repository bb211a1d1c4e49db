#!/usr/bin/env node
import { Command } from "commander";
import { registerRun } from "./features/harness/commands/run.js";
import { registerList } from "./features/fixtures/commands/list.js";
import { registerConfig } from "./features/config/commands/config.js";
import { formatCliError } from "./shared/errors.js";

/** Whether to show full stack traces (set DEBUG=1 in env). */
const DEBUG = Boolean(process.env.DEBUG);

// ── CLI setup ─────────────────────────────────────────────────────────

const program = new Command();

program
  .name("golden-trace")
  .description("Golden-output regression harness for a trace resolve/replay tool")
  .version("0.1.0");

registerRun(program);
registerList(program);
registerConfig(program);

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${formatCliError(err)}`);
  if (DEBUG && err instanceof Error && err.stack) {
    console.error(`\nStack trace:\n${err.stack}`);
  }
  process.exit(1);
});
