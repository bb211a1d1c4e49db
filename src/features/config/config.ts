/**
 * Harness configuration loader.
 *
 * Reads `golden-trace.yml` from the fixtures root (or an explicit
 * `--config` file), validates it against
 * `schema/harness-config.schema.json` via ajv, and fills in defaults.
 * Every key is optional; a missing default config file means "all
 * defaults".
 */
import { createRequire } from "node:module";
import { readFileSync, existsSync } from "node:fs";
import { join, resolve } from "node:path";
import type { HarnessConfig } from "../../shared/types/harness.js";
import { ConfigError } from "../../shared/errors.js";
import { CONFIG_FILE, expandHome, schemaDir } from "../../shared/paths.js";
import { parseYaml } from "../../shared/yaml.js";
import { renderBuildCommand } from "../harness/build-runner.js";

// ajv is a CJS package; use createRequire for clean interop
// under both tsc (NodeNext resolution) and tsx (ESM runtime).
const require = createRequire(import.meta.url);
const Ajv = require("ajv").default as typeof import("ajv").default;

const SCHEMA_ID = "harness-config";

/** Shape of the config file on disk: every key optional. */
export type HarnessConfigFile = Partial<HarnessConfig>;

/** Options for {@link loadHarnessConfig}. */
export interface ConfigOptions {
  /** Absolute fixtures root; the default config file is looked up here. */
  root: string;
  /** Explicit config file; must exist when given. */
  configPath?: string;
  /** Override the schema directory (tests). */
  schemaDir?: string;
}

/** Configuration used when no file overrides a key. */
export const DEFAULT_CONFIG: HarnessConfig = {
  activeConfig: "Cargo.toml",
  generalManifest: "general",
  resolveTarget: "general",
  buildCommand: ["cargo", "build", "--bin", "{{binary}}"],
  toolBinDir: "~/.cargo/bin",
  timeoutMs: 0,
  blankLines: "ignore",
};

// ── Validation ────────────────────────────────────────────────────────

/** Compile the config schema into a type-guarding validator. */
function buildValidator(dir: string) {
  const ajv = new Ajv({ allErrors: true, strict: true });
  const schema = JSON.parse(readFileSync(join(dir, "harness-config.schema.json"), "utf-8"));
  ajv.addSchema(schema, SCHEMA_ID);
  const validate = ajv.getSchema<HarnessConfigFile>(SCHEMA_ID);
  if (!validate) {
    throw new Error(`Schema "${SCHEMA_ID}" not found in ajv`);
  }
  return validate;
}

/**
 * Validate parsed YAML against the config schema.
 *
 * An empty document (`null`) is an empty config.
 *
 * @throws {ConfigError} listing every schema violation.
 */
export function validateHarnessConfig(
  data: unknown,
  path: string,
  dir: string = schemaDir(),
): HarnessConfigFile {
  if (data === null || data === undefined) return {};
  const validate = buildValidator(dir);
  if (validate(data)) return data;

  const problems = (validate.errors ?? []).map((e) => {
    const loc = e.instancePath ? `${e.instancePath}: ` : "";
    const extra = e.keyword === "additionalProperties" && "additionalProperty" in e.params
      ? ` (${String(e.params.additionalProperty)})`
      : "";
    return `${loc}${e.message ?? e.keyword}${extra}`;
  });
  throw new ConfigError(path, problems);
}

// ── Loading ───────────────────────────────────────────────────────────

/** Merge a validated config file over the defaults. */
export function resolveHarnessConfig(file: HarnessConfigFile): HarnessConfig {
  const merged: HarnessConfig = { ...DEFAULT_CONFIG, ...file };
  return { ...merged, toolBinDir: expandHome(merged.toolBinDir) };
}

/**
 * Render every `buildCommand` template against a sample context.
 *
 * @throws {ConfigError} naming each element that references an unknown
 *   variable or does not parse.
 */
export function checkBuildCommand(config: HarnessConfig, path: string, root: string): void {
  const sample = { binary: config.generalManifest, manifest: config.generalManifest, root };
  const problems: string[] = [];
  config.buildCommand.forEach((template, i) => {
    try {
      renderBuildCommand([template], sample);
    } catch (err) {
      problems.push(`/buildCommand/${i}: ${err instanceof Error ? err.message : String(err)}`);
    }
  });
  if (problems.length > 0) throw new ConfigError(path, problems);
}

/**
 * Load the effective harness configuration.
 *
 * @throws {ConfigError} when an explicit config file is missing, any
 *   config file fails validation or a build command template cannot be
 *   rendered.
 * @throws {yaml.YAMLException} on malformed YAML.
 */
export function loadHarnessConfig(opts: ConfigOptions): HarnessConfig {
  const path = opts.configPath !== undefined
    ? resolve(opts.configPath)
    : join(opts.root, CONFIG_FILE);

  if (!existsSync(path)) {
    if (opts.configPath !== undefined) throw new ConfigError(path, ["file does not exist"]);
    return resolveHarnessConfig({});
  }

  const data = parseYaml(readFileSync(path, "utf-8"), path);
  const config = resolveHarnessConfig(validateHarnessConfig(data, path, opts.schemaDir));
  checkBuildCommand(config, path, opts.root);
  return config;
}
