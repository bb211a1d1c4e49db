/**
 * Path resolution utilities.
 *
 * Two resolution strategies:
 *
 * 1. **Fixture paths** (`fixturesRoot`, `binariesDir`, `expectedDir`, …)
 *    resolve from `process.cwd()` (or an explicit `--root` override).
 *    This is the fixture tree the harness runs against.
 *
 * 2. **Package asset paths** (`packageRoot`, `schemaDir`) resolve from
 *    this module's own location.  The config schema ships with the
 *    package.
 */
import { resolve, join, relative, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { homedir } from "node:os";

/** Default name of the harness configuration file in the fixtures root. */
export const CONFIG_FILE = "golden-trace.yml";

/** Extensions of the fixture files, per fixture directory. */
export const BINARY_EXT = ".rs";
export const MANIFEST_EXT = ".toml";
export const TRACE_EXT = ".trace";
export const EXPECTED_EXT = ".run";

/** File-name prefix of trace expected-output fixtures. */
export const TRACE_EXPECTED_PREFIX = "trace-";

/**
 * Resolve the package installation root.
 *
 * From source (`src/shared/`) and from the compiled output
 * (`dist/shared/`) alike, this is two levels up.
 */
export function packageRoot(): string {
  return resolve(dirname(fileURLToPath(import.meta.url)), "../..");
}

/**
 * Resolve the fixtures root.
 *
 * Defaults to `process.cwd()`; callers override with the `--root` flag.
 */
export function fixturesRoot(override?: string): string {
  if (override) return resolve(override);
  return resolve(process.cwd());
}

/** Absolute path to `src/bin/` (binary fixtures). */
export function binariesDir(root: string): string {
  return join(root, "src", "bin");
}

/** Absolute path to `manifests/` (project-configuration fixtures). */
export function manifestsDir(root: string): string {
  return join(root, "manifests");
}

/** Absolute path to `traces/` (trace-file fixtures). */
export function tracesDir(root: string): string {
  return join(root, "traces");
}

/** Absolute path to `out/` (expected-output fixtures). */
export function expectedDir(root: string): string {
  return join(root, "out");
}

/** Absolute path to `schema/` in the package. */
export function schemaDir(): string {
  return join(packageRoot(), "schema");
}

/** Expand a leading `~` to the current user's home directory. */
export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}

/**
 * Turn an absolute path into a root-relative POSIX path
 * (forward slashes, no leading `./`).
 */
export function rootRelative(absPath: string, root: string): string {
  return relative(root, absPath).replace(/\\/g, "/");
}
