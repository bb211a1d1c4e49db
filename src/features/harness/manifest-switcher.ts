/**
 * Manifest switcher.
 *
 * Installs a manifest fixture as the active project configuration by
 * copying it over the active-configuration file in the fixtures root.
 */
import { copyFileSync } from "node:fs";
import { join } from "node:path";
import type { ActiveConfiguration, Fixture } from "../../shared/types/harness.js";

/**
 * Copy `manifest` over `<root>/<activeConfig>`, replacing any previous
 * content.  The copy is synchronous, so it is complete before the next
 * build or invocation reads the file.
 */
export function activateManifest(
  manifest: Pick<Fixture, "name" | "path">,
  root: string,
  activeConfig: string,
): ActiveConfiguration {
  const target = join(root, activeConfig);
  copyFileSync(manifest.path, target);
  return { manifest: manifest.name, path: target };
}
