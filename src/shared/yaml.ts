/**
 * YAML parse / stringify helpers.
 *
 * Thin wrappers around js-yaml that pin options.
 */
import yaml from "js-yaml";

/**
 * Parse a YAML string.  `filename` is reported in parse errors.
 *
 * @throws {yaml.YAMLException} on malformed YAML.
 */
export function parseYaml(text: string, filename?: string): unknown {
  return yaml.load(text, { filename });
}

/**
 * Stringify a value to a YAML string.
 *
 * Uses block-style scalars and 2-space indent for readability.
 */
export function stringifyYaml(value: unknown): string {
  return yaml.dump(value, {
    indent: 2,
    lineWidth: 120,
    noRefs: true,
    sortKeys: false,
  });
}
