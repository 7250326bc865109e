import { JSON_SCHEMA, load } from "js-yaml";

/**
 * parseYAML: Parses a YAML document with js-yaml.
 *
 * Uses the JSON schema so that timestamps and other YAML-only scalars stay
 * strings, and the result is always a JSON-like value.
 *
 * @param rawContent - Raw YAML string content.
 * @returns Parsed value (`null` for an empty document).
 */
export function parseYAML({ rawContent }: { rawContent: string }): unknown {
  const parsed = load(rawContent, { schema: JSON_SCHEMA });

  return parsed === undefined ? null : parsed;
}
