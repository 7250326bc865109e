import type { JsonValue } from "../schema/SchemaNode.js";
import { ROOT_SCHEMA_NAME } from "../schema/SchemaNode.js";
import { isJsonObject } from "../utils/normalize.js";
import { summarizeValue } from "../validator/describe.js";
import type { RefinementIssue, RefinementMap } from "../validator/Validator.js";

/** Named schema of a catalog plugin entry in the marketplace schema. */
export const PLUGIN_ENTRY_SCHEMA = "PluginEntry";

/**
 * Plugin names must be unique within a catalog.
 */
export function duplicatePluginNames(value: JsonValue): RefinementIssue[] {
  if (!isJsonObject(value) || !Array.isArray(value.plugins)) return [];

  const seen = new Map<string, number>();
  const issues: RefinementIssue[] = [];

  value.plugins.forEach((plugin, i) => {
    if (!isJsonObject(plugin) || typeof plugin.name !== "string") return;

    const first = seen.get(plugin.name);
    if (first === undefined) {
      seen.set(plugin.name, i);
      return;
    }

    issues.push({
      path: ["plugins", i, "name"],
      expected: "unique plugin name",
      actual: `duplicate plugin name ${JSON.stringify(plugin.name)} (first used by plugins[${first}])`,
    });
  });

  return issues;
}

/**
 * Marketplace names the host tool keeps for itself.
 */
export function reservedMarketplaceName(reservedNames: readonly string[]) {
  const reserved = new Set(reservedNames.map((name) => name.toLowerCase()));

  return (value: JsonValue): RefinementIssue[] => {
    if (!isJsonObject(value) || typeof value.name !== "string") return [];
    if (!reserved.has(value.name.toLowerCase())) return [];

    return [
      {
        path: ["name"],
        expected: "a marketplace name that is not reserved",
        actual: `reserved name ${JSON.stringify(value.name)}`,
      },
    ];
  };
}

/**
 * Relative paths may not climb out of their root with `..` segments.
 */
export function pathTraversal(value: JsonValue): RefinementIssue[] {
  if (typeof value !== "string") return [];

  const escapes = value.split(/[\\/]/).some((segment) => segment === "..");
  if (!escapes) return [];

  return [
    {
      expected: "a relative path without \"..\" segments",
      actual: summarizeValue(value),
    },
  ];
}

/**
 * A relative plugin source must stay inside the catalog root.
 */
export function relativeSourceTraversal(value: JsonValue): RefinementIssue[] {
  if (!isJsonObject(value) || typeof value.source !== "string") return [];

  return pathTraversal(value.source).map((issue) => ({ ...issue, path: ["source"] }));
}

/**
 * Refinements applied on top of the marketplace schema.
 */
export function catalogRefinements(reservedNames: readonly string[]): RefinementMap {
  return {
    [ROOT_SCHEMA_NAME]: [duplicatePluginNames, reservedMarketplaceName(reservedNames)],
    [PLUGIN_ENTRY_SCHEMA]: relativeSourceTraversal,
  };
}
