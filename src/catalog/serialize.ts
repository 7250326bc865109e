import type { JsonValue } from "../schema/SchemaNode.js";

/**
 * Catalog file text: two-space indentation, non-ASCII characters kept as
 * they are, trailing newline.
 */
export function serializeCatalog(value: JsonValue): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}
