import type { JsonObject, JsonValue } from "../schema/SchemaNode.js";
import { defineOwn, isJsonObject } from "../utils/normalize.js";

/** Always taken from the catalog entry, never from the manifest. */
export const PROTECTED_FIELDS = ["name", "source"] as const;

/** Only meaningful in the catalog; kept unless the manifest sets them. */
export const CATALOG_ONLY_FIELDS = ["category", "tags", "strict"] as const;

export const AUTHOR_FIELDS = ["name", "email", "url"] as const;

export const PLUGIN_KEY_ORDER = [
  "name",
  "source",
  "version",
  "description",
  "author",
  "homepage",
  "repository",
  "license",
  "keywords",
  "category",
  "tags",
  "strict",
] as const;

const rank = new Map<string, number>(PLUGIN_KEY_ORDER.map((key, i) => [key, i]));

/**
 * Keeps the documented author fields.
 *
 * @returns the sanitized author, or `undefined` when nothing is left.
 */
export function filterAuthor(value: JsonValue | undefined): JsonObject | undefined {
  if (value === undefined || !isJsonObject(value)) return undefined;

  const author: JsonObject = {};
  for (const field of AUTHOR_FIELDS) {
    if (Object.hasOwn(value, field)) defineOwn(author, field, value[field]);
  }

  return Object.keys(author).length > 0 ? author : undefined;
}

/**
 * Copy of an entry with keys in canonical order; unknown keys follow,
 * alphabetically.
 */
export function orderEntry(entry: JsonObject): JsonObject {
  const keys = Object.keys(entry).sort((a, b) => {
    const ra = rank.get(a) ?? PLUGIN_KEY_ORDER.length;
    const rb = rank.get(b) ?? PLUGIN_KEY_ORDER.length;
    if (ra !== rb) return ra - rb;
    return a < b ? -1 : a > b ? 1 : 0;
  });

  const ordered: JsonObject = {};
  for (const key of keys) defineOwn(ordered, key, entry[key]);

  return ordered;
}

/**
 * Merges a plugin's own manifest into its catalog entry.
 *
 * - `name` and `source` come from the entry;
 * - catalog-only fields come from the entry unless the manifest has them;
 * - every other field comes from the manifest, so fields the manifest no
 *   longer declares are dropped;
 * - the author is reduced to its documented fields.
 *
 * Neither input is modified; the result shares no objects with them.
 */
export function mergePlugin(entry: JsonObject, manifest: JsonObject): JsonObject {
  const merged: JsonObject = {};
  const isProtected = (key: string) => PROTECTED_FIELDS.some((field) => field === key);

  for (const field of [...PROTECTED_FIELDS, ...CATALOG_ONLY_FIELDS]) {
    if (Object.hasOwn(entry, field)) defineOwn(merged, field, structuredClone(entry[field]));
  }

  for (const [key, value] of Object.entries(manifest)) {
    if (isProtected(key)) continue;
    defineOwn(merged, key, structuredClone(value));
  }

  if (Object.hasOwn(merged, "author")) {
    const author = filterAuthor(merged.author);
    if (author) merged.author = author;
    else delete merged.author;
  }

  return orderEntry(merged);
}
