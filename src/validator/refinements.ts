import { asArray } from "../utils/normalize.js";
import type { Refinement, RefinementMap } from "./Validator.js";

/**
 * Combine refinement maps; refinements for the same schema name run in
 * argument order.
 */
export function mergeRefinements(...maps: (RefinementMap | undefined)[]): RefinementMap {
  const merged = new Map<string, Refinement[]>();

  for (const map of maps) {
    for (const [name, entry] of Object.entries(map ?? {})) {
      merged.set(name, [...(merged.get(name) ?? []), ...asArray(entry)]);
    }
  }

  return Object.fromEntries(merged);
}
