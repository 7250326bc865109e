import type { SchemaDocument } from "../schema/SchemaDocument.js";
import { mergeRefinements } from "../validator/refinements.js";
import type { RefinementMap, Validator } from "../validator/Validator.js";
import type { Violation } from "../validator/Violation.js";
import { defaultValidator } from "../validator/defaultValidator.js";
import { catalogRefinements, pathTraversal } from "./refinements.js";

/** Named schema in the plugin manifest schema for component paths. */
export const MANIFEST_RELATIVE_PATH_SCHEMA = "RelativePath";

export interface CatalogValidationOptions {
  reservedNames?: readonly string[];
  refinements?: RefinementMap;
  validator?: Validator;
}

/**
 * Validates a marketplace catalog: the schema, then duplicate plugin names,
 * reserved marketplace names and relative sources escaping the catalog root.
 */
export function validateCatalog(
  schema: SchemaDocument,
  catalog: unknown,
  { reservedNames = [], refinements, validator = defaultValidator }: CatalogValidationOptions = {}
): Violation[] {
  return validator.validate(schema, catalog, {
    refinements: mergeRefinements(catalogRefinements(reservedNames), refinements),
  });
}

/**
 * Validates a plugin manifest. Component paths may not leave the plugin root.
 */
export function validateManifest(
  schema: SchemaDocument,
  manifest: unknown,
  { refinements, validator = defaultValidator }: Omit<CatalogValidationOptions, "reservedNames"> = {}
): Violation[] {
  return validator.validate(schema, manifest, {
    refinements: mergeRefinements({ [MANIFEST_RELATIVE_PATH_SCHEMA]: pathTraversal }, refinements),
  });
}
