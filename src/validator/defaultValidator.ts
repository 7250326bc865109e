import { ValidationViolationError } from "../errors.js";
import type { SchemaDocument } from "../schema/SchemaDocument.js";
import type { ValidateOptions, Validator } from "./Validator.js";
import { validateDocument } from "./validateDocument.js";

/**
 * The built-in Validator, backed by the structural engine in `validateDocument`.
 */
export const defaultValidator: Validator = {
  validate(document, candidate, options) {
    return validateDocument(document, candidate, options);
  },
};

/**
 * Validates and throws when anything is wrong.
 *
 * @throws ValidationViolationError carrying the whole violation batch.
 */
export function assertValid(
  document: SchemaDocument,
  candidate: unknown,
  options?: ValidateOptions,
  validator: Validator = defaultValidator
): void {
  const violations = validator.validate(document, candidate, options);

  if (violations.length > 0) {
    throw new ValidationViolationError(violations);
  }
}
