import type { JsonValue } from "../schema/SchemaNode.js";
import type { SchemaDocument } from "../schema/SchemaDocument.js";
import type { PathSegment, Violation } from "./Violation.js";

/**
 * Declarative JSON Schema, restricted to the keywords the loader reads.
 */
export type JSONSchema = {
  $schema?: string;
  $id?: string;
  $ref?: string;
  $defs?: Record<string, JSONSchema>;
  definitions?: Record<string, JSONSchema>;
  title?: string;
  description?: string;
  type?: string | string[];
  properties?: Record<string, JSONSchema>;
  required?: string[];
  additionalProperties?: boolean | JSONSchema;
  items?: JSONSchema;
  minItems?: number;
  maxItems?: number;
  uniqueItems?: boolean;
  enum?: JsonValue[];
  const?: JsonValue;
  anyOf?: JSONSchema[];
  oneOf?: JSONSchema[];
  discriminator?: { propertyName: string };
  minLength?: number;
  maxLength?: number;
  pattern?: string;
  format?: string;
  minimum?: number;
  maximum?: number;
};

/**
 * A problem found by a refinement, relative to the value it was given.
 */
export interface RefinementIssue {
  path?: readonly PathSegment[];
  expected: string;
  actual: string;
}

/**
 * A check that cannot be expressed declaratively. Runs on a value after it
 * passed the structural check of the named schema it is registered for.
 */
export type Refinement = (value: JsonValue) => RefinementIssue[];

/**
 * Refinements keyed by named schema (`#` is the document root).
 */
export type RefinementMap = Readonly<Record<string, Refinement | readonly Refinement[]>>;

export interface ValidateOptions {
  refinements?: RefinementMap;
}

/**
 * Validator interface for schema-based data validation.
 */
export interface Validator {
  /**
   * Validates a candidate value against a loaded schema document.
   *
   * @param document - The schema to validate against.
   * @param candidate - A parsed JSON-like value.
   * @param options - Refinements to run on top of the declarative schema.
   * @returns Every violation found, in document order; empty when valid.
   * @throws CandidateParseError if the candidate is not a JSON-like value.
   */
  validate(
    document: SchemaDocument,
    candidate: unknown,
    options?: ValidateOptions
  ): Violation[];
}
