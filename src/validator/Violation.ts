/**
 * One step from the document root: a property name or an array index.
 */
export type PathSegment = string | number;

export type ViolationCode =
  | "type"
  | "required"
  | "unknown-property"
  | "enum"
  | "union"
  | "discriminator"
  | "constraint"
  | "refinement";

/**
 * A single mismatch between a candidate document and its schema.
 */
export interface Violation {
  readonly path: readonly PathSegment[];
  readonly expected: string;
  readonly actual: string;
  readonly code: ViolationCode;
}
