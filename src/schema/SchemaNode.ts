/**
 * In-memory schema model.
 *
 * A schema document is read once into these nodes and never mutated
 * afterwards (the loader freezes them). Nodes reference each other by name
 * only through `reference` nodes; the lookup table lives on SchemaDocument.
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export type JsonObject = { [key: string]: JsonValue };

export type PrimitiveType = "string" | "number" | "integer" | "boolean" | "null";

export interface PrimitiveConstraints {
  readonly minLength?: number;
  readonly maxLength?: number;
  readonly pattern?: string;
  readonly format?: string;
  readonly minimum?: number;
  readonly maximum?: number;
}

interface Annotated {
  readonly description?: string;
}

export interface PrimitiveNode extends Annotated {
  readonly kind: "primitive";
  readonly type: PrimitiveType;
  readonly constraints?: PrimitiveConstraints;
}

export interface ObjectNode extends Annotated {
  readonly kind: "object";
  readonly fields: Readonly<Record<string, SchemaNode>>;
  readonly required: readonly string[];
  /** `false` makes the object strict; a node constrains undeclared values. */
  readonly additionalProperties: boolean | SchemaNode;
}

export interface ArrayNode extends Annotated {
  readonly kind: "array";
  readonly items: SchemaNode;
  readonly minItems?: number;
  readonly maxItems?: number;
  readonly uniqueItems?: boolean;
}

export interface UnionNode extends Annotated {
  readonly kind: "union";
  readonly variants: readonly SchemaNode[];
  readonly combinator: "anyOf" | "oneOf";
  /** Declared discriminator. Inferred ones live in the document's dispatch tables. */
  readonly discriminator?: string;
}

export interface EnumNode extends Annotated {
  readonly kind: "enum";
  readonly values: readonly JsonValue[];
}

export interface ReferenceNode extends Annotated {
  readonly kind: "reference";
  readonly target: string;
}

export interface AnyNode extends Annotated {
  readonly kind: "any";
}

export type SchemaNode =
  | PrimitiveNode
  | ObjectNode
  | ArrayNode
  | UnionNode
  | EnumNode
  | ReferenceNode
  | AnyNode;

export interface NamedSchema {
  readonly name: string;
  readonly node: SchemaNode;
}

/** Name of the document root; `$ref: "#"` points here. */
export const ROOT_SCHEMA_NAME = "#";
