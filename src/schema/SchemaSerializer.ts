import type { JSONSchema } from "../validator/Validator.js";
import { encodePointerToken } from "../utils/path.js";
import { SchemaDocument } from "./SchemaDocument.js";
import { ROOT_SCHEMA_NAME, SchemaNode } from "./SchemaNode.js";

export const JSON_SCHEMA_DIALECT = "https://json-schema.org/draft/2020-12/schema";

/**
 * Writes a schema document back to declarative JSON Schema: the root at the
 * top level, every other named schema under `$defs`.
 *
 * Inferred discriminators are not written; loading the output infers them
 * again.
 */
export function serializeSchema(document: SchemaDocument): JSONSchema {
  const out: JSONSchema = {
    $schema: JSON_SCHEMA_DIALECT,
    ...serializeNode(document.root.node),
  };

  const defs = document.schemas.filter((schema) => schema.name !== ROOT_SCHEMA_NAME);
  if (defs.length > 0) {
    out.$defs = Object.fromEntries(defs.map((schema) => [schema.name, serializeNode(schema.node)]));
  }

  return out;
}

export function serializeNode(node: SchemaNode): JSONSchema {
  const out = serializeShape(node);
  if (node.description !== undefined) out.description = node.description;

  return out;
}

function serializeShape(node: SchemaNode): JSONSchema {
  switch (node.kind) {
    case "any":
      return {};

    case "primitive":
      return { type: node.type, ...node.constraints };

    case "object": {
      const out: JSONSchema = {
        type: "object",
        properties: Object.fromEntries(
          Object.entries(node.fields).map(([name, field]) => [name, serializeNode(field)])
        ),
      };
      if (node.required.length > 0) out.required = [...node.required];
      if (node.additionalProperties !== true) {
        out.additionalProperties =
          node.additionalProperties === false ? false : serializeNode(node.additionalProperties);
      }
      return out;
    }

    case "array": {
      const out: JSONSchema = { type: "array" };
      if (node.items.kind !== "any" || node.items.description !== undefined) {
        out.items = serializeNode(node.items);
      }
      if (node.minItems !== undefined) out.minItems = node.minItems;
      if (node.maxItems !== undefined) out.maxItems = node.maxItems;
      if (node.uniqueItems) out.uniqueItems = true;
      return out;
    }

    case "union": {
      const variants = node.variants.map(serializeNode);
      const out: JSONSchema =
        node.combinator === "oneOf" ? { oneOf: variants } : { anyOf: variants };
      if (node.discriminator !== undefined) {
        out.discriminator = { propertyName: node.discriminator };
      }
      return out;
    }

    case "enum":
      return node.values.length === 1 ? { const: node.values[0] } : { enum: [...node.values] };

    case "reference":
      return {
        $ref:
          node.target === ROOT_SCHEMA_NAME
            ? "#"
            : `#/$defs/${encodePointerToken(node.target)}`,
      };
  }
}
