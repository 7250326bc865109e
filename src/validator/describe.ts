import type { JsonValue, SchemaNode } from "../schema/SchemaNode.js";

const MAX_SUMMARY_LENGTH = 40;

/**
 * Short human description of what a schema node accepts.
 */
export function describeNode(node: SchemaNode): string {
  switch (node.kind) {
    case "any":
      return "any value";
    case "primitive":
      return node.type;
    case "object":
      return "object";
    case "array":
      return node.items.kind === "primitive" ? `array of ${node.items.type}` : "array";
    case "enum":
      return node.values.length === 1
        ? literal(node.values[0])
        : `one of ${node.values.map(literal).join(", ")}`;
    case "union":
      return node.variants.map(describeNode).join(" | ");
    case "reference":
      return node.target;
  }
}

/**
 * Short human summary of a candidate value, used as the "got" part of a
 * violation.
 */
export function summarizeValue(value: JsonValue): string {
  if (Array.isArray(value)) {
    return value.length === 0 ? "empty array" : `array of length ${value.length}`;
  }

  if (value !== null && typeof value === "object") {
    return "object";
  }

  return literal(value);
}

function literal(value: JsonValue): string {
  const text = JSON.stringify(value);
  // Cut by code point; a surrogate pair is never split.
  const chars = [...text];

  return chars.length > MAX_SUMMARY_LENGTH
    ? `${chars.slice(0, MAX_SUMMARY_LENGTH - 3).join("")}...`
    : text;
}
