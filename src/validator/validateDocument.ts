import { CandidateParseError } from "../errors.js";
import { parseByType } from "../parser/index.js";
import { SchemaDocument } from "../schema/SchemaDocument.js";
import {
  ArrayNode,
  JsonValue,
  ObjectNode,
  PrimitiveNode,
  ROOT_SCHEMA_NAME,
  SchemaNode,
  UnionNode,
} from "../schema/SchemaNode.js";
import { asArray, isJsonObject, jsonEquals } from "../utils/normalize.js";
import { formatPath } from "../utils/path.js";
import { describeNode, summarizeValue } from "./describe.js";
import type { Refinement, ValidateOptions } from "./Validator.js";
import type { PathSegment, Violation } from "./Violation.js";

const MISSING = "nothing (missing required field)";

interface Context {
  document: SchemaDocument;
  refinements: ReadonlyMap<string, readonly Refinement[]>;
}

/**
 * Validates a candidate value against a schema document and returns every
 * violation, in document order.
 *
 * Malformed candidates are reported, never thrown; the only exception is a
 * value that is not JSON-like at all.
 *
 * @param document - Loaded schema.
 * @param candidate - Parsed candidate document.
 * @param options - Refinements keyed by named schema.
 * @throws CandidateParseError if `candidate` is not a JSON-like value.
 */
export function validateDocument(
  document: SchemaDocument,
  candidate: unknown,
  options: ValidateOptions = {}
): Violation[] {
  assertJsonValue(candidate);

  const refinements = new Map<string, readonly Refinement[]>();
  for (const [name, entry] of Object.entries(options.refinements ?? {})) {
    refinements.set(name, asArray(entry));
  }

  return checkNamed(ROOT_SCHEMA_NAME, candidate, [], { document, refinements });
}

/**
 * Parses candidate text with a registered parser.
 *
 * @param text - Raw candidate document.
 * @param options.format - Parser type, `json` by default.
 * @param options.location - File name or label used in errors.
 * @throws CandidateParseError if the text does not parse.
 */
export function parseCandidate(
  text: string,
  { format = "json", location = "candidate" }: { format?: string; location?: string } = {}
): JsonValue {
  let parsed: unknown;

  try {
    parsed = parseByType(format, { rawContent: text });
  } catch (err) {
    throw new CandidateParseError(
      `Malformed ${format} document: ${err instanceof Error ? err.message : String(err)}`,
      location,
      { cause: err }
    );
  }

  assertJsonValue(parsed, location);
  return parsed;
}

/**
 * Asserts that a value is made only of JSON data: plain objects, arrays,
 * strings, finite numbers, booleans and null, without cycles.
 */
export function assertJsonValue(value: unknown, location = "candidate"): asserts value is JsonValue {
  const ancestors = new Set<object>();

  const visit = (current: unknown, path: PathSegment[]): void => {
    const where = path.length === 0 ? location : `${location} ${formatPath(path)}`;

    if (current === null || typeof current === "string" || typeof current === "boolean") {
      return;
    }
    if (typeof current === "number") {
      if (!Number.isFinite(current)) {
        throw new CandidateParseError(`non-finite number ${current}`, where);
      }
      return;
    }
    if (typeof current !== "object") {
      throw new CandidateParseError(`${typeof current} is not a JSON value`, where);
    }
    if (ancestors.has(current)) {
      throw new CandidateParseError("circular structure", where);
    }

    ancestors.add(current);
    if (Array.isArray(current)) {
      current.forEach((item, i) => visit(item, [...path, i]));
    } else {
      const proto = Object.getPrototypeOf(current);
      if (proto !== Object.prototype && proto !== null) {
        throw new CandidateParseError(
          `${current.constructor?.name ?? "object"} instance is not a JSON value`,
          where
        );
      }
      for (const [key, item] of Object.entries(current)) {
        visit(item, [...path, key]);
      }
    }
    ancestors.delete(current);
  };

  visit(value, []);
}

function checkNamed(
  name: string,
  value: JsonValue,
  path: readonly PathSegment[],
  ctx: Context
): Violation[] {
  const violations = check(ctx.document.lookup(name), value, path, ctx);
  const refinements = ctx.refinements.get(name);

  if (violations.length > 0 || !refinements) return violations;

  return refinements.flatMap((refinement) =>
    refinement(value).map(
      (issue): Violation => ({
        path: [...path, ...(issue.path ?? [])],
        expected: issue.expected,
        actual: issue.actual,
        code: "refinement",
      })
    )
  );
}

function check(
  node: SchemaNode,
  value: JsonValue,
  path: readonly PathSegment[],
  ctx: Context
): Violation[] {
  switch (node.kind) {
    case "any":
      return [];
    case "primitive":
      return checkPrimitive(node, value, path);
    case "object":
      return checkObject(node, value, path, ctx);
    case "array":
      return checkArray(node, value, path, ctx);
    case "union":
      return checkUnion(node, value, path, ctx);
    case "enum":
      return node.values.some((allowed) => jsonEquals(allowed, value))
        ? []
        : [violation(path, describeNode(node), summarizeValue(value), "enum")];
    case "reference":
      return checkNamed(node.target, value, path, ctx);
  }
}

function checkPrimitive(
  node: PrimitiveNode,
  value: JsonValue,
  path: readonly PathSegment[]
): Violation[] {
  if (!matchesType(node, value)) {
    return [violation(path, node.type, summarizeValue(value), "type")];
  }

  const c = node.constraints;
  if (!c) return [];

  const out: Violation[] = [];
  const actual = summarizeValue(value);

  if (typeof value === "string") {
    const length = [...value].length;
    if (c.minLength !== undefined && length < c.minLength) {
      out.push(violation(path, `string of at least ${c.minLength} character(s)`, actual, "constraint"));
    }
    if (c.maxLength !== undefined && length > c.maxLength) {
      out.push(violation(path, `string of at most ${c.maxLength} character(s)`, actual, "constraint"));
    }
    if (c.pattern !== undefined && !compilePattern(c.pattern).test(value)) {
      out.push(violation(path, `string matching /${c.pattern}/`, actual, "constraint"));
    }
    if (c.format !== undefined && !matchesFormat(c.format, value)) {
      out.push(violation(path, `${c.format} string`, actual, "constraint"));
    }
  }

  if (typeof value === "number") {
    if (c.minimum !== undefined && value < c.minimum) {
      out.push(violation(path, `${node.type} >= ${c.minimum}`, actual, "constraint"));
    }
    if (c.maximum !== undefined && value > c.maximum) {
      out.push(violation(path, `${node.type} <= ${c.maximum}`, actual, "constraint"));
    }
  }

  return out;
}

function checkObject(
  node: ObjectNode,
  value: JsonValue,
  path: readonly PathSegment[],
  ctx: Context
): Violation[] {
  if (!isJsonObject(value)) {
    return [violation(path, "object", summarizeValue(value), "type")];
  }

  const out: Violation[] = [];

  for (const name of node.required) {
    if (!Object.hasOwn(value, name)) {
      const expected = Object.hasOwn(node.fields, name) ? describeNode(node.fields[name]) : "any value";
      out.push(violation([...path, name], expected, MISSING, "required"));
    }
  }

  for (const [key, child] of Object.entries(value)) {
    const childPath = [...path, key];

    if (Object.hasOwn(node.fields, key)) {
      out.push(...check(node.fields[key], child, childPath, ctx));
    } else if (node.additionalProperties === false) {
      out.push(violation(childPath, "no additional properties", "unknown property", "unknown-property"));
    } else if (node.additionalProperties !== true) {
      out.push(...check(node.additionalProperties, child, childPath, ctx));
    }
  }

  return out;
}

function checkArray(
  node: ArrayNode,
  value: JsonValue,
  path: readonly PathSegment[],
  ctx: Context
): Violation[] {
  if (!Array.isArray(value)) {
    return [violation(path, describeNode(node), summarizeValue(value), "type")];
  }

  const out: Violation[] = [];
  const actual = summarizeValue(value);

  if (node.minItems !== undefined && value.length < node.minItems) {
    out.push(violation(path, `array of at least ${node.minItems} item(s)`, actual, "constraint"));
  }
  if (node.maxItems !== undefined && value.length > node.maxItems) {
    out.push(violation(path, `array of at most ${node.maxItems} item(s)`, actual, "constraint"));
  }

  for (let i = 0; i < value.length; i++) {
    const item = value[i];
    if (node.uniqueItems) {
      const first = value.findIndex((other) => jsonEquals(other, item));
      if (first < i) {
        out.push(violation([...path, i], "unique items", `duplicate of item ${first}`, "constraint"));
      }
    }
    out.push(...check(node.items, item, [...path, i], ctx));
  }

  return out;
}

function checkUnion(
  node: UnionNode,
  value: JsonValue,
  path: readonly PathSegment[],
  ctx: Context
): Violation[] {
  const table = ctx.document.dispatchFor(node);

  if (table) {
    if (!isJsonObject(value)) {
      return [violation(path, "object", summarizeValue(value), "type")];
    }

    const tags = [...table.variants.keys()].map((tag) => JSON.stringify(tag)).join(", ");
    const fieldPath = [...path, table.field];

    if (!Object.hasOwn(value, table.field)) {
      return [violation(fieldPath, `one of ${tags}`, MISSING, "discriminator")];
    }

    const tag = value[table.field];
    const index = typeof tag === "string" ? table.variants.get(tag) : undefined;
    if (index === undefined) {
      return [violation(fieldPath, `one of ${tags}`, summarizeValue(tag), "discriminator")];
    }

    return check(node.variants[index], value, path, ctx);
  }

  for (const variant of node.variants) {
    if (check(variant, value, path, ctx).length === 0) return [];
  }

  return [violation(path, `one of: ${describeNode(node)}`, summarizeValue(value), "union")];
}

function matchesType(node: PrimitiveNode, value: JsonValue): boolean {
  switch (node.type) {
    case "string":
      return typeof value === "string";
    case "number":
      return typeof value === "number";
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "boolean":
      return typeof value === "boolean";
    case "null":
      return value === null;
  }
}

const EMAIL = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const DATE_TIME = /^\d{4}-\d{2}-\d{2}[Tt ]\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:[Zz]|[+-]\d{2}:\d{2})$/;

function matchesFormat(format: string, value: string): boolean {
  switch (format) {
    case "uri":
      return isAbsoluteUri(value);
    case "email":
      return EMAIL.test(value);
    case "date-time":
      return DATE_TIME.test(value) && !Number.isNaN(Date.parse(value));
    default:
      // Unknown formats are annotations only.
      return true;
  }
}

function isAbsoluteUri(value: string): boolean {
  if (/\s/.test(value)) return false;

  try {
    return new URL(value).protocol.length > 1;
  } catch {
    return false;
  }
}

const patternCache = new Map<string, RegExp>();

function compilePattern(pattern: string): RegExp {
  let compiled = patternCache.get(pattern);
  if (!compiled) {
    compiled = new RegExp(pattern, "u");
    patternCache.set(pattern, compiled);
  }
  return compiled;
}

function violation(
  path: readonly PathSegment[],
  expected: string,
  actual: string,
  code: Violation["code"]
): Violation {
  return { path, expected, actual, code };
}
