import { SchemaParseError, SchemaReferenceError } from "../errors.js";
import { parseByType } from "../parser/index.js";
import { deepFreeze, defineOwn, isRecord } from "../utils/normalize.js";
import { appendPointer, decodePointerToken } from "../utils/path.js";
import { DispatchTable, SchemaDocument } from "./SchemaDocument.js";
import {
  ArrayNode,
  EnumNode,
  JsonValue,
  NamedSchema,
  ObjectNode,
  PrimitiveConstraints,
  PrimitiveNode,
  PrimitiveType,
  ROOT_SCHEMA_NAME,
  SchemaNode,
  UnionNode,
} from "./SchemaNode.js";

export interface LoadSchemaOptions {
  /** Parser type for the schema text. Defaults to `json`. */
  format?: string;
  /**
   * Infer a discriminator for unions whose variants all require a common
   * field holding a single string literal. Defaults to `true`.
   */
  inferDiscriminators?: boolean;
}

const PRIMITIVE_TYPES: readonly PrimitiveType[] = [
  "string",
  "number",
  "integer",
  "boolean",
  "null",
];

const JSON_TYPES: readonly string[] = [...PRIMITIVE_TYPES, "object", "array"];

// Keywords whose meaning the model cannot represent. Ignoring them would
// accept documents the schema author meant to reject.
const UNSUPPORTED_KEYWORDS = [
  "allOf",
  "not",
  "if",
  "then",
  "else",
  "patternProperties",
  "propertyNames",
  "dependentRequired",
  "dependentSchemas",
  "dependencies",
  "prefixItems",
  "contains",
  "unevaluatedProperties",
  "unevaluatedItems",
  "minProperties",
  "maxProperties",
  "exclusiveMinimum",
  "exclusiveMaximum",
  "multipleOf",
  "$dynamicRef",
  "$recursiveRef",
];

type KeywordKind = "object" | "array" | "string" | "number";

// Without a `type`, these keywords decide what the node is.
const KEYWORDS_BY_KIND: Record<KeywordKind, readonly string[]> = {
  object: ["properties", "required", "additionalProperties"],
  array: ["items", "minItems", "maxItems", "uniqueItems"],
  string: ["minLength", "maxLength", "pattern", "format"],
  number: ["minimum", "maximum"],
};

const KEYWORD_KINDS: readonly KeywordKind[] = ["object", "array", "string", "number"];

// Everything that constrains a value. Annotations such as `title` or
// `$comment` may sit next to any of these.
const STRUCTURAL_KEYWORDS: readonly string[] = [
  "$ref",
  "type",
  "const",
  "enum",
  "anyOf",
  "oneOf",
  "discriminator",
  ...KEYWORD_KINDS.flatMap((kind) => KEYWORDS_BY_KIND[kind]),
];

const REF_PATTERN = /^#\/(?:\$defs|definitions)\/([^/]+)$/;

interface RefSite {
  from: string;
  target: string;
  pointer: string;
}

interface UnionSite {
  node: UnionNode;
  pointer: string;
}

/**
 * State shared while converting one document.
 */
class ConversionContext {
  readonly refs: RefSite[] = [];
  readonly unions: UnionSite[] = [];

  constructor(public current: string) {}
}

/**
 * Parses schema text and loads it into a SchemaDocument.
 *
 * @param text - Raw schema document.
 * @param options - Parser type and discriminator inference.
 * @throws SchemaParseError on malformed text or unsupported schema content.
 * @throws SchemaReferenceError on dangling, external or cyclic references.
 */
export function loadSchema(text: string, options: LoadSchemaOptions = {}): SchemaDocument {
  const format = options.format ?? "json";
  let raw: unknown;

  try {
    raw = parseByType(format, { rawContent: text });
  } catch (err) {
    throw new SchemaParseError(
      `Malformed ${format} schema: ${err instanceof Error ? err.message : String(err)}`,
      "#",
      { cause: err }
    );
  }

  return buildSchemaDocument(raw, options);
}

/**
 * Loads an already-parsed JSON Schema value into a SchemaDocument.
 */
export function buildSchemaDocument(
  raw: unknown,
  options: Omit<LoadSchemaOptions, "format"> = {}
): SchemaDocument {
  if (!isRecord(raw) && typeof raw !== "boolean") {
    throw new SchemaParseError("schema document must be an object");
  }

  const ctx = new ConversionContext(ROOT_SCHEMA_NAME);
  const schemas: NamedSchema[] = [
    { name: ROOT_SCHEMA_NAME, node: convert(raw, "#", ctx) },
  ];

  if (isRecord(raw)) {
    for (const keyword of ["$defs", "definitions"]) {
      const defs = raw[keyword];
      if (defs === undefined) continue;

      const pointer = appendPointer("#", keyword);
      if (!isRecord(defs)) {
        throw new SchemaParseError(`"${keyword}" must be an object`, pointer);
      }

      for (const [name, def] of Object.entries(defs)) {
        if (schemas.some((schema) => schema.name === name)) {
          throw new SchemaParseError(`duplicate schema name "${name}"`, appendPointer(pointer, name));
        }
        ctx.current = name;
        schemas.push({ name, node: convert(def, appendPointer(pointer, name), ctx) });
      }
    }
  }

  const names = new Set(schemas.map((schema) => schema.name));
  for (const ref of ctx.refs) {
    if (!names.has(ref.target)) {
      throw new SchemaReferenceError(`unresolved reference "${ref.target}"`, ref.pointer);
    }
  }
  detectReferenceCycles(schemas, ctx.refs);

  const table = new Map(schemas.map((schema) => [schema.name, schema.node]));
  const resolve = (node: SchemaNode): SchemaNode => {
    let current = node;
    while (current.kind === "reference") {
      const next = table.get(current.target);
      if (!next) throw new SchemaReferenceError(`unresolved reference "${current.target}"`);
      current = next;
    }
    return current;
  };

  const dispatch = new WeakMap<UnionNode, DispatchTable>();
  for (const site of ctx.unions) {
    const entry = buildDispatch(site, resolve, options.inferDiscriminators ?? true);
    if (entry) dispatch.set(site.node, entry);
  }

  return new SchemaDocument(deepFreeze(schemas), dispatch);
}

function convert(raw: unknown, pointer: string, ctx: ConversionContext): SchemaNode {
  if (raw === true) return { kind: "any" };
  if (raw === false) {
    throw new SchemaParseError("the `false` schema is not supported", pointer);
  }
  if (!isRecord(raw)) {
    throw new SchemaParseError("schema must be an object or a boolean", pointer);
  }

  for (const keyword of UNSUPPORTED_KEYWORDS) {
    if (keyword in raw) {
      throw new SchemaParseError(`unsupported keyword "${keyword}"`, appendPointer(pointer, keyword));
    }
  }

  const description = optionalString(raw, "description", pointer);

  if (raw.$ref !== undefined) {
    rejectSiblings(raw, "$ref", ["$ref"], pointer);
    return withDescription(convertRef(raw.$ref, pointer, ctx), description);
  }

  if (raw.const !== undefined || raw.enum !== undefined) {
    if (raw.const !== undefined && raw.enum !== undefined) {
      throw new SchemaParseError("use either const or enum, not both", pointer);
    }
    rejectSiblings(raw, raw.const !== undefined ? "const" : "enum", ["const", "enum", "type"], pointer);
    const node = convertEnum(raw, pointer);
    if (raw.type !== undefined) assertLiteralTypes(node, raw.type, pointer);
    return withDescription(node, description);
  }

  const combinator = raw.oneOf !== undefined ? "oneOf" : raw.anyOf !== undefined ? "anyOf" : undefined;
  if (combinator) {
    if (raw.oneOf !== undefined && raw.anyOf !== undefined) {
      throw new SchemaParseError("use either anyOf or oneOf, not both", pointer);
    }
    rejectSiblings(raw, combinator, [combinator, "discriminator"], pointer);
    return convertUnion(raw, combinator, pointer, ctx, description);
  }

  if (raw.discriminator !== undefined) {
    throw new SchemaParseError(
      `"discriminator" needs "anyOf" or "oneOf"`,
      appendPointer(pointer, "discriminator")
    );
  }

  const type = raw.type;
  const kinds = keywordKinds(raw);

  if (Array.isArray(type)) {
    if (type.length === 0) {
      throw new SchemaParseError(`"type" must not be empty`, appendPointer(pointer, "type"));
    }
    assertKindsApply(raw, kinds, type, pointer);
    const node: UnionNode = {
      kind: "union",
      combinator: "anyOf",
      variants: type.map((t, i) => convertTyped(raw, t, pointer, appendPointer(pointer, "type", i), ctx)),
    };
    return withDescription(node, description);
  }

  if (type !== undefined) {
    const node = convertTyped(raw, type, pointer, appendPointer(pointer, "type"), ctx);
    assertKindsApply(raw, kinds, [type], pointer);
    return withDescription(node, description);
  }

  if (kinds.length > 1) {
    throw new SchemaParseError(
      `cannot infer a type from ${kinds.join(" and ")} keywords; declare "type"`,
      pointer
    );
  }

  switch (kinds[0]) {
    case "object":
      return withDescription(convertObject(raw, pointer, ctx), description);
    case "array":
      return withDescription(convertArray(raw, pointer, ctx), description);
    case "string":
    case "number":
      return withDescription(convertTyped(raw, kinds[0], pointer, pointer, ctx), description);
    default:
      return withDescription({ kind: "any" }, description);
  }
}

// Rejects validation keywords that the node's own kind would drop.
function rejectSiblings(
  raw: Record<string, unknown>,
  owner: string,
  allowed: readonly string[],
  pointer: string
): void {
  for (const keyword of STRUCTURAL_KEYWORDS) {
    if (keyword in raw && !allowed.includes(keyword)) {
      throw new SchemaParseError(
        `"${keyword}" next to "${owner}" is not supported`,
        appendPointer(pointer, keyword)
      );
    }
  }
}

function keywordKinds(raw: Record<string, unknown>): KeywordKind[] {
  return KEYWORD_KINDS.filter((kind) => KEYWORDS_BY_KIND[kind].some((keyword) => keyword in raw));
}

function assertKindsApply(
  raw: Record<string, unknown>,
  kinds: readonly KeywordKind[],
  types: readonly unknown[],
  pointer: string
): void {
  for (const kind of kinds) {
    if (types.some((type) => type === kind || (kind === "number" && type === "integer"))) continue;

    const keyword = KEYWORDS_BY_KIND[kind].find((candidate) => candidate in raw) ?? kind;
    throw new SchemaParseError(
      `"${keyword}" does not apply to type ${JSON.stringify(types.length === 1 ? types[0] : types)}`,
      appendPointer(pointer, keyword)
    );
  }
}

function convertTyped(
  raw: Record<string, unknown>,
  type: unknown,
  pointer: string,
  typePointer: string,
  ctx: ConversionContext
): SchemaNode {
  if (type === "object") return convertObject(raw, pointer, ctx);
  if (type === "array") return convertArray(raw, pointer, ctx);

  const primitive = PRIMITIVE_TYPES.find((candidate) => candidate === type);
  if (!primitive) {
    throw new SchemaParseError(`unknown type ${JSON.stringify(type)}`, typePointer);
  }

  const node: PrimitiveNode = { kind: "primitive", type: primitive };
  const constraints = readConstraints(raw, primitive, pointer);

  return Object.keys(constraints).length > 0 ? { ...node, constraints } : node;
}

function convertObject(
  raw: Record<string, unknown>,
  pointer: string,
  ctx: ConversionContext
): ObjectNode {
  const fields: Record<string, SchemaNode> = {};
  const properties = raw.properties ?? {};
  const propertiesPointer = appendPointer(pointer, "properties");

  if (!isRecord(properties)) {
    throw new SchemaParseError(`"properties" must be an object`, propertiesPointer);
  }
  for (const [name, child] of Object.entries(properties)) {
    defineOwn(fields, name, convert(child, appendPointer(propertiesPointer, name), ctx));
  }

  const required = raw.required ?? [];
  if (!Array.isArray(required) || !required.every((name) => typeof name === "string")) {
    throw new SchemaParseError(`"required" must be an array of strings`, appendPointer(pointer, "required"));
  }

  const additional = raw.additionalProperties;
  let additionalProperties: boolean | SchemaNode = true;
  if (typeof additional === "boolean") {
    additionalProperties = additional;
  } else if (additional !== undefined) {
    additionalProperties = convert(additional, appendPointer(pointer, "additionalProperties"), ctx);
  }

  return {
    kind: "object",
    fields,
    required: [...new Set<string>(required)],
    additionalProperties,
  };
}

function convertArray(
  raw: Record<string, unknown>,
  pointer: string,
  ctx: ConversionContext
): ArrayNode {
  if (Array.isArray(raw.items)) {
    throw new SchemaParseError("tuple-form \"items\" is not supported", appendPointer(pointer, "items"));
  }

  const node: ArrayNode = {
    kind: "array",
    items: raw.items === undefined ? { kind: "any" } : convert(raw.items, appendPointer(pointer, "items"), ctx),
  };
  const minItems = optionalCount(raw, "minItems", pointer);
  const maxItems = optionalCount(raw, "maxItems", pointer);
  const uniqueItems = raw.uniqueItems;

  if (uniqueItems !== undefined && typeof uniqueItems !== "boolean") {
    throw new SchemaParseError(`"uniqueItems" must be a boolean`, appendPointer(pointer, "uniqueItems"));
  }

  return {
    ...node,
    ...(minItems === undefined ? {} : { minItems }),
    ...(maxItems === undefined ? {} : { maxItems }),
    ...(uniqueItems ? { uniqueItems } : {}),
  };
}

function convertUnion(
  raw: Record<string, unknown>,
  combinator: "anyOf" | "oneOf",
  pointer: string,
  ctx: ConversionContext,
  description: string | undefined
): UnionNode {
  const variants = raw[combinator];
  const variantsPointer = appendPointer(pointer, combinator);

  if (!Array.isArray(variants) || variants.length === 0) {
    throw new SchemaParseError(`"${combinator}" must be a non-empty array`, variantsPointer);
  }

  let discriminator: string | undefined;
  if (raw.discriminator !== undefined) {
    const declared = raw.discriminator;
    if (!isRecord(declared) || typeof declared.propertyName !== "string") {
      throw new SchemaParseError(
        `"discriminator" must be an object with a string "propertyName"`,
        appendPointer(pointer, "discriminator")
      );
    }
    discriminator = declared.propertyName;
  }

  const node: UnionNode = {
    kind: "union",
    combinator,
    variants: variants.map((variant, i) => convert(variant, appendPointer(variantsPointer, i), ctx)),
    ...(discriminator === undefined ? {} : { discriminator }),
    ...(description === undefined ? {} : { description }),
  };
  // Dispatch tables are keyed by this exact node, so it is not copied afterwards.
  ctx.unions.push({ node, pointer });

  return node;
}

function convertEnum(raw: Record<string, unknown>, pointer: string): EnumNode {
  if (raw.const !== undefined) {
    return { kind: "enum", values: [toJsonValue(raw.const, appendPointer(pointer, "const"))] };
  }

  const values = raw.enum;
  const enumPointer = appendPointer(pointer, "enum");
  if (!Array.isArray(values) || values.length === 0) {
    throw new SchemaParseError(`"enum" must be a non-empty array`, enumPointer);
  }

  return {
    kind: "enum",
    values: values.map((value, i) => toJsonValue(value, appendPointer(enumPointer, i))),
  };
}

// `type` next to `enum` adds nothing once every literal already has that type.
function assertLiteralTypes(node: EnumNode, type: unknown, pointer: string): void {
  const types: unknown[] = Array.isArray(type) ? type : [type];

  for (const candidate of types) {
    if (!JSON_TYPES.some((known) => known === candidate)) {
      throw new SchemaParseError(`unknown type ${JSON.stringify(candidate)}`, appendPointer(pointer, "type"));
    }
  }

  for (const value of node.values) {
    if (!types.some((candidate) => literalHasType(value, candidate))) {
      throw new SchemaParseError(
        `${JSON.stringify(value)} is not of type ${JSON.stringify(type)}`,
        appendPointer(pointer, "type")
      );
    }
  }
}

function literalHasType(value: JsonValue, type: unknown): boolean {
  switch (type) {
    case "null":
      return value === null;
    case "boolean":
    case "string":
    case "number":
      return typeof value === type;
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "array":
      return Array.isArray(value);
    case "object":
      return isRecord(value);
    default:
      return false;
  }
}

function convertRef(ref: unknown, pointer: string, ctx: ConversionContext): SchemaNode {
  const refPointer = appendPointer(pointer, "$ref");
  if (typeof ref !== "string") {
    throw new SchemaParseError(`"$ref" must be a string`, refPointer);
  }

  let target: string;
  if (ref === "#" || ref === "#/") {
    target = ROOT_SCHEMA_NAME;
  } else {
    const match = REF_PATTERN.exec(ref);
    if (!match) {
      throw new SchemaReferenceError(`unsupported reference "${ref}"`, refPointer);
    }
    target = decodePointerToken(match[1]);
  }

  ctx.refs.push({ from: ctx.current, target, pointer: refPointer });

  return { kind: "reference", target };
}

function readConstraints(
  raw: Record<string, unknown>,
  type: PrimitiveType,
  pointer: string
): PrimitiveConstraints {
  if (type === "string") {
    const minLength = optionalCount(raw, "minLength", pointer);
    const maxLength = optionalCount(raw, "maxLength", pointer);
    const pattern = optionalString(raw, "pattern", pointer);
    const format = optionalString(raw, "format", pointer);

    if (pattern !== undefined) {
      try {
        new RegExp(pattern, "u");
      } catch (err) {
        throw new SchemaParseError(
          `invalid pattern: ${err instanceof Error ? err.message : String(err)}`,
          appendPointer(pointer, "pattern"),
          { cause: err }
        );
      }
    }

    return {
      ...(minLength === undefined ? {} : { minLength }),
      ...(maxLength === undefined ? {} : { maxLength }),
      ...(pattern === undefined ? {} : { pattern }),
      ...(format === undefined ? {} : { format }),
    };
  }

  if (type === "number" || type === "integer") {
    const minimum = optionalNumber(raw, "minimum", pointer);
    const maximum = optionalNumber(raw, "maximum", pointer);

    return {
      ...(minimum === undefined ? {} : { minimum }),
      ...(maximum === undefined ? {} : { maximum }),
    };
  }

  return {};
}

function buildDispatch(
  site: UnionSite,
  resolve: (node: SchemaNode) => SchemaNode,
  infer: boolean
): DispatchTable | undefined {
  const { node, pointer } = site;

  if (node.discriminator !== undefined) {
    const entry = dispatchOn(node, node.discriminator, resolve);
    if (typeof entry === "number") {
      throw new SchemaParseError(
        `discriminator "${node.discriminator}" is not a unique string literal required by this variant`,
        appendPointer(pointer, node.combinator, entry)
      );
    }
    return entry;
  }

  if (!infer || node.variants.length < 2) return undefined;

  const first = resolve(node.variants[0]);
  if (first.kind !== "object") return undefined;

  for (const field of first.required) {
    const entry = dispatchOn(node, field, resolve);
    if (typeof entry !== "number") return entry;
  }

  return undefined;
}

/**
 * Builds the dispatch table for one field, or returns the index of the
 * first variant that does not pin the field to a unique string literal.
 */
function dispatchOn(
  node: UnionNode,
  field: string,
  resolve: (node: SchemaNode) => SchemaNode
): DispatchTable | number {
  const variants = new Map<string, number>();

  for (let i = 0; i < node.variants.length; i++) {
    const variant = resolve(node.variants[i]);
    if (
      variant.kind !== "object" ||
      !variant.required.includes(field) ||
      !Object.hasOwn(variant.fields, field)
    ) {
      return i;
    }

    const tag = resolve(variant.fields[field]);
    if (tag.kind !== "enum" || tag.values.length !== 1) return i;

    const [value] = tag.values;
    if (typeof value !== "string" || variants.has(value)) return i;

    variants.set(value, i);
  }

  return { field, variants };
}

/**
 * Depth-first search over the name → referenced names graph.
 */
function detectReferenceCycles(schemas: NamedSchema[], refs: RefSite[]): void {
  const graph = new Map<string, RefSite[]>();
  for (const schema of schemas) graph.set(schema.name, []);
  for (const ref of refs) graph.get(ref.from)?.push(ref);

  const done = new Set<string>();
  const stack: string[] = [];

  const visit = (name: string): void => {
    stack.push(name);

    for (const ref of graph.get(name) ?? []) {
      const start = stack.indexOf(ref.target);
      if (start !== -1) {
        const cycle = [...stack.slice(start), ref.target];
        throw new SchemaReferenceError(`circular reference: ${cycle.join(" → ")}`, ref.pointer);
      }
      if (!done.has(ref.target)) visit(ref.target);
    }

    stack.pop();
    done.add(name);
  };

  for (const schema of schemas) {
    if (!done.has(schema.name)) visit(schema.name);
  }
}

function withDescription<T extends SchemaNode>(node: T, description: string | undefined): T {
  return description === undefined ? node : { ...node, description };
}

function optionalString(
  raw: Record<string, unknown>,
  keyword: string,
  pointer: string
): string | undefined {
  const value = raw[keyword];
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new SchemaParseError(`"${keyword}" must be a string`, appendPointer(pointer, keyword));
  }
  return value;
}

function optionalNumber(
  raw: Record<string, unknown>,
  keyword: string,
  pointer: string
): number | undefined {
  const value = raw[keyword];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new SchemaParseError(`"${keyword}" must be a number`, appendPointer(pointer, keyword));
  }
  return value;
}

function optionalCount(
  raw: Record<string, unknown>,
  keyword: string,
  pointer: string
): number | undefined {
  const value = optionalNumber(raw, keyword, pointer);
  if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
    throw new SchemaParseError(`"${keyword}" must be a non-negative integer`, appendPointer(pointer, keyword));
  }
  return value;
}

function toJsonValue(value: unknown, pointer: string): JsonValue {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "boolean" ||
    (typeof value === "number" && Number.isFinite(value))
  ) {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item, i) => toJsonValue(item, appendPointer(pointer, i)));
  }

  if (isRecord(value)) {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      defineOwn(out, key, toJsonValue(item, appendPointer(pointer, key)));
    }
    return out;
  }

  throw new SchemaParseError("literal is not a JSON value", pointer);
}
