import { describe, it, expect, vi } from "vitest";
import { CandidateParseError, ValidationViolationError } from "../src/errors.js";
import { formatViolations } from "../src/reporter/formatViolations.js";
import type { JsonValue } from "../src/schema/SchemaNode.js";
import { isJsonObject } from "../src/utils/normalize.js";
import { assertValid, defaultValidator } from "../src/validator/defaultValidator.js";
import { parseCandidate, validateDocument } from "../src/validator/validateDocument.js";
import type { RefinementIssue } from "../src/validator/Validator.js";
import { schemaOf } from "./helpers.js";

const MISSING = "nothing (missing required field)";

const pluginSchema = schemaOf({
  type: "object",
  properties: {
    name: { type: "string" },
    source: {
      type: "object",
      properties: {
        type: { const: "github" },
        repo: { type: "string" },
      },
      required: ["type", "repo"],
      additionalProperties: false,
    },
  },
  required: ["name", "source"],
  additionalProperties: false,
});

const sourceSchema = schemaOf({
  anyOf: [
    {
      type: "object",
      properties: { source: { const: "github" }, repo: { type: "string" } },
      required: ["source", "repo"],
      additionalProperties: false,
    },
    {
      type: "object",
      properties: { source: { const: "url" }, url: { type: "string" } },
      required: ["source", "url"],
      additionalProperties: false,
    },
  ],
});

describe("validateDocument", () => {
  describe("plugin entry scenario", () => {
    it("accepts a document that matches exactly", () => {
      expect(
        validateDocument(pluginSchema, {
          name: "claudash",
          source: { type: "github", repo: "x/y" },
        })
      ).toEqual([]);
    });

    it("reports the missing source", () => {
      const violations = validateDocument(pluginSchema, { name: "claudash" });

      expect(violations).toEqual([
        { path: ["source"], expected: "object", actual: MISSING, code: "required" },
      ]);
      expect(formatViolations(violations)).toBe(
        "source: expected object, got nothing (missing required field)"
      );
    });

    it("reports an undeclared field on a strict object", () => {
      const violations = validateDocument(pluginSchema, {
        name: "claudash",
        source: { type: "github", repo: "x/y" },
        extra: 1,
      });

      expect(violations).toEqual([
        {
          path: ["extra"],
          expected: "no additional properties",
          actual: "unknown property",
          code: "unknown-property",
        },
      ]);
    });

    it("reports every problem in one pass", () => {
      const violations = validateDocument(pluginSchema, {
        name: 7,
        source: { type: "gitlab" },
      });

      expect(violations).toEqual([
        { path: ["name"], expected: "string", actual: "7", code: "type" },
        { path: ["source", "repo"], expected: "string", actual: MISSING, code: "required" },
        { path: ["source", "type"], expected: '"github"', actual: '"gitlab"', code: "enum" },
      ]);
    });
  });

  describe("primitives", () => {
    it("never coerces between kinds", () => {
      expect(validateDocument(schemaOf({ type: "number" }), "1")).toEqual([
        { path: [], expected: "number", actual: '"1"', code: "type" },
      ]);
      expect(validateDocument(schemaOf({ type: "boolean" }), 0)).toEqual([
        { path: [], expected: "boolean", actual: "0", code: "type" },
      ]);
      expect(validateDocument(schemaOf({ type: "null" }), false)).toEqual([
        { path: [], expected: "null", actual: "false", code: "type" },
      ]);
    });

    it("distinguishes integers from other numbers", () => {
      const schema = schemaOf({ type: "integer" });

      expect(validateDocument(schema, 3)).toEqual([]);
      expect(validateDocument(schema, 1.5)).toEqual([
        { path: [], expected: "integer", actual: "1.5", code: "type" },
      ]);
    });

    it("checks string constraints", () => {
      const violations = validateDocument(
        schemaOf({ type: "string", minLength: 2, pattern: "^[a-z]+$" }),
        "A"
      );

      expect(violations).toEqual([
        { path: [], expected: "string of at least 2 character(s)", actual: '"A"', code: "constraint" },
        { path: [], expected: "string matching /^[a-z]+$/", actual: '"A"', code: "constraint" },
      ]);
    });

    it("applies string keywords that come without a type", () => {
      const schema = schemaOf({ type: "object", properties: { n: { minLength: 3, pattern: "^z" } } });

      expect(validateDocument(schema, { n: "a" })).toEqual([
        { path: ["n"], expected: "string of at least 3 character(s)", actual: '"a"', code: "constraint" },
        { path: ["n"], expected: "string matching /^z/", actual: '"a"', code: "constraint" },
      ]);
      expect(validateDocument(schema, { n: "zzz" })).toEqual([]);
    });

    it("checks known formats and ignores unknown ones", () => {
      expect(validateDocument(schemaOf({ type: "string", format: "uri" }), "not a url")).toEqual([
        { path: [], expected: "uri string", actual: '"not a url"', code: "constraint" },
      ]);
      expect(validateDocument(schemaOf({ type: "string", format: "uri" }), "https://example.com/x")).toEqual([]);
      expect(validateDocument(schemaOf({ type: "string", format: "email" }), "dev@example.com")).toEqual([]);
      expect(validateDocument(schemaOf({ type: "string", format: "hostname" }), "?")).toEqual([]);
    });

    it("checks numeric bounds", () => {
      expect(validateDocument(schemaOf({ type: "number", minimum: 1, maximum: 5 }), 0)).toEqual([
        { path: [], expected: "number >= 1", actual: "0", code: "constraint" },
      ]);
    });
  });

  describe("arrays and objects", () => {
    it("appends the element index to the path", () => {
      expect(
        validateDocument(schemaOf({ type: "array", items: { type: "string" } }), ["a", 2, "c", null])
      ).toEqual([
        { path: [1], expected: "string", actual: "2", code: "type" },
        { path: [3], expected: "string", actual: "null", code: "type" },
      ]);
    });

    it("reports duplicates when items must be unique", () => {
      expect(validateDocument(schemaOf({ type: "array", uniqueItems: true }), [1, 2, 1])).toEqual([
        { path: [2], expected: "unique items", actual: "duplicate of item 0", code: "constraint" },
      ]);
    });

    it("follows references through nested paths", () => {
      const schema = schemaOf({
        type: "object",
        properties: { plugins: { type: "array", items: { $ref: "#/$defs/Plugin" } } },
        $defs: {
          Plugin: { type: "object", properties: { name: { type: "string" } }, required: ["name"] },
        },
      });

      const violations = validateDocument(schema, { plugins: [{ name: "a" }, {}] });
      expect(violations).toEqual([
        { path: ["plugins", 1, "name"], expected: "string", actual: MISSING, code: "required" },
      ]);
      expect(formatViolations(violations)).toBe(
        "plugins[1].name: expected string, got nothing (missing required field)"
      );
    });

    it("validates undeclared properties against an additionalProperties schema", () => {
      expect(
        validateDocument(schemaOf({ type: "object", additionalProperties: { type: "number" } }), {
          a: 1,
          b: "x",
        })
      ).toEqual([{ path: ["b"], expected: "number", actual: '"x"', code: "type" }]);
    });

    it("compares enum values structurally", () => {
      const schema = schemaOf({ enum: ["a", "b", { x: [1, 2] }] });

      expect(validateDocument(schema, { x: [1, 2] })).toEqual([]);
      expect(validateDocument(schema, "c")).toEqual([
        { path: [], expected: 'one of "a", "b", {"x":[1,2]}', actual: '"c"', code: "enum" },
      ]);
    });
  });

  describe("unions", () => {
    it("lists every variant when nothing matches an undiscriminated union", () => {
      expect(
        validateDocument(schemaOf({ anyOf: [{ type: "string" }, { type: "number" }] }), true)
      ).toEqual([{ path: [], expected: "one of: string | number", actual: "true", code: "union" }]);
    });

    it("scopes violations to the variant the discriminator selects", () => {
      expect(validateDocument(sourceSchema, { source: "github", repo: 5 })).toEqual([
        { path: ["repo"], expected: "string", actual: "5", code: "type" },
      ]);
      expect(validateDocument(sourceSchema, { source: "github", url: "https://example.com" })).toEqual([
        { path: ["repo"], expected: "string", actual: MISSING, code: "required" },
        {
          path: ["url"],
          expected: "no additional properties",
          actual: "unknown property",
          code: "unknown-property",
        },
      ]);
    });

    it("reports an unknown or missing discriminator value at the field", () => {
      expect(validateDocument(sourceSchema, { source: "npm" })).toEqual([
        { path: ["source"], expected: 'one of "github", "url"', actual: '"npm"', code: "discriminator" },
      ]);
      expect(validateDocument(sourceSchema, {})).toEqual([
        { path: ["source"], expected: 'one of "github", "url"', actual: MISSING, code: "discriminator" },
      ]);
      expect(validateDocument(sourceSchema, "x")).toEqual([
        { path: [], expected: "object", actual: '"x"', code: "type" },
      ]);
    });
  });

  describe("refinements", () => {
    const schema = schemaOf({
      type: "object",
      properties: { name: { type: "string" } },
      required: ["name"],
    });

    it("runs after the structural check passes", () => {
      const reserved = (value: JsonValue): RefinementIssue[] =>
        isJsonObject(value) && value.name === "official"
          ? [{ path: ["name"], expected: "a name that is not reserved", actual: "reserved" }]
          : [];

      expect(validateDocument(schema, { name: "official" }, { refinements: { "#": reserved } })).toEqual([
        { path: ["name"], expected: "a name that is not reserved", actual: "reserved", code: "refinement" },
      ]);
      expect(validateDocument(schema, { name: "mine" }, { refinements: { "#": reserved } })).toEqual([]);
    });

    it("is skipped while the value is structurally invalid", () => {
      const refinement = vi.fn((_value: JsonValue): RefinementIssue[] => []);

      expect(validateDocument(schema, {}, { refinements: { "#": [refinement] } })).toHaveLength(1);
      expect(refinement).not.toHaveBeenCalled();
    });
  });

  describe("candidate errors", () => {
    it("throws for values that are not JSON-like", () => {
      expect(() => validateDocument(pluginSchema, undefined)).toThrow(CandidateParseError);
      expect(() => validateDocument(pluginSchema, { n: Number.NaN })).toThrow("non-finite number NaN (at candidate n)");
      expect(() => validateDocument(pluginSchema, { at: new Date(0) })).toThrow(CandidateParseError);

      const cyclic: Record<string, unknown> = {};
      cyclic.self = cyclic;
      expect(() => validateDocument(pluginSchema, cyclic)).toThrow("circular structure");
    });

    it("throws when candidate text does not parse", () => {
      expect(() => parseCandidate("{bad", { location: "plugin.json" })).toThrow(CandidateParseError);
      expect(() => parseCandidate("{bad", { location: "plugin.json" })).toThrow(/^Malformed json document: /);
      expect(parseCandidate("name: x\n", { format: "yaml" })).toEqual({ name: "x" });
    });
  });

  it("reuses one loaded document across runs", () => {
    const candidate = { name: "claudash" };

    expect(defaultValidator.validate(pluginSchema, candidate)).toEqual(
      defaultValidator.validate(pluginSchema, candidate)
    );
  });

  it("assertValid throws the whole violation batch", () => {
    let caught: unknown;
    try {
      assertValid(pluginSchema, { extra: true });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ValidationViolationError);
    if (caught instanceof ValidationViolationError) {
      expect(caught.violations.map((v) => v.path)).toEqual([["name"], ["source"], ["extra"]]);
      expect(caught.message).toBe("Validation failed with 3 violation(s)");
    }
  });
});
