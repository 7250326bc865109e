import { describe, it, expect } from "vitest";
import { loadSchema } from "../src/schema/SchemaLoader.js";
import type { SchemaDocument } from "../src/schema/SchemaDocument.js";
import { JSON_SCHEMA_DIALECT, serializeSchema } from "../src/schema/SchemaSerializer.js";
import { validateDocument } from "../src/validator/validateDocument.js";
import { loadRepoSchema, schemaOf } from "./helpers.js";

function reload(document: SchemaDocument): SchemaDocument {
  return loadSchema(JSON.stringify(serializeSchema(document)));
}

const catalogCandidates: unknown[] = [
  {
    name: "community-plugins",
    owner: { name: "Maintainers" },
    plugins: [{ name: "local-tool", source: "./plugins/local-tool" }],
  },
  {
    name: "community-plugins",
    owner: { name: "Maintainers", email: "not-an-email" },
    metadata: { version: "1.0" },
    plugins: [
      { name: "remote", source: { source: "github", repo: "example-org/remote", ref: 3 } },
      { name: "Bad Name", source: { source: "ftp" } },
      { name: "npm-tool", source: { source: "npm", package: "npm-tool" }, tags: ["a", "a"] },
    ],
    extra: true,
  },
  { owner: "nobody", plugins: "none" },
  [],
];

describe("serializeSchema", () => {
  it("writes the root at the top level and named schemas under $defs", () => {
    const doc = schemaOf({
      type: "object",
      properties: { owner: { $ref: "#/definitions/Owner" } },
      required: ["owner"],
      additionalProperties: false,
      definitions: { Owner: { const: "me" } },
    });

    expect(serializeSchema(doc)).toEqual({
      $schema: JSON_SCHEMA_DIALECT,
      type: "object",
      properties: { owner: { $ref: "#/$defs/Owner" } },
      required: ["owner"],
      additionalProperties: false,
      $defs: { Owner: { const: "me" } },
    });
  });

  it("reloads the marketplace schema into one that validates identically", () => {
    const doc = loadRepoSchema("schemas/marketplace.schema.json");
    const reloaded = reload(doc);

    for (const candidate of catalogCandidates) {
      expect(validateDocument(reloaded, candidate)).toEqual(validateDocument(doc, candidate));
    }
  });

  it("reloads the plugin manifest schema into one that validates identically", () => {
    const doc = loadRepoSchema("schemas/plugin-manifest.schema.json");
    const reloaded = reload(doc);
    const candidates: unknown[] = [
      { name: "claudash", commands: ["./commands/run.md"], hooks: { onStart: [] } },
      { name: "claudash", author: { name: "" }, commands: ["commands/run.md"], mcpServers: 3 },
      { version: "1.0.0" },
    ];

    for (const candidate of candidates) {
      expect(validateDocument(reloaded, candidate)).toEqual(validateDocument(doc, candidate));
    }
  });

  it("keeps inferred discriminators working after a reload", () => {
    const doc = schemaOf({
      anyOf: [
        { type: "object", properties: { kind: { const: "a" }, n: { type: "integer" } }, required: ["kind"] },
        { type: "object", properties: { kind: { const: "b" } }, required: ["kind"] },
      ],
    });
    const candidate = { kind: "a", n: "1" };

    expect(validateDocument(reload(doc), candidate)).toEqual([
      { path: ["n"], expected: "integer", actual: '"1"', code: "type" },
    ]);
  });

  it("is stable across repeated round trips", () => {
    const doc = loadRepoSchema("schemas/marketplace.schema.json");

    expect(serializeSchema(reload(doc))).toEqual(serializeSchema(doc));
  });
});
