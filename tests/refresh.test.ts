import fs from "fs";
import path from "path";
import { describe, it, expect, beforeEach } from "vitest";
import {
  CheckoutConfigSource,
  GithubPluginRef,
  PluginConfigSource,
} from "../src/catalog/PluginConfigSource.js";
import { refreshCatalog } from "../src/catalog/refresh.js";
import { CandidateParseError, CatalogError, ValidationViolationError } from "../src/errors.js";
import { FsRepository } from "../src/repository/FsRepository.js";
import type { JsonObject } from "../src/schema/SchemaNode.js";
import { loadRepoSchema, makeTmpDir, MemoryLogger, writeTmpFile } from "./helpers.js";

/**
 * Serves manifests from memory, keyed by `owner/repo`.
 */
class StaticConfigSource implements PluginConfigSource {
  readonly reads: GithubPluginRef[] = [];

  constructor(private manifests: Record<string, string>) {}

  async read(plugin: GithubPluginRef): Promise<string> {
    this.reads.push(plugin);
    if (!Object.hasOwn(this.manifests, plugin.repo)) {
      throw new CatalogError(`no manifest for ${plugin.repo}`);
    }
    return this.manifests[plugin.repo];
  }
}

const marketplaceSchema = loadRepoSchema("schemas/marketplace.schema.json");
const pluginSchema = loadRepoSchema("schemas/plugin-manifest.schema.json");

const catalog = (): JsonObject => ({
  name: "test-market",
  owner: { name: "Tester" },
  metadata: { version: "1.0.2" },
  plugins: [
    { name: "local-tool", source: "./plugins/local-tool" },
    {
      name: "claudash",
      source: { source: "github", repo: "example-org/claudash" },
      version: "0.3.1",
      description: "old",
      category: "productivity",
    },
    { name: "npm-tool", source: { source: "npm", package: "npm-tool" } },
  ],
});

describe("refreshCatalog", () => {
  let logger: MemoryLogger;

  beforeEach(() => {
    logger = new MemoryLogger();
  });

  const refresh = (input: JsonObject, manifests: Record<string, string>) =>
    refreshCatalog(input, {
      marketplaceSchema,
      pluginSchema,
      source: new StaticConfigSource(manifests),
      logger,
    });

  it("merges changed manifests and bumps the catalog version", async () => {
    const input = catalog();
    const result = await refresh(input, {
      "example-org/claudash": JSON.stringify({ name: "claudash", version: "0.4.0", description: "new" }),
    });

    expect(result.changed).toBe(true);
    expect(result.previousVersion).toBe("1.0.2");
    expect(result.version).toBe("1.0.3");
    expect(result.skipped).toEqual(["local-tool", "npm-tool"]);
    expect(result.failures).toEqual([]);
    expect(result.catalog.metadata).toEqual({ version: "1.0.3" });
    expect(result.catalog.plugins).toEqual([
      { name: "local-tool", source: "./plugins/local-tool" },
      {
        name: "claudash",
        source: { source: "github", repo: "example-org/claudash" },
        version: "0.4.0",
        description: "new",
        category: "productivity",
      },
      { name: "npm-tool", source: { source: "npm", package: "npm-tool" } },
    ]);
    expect(input).toEqual(catalog());
    expect(logger.lines).toEqual([
      "Skipping local-tool: relative-path source",
      "Refreshing claudash (example-org/claudash)",
      "Skipping npm-tool: non-GitHub source (npm)",
    ]);
  });

  it("keeps the version when nothing changed", async () => {
    const result = await refresh(catalog(), {
      "example-org/claudash": JSON.stringify({ name: "claudash", version: "0.3.1", description: "old" }),
    });

    expect(result.changed).toBe(false);
    expect(result.version).toBe("1.0.2");
    expect(result.catalog).toEqual(catalog());
  });

  it("starts from 0.0.0 when the catalog has no version", async () => {
    const input = catalog();
    delete input.metadata;

    const result = await refresh(input, {
      "example-org/claudash": JSON.stringify({ name: "claudash", version: "0.4.0" }),
    });

    expect(result.previousVersion).toBe("0.0.0");
    expect(result.catalog.metadata).toEqual({ version: "0.0.1" });
  });

  it("passes the pinned ref to the source", async () => {
    const source = new StaticConfigSource({ "example-org/pinned": JSON.stringify({ name: "pinned" }) });
    const input: JsonObject = {
      name: "test-market",
      owner: { name: "Tester" },
      plugins: [{ name: "pinned", source: { source: "github", repo: "example-org/pinned", ref: "v1.2.0" } }],
    };

    await refreshCatalog(input, { marketplaceSchema, pluginSchema, source, logger });

    expect(source.reads).toEqual([{ name: "pinned", repo: "example-org/pinned", ref: "v1.2.0" }]);
  });

  it("returns the input untouched when a manifest cannot be read", async () => {
    const input = catalog();
    const result = await refresh(input, {});

    expect(result.catalog).toBe(input);
    expect(result.changed).toBe(false);
    expect(result.failures.map((failure) => failure.plugin)).toEqual(["claudash"]);
    expect(result.failures[0].error).toBeInstanceOf(CatalogError);
  });

  it("records invalid and unparseable manifests as failures", async () => {
    const invalid = await refresh(catalog(), {
      "example-org/claudash": JSON.stringify({ name: "claudash", bogus: true }),
    });
    expect(invalid.failures[0].error).toBeInstanceOf(ValidationViolationError);

    const unparseable = await refresh(catalog(), { "example-org/claudash": "{not json" });
    expect(unparseable.failures[0].error).toBeInstanceOf(CandidateParseError);
  });

  it("refuses to refresh an invalid catalog", async () => {
    const input = catalog();
    delete input.owner;

    await expect(refresh(input, {})).rejects.toBeInstanceOf(ValidationViolationError);
  });
});

describe("CheckoutConfigSource", () => {
  it("reads <checkouts>/<owner>/<repo>/<manifestPath>", async () => {
    const tmp = makeTmpDir();
    writeTmpFile(tmp, "checkouts/example-org/claudash/.claude-plugin/plugin.json", '{"name":"claudash"}');
    const source = new CheckoutConfigSource(new FsRepository(tmp), "checkouts", ".claude-plugin/plugin.json");

    expect(await source.read({ name: "claudash", repo: "example-org/claudash" })).toBe('{"name":"claudash"}');
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  it("fails when the checkout has no manifest", async () => {
    const tmp = makeTmpDir();
    fs.mkdirSync(path.join(tmp, "checkouts"));
    const source = new CheckoutConfigSource(new FsRepository(tmp), "checkouts", ".claude-plugin/plugin.json");

    await expect(source.read({ name: "missing", repo: "example-org/missing" })).rejects.toThrow(
      "Plugin manifest not found for missing: checkouts/example-org/missing/.claude-plugin/plugin.json"
    );
    fs.rmSync(tmp, { recursive: true, force: true });
  });
});
