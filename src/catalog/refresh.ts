import { ValidationViolationError } from "../errors.js";
import { ConsoleLogger } from "../logger/ConsoleLogger.js";
import type { LoggerProvider } from "../logger/LoggerProvider.js";
import type { SchemaDocument } from "../schema/SchemaDocument.js";
import type { JsonObject, JsonValue } from "../schema/SchemaNode.js";
import { isJsonObject } from "../utils/normalize.js";
import { joinPath } from "../utils/path.js";
import type { RefinementMap, Validator } from "../validator/Validator.js";
import { parseCandidate } from "../validator/validateDocument.js";
import { mergePlugin } from "./merge.js";
import type { GithubPluginRef, PluginConfigSource } from "./PluginConfigSource.js";
import { serializeCatalog } from "./serialize.js";
import { validateCatalog, validateManifest } from "./validate.js";
import { bumpVersion } from "./version.js";

export const INITIAL_CATALOG_VERSION = "0.0.0";

export interface RefreshOptions {
  marketplaceSchema: SchemaDocument;
  pluginSchema: SchemaDocument;
  source: PluginConfigSource;
  reservedNames?: readonly string[];
  refinements?: RefinementMap;
  validator?: Validator;
  logger?: LoggerProvider;
}

export interface RefreshFailure {
  plugin: string;
  error: Error;
}

export interface RefreshResult {
  /** The refreshed catalog; the input, unchanged, when anything failed. */
  catalog: JsonObject;
  changed: boolean;
  previousVersion: string;
  version: string;
  failures: RefreshFailure[];
  skipped: string[];
}

/**
 * Re-reads the manifest of every GitHub-hosted plugin and merges it into
 * its catalog entry.
 *
 * Relative and non-GitHub sources are skipped. A plugin whose manifest
 * cannot be read or is invalid is recorded in `failures` and the catalog
 * is returned untouched. `metadata.version` is bumped only when the
 * catalog content changed.
 *
 * @throws ValidationViolationError if the input catalog is itself invalid.
 */
export async function refreshCatalog(
  catalog: JsonValue,
  options: RefreshOptions
): Promise<RefreshResult> {
  const logger = options.logger ?? new ConsoleLogger("info");
  const violations = validateCatalog(options.marketplaceSchema, catalog, options);

  if (violations.length > 0) {
    throw new ValidationViolationError(violations);
  }
  if (!isJsonObject(catalog)) {
    throw new ValidationViolationError([
      { path: [], expected: "object", actual: "non-object catalog", code: "type" },
    ]);
  }

  const previousVersion = readVersion(catalog);
  const refreshed = structuredClone(catalog);
  const plugins = Array.isArray(refreshed.plugins) ? refreshed.plugins : [];
  const failures: RefreshFailure[] = [];
  const skipped: string[] = [];

  for (let i = 0; i < plugins.length; i++) {
    const entry = plugins[i];
    if (!isJsonObject(entry) || typeof entry.name !== "string") continue;

    const plugin = githubRef(entry.name, entry.source);
    if (typeof plugin === "string") {
      logger.info(`Skipping ${entry.name}: ${plugin}`);
      skipped.push(entry.name);
      continue;
    }

    logger.info(`Refreshing ${plugin.name} (${plugin.repo})`);

    try {
      const manifest = parseCandidate(await options.source.read(plugin), {
        location: joinPath(plugin.repo, "manifest"),
      });
      const manifestViolations = validateManifest(options.pluginSchema, manifest, options);

      if (manifestViolations.length > 0 || !isJsonObject(manifest)) {
        throw new ValidationViolationError(manifestViolations);
      }

      plugins[i] = mergePlugin(entry, manifest);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      logger.error(`Failed to refresh ${plugin.name}:`, error.message);
      failures.push({ plugin: plugin.name, error });
    }
  }

  if (failures.length > 0) {
    return {
      catalog,
      changed: false,
      previousVersion,
      version: previousVersion,
      failures,
      skipped,
    };
  }

  const changed = serializeCatalog(refreshed) !== serializeCatalog(catalog);
  let version = previousVersion;

  if (changed) {
    version = bumpVersion(previousVersion);
    if (isJsonObject(refreshed.metadata)) {
      refreshed.metadata.version = version;
    } else {
      refreshed.metadata = { version };
    }
  }

  return { catalog: refreshed, changed, previousVersion, version, failures, skipped };
}

function readVersion(catalog: JsonObject): string {
  const metadata = catalog.metadata;

  if (metadata !== undefined && isJsonObject(metadata) && typeof metadata.version === "string") {
    return metadata.version;
  }

  return INITIAL_CATALOG_VERSION;
}

/**
 * The GitHub reference of an entry, or why it is skipped.
 */
function githubRef(name: string, source: JsonValue | undefined): GithubPluginRef | string {
  if (typeof source === "string") return "relative-path source";

  if (source === undefined || !isJsonObject(source)) {
    return `non-GitHub source (${source === null ? "null" : typeof source})`;
  }
  if (source.source !== "github" || typeof source.repo !== "string") {
    return `non-GitHub source (${typeof source.source === "string" ? source.source : "unknown"})`;
  }

  const ref: GithubPluginRef = { name, repo: source.repo };
  if (typeof source.ref === "string") ref.ref = source.ref;

  return ref;
}
