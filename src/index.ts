import { PluginCatalogConfigInput, resolveConfig } from "./config.js";
import { Parser, registerParser } from "./parser/index.js";
import { PluginCatalog, PluginCatalogInitOptions } from "./PluginCatalog.js";
import type { StorageRepository } from "./repository/StorageRepository.js";

/**
 * Factory function to create a PluginCatalog instance.
 *
 * @param config - Configuration; missing fields take their defaults.
 * @returns A factory function that accepts a repository and optional init options.
 * @throws ConfigError if the configuration is invalid.
 */
export function definePluginCatalog(config: PluginCatalogConfigInput = {}) {
  const resolved = resolveConfig(config);

  return ({
    repository,
    options = {},
    parsers = {},
  }: {
    repository: StorageRepository;
    options?: PluginCatalogInitOptions;
    parsers?: Record<string, { parser: Parser; extensions?: string[] }>;
  }) => {
    // inject custom parsers if provided
    for (const [type, { parser, extensions }] of Object.entries(parsers)) {
      registerParser(type, parser, extensions);
    }

    return new PluginCatalog(resolved, repository, options);
  };
}

export { PluginCatalog } from "./PluginCatalog.js";
export type { PluginCatalogInitOptions } from "./PluginCatalog.js";
export {
  DEFAULT_CONFIG_PATH,
  PluginCatalogConfigSchema,
  loadConfig,
  resolveConfig,
} from "./config.js";
export type { PluginCatalogConfig, PluginCatalogConfigInput } from "./config.js";
export {
  CandidateParseError,
  CatalogError,
  ConfigError,
  SchemaParseError,
  SchemaReferenceError,
  ValidationViolationError,
  isFatalError,
} from "./errors.js";

export { loadSchema, buildSchemaDocument } from "./schema/SchemaLoader.js";
export type { LoadSchemaOptions } from "./schema/SchemaLoader.js";
export { SchemaDocument } from "./schema/SchemaDocument.js";
export { serializeSchema, serializeNode } from "./schema/SchemaSerializer.js";
export { ROOT_SCHEMA_NAME } from "./schema/SchemaNode.js";
export type {
  JsonObject,
  JsonValue,
  NamedSchema,
  SchemaNode,
} from "./schema/SchemaNode.js";

export { validateDocument, parseCandidate, assertJsonValue } from "./validator/validateDocument.js";
export { defaultValidator, assertValid } from "./validator/defaultValidator.js";
export { mergeRefinements } from "./validator/refinements.js";
export type {
  JSONSchema,
  Refinement,
  RefinementIssue,
  RefinementMap,
  ValidateOptions,
  Validator,
} from "./validator/Validator.js";
export type { PathSegment, Violation, ViolationCode } from "./validator/Violation.js";

export {
  formatViolations,
  formatViolationsJson,
  toStructured,
} from "./reporter/formatViolations.js";
export type { StructuredViolation } from "./reporter/formatViolations.js";
export { formatPath } from "./utils/path.js";

export { registerParser, parseByType, formatFromPath } from "./parser/index.js";
export type { Parser, ParserOptions } from "./parser/index.js";

export { bumpVersion } from "./catalog/version.js";
export { filterAuthor, mergePlugin, orderEntry } from "./catalog/merge.js";
export { serializeCatalog } from "./catalog/serialize.js";
export { catalogRefinements } from "./catalog/refinements.js";
export { validateCatalog, validateManifest } from "./catalog/validate.js";
export { refreshCatalog } from "./catalog/refresh.js";
export type { RefreshFailure, RefreshOptions, RefreshResult } from "./catalog/refresh.js";
export { CheckoutConfigSource } from "./catalog/PluginConfigSource.js";
export type { GithubPluginRef, PluginConfigSource } from "./catalog/PluginConfigSource.js";

export { FsRepository } from "./repository/FsRepository.js";
export type { StorageRepository } from "./repository/StorageRepository.js";
export { ConsoleLogger } from "./logger/ConsoleLogger.js";
export type { LoggerProvider, LogLevel } from "./logger/LoggerProvider.js";
export { InMemoryCacheProvider } from "./cache/InMemoryCacheProvider.js";
export type { CacheProvider } from "./cache/CacheProvider.js";
