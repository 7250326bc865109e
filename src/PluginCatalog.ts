import { CandidateParseError, CatalogError, SchemaParseError } from "./errors.js";
import type { PluginCatalogConfig } from "./config.js";
import type { CacheProvider } from "./cache/CacheProvider.js";
import { InMemoryCacheProvider } from "./cache/InMemoryCacheProvider.js";
import type { PluginConfigSource } from "./catalog/PluginConfigSource.js";
import { refreshCatalog, RefreshResult } from "./catalog/refresh.js";
import { serializeCatalog } from "./catalog/serialize.js";
import { validateCatalog, validateManifest } from "./catalog/validate.js";
import { ConsoleLogger } from "./logger/ConsoleLogger.js";
import type { LoggerProvider } from "./logger/LoggerProvider.js";
import { formatFromPath } from "./parser/index.js";
import type { StorageRepository } from "./repository/StorageRepository.js";
import type { SchemaDocument } from "./schema/SchemaDocument.js";
import { loadSchema } from "./schema/SchemaLoader.js";
import type { JsonValue } from "./schema/SchemaNode.js";
import { defaultValidator } from "./validator/defaultValidator.js";
import { parseCandidate } from "./validator/validateDocument.js";
import type { RefinementMap, Validator } from "./validator/Validator.js";
import type { Violation } from "./validator/Violation.js";

/**
 * Initialization options for PluginCatalog.
 */
export interface PluginCatalogInitOptions {
  validator?: Validator;
  logger?: LoggerProvider;
  /** Extra refinements, applied on top of the built-in catalog checks. */
  refinements?: RefinementMap;
  cache?: CacheProvider<SchemaDocument>;
}

/**
 * Validates files against schemas and maintains a marketplace catalog,
 * reading and writing everything through one repository.
 */
export class PluginCatalog {
  private validator: Validator;
  private logger: LoggerProvider;
  private cache: CacheProvider<SchemaDocument>;

  constructor(
    private config: PluginCatalogConfig,
    private repository: StorageRepository,
    private options: PluginCatalogInitOptions = {}
  ) {
    this.validator = this.options.validator ?? defaultValidator;
    this.logger = this.options.logger ?? new ConsoleLogger(config.logLevel);
    this.cache = this.options.cache ?? new InMemoryCacheProvider<SchemaDocument>();
  }

  /**
   * Loads a schema file; repeated calls for the same path share the document.
   *
   * @throws SchemaParseError | SchemaReferenceError
   */
  async loadSchema(schemaPath: string): Promise<SchemaDocument> {
    const cached = await this.cache.get(schemaPath);
    if (cached) return cached;

    this.logger.debug(`Loading schema ${schemaPath}`);
    const text = await this.readText(
      schemaPath,
      (message, cause) => new SchemaParseError(message, schemaPath, { cause })
    );
    const document = loadSchema(text, {
      format: formatFromPath(schemaPath) ?? "json",
    });
    await this.cache.set(schemaPath, document);

    return document;
  }

  /**
   * Reads and parses a candidate file. The format defaults to the one
   * registered for the file extension, then to JSON.
   *
   * @throws CandidateParseError
   */
  async readCandidate(candidatePath: string, format?: string): Promise<JsonValue> {
    const text = await this.readText(
      candidatePath,
      (message, cause) => new CandidateParseError(message, candidatePath, { cause })
    );
    return parseCandidate(text, {
      format: format ?? formatFromPath(candidatePath) ?? "json",
      location: candidatePath,
    });
  }

  private async readText(
    filePath: string,
    toError: (message: string, cause: unknown) => Error
  ): Promise<string> {
    try {
      return await this.repository.readFile(filePath);
    } catch (err) {
      throw toError(`cannot read file: ${err instanceof Error ? err.message : String(err)}`, err);
    }
  }

  /**
   * Validates one file against a schema file.
   */
  async validateFile(
    schemaPath: string,
    candidatePath: string,
    { format }: { format?: string } = {}
  ): Promise<Violation[]> {
    const document = await this.loadSchema(schemaPath);
    const candidate = await this.readCandidate(candidatePath, format);

    return this.validator.validate(document, candidate, {
      refinements: this.options.refinements,
    });
  }

  /**
   * Validates the configured catalog file.
   */
  async validateCatalog(catalogPath: string = this.config.catalogPath): Promise<Violation[]> {
    return validateCatalog(
      await this.loadSchema(this.config.schemas.marketplace),
      await this.readCandidate(catalogPath),
      this.catalogOptions()
    );
  }

  /**
   * Validates a plugin manifest file (the configured manifest path by default).
   */
  async validateManifest(manifestPath: string = this.config.manifestPath): Promise<Violation[]> {
    return validateManifest(
      await this.loadSchema(this.config.schemas.plugin),
      await this.readCandidate(manifestPath),
      this.catalogOptions()
    );
  }

  /**
   * Refreshes the catalog from plugin manifests and writes it back when
   * anything changed.
   *
   * @throws ValidationViolationError if the catalog is invalid before refreshing.
   * @throws CatalogError if any plugin could not be refreshed; nothing is written.
   */
  async refresh(source: PluginConfigSource): Promise<RefreshResult> {
    const catalogPath = this.config.catalogPath;
    const result = await refreshCatalog(await this.readCandidate(catalogPath), {
      marketplaceSchema: await this.loadSchema(this.config.schemas.marketplace),
      pluginSchema: await this.loadSchema(this.config.schemas.plugin),
      source,
      logger: this.logger,
      ...this.catalogOptions(),
    });

    if (result.failures.length > 0) {
      throw new CatalogError(
        `Refresh failed for ${result.failures.length} plugin(s): ` +
          result.failures.map((failure) => failure.plugin).join(", ")
      );
    }

    if (!result.changed) {
      this.logger.info("No plugin changes detected");
      return result;
    }

    await this.repository.writeFile(catalogPath, serializeCatalog(result.catalog));
    this.logger.info(`Marketplace version: ${result.previousVersion} -> ${result.version}`);

    return result;
  }

  /**
   * Returns the resolved configuration.
   */
  getConfig(): PluginCatalogConfig {
    return this.config;
  }

  private catalogOptions() {
    return {
      reservedNames: this.config.reservedNames,
      refinements: this.options.refinements,
      validator: this.validator,
    };
  }
}
