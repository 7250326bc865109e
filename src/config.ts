import { z } from "zod";
import { ConfigError } from "./errors.js";
import { LOG_LEVELS } from "./logger/LoggerProvider.js";
import type { StorageRepository } from "./repository/StorageRepository.js";

export const DEFAULT_CONFIG_PATH = "plugin-catalog.config.json";

/**
 * Shape of `plugin-catalog.config.json`. Every field has a default.
 */
export const PluginCatalogConfigSchema = z
  .object({
    catalogPath: z.string().min(1).default(".claude-plugin/marketplace.json"),
    manifestPath: z.string().min(1).default(".claude-plugin/plugin.json"),
    schemas: z
      .object({
        marketplace: z.string().min(1).default("schemas/marketplace.schema.json"),
        plugin: z.string().min(1).default("schemas/plugin-manifest.schema.json"),
      })
      .strict()
      .default({}),
    reservedNames: z.array(z.string().min(1)).default([]),
    logLevel: z.enum(LOG_LEVELS).default("info"),
  })
  .strict();

export type PluginCatalogConfigInput = z.input<typeof PluginCatalogConfigSchema>;

export type PluginCatalogConfig = z.output<typeof PluginCatalogConfigSchema>;

/**
 * Applies defaults and checks a configuration object.
 *
 * @throws ConfigError listing every issue.
 */
export function resolveConfig(input: unknown): PluginCatalogConfig {
  const result = PluginCatalogConfigSchema.safeParse(input);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(
        (issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`
      )
    );
  }

  return result.data;
}

/**
 * Reads a JSON configuration file through the repository.
 *
 * @param repository - Where to read from.
 * @param configPath - Config file path.
 * @param optional - When true, a missing file yields the defaults.
 * @throws ConfigError if the file is missing (and required), not JSON, or invalid.
 */
export async function loadConfig(
  repository: StorageRepository,
  configPath: string = DEFAULT_CONFIG_PATH,
  optional = false
): Promise<PluginCatalogConfig> {
  if (!(await repository.exists(configPath))) {
    if (optional) return resolveConfig({});
    throw new ConfigError([`${configPath}: file not found`]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await repository.readFile(configPath));
  } catch (err) {
    throw new ConfigError([
      `${configPath}: ${err instanceof Error ? err.message : String(err)}`,
    ]);
  }

  return resolveConfig(raw);
}
