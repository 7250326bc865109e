import { CheckoutConfigSource } from "../src/catalog/PluginConfigSource.js";
import { DEFAULT_CONFIG_PATH, loadConfig } from "../src/config.js";
import {
  CatalogError,
  ConfigError,
  ValidationViolationError,
  isFatalError,
} from "../src/errors.js";
import { definePluginCatalog } from "../src/index.js";
import { ConsoleLogger } from "../src/logger/ConsoleLogger.js";
import type { LoggerProvider } from "../src/logger/LoggerProvider.js";
import { formatFromPath } from "../src/parser/index.js";
import { PluginCatalog } from "../src/PluginCatalog.js";
import { formatViolations, toStructured } from "../src/reporter/formatViolations.js";
import { FsRepository } from "../src/repository/FsRepository.js";
import type { StorageRepository } from "../src/repository/StorageRepository.js";
import type { Violation } from "../src/validator/Violation.js";

export const EXIT_OK = 0;
export const EXIT_VIOLATIONS = 1;
export const EXIT_FATAL = 2;

export const DEFAULT_CHECKOUTS_DIR = "checkouts";

/**
 * Where a command reads from and writes to.
 */
export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  logger?: LoggerProvider;
  repository?: StorageRepository;
}

interface ParsedArgs {
  positionals: string[];
  flags: Map<string, string | true>;
}

const VALIDATE_USAGE =
  "Usage: plugin-validate <schema> <candidate...> [--format=text|json] [--type=json|yaml|markdown] [--quiet]";
const CATALOG_USAGE =
  "Usage: plugin-catalog [validate|refresh] [--config=path] [--checkouts=dir]";

function parseArgs(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Map<string, string | true>();

  for (const arg of argv) {
    if (!arg.startsWith("--")) {
      positionals.push(arg);
      continue;
    }
    const eq = arg.indexOf("=");
    if (eq === -1) flags.set(arg.slice(2), true);
    else flags.set(arg.slice(2, eq), arg.slice(eq + 1));
  }

  return { positionals, flags };
}

function unknownFlag(args: ParsedArgs, known: readonly string[]): string | undefined {
  return [...args.flags.keys()].find((flag) => !known.includes(flag));
}

function stringFlag(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags.get(name);
  return typeof value === "string" ? value : undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * `plugin-validate`: validates candidate files (or directories of them)
 * against a schema file.
 *
 * @returns 0 when everything is valid, 1 on violations, 2 on a fatal error or bad usage.
 */
export async function runValidate(argv: readonly string[], io: CliIO): Promise<number> {
  const args = parseArgs(argv);
  const format = stringFlag(args, "format") ?? "text";
  const type = stringFlag(args, "type");
  const quiet = args.flags.get("quiet") === true;
  const bad = unknownFlag(args, ["format", "type", "quiet"]);

  if (bad !== undefined || args.positionals.length < 2 || (format !== "text" && format !== "json")) {
    io.stderr(bad !== undefined ? `Unknown option: --${bad}\n${VALIDATE_USAGE}` : VALIDATE_USAGE);
    return EXIT_FATAL;
  }

  const [schemaPath, ...candidates] = args.positionals;
  const repository = io.repository ?? new FsRepository(".");
  const catalog = definePluginCatalog()({
    repository,
    options: { logger: io.logger ?? new ConsoleLogger("warn") },
  });

  try {
    await catalog.loadSchema(schemaPath);
  } catch (err) {
    if (!isFatalError(err)) throw err;
    io.stderr(`${schemaPath}: ${err.message}`);
    return EXIT_FATAL;
  }

  let files: string[];
  try {
    files = await expandCandidates(repository, candidates, type);
  } catch (err) {
    io.stderr(errorMessage(err));
    return EXIT_FATAL;
  }

  const results: { file: string; violations: Violation[] }[] = [];
  let fatal = false;

  for (const file of files) {
    try {
      results.push({ file, violations: await catalog.validateFile(schemaPath, file, { format: type }) });
    } catch (err) {
      if (!isFatalError(err)) throw err;
      io.stderr(`${file}: ${err.message}`);
      fatal = true;
    }
  }

  if (format === "json") {
    io.stdout(
      JSON.stringify(
        results.map(({ file, violations }) => ({
          file,
          valid: violations.length === 0,
          violations: toStructured(violations),
        })),
        null,
        2
      )
    );
  } else {
    for (const { file, violations } of results) {
      if (violations.length === 0) {
        if (!quiet) io.stderr(`${file}: ok`);
        continue;
      }
      io.stderr(`${file}: ${violations.length} violation(s)`);
      io.stderr(indent(formatViolations(violations)));
    }
  }

  if (fatal) return EXIT_FATAL;
  return results.some(({ violations }) => violations.length > 0) ? EXIT_VIOLATIONS : EXIT_OK;
}

/**
 * Files named directly are kept; directories contribute the files whose
 * extension has a registered parser, or every file when a type is forced.
 */
async function expandCandidates(
  repository: StorageRepository,
  candidates: readonly string[],
  type: string | undefined
): Promise<string[]> {
  const files: string[] = [];

  for (const candidate of candidates) {
    const listed = await repository.listFiles(candidate);
    const isFile = listed.length === 1 && candidate.replace(/^\.\//, "") === listed[0];
    const matched = isFile
      ? listed
      : listed.filter((file) => type !== undefined || formatFromPath(file) !== undefined);

    if (matched.length === 0) {
      throw new Error(`No candidate files found in ${candidate}`);
    }
    files.push(...matched);
  }

  return files;
}

function indent(text: string): string {
  return text
    .split("\n")
    .map((line) => `  ${line}`)
    .join("\n");
}

/**
 * `plugin-catalog`: validates or refreshes the marketplace catalog.
 *
 * @returns 0 on success, 1 on violations or failed plugins, 2 on bad usage
 *   or an unusable configuration or schema.
 */
export async function runCatalog(argv: readonly string[], io: CliIO): Promise<number> {
  const args = parseArgs(argv);
  const command = args.positionals[0] ?? "refresh";
  const bad = unknownFlag(args, ["config", "checkouts"]);

  if (bad !== undefined || args.positionals.length > 1 || (command !== "validate" && command !== "refresh")) {
    io.stderr(bad !== undefined ? `Unknown option: --${bad}\n${CATALOG_USAGE}` : CATALOG_USAGE);
    return EXIT_FATAL;
  }

  const repository = io.repository ?? new FsRepository(".");
  const configPath = stringFlag(args, "config");

  let catalog: PluginCatalog;
  try {
    const config = await loadConfig(repository, configPath ?? DEFAULT_CONFIG_PATH, configPath === undefined);
    catalog = new PluginCatalog(config, repository, {
      logger: io.logger ?? new ConsoleLogger(config.logLevel),
    });
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    io.stderr(err.message);
    return EXIT_FATAL;
  }

  const { catalogPath, manifestPath } = catalog.getConfig();

  try {
    if (command === "validate") {
      const violations = await catalog.validateCatalog();
      if (violations.length > 0) {
        io.stderr(`${catalogPath}: ${violations.length} violation(s)`);
        io.stderr(indent(formatViolations(violations)));
        return EXIT_VIOLATIONS;
      }
      io.stdout(`${catalogPath} is valid`);
      return EXIT_OK;
    }

    const checkouts = stringFlag(args, "checkouts") ?? DEFAULT_CHECKOUTS_DIR;
    await catalog.refresh(new CheckoutConfigSource(repository, checkouts, manifestPath));
    return EXIT_OK;
  } catch (err) {
    if (err instanceof ValidationViolationError) {
      io.stderr(`${catalogPath}: ${err.violations.length} violation(s)`);
      io.stderr(indent(formatViolations(err.violations)));
      return EXIT_VIOLATIONS;
    }
    if (err instanceof CatalogError) {
      io.stderr(err.message);
      return EXIT_VIOLATIONS;
    }
    if (isFatalError(err)) {
      io.stderr(err.message);
      return EXIT_FATAL;
    }
    throw err;
  }
}
