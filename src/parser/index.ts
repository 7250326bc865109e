import { parseMarkdown } from "./markdown.js";
import { parseYAML } from "./yaml.js";
import { parseJSON } from "./json.js";
import { extname } from "../utils/path.js";

/**
 * Parser function type.
 * Accepts ParserOptions and returns the parsed value.
 */
export type Parser = (options: ParserOptions) => unknown;

/**
 * Options for all parsers.
 */
export interface ParserOptions {
  /**
   * Raw file content as a string or binary buffer.
   */
  rawContent: string | Uint8Array;
}

const decode = (rawContent: string | Uint8Array) =>
  rawContent instanceof Uint8Array ? new TextDecoder().decode(rawContent) : rawContent;

/**
 * Built-in parser registry. Keys are format types.
 */
export const defaultParsers: Record<string, Parser> = {
  json: ({ rawContent }) => parseJSON({ rawContent }),
  yaml: ({ rawContent }) => parseYAML({ rawContent: decode(rawContent) }),
  markdown: ({ rawContent }) => parseMarkdown({ rawContent: decode(rawContent) }),
};

const extensionFormats: Record<string, string> = {
  json: "json",
  yaml: "yaml",
  yml: "yaml",
  md: "markdown",
  markdown: "markdown",
};

/**
 * Register or override a parser for a given type.
 */
export function registerParser(type: string, parser: Parser, extensions: string[] = []): void {
  defaultParsers[type] = parser;
  for (const ext of extensions) {
    extensionFormats[ext.replace(/^\./, "").toLowerCase()] = type;
  }
}

/**
 * Format type registered for a file's extension, if any.
 *
 * @param path - File path or name.
 */
export function formatFromPath(path: string): string | undefined {
  const ext = extname(path);

  return Object.hasOwn(extensionFormats, ext) ? extensionFormats[ext] : undefined;
}

/**
 * parseByType: Delegates parsing based on declared content type, using registered parsers.
 *
 * @param type - The declared type of the content (`json`, `yaml`, `markdown` or a registered one)
 * @param options - Contains the raw content to parse
 * @returns The parsed value
 * @throws If the type is not supported or parsing fails
 */
export function parseByType(type: string, options: ParserOptions): unknown {
  if (!Object.hasOwn(defaultParsers, type)) {
    throw new Error(`No parser registered for type: ${type}`);
  }

  return defaultParsers[type](options);
}
