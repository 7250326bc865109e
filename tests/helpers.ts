import fs from "fs";
import os from "os";
import path from "path";
import type { LoggerProvider } from "../src/logger/LoggerProvider.js";
import { loadSchema } from "../src/schema/SchemaLoader.js";
import type { SchemaDocument } from "../src/schema/SchemaDocument.js";

/**
 * Logger that keeps every line, for assertions.
 */
export class MemoryLogger implements LoggerProvider {
  readonly lines: string[] = [];

  debug(...args: unknown[]) {
    this.lines.push(args.join(" "));
  }

  info(...args: unknown[]) {
    this.lines.push(args.join(" "));
  }

  warn(...args: unknown[]) {
    this.lines.push(args.join(" "));
  }

  error(...args: unknown[]) {
    this.lines.push(args.join(" "));
  }
}

export function readRepoFile(relativePath: string): string {
  return fs.readFileSync(new URL(`../${relativePath}`, import.meta.url), "utf-8");
}

export function loadRepoSchema(relativePath: string): SchemaDocument {
  return loadSchema(readRepoFile(relativePath));
}

export function schemaOf(schema: object): SchemaDocument {
  return loadSchema(JSON.stringify(schema));
}

export function makeTmpDir(prefix = "plugin-catalog-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeTmpFile(baseDir: string, relativePath: string, content: string): void {
  const abs = path.join(baseDir, relativePath);
  fs.mkdirSync(path.dirname(abs), { recursive: true });
  fs.writeFileSync(abs, content);
}
