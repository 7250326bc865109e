import type { Violation } from "./validator/Violation.js";

/**
 * Raised when a schema document cannot be read into the schema model:
 * malformed syntax, unsupported keywords or invalid keyword values.
 */
export class SchemaParseError extends Error {
  constructor(
    message: string,
    public readonly location: string = "#",
    options?: ErrorOptions
  ) {
    super(`${message} (at ${location})`, options);
    this.name = "SchemaParseError";
  }
}

/**
 * Raised at load time for a `$ref` that does not name a schema in the same
 * document, or for a cycle in the reference graph.
 */
export class SchemaReferenceError extends Error {
  constructor(
    message: string,
    public readonly location: string = "#",
    options?: ErrorOptions
  ) {
    super(`${message} (at ${location})`, options);
    this.name = "SchemaReferenceError";
  }
}

/**
 * Raised when a candidate document is not parseable, or is not a JSON-like value.
 */
export class CandidateParseError extends Error {
  constructor(
    message: string,
    public readonly location: string,
    options?: ErrorOptions
  ) {
    super(`${message} (at ${location})`, options);
    this.name = "CandidateParseError";
  }
}

export class ValidationViolationError extends Error {
  constructor(public readonly violations: readonly Violation[]) {
    super(`Validation failed with ${violations.length} violation(s)`);
    this.name = "ValidationViolationError";
  }
}

export class ConfigError extends Error {
  constructor(public readonly issues: readonly string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

export class CatalogError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CatalogError";
  }
}

/**
 * Errors that end a run before any violation can be reported.
 */
export function isFatalError(
  err: unknown
): err is SchemaParseError | SchemaReferenceError | CandidateParseError {
  return (
    err instanceof SchemaParseError ||
    err instanceof SchemaReferenceError ||
    err instanceof CandidateParseError
  );
}
