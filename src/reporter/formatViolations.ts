import { formatPath } from "../utils/path.js";
import type { PathSegment, Violation, ViolationCode } from "../validator/Violation.js";

/**
 * Machine-readable form of a violation.
 */
export interface StructuredViolation {
  path: string;
  segments: PathSegment[];
  expected: string;
  actual: string;
  code: ViolationCode;
}

/**
 * One line per violation: `<path>: expected <expected>, got <actual>`.
 */
export function formatViolations(violations: readonly Violation[]): string {
  return violations
    .map((v) => `${formatPath(v.path)}: expected ${v.expected}, got ${v.actual}`)
    .join("\n");
}

export function toStructured(violations: readonly Violation[]): StructuredViolation[] {
  return violations.map((v) => ({
    path: formatPath(v.path),
    segments: [...v.path],
    expected: v.expected,
    actual: v.actual,
    code: v.code,
  }));
}

export function formatViolationsJson(violations: readonly Violation[]): string {
  return JSON.stringify(toStructured(violations), null, 2);
}
