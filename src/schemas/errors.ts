/**
 * Validation errors for research pipeline records.
 *
 * Every failure of the schema layer (missing required field, wrong type,
 * enum value outside its set, malformed JSON text, unknown field under
 * strict parsing) surfaces as a ValidationError. Nothing is retried or
 * defaulted here; the caller decides what to do.
 */

import type { ZodIssue } from "zod";

/**
 * Individual validation issue.
 */
export interface ValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or one of our own ("invalid_json", "unrecognized_keys") */
  code: string;
}

/**
 * Structured validation error for a record type.
 */
export class ValidationError extends Error {
  public readonly record: string;
  public readonly issues: ValidationIssue[];

  constructor(record: string, issues: ValidationIssue[], message?: string) {
    super(
      message ??
        `Invalid ${record}: ${issues.map(describeIssue).join("; ")}`
    );
    this.name = "ValidationError";
    this.record = record;
    this.issues = issues;
  }

  /**
   * Dotted paths of the offending fields, deduplicated in issue order.
   */
  get fields(): string[] {
    return [...new Set(this.issues.map((issue) => formatPath(issue.path)))];
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = [`${this.record} validation failed:`];
    for (const issue of this.issues) {
      lines.push(`  - ${describeIssue(issue)}`);
    }
    return lines.join("\n");
  }
}

export function formatPath(path: readonly (string | number)[]): string {
  return path.length > 0 ? path.join(".") : "(root)";
}

function describeIssue(issue: ValidationIssue): string {
  return `${formatPath(issue.path)}: ${issue.message}`;
}

/**
 * Convert Zod issues to our structured format.
 */
export function toValidationIssues(zodIssues: readonly ZodIssue[]): ValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}
