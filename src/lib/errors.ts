// Error taxonomy for parsing, rewriting and schema registration

import { describeError } from "@/lib/helpers";

/** Input SQL is not valid for the configured dialect. Raised before any rewriting. */
export class ParseError extends Error {
  readonly sql: string;

  constructor(sql: string, cause: unknown) {
    super(describeError(cause), { cause });
    this.name = "ParseError";
    this.sql = sql;
  }
}

/**
 * A rendered FROM fragment did not parse back into a single FROM term.
 * Always a defect in fragment construction, never a property of the input query.
 */
export class InternalConstructionError extends Error {
  readonly fragment: string;

  constructor(fragment: string, reason: string, cause?: unknown) {
    super(`Failed to construct FROM fragment "${fragment}": ${reason}`, { cause });
    this.name = "InternalConstructionError";
    this.fragment = fragment;
  }
}

export class SchemaDefinitionError extends Error {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`${source} failed validation: ${issues.join("; ")}`);
    this.name = "SchemaDefinitionError";
    this.issues = issues;
  }
}

export function isParseError(err: unknown): err is ParseError {
  return err instanceof ParseError;
}

export function isInternalConstructionError(
  err: unknown
): err is InternalConstructionError {
  return err instanceof InternalConstructionError;
}
