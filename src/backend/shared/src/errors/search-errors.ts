/**
 * Search Error Types
 *
 * Errors surfaced by the filter engine and the listings client. Empty
 * candidate sets and exhausted relaxation are normal results, not errors.
 */

import type { ZodError } from 'zod';

/**
 * Field-level error detail
 */
export interface FieldErrorDetail {
  field: string;
  message: string;
  code: string;
}

/**
 * Formats Zod issues into field-level error details
 */
export function formatValidationErrors(error: ZodError): FieldErrorDetail[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Base class for search errors
 */
export abstract class SearchError extends Error {
  abstract readonly code: string;

  constructor(
    message: string,
    public readonly details: FieldErrorDetail[] = []
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A caller-supplied criteria value is malformed. Raised before any
 * listing is examined.
 */
export class InvalidCriteriaError extends SearchError {
  readonly code = 'INVALID_CRITERIA';

  static fromZodError(domain: string, error: ZodError): InvalidCriteriaError {
    const details = formatValidationErrors(error);
    const fields = details.map((d) => d.field || '(root)').join(', ');
    return new InvalidCriteriaError(`Invalid ${domain.toLowerCase()} criteria: ${fields}`, details);
  }
}

/**
 * A listing supplied by the data source violates its domain schema.
 * Attributed to the data source, never reported as "no results".
 */
export class DataIntegrityError extends SearchError {
  readonly code = 'DATA_INTEGRITY';

  constructor(
    message: string,
    details: FieldErrorDetail[] = [],
    public readonly listingId?: string
  ) {
    super(message, details);
  }
}

/**
 * The listings backend could not be reached or answered with an error
 */
export class ListingsUnavailableError extends SearchError {
  readonly code = 'LISTINGS_UNAVAILABLE';
}

export function isSearchError(error: unknown): error is SearchError {
  return error instanceof SearchError;
}
