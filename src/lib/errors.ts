/**
 * ThreatLedger — Error Taxonomy
 *
 * "Not found" is never an error: lookups return null.
 */

import type { ZodIssue } from 'zod';

export type ThreatLedgerErrorCode =
  | 'STORAGE_UNAVAILABLE'
  | 'VALIDATION_ERROR'
  | 'SOURCE_TIMEOUT';

export abstract class ThreatLedgerError extends Error {
  abstract readonly code: ThreatLedgerErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The persistence backend could not complete an operation.
 */
export class StorageUnavailableError extends ThreatLedgerError {
  readonly code = 'STORAGE_UNAVAILABLE' as const;

  constructor(operation: string, cause?: unknown) {
    super(`Storage unavailable during ${operation}: ${toErrorMessage(cause)}`, { cause });
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Malformed observation, request or configuration.
 */
export class ValidationError extends ThreatLedgerError {
  readonly code = 'VALIDATION_ERROR' as const;
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    const detail = issues.map(i => `${i.path || '(root)'}: ${i.message}`).join('; ');
    super(detail ? `${message} (${detail})` : message);
    this.issues = issues;
  }

  static fromZod(message: string, issues: ZodIssue[]): ValidationError {
    return new ValidationError(
      message,
      issues.map(i => ({ path: i.path.join('.'), message: i.message }))
    );
  }
}

/**
 * A reputation source did not answer within its per-call timeout.
 * Only raised inside SourceLookup.safeLookup, where it becomes "no data".
 */
export class SourceTimeoutError extends ThreatLedgerError {
  readonly code = 'SOURCE_TIMEOUT' as const;

  constructor(source: string, timeoutMs: number) {
    super(`Source ${source} timed out after ${timeoutMs}ms`);
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (error === undefined) return 'unknown error';
  return String(error);
}
