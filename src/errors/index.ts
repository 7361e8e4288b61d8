/**
 * Listing Validator - Structured Error Handling
 *
 * Only fatal conditions are thrown. Everything a checker can recover from
 * becomes a report entry instead.
 */

import type { ListingValidatorErrorCode, ListingValidatorErrorInfo } from '../types/index.js';
import { getCatalogEntry } from './catalog.js';

export class ListingValidatorError extends Error {
  readonly code: ListingValidatorErrorCode;
  readonly suggestion: string;
  readonly details?: Record<string, unknown>;

  constructor(info: ListingValidatorErrorInfo, options?: { cause?: unknown }) {
    super(info.message, options);
    this.code = info.code;
    this.suggestion = info.suggestion ?? getCatalogEntry(info.code)?.suggestion ?? '';
    this.details = info.details;
    this.name = 'ListingValidatorError';
  }
}

export function formatFatalError(error: ListingValidatorError): string {
  const suggestion = error.suggestion || getCatalogEntry(error.code)?.suggestion || '';
  return suggestion
    ? `[${error.code}] ${error.message}\nSuggestion: ${suggestion}`
    : `[${error.code}] ${error.message}`;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
