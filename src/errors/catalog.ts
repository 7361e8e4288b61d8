/**
 * Listing Validator - Error Catalog
 *
 * Maps fatal error codes to user-friendly messages and actionable suggestions.
 */

import type { ListingValidatorErrorCode } from '../types/index.js';

export interface ErrorCatalogEntry {
  userMessage: string;
  suggestion: string;
  docsUrl?: string;
}

export const ERROR_CATALOG: Record<ListingValidatorErrorCode, ErrorCatalogEntry> = {
  METADATA_ROOT_UNREADABLE: {
    userMessage: 'The metadata directory could not be read.',
    suggestion: 'Check that --fastlane-path points at a directory containing metadata/android.',
    docsUrl: 'https://docs.fastlane.tools/actions/supply/',
  },
  INVALID_CONFIG: {
    userMessage: 'The validator configuration is invalid.',
    suggestion: 'Review the command-line options and try again.',
  },
  LOCALE_DATA_UNREADABLE: {
    userMessage: 'The known-locale list could not be loaded.',
    suggestion: 'Reinstall the package or run without --check-locales.',
  },
};

export function getCatalogEntry(code: string): ErrorCatalogEntry | undefined {
  const entries: Record<string, ErrorCatalogEntry> = ERROR_CATALOG;
  return Object.hasOwn(entries, code) ? entries[code] : undefined;
}
