/**
 * Listing Validator - run orchestration
 *
 * Resolves configuration, walks the metadata tree, renders the report and
 * maps it to an exit code. Fatal errors propagate as ListingValidatorError.
 */

import { loadConfig, resolveMetadataRoot } from './config/schema.js';
import { getKnownLocales } from './locales/knownLocales.js';
import { createLogger } from './logger/index.js';
import { renderReport, type ReportSink } from './report/Reporter.js';
import type { RunReport } from './report/RunReport.js';
import { walkMetadata } from './walker/LocaleWalker.js';

const log = createLogger('validate');

export interface ValidationStreams {
  out: ReportSink;
  err: ReportSink;
}

export interface ValidationResult {
  report: RunReport;
  exitCode: 0 | 1;
}

export function runValidation(
  input: unknown,
  streams: ValidationStreams = { out: process.stdout, err: process.stderr },
): ValidationResult {
  const config = loadConfig(input);
  const metadataRoot = resolveMetadataRoot(config);
  log.debug({ metadataRoot, checkLocales: config.checkLocales }, 'starting validation');

  const report = walkMetadata(metadataRoot, {
    knownLocales: config.checkLocales ? getKnownLocales() : undefined,
  });

  renderReport(report, {
    out: streams.out,
    err: streams.err,
    format: config.format,
    enableGaAnnotations: config.enableGaAnnotations,
  });

  const exitCode = report.exitCode();
  log.info({ errors: report.count, exitCode }, report.passed ? 'metadata is valid' : 'metadata has errors');
  return { report, exitCode };
}
