/**
 * Reporter — renders a RunReport for humans and for CI log parsers.
 *
 * Human-readable lines go to the diagnostic stream. GitHub Actions
 * `::error` annotations and the JSON document go to the output stream.
 */

import type { ReportEntry, ReportFormat, Violation } from '../types/index.js';
import type { RunReport } from './RunReport.js';

export interface ReportSink {
  write(chunk: string): unknown;
}

export interface ReporterOptions {
  out: ReportSink;
  err: ReportSink;
  format: ReportFormat;
  enableGaAnnotations: boolean;
}

export function formatEntry(entry: ReportEntry): string {
  const relative = entry.relativePath === '.' ? entry.locale : `${entry.locale}/${entry.relativePath}`;
  return `${relative}: ${entry.message}`;
}

export function escapeAnnotationData(value: string): string {
  return value.replaceAll('%', '%25').replaceAll('\r', '%0D').replaceAll('\n', '%0A');
}

export function formatAnnotation(violation: Violation): string {
  return `::error file=${violation.assetPath}::${escapeAnnotationData(violation.message)}`;
}

export function renderReport(report: RunReport, opts: ReporterOptions): void {
  if (opts.format === 'json') {
    opts.out.write(
      JSON.stringify({ passed: report.passed, count: report.count, entries: report.entries }, null, 2) + '\n',
    );
  } else {
    opts.out.write(`found ${report.count} errors!\n`);
  }

  for (const entry of report.entries) {
    if (entry.kind === 'violation' && opts.enableGaAnnotations) {
      opts.out.write(formatAnnotation(entry) + '\n');
    }
    opts.err.write(formatEntry(entry) + '\n');
  }
}
