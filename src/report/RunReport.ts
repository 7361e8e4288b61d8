/**
 * RunReport — run-scoped, append-only accumulator of report entries.
 *
 * Entries keep insertion order and are never filtered or deduplicated.
 */

import type {
  AssetRef,
  IoFailure,
  ReportEntry,
  RuleFinding,
  Violation,
} from '../types/index.js';

export class RunReport {
  private readonly items: ReportEntry[] = [];

  add(entry: ReportEntry): void {
    this.items.push(entry);
  }

  addAll(entries: Iterable<ReportEntry>): void {
    for (const entry of entries) {
      this.items.push(entry);
    }
  }

  /** Attaches rule findings to the asset they were computed for. */
  addFindings(asset: AssetRef, findings: RuleFinding[]): void {
    for (const finding of findings) {
      this.items.push(
        finding.kind === 'violation'
          ? { ...asset, kind: 'violation', rule: finding.rule, message: finding.message }
          : { ...asset, kind: 'io_failure', message: finding.message },
      );
    }
  }

  addIoFailure(asset: AssetRef, message: string): void {
    this.items.push({ ...asset, kind: 'io_failure', message });
  }

  get entries(): readonly ReportEntry[] {
    return this.items;
  }

  get count(): number {
    return this.items.length;
  }

  get passed(): boolean {
    return this.items.length === 0;
  }

  violations(): Violation[] {
    return this.items.filter((e): e is Violation => e.kind === 'violation');
  }

  ioFailures(): IoFailure[] {
    return this.items.filter((e): e is IoFailure => e.kind === 'io_failure');
  }

  exitCode(): 0 | 1 {
    return this.passed ? 0 : 1;
  }
}
