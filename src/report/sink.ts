import type { Diagnostic } from "../analysis/diagnostic";

/**
 * Accumulates diagnostics across files. Persistence is left to ./json.
 */
export class ReportSink {
  private readonly entries: Diagnostic[] = [];

  add(diagnostics: readonly Diagnostic[]): void {
    this.entries.push(...diagnostics);
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }
}
