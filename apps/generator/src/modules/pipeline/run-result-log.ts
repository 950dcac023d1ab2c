import type { RunResult } from '@certgen/shared';

/**
 * Append-only record of row outcomes for one run.
 * A row gets exactly one entry; entries are frozen once written.
 */
export class RunResultLog {
  private readonly results: RunResult[] = [];
  private readonly seen = new Set<number>();

  append(result: RunResult): void {
    if (this.seen.has(result.rowId)) {
      throw new Error(`Row ${result.rowId} already has a result`);
    }
    this.seen.add(result.rowId);
    this.results.push(Object.freeze({ ...result }));
  }

  has(rowId: number): boolean {
    return this.seen.has(rowId);
  }

  entries(): readonly RunResult[] {
    return this.results;
  }

  get size(): number {
    return this.results.length;
  }
}
