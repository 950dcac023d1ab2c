import type { RunCounts, RunResult, RunSummary } from '../types/run-types';

export function countOutcomes(results: readonly RunResult[]): RunCounts {
  const counts: RunCounts = { generated: 0, skipped: 0, failed: 0, total: results.length };
  for (const result of results) {
    counts[result.outcome] += 1;
  }
  return counts;
}

/** Assemble the end-of-run report. Results are listed in row order. */
export function buildRunSummary(input: {
  runId: string;
  startedAt: Date;
  finishedAt: Date;
  dryRun: boolean;
  cancelled: boolean;
  results: readonly RunResult[];
}): RunSummary {
  const results = [...input.results].sort((a, b) => a.rowId - b.rowId);
  return {
    runId: input.runId,
    startedAt: input.startedAt.toISOString(),
    finishedAt: input.finishedAt.toISOString(),
    dryRun: input.dryRun,
    cancelled: input.cancelled,
    counts: countOutcomes(results),
    failures: results.filter((r) => r.outcome === 'failed'),
    warnings: results.filter((r) => r.warning !== undefined),
    results,
  };
}
