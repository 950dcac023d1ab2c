import * as fs from 'fs/promises';
import * as path from 'path';
import type { RunSummary } from '@certgen/shared';
import type { DiagnosticReport } from '../modules/diagnostics/diagnostics.service';

export const EXIT_CODES = {
  OK: 0,
  FATAL: 1,
  ROW_FAILURES: 2,
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeFor(summary: RunSummary): ExitCode {
  if (summary.cancelled) return EXIT_CODES.INTERRUPTED;
  if (summary.counts.failed > 0) return EXIT_CODES.ROW_FAILURES;
  return EXIT_CODES.OK;
}

export function formatSummary(summary: RunSummary): string {
  return `${JSON.stringify(summary, null, 2)}\n`;
}

export async function writeSummary(filePath: string, summary: RunSummary): Promise<string> {
  const resolved = path.resolve(process.cwd(), filePath);
  await fs.mkdir(path.dirname(resolved), { recursive: true });
  await fs.writeFile(resolved, formatSummary(summary), 'utf8');
  return resolved;
}

export function formatChecks(report: DiagnosticReport): string {
  const lines = report.checks.map((c) => `${c.ok ? 'ok  ' : 'FAIL'} ${c.name}: ${c.detail}`);
  return `${lines.join('\n')}\n`;
}

export function exitCodeForChecks(report: DiagnosticReport): ExitCode {
  return report.ok ? EXIT_CODES.OK : EXIT_CODES.FATAL;
}
