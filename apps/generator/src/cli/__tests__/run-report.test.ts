import { describe, it, expect } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { buildRunSummary, type RunResult } from '@certgen/shared';
import { EXIT_CODES, exitCodeFor, exitCodeForChecks, formatChecks, writeSummary } from '../run-report';

function summaryOf(results: RunResult[], cancelled = false) {
  return buildRunSummary({
    runId: 'run-1',
    startedAt: new Date('2024-05-01T10:00:00.000Z'),
    finishedAt: new Date('2024-05-01T10:00:01.000Z'),
    dryRun: false,
    cancelled,
    results,
  });
}

const generated: RunResult = { rowId: 0, sheetRow: 2, company: 'Acme', nationalId: '1', outcome: 'generated' };
const failed: RunResult = {
  rowId: 1, sheetRow: 3, company: 'Acme', nationalId: '2', outcome: 'failed', errorKind: 'UploadError', error: 'x',
};

describe('exitCodeFor', () => {
  it('succeeds when no row failed', () => {
    expect(exitCodeFor(summaryOf([generated]))).toBe(EXIT_CODES.OK);
  });

  it('signals row failures', () => {
    expect(exitCodeFor(summaryOf([generated, failed]))).toBe(2);
  });

  it('signals an interrupted run', () => {
    expect(exitCodeFor(summaryOf([generated, failed], true))).toBe(130);
  });
});

describe('writeSummary', () => {
  it('writes the summary as JSON, creating directories', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'certgen-summary-'));
    const target = path.join(dir, 'nested', 'run.json');

    const written = await writeSummary(target, summaryOf([generated]));

    expect(written).toBe(target);
    const parsed: unknown = JSON.parse(await fs.readFile(target, 'utf8'));
    expect(parsed).toMatchObject({ runId: 'run-1', counts: { generated: 1, total: 1 } });
  });
});

describe('formatChecks', () => {
  const report = {
    ok: false,
    checks: [
      { name: 'account' as const, ok: true, detail: 'token accepted for Ana' },
      { name: 'roster' as const, ok: false, detail: 'getFile: HTTP 404' },
    ],
  };

  it('prints one line per check', () => {
    expect(formatChecks(report)).toBe('ok   account: token accepted for Ana\nFAIL roster: getFile: HTTP 404\n');
  });

  it('exits 1 when any check failed', () => {
    expect(exitCodeForChecks(report)).toBe(EXIT_CODES.FATAL);
    expect(exitCodeForChecks({ ...report, ok: true })).toBe(EXIT_CODES.OK);
  });
});
