import { describe, it, expect } from 'vitest';
import { RunResultLog } from '../run-result-log';

describe('RunResultLog', () => {
  it('keeps results in append order', () => {
    const log = new RunResultLog();
    log.append({ rowId: 1, sheetRow: 3, company: 'Beta', nationalId: '2', outcome: 'generated' });
    log.append({ rowId: 0, sheetRow: 2, company: 'Acme', nationalId: '1', outcome: 'skipped', reason: 'already_done' });

    expect(log.entries().map((r) => r.rowId)).toEqual([1, 0]);
    expect(log.size).toBe(2);
    expect(log.has(0)).toBe(true);
  });

  it('freezes results once appended', () => {
    const log = new RunResultLog();
    const result = { rowId: 0, sheetRow: 2, company: 'Acme', nationalId: '1', outcome: 'generated' as const };
    log.append(result);

    const stored = log.entries()[0];
    expect(Object.isFrozen(stored)).toBe(true);
    result.company = 'Changed';
    expect(stored?.company).toBe('Acme');
  });

  it('refuses a second result for the same row', () => {
    const log = new RunResultLog();
    log.append({ rowId: 0, sheetRow: 2, company: 'Acme', nationalId: '1', outcome: 'generated' });

    expect(() =>
      log.append({ rowId: 0, sheetRow: 2, company: 'Acme', nationalId: '1', outcome: 'failed', errorKind: 'UploadError', error: 'x' }),
    ).toThrow('Row 0 already has a result');
  });
});
