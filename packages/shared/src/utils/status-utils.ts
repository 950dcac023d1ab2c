import type { RowStatus, RosterRow } from '../types/roster-types';
import { DEFAULT_DONE_VALUE } from '../constants/defaults';

/**
 * Map a raw status cell to a row status.
 * Only the configured done marker (or the literal "done") counts as done;
 * empty, missing, misspelled and unknown values are pending.
 */
export function normalizeStatus(raw: unknown, doneValue: string = DEFAULT_DONE_VALUE): RowStatus {
  if (raw === null || raw === undefined) return 'pending';
  const value = String(raw).trim().toLowerCase();
  if (value.length === 0) return 'pending';
  if (value === 'done') return 'done';
  return value === doneValue.trim().toLowerCase() ? 'done' : 'pending';
}

/** Rows that still need a certificate, in source order */
export function selectPending<T extends Pick<RosterRow, 'status'>>(rows: readonly T[]): T[] {
  return rows.filter((row) => row.status === 'pending');
}
