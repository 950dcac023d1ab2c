import type { RosterRow, RosterTable } from '@certgen/shared';

/** Injection token for the roster the pipeline reads and marks */
export const ROSTER_SOURCE = Symbol('ROSTER_SOURCE');

/**
 * Source of truth for recipients and their status.
 * `markDone` writes the status of one row only, never the whole file.
 */
export interface RosterSource {
  load(): Promise<RosterTable>;
  markDone(row: RosterRow): Promise<void>;
  describe(): string;
}
