/** Per-row lifecycle inside one run */
export const ROW_STATES = [
  'pending',
  'rendering',
  'uploading',
  'marking_done',
  'done',
  'failed',
] as const;
export type RowState = (typeof ROW_STATES)[number];

export const ROW_OUTCOMES = ['generated', 'skipped', 'failed'] as const;
export type RowOutcome = (typeof ROW_OUTCOMES)[number];

export const SKIP_REASONS = ['already_done', 'dry_run', 'cancelled'] as const;
export type SkipReason = (typeof SKIP_REASONS)[number];

export const ERROR_KINDS = [
  'ConfigurationError',
  'FolderCreationError',
  'TemplateLoadError',
  'RenderConversionError',
  'UploadError',
  'StatusWriteError',
] as const;
export type ErrorKind = (typeof ERROR_KINDS)[number];

/** Outcome record for one roster row. Frozen once appended to a run log. */
export interface RunResult {
  rowId: number;
  sheetRow: number;
  company: string;
  nationalId: string;
  outcome: RowOutcome;
  /** State the row was in when it failed */
  failedAt?: RowState;
  errorKind?: ErrorKind;
  error?: string;
  reason?: SkipReason;
  fileName?: string;
  /** Set when the artifact was uploaded but the status write failed */
  warning?: string;
}

export interface RunCounts {
  generated: number;
  skipped: number;
  failed: number;
  total: number;
}

/** Machine-readable end-of-run report */
export interface RunSummary {
  runId: string;
  startedAt: string;
  finishedAt: string;
  dryRun: boolean;
  cancelled: boolean;
  counts: RunCounts;
  failures: RunResult[];
  warnings: RunResult[];
  results: RunResult[];
}
