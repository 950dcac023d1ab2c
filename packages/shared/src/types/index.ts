export type {
  RowStatus,
  RequiredField,
  ColumnMapping,
  RosterRow,
  RosterTable,
} from './roster-types';
export { ROW_STATUSES, REQUIRED_FIELDS } from './roster-types';

export type {
  RowState,
  RowOutcome,
  SkipReason,
  ErrorKind,
  RunResult,
  RunCounts,
  RunSummary,
} from './run-types';
export { ROW_STATES, ROW_OUTCOMES, SKIP_REASONS, ERROR_KINDS } from './run-types';

export type { FolderHandle, StoredFile, CertificateArtifact } from './store-types';
