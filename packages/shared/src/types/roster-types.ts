/** Row status values. Anything that is not recognized as done is pending. */
export const ROW_STATUSES = ['done', 'pending'] as const;
export type RowStatus = (typeof ROW_STATUSES)[number];

/** Canonical keys every roster must provide */
export const REQUIRED_FIELDS = ['name', 'national_id', 'company', 'status'] as const;
export type RequiredField = (typeof REQUIRED_FIELDS)[number];

/** Sheet header expected for each canonical key */
export type ColumnMapping = Record<RequiredField, string>;

/** One recipient row read from the roster */
export interface RosterRow {
  /** 0-based data row index, in source order */
  rowId: number;
  /** 1-based worksheet row, used for status write-back */
  sheetRow: number;
  /** Column key → string value, in header order */
  fields: Record<string, string>;
  name: string;
  nationalId: string;
  company: string;
  status: RowStatus;
  rawStatus: string;
}

/** Parsed roster together with what write-back needs to address its cells */
export interface RosterTable {
  sheetName: string;
  headers: string[];
  /** 0-based column index of the status column */
  statusColumn: number;
  rows: RosterRow[];
}
