/** Remote store call limits */
export const STORE_LIMITS = {
  DEFAULT_TIMEOUT_MS: 30_000,
  MIN_TIMEOUT_MS: 1_000,
  MAX_TIMEOUT_MS: 300_000,
  /** Graph accepts simple PUT uploads up to 250MB */
  MAX_SIMPLE_UPLOAD_BYTES: 250 * 1024 * 1024,
} as const;

/** Row dispatch limits */
export const RUN_LIMITS = {
  DEFAULT_ROW_CONCURRENCY: 1,
  MAX_ROW_CONCURRENCY: 8,
} as const;

/** Roster sheet layout */
export const ROSTER_LIMITS = {
  HEADER_ROW: 1,
} as const;

/** Certificate PDF layout, in PDF points */
export const PDF_LAYOUT = {
  /** A4 portrait */
  PAGE_WIDTH: 595.28,
  PAGE_HEIGHT: 841.89,
  MARGIN_X: 56,
  MARGIN_TOP: 96,
  MARGIN_BOTTOM: 56,
  TITLE_FONT_SIZE: 22,
  TITLE_LINE_HEIGHT: 30,
  BODY_FONT_SIZE: 12,
  BODY_LINE_HEIGHT: 18,
  PARAGRAPH_GAP: 8,
} as const;
