import { z } from 'zod';
import { ERROR_KINDS, ROW_OUTCOMES, ROW_STATES, SKIP_REASONS } from '../types/run-types';

export const runResultSchema = z.object({
  rowId: z.number().int().min(0),
  sheetRow: z.number().int().min(2),
  company: z.string(),
  nationalId: z.string(),
  outcome: z.enum(ROW_OUTCOMES),
  failedAt: z.enum(ROW_STATES).optional(),
  errorKind: z.enum(ERROR_KINDS).optional(),
  error: z.string().optional(),
  reason: z.enum(SKIP_REASONS).optional(),
  fileName: z.string().optional(),
  warning: z.string().optional(),
}).refine(
  (r) => r.outcome !== 'failed' || (r.errorKind !== undefined && r.error !== undefined),
  { message: 'Failed results must carry an error kind and cause' },
);

export const runCountsSchema = z.object({
  generated: z.number().int().min(0),
  skipped: z.number().int().min(0),
  failed: z.number().int().min(0),
  total: z.number().int().min(0),
}).refine(
  (c) => c.generated + c.skipped + c.failed === c.total,
  { message: 'Outcome counts must add up to the total' },
);

export const runSummarySchema = z.object({
  runId: z.string().min(1),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  dryRun: z.boolean(),
  cancelled: z.boolean(),
  counts: runCountsSchema,
  failures: z.array(runResultSchema),
  warnings: z.array(runResultSchema),
  results: z.array(runResultSchema),
});

export type RunResultInput = z.infer<typeof runResultSchema>;
export type RunSummaryInput = z.infer<typeof runSummarySchema>;
