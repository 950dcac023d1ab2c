import { z } from 'zod';

const headerSchema = z.string().trim().min(1).max(255);

export const columnMappingSchema = z.object({
  name: headerSchema,
  national_id: headerSchema,
  company: headerSchema,
  status: headerSchema,
}).refine(
  (m) => new Set(Object.values(m).map((h) => h.toLowerCase())).size === 4,
  { message: 'Each required field needs its own column' },
);

export type ColumnMappingInput = z.infer<typeof columnMappingSchema>;
