export {
  runResultSchema,
  runCountsSchema,
  runSummarySchema,
  type RunResultInput,
  type RunSummaryInput,
} from './run-schema';

export { columnMappingSchema, type ColumnMappingInput } from './roster-schema';
