export { normalizeStatus, selectPending } from './status-utils';

export {
  companyKey,
  sanitizeFolderName,
  headerSlug,
  markerKey,
  buildArtifactFileName,
} from './naming-utils';

export { colIndexToLetter, buildCellAddress, formatDate } from './cell-utils';

export { countOutcomes, buildRunSummary } from './run-summary';
