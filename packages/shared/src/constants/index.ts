export { STORE_LIMITS, RUN_LIMITS, ROSTER_LIMITS, PDF_LAYOUT } from './limits';

export {
  DEFAULT_COLUMN_MAPPING,
  DEFAULT_DONE_VALUE,
  DEFAULT_TEMPLATE_PATH,
  FALLBACK_FOLDER_NAME,
  PDF_MIME_TYPE,
} from './defaults';
