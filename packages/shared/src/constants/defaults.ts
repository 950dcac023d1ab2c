import type { ColumnMapping } from '../types/roster-types';

/** Sheet headers of the roster used by the training team */
export const DEFAULT_COLUMN_MAPPING: ColumnMapping = {
  name: 'nombre',
  national_id: 'cedula',
  company: 'compañia',
  status: 'certificado',
};

/** Value written to the status column once a certificate is uploaded */
export const DEFAULT_DONE_VALUE = 'si';

/** Folder used when a row carries no usable company name */
export const FALLBACK_FOLDER_NAME = 'Sin_Empresa';

/** Word template, relative to the working directory */
export const DEFAULT_TEMPLATE_PATH = 'plantilla.docx';

export const PDF_MIME_TYPE = 'application/pdf';
