import { FALLBACK_FOLDER_NAME } from '../constants/defaults';
import type { RosterRow } from '../types/roster-types';

/** Lookup key for a company: trimmed, single-spaced, lower-case */
export function companyKey(companyName: string): string {
  return companyName.trim().replace(/\s+/g, ' ').toLowerCase();
}

/** Folder name for a company: letters, digits, space, '-' and '_' only */
export function sanitizeFolderName(companyName: string): string {
  const cleaned = companyName
    .replace(/[^\p{L}\p{N} _-]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
  return cleaned || FALLBACK_FOLDER_NAME;
}

/** Header text as a marker-friendly key: "Fecha de Emisión " → "fecha_de_emisión" */
export function headerSlug(header: string): string {
  return header.trim().toLowerCase().replace(/\s+/g, '_');
}

/** Template marker key: a header slug with accents folded, so {{ COMPANIA }} finds "Compañia" */
export function markerKey(key: string): string {
  return stripAccents(headerSlug(key));
}

function stripAccents(value: string): string {
  return value.normalize('NFD').replace(/[\u0300-\u036f]/g, '');
}

function asciiToken(value: string, fallback: string): string {
  const token = stripAccents(value)
    .replace(/[^A-Za-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return token || fallback;
}

/**
 * Deterministic artifact name from row identity, so a rerun overwrites the
 * same file in the store instead of adding a copy.
 */
export function buildArtifactFileName(row: Pick<RosterRow, 'rowId' | 'name' | 'nationalId'>): string {
  const id = row.nationalId.replace(/[^A-Za-z0-9]/g, '') || 'SinID';
  return `Certificado_${asciiToken(row.name, 'SinNombre')}_${id}_${row.rowId}.pdf`;
}
