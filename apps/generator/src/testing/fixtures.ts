import ExcelJS from 'exceljs';
import JSZip from 'jszip';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ConfigService } from '@nestjs/config';

export type RosterCell = ExcelJS.CellValue;

export const ROSTER_HEADERS = ['Nombre', 'Cedula', 'Compañia', 'Certificado'];

/** An .xlsx with a header row followed by the given rows */
export async function buildRosterWorkbook(
  rows: RosterCell[][],
  options: { headers?: string[]; sheetName?: string; extraSheets?: string[] } = {},
): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  for (const name of options.extraSheets ?? []) {
    workbook.addWorksheet(name).addRow(['otro']);
  }
  const ws = workbook.addWorksheet(options.sheetName ?? 'Hoja1');
  ws.addRow(options.headers ?? ROSTER_HEADERS);
  for (const values of rows) {
    const row = ws.addRow(values);
    row.eachCell((cell) => {
      if (cell.value instanceof Date) cell.numFmt = 'dd/mm/yyyy';
    });
  }
  return Buffer.from(await workbook.xlsx.writeBuffer());
}

const CONTENT_TYPES =
  '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
  '<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">' +
  '<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>' +
  '<Default Extension="xml" ContentType="application/xml"/>' +
  '<Override PartName="/word/document.xml" ' +
  'ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>' +
  '</Types>';

const PACKAGE_RELS =
  '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
  '<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">' +
  '<Relationship Id="rId1" ' +
  'Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" ' +
  'Target="word/document.xml"/>' +
  '</Relationships>';

const DOCUMENT_RELS =
  '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
  '<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships"></Relationships>';

/** Paragraphs given as their runs; each run becomes its own `<w:t>` */
export function documentXml(paragraphs: string[][]): string {
  const body = paragraphs
    .map((runs) => {
      const xmlRuns = runs.map((text) => `<w:r><w:t xml:space="preserve">${escapeXml(text)}</w:t></w:r>`).join('');
      return `<w:p>${xmlRuns}</w:p>`;
    })
    .join('');
  return (
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
    '<w:document xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main">' +
    `<w:body>${body}</w:body></w:document>`
  );
}

export async function buildTemplateDocx(paragraphs: string[][]): Promise<Buffer> {
  const zip = new JSZip();
  const date = new Date('2024-01-01T00:00:00Z');
  zip.file('[Content_Types].xml', CONTENT_TYPES, { date });
  zip.file('_rels/.rels', PACKAGE_RELS, { date });
  zip.file('word/_rels/document.xml.rels', DOCUMENT_RELS, { date });
  zip.file('word/document.xml', documentXml(paragraphs), { date });
  return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
}

/** Certificate text with one marker split across runs */
export const CERTIFICATE_PARAGRAPHS: string[][] = [
  ['CERTIFICADO'],
  ['Se certifica que ', '{{ nom', 'bre }}', ', cédula {{cedula}},'],
  ['de la empresa {{ company }} completó el curso.'],
];

export async function writeTempFile(name: string, bytes: Buffer): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'certgen-'));
  const filePath = path.join(dir, name);
  await fs.writeFile(filePath, bytes);
  return filePath;
}

export function testConfig(values: Record<string, unknown> = {}): ConfigService {
  return new ConfigService({
    GRAPH_ACCESS_TOKEN: 'test-secret',
    GRAPH_BASE_URL: 'https://graph.test/v1.0',
    ROSTER_FILE_ID: 'roster-1',
    CERTIFICATES_FOLDER_ID: 'certs',
    STORE_TIMEOUT_MS: 5000,
    ROW_CONCURRENCY: 1,
    ...values,
  });
}

function escapeXml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}
