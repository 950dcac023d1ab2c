import { Injectable, Logger } from '@nestjs/common';
import ExcelJS from 'exceljs';
import {
  REQUIRED_FIELDS,
  ROSTER_LIMITS,
  formatDate,
  headerSlug,
  normalizeStatus,
  type ColumnMapping,
  type RequiredField,
  type RosterRow,
  type RosterTable,
} from '@certgen/shared';
import { ConfigurationError } from '../../common/errors/certificate-errors';

export interface ReadRowsOptions {
  mapping: ColumnMapping;
  doneValue: string;
  /** Worksheet to read; the first one when omitted */
  sheetName?: string;
}

interface HeaderColumn {
  /** 1-based ExcelJS column number */
  col: number;
  header: string;
  key: string;
  /** Header slug of a mapped column, when it differs from the canonical key */
  alias?: string;
}

@Injectable()
export class RosterReaderService {
  private readonly logger = new Logger(RosterReaderService.name);

  /**
   * Parse an .xlsx roster into rows, in sheet order.
   * Missing required columns abort the whole run.
   */
  async readRows(buffer: Buffer, options: ReadRowsOptions): Promise<RosterTable> {
    const workbook = new ExcelJS.Workbook();
    try {
      await workbook.xlsx.load(buffer as unknown as ExcelJS.Buffer);
    } catch (err) {
      const message = err instanceof Error ? err.message : 'unknown parse error';
      throw new ConfigurationError(`Roster is not a readable .xlsx workbook: ${message}`, { cause: err });
    }

    const ws = options.sheetName ? workbook.getWorksheet(options.sheetName) : workbook.worksheets[0];
    if (!ws) {
      throw new ConfigurationError(
        options.sheetName ? `Roster has no worksheet named "${options.sheetName}"` : 'Roster has no worksheets',
      );
    }

    const { columns, statusColumn } = this.mapHeaders(ws, options.mapping);
    const rows: RosterRow[] = [];

    ws.eachRow({ includeEmpty: false }, (row, rowNumber) => {
      if (rowNumber <= ROSTER_LIMITS.HEADER_ROW) return;

      const fields: Record<string, string> = {};
      for (const column of columns) {
        const value = this.cellToString(row.getCell(column.col).value);
        fields[column.key] = value;
        if (column.alias && !(column.alias in fields)) fields[column.alias] = value;
      }
      if (Object.values(fields).every((v) => v === '')) return;

      const rawStatus = fields['status'] ?? '';
      rows.push({
        rowId: rowNumber - ROSTER_LIMITS.HEADER_ROW - 1,
        sheetRow: rowNumber,
        fields,
        name: fields['name'] ?? '',
        nationalId: fields['national_id'] ?? '',
        company: fields['company'] ?? '',
        status: normalizeStatus(rawStatus, options.doneValue),
        rawStatus,
      });
    });

    this.logger.log(`Parsed roster "${ws.name}": ${rows.length} rows, ${columns.length} columns`);
    return {
      sheetName: ws.name,
      headers: columns.map((c) => c.header),
      statusColumn,
      rows,
    };
  }

  /**
   * Match header cells to the mapping (trimmed, case-insensitive).
   * Mapped columns take their canonical key (and keep their header slug as an
   * alias for template markers); the rest keep their header slug.
   */
  private mapHeaders(
    ws: ExcelJS.Worksheet,
    mapping: ColumnMapping,
  ): { columns: HeaderColumn[]; statusColumn: number } {
    const byHeader = new Map<string, RequiredField>();
    for (const field of REQUIRED_FIELDS) {
      byHeader.set(mapping[field].trim().toLowerCase(), field);
    }

    const columns: HeaderColumn[] = [];
    const found = new Map<RequiredField, HeaderColumn>();

    ws.getRow(ROSTER_LIMITS.HEADER_ROW).eachCell({ includeEmpty: false }, (cell, colNumber) => {
      const header = this.cellToString(cell.value);
      if (!header) return;
      const field = byHeader.get(header.toLowerCase());
      if (field && !found.has(field)) {
        const slug = headerSlug(header);
        const column: HeaderColumn = { col: colNumber, header, key: field, alias: slug !== field ? slug : undefined };
        found.set(field, column);
        columns.push(column);
        return;
      }
      const key = headerSlug(header);
      if (columns.some((c) => c.key === key || c.alias === key)) {
        this.logger.warn(`Duplicate roster column "${header}" ignored`);
        return;
      }
      columns.push({ col: colNumber, header, key });
    });

    const missing = REQUIRED_FIELDS.filter((f) => !found.has(f));
    const status = found.get('status');
    if (missing.length > 0 || !status) {
      const expected = missing.map((f) => `"${mapping[f]}" (${f})`).join(', ');
      throw new ConfigurationError(`Roster is missing required columns: ${expected}`);
    }

    return { columns, statusColumn: status.col - 1 };
  }

  private cellToString(raw: ExcelJS.CellValue): string {
    if (raw === null || raw === undefined) return '';
    if (typeof raw === 'string') return this.normalizeString(raw);
    if (typeof raw === 'number') return String(raw);
    if (typeof raw === 'boolean') return raw ? 'TRUE' : 'FALSE';
    if (raw instanceof Date) return formatDate(raw);

    if ('richText' in raw) {
      return this.normalizeString(raw.richText.map((r) => r.text).join(''));
    }
    if ('error' in raw) return '';
    if ('formula' in raw || 'sharedFormula' in raw) {
      const result = raw.result;
      if (result === undefined || (typeof result === 'object' && !(result instanceof Date))) return '';
      return this.cellToString(result);
    }
    if ('text' in raw) {
      return typeof raw.text === 'string' ? this.normalizeString(raw.text) : this.cellToString(raw.text);
    }
    return '';
  }

  private normalizeString(value: string): string {
    return value.trim().replace(/\s+/g, ' ');
  }
}
