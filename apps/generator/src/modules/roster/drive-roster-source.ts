import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  DEFAULT_COLUMN_MAPPING,
  DEFAULT_DONE_VALUE,
  buildCellAddress,
  columnMappingSchema,
  type ColumnMapping,
  type RosterRow,
  type RosterTable,
} from '@certgen/shared';
import { ConfigurationError, describeCause, isCertificateError } from '../../common/errors/certificate-errors';
import { FILE_STORE, type FileStore } from '../../common/services/file-store';
import { RosterReaderService } from './roster-reader.service';
import type { RosterSource } from './roster-source';

/** Roster workbook kept in the drive, status written back cell by cell */
@Injectable()
export class DriveRosterSource implements RosterSource {
  private readonly logger = new Logger(DriveRosterSource.name);
  private table: RosterTable | null = null;

  constructor(
    @Inject(FILE_STORE) private readonly store: FileStore,
    @Inject(RosterReaderService) private readonly reader: RosterReaderService,
    @Inject(ConfigService) private readonly config: ConfigService,
  ) {}

  describe(): string {
    return `drive item ${this.fileId}`;
  }

  async load(): Promise<RosterTable> {
    const mapping = this.mapping;
    let bytes: Buffer;
    try {
      bytes = await this.store.getFile(this.fileId);
    } catch (err) {
      throw new ConfigurationError(`Roster ${this.fileId} could not be downloaded: ${describeCause(err)}`, {
        cause: err,
      });
    }

    try {
      this.table = await this.reader.readRows(bytes, {
        mapping,
        doneValue: this.doneValue,
        sheetName: this.config.get<string>('ROSTER_SHEET'),
      });
    } catch (err) {
      if (isCertificateError(err)) throw err;
      throw new ConfigurationError(`Roster ${this.fileId} could not be parsed: ${describeCause(err)}`, { cause: err });
    }
    return this.table;
  }

  /** Write the done marker into the row's status cell */
  async markDone(row: RosterRow): Promise<void> {
    if (!this.table) {
      throw new Error('Roster must be loaded before rows can be marked');
    }
    const address = buildCellAddress(this.table.statusColumn, row.sheetRow);
    await this.store.updateRange(this.fileId, this.table.sheetName, address, [[this.doneValue]]);
    this.logger.debug(`Marked ${this.table.sheetName}!${address} as "${this.doneValue}"`);
  }

  private get fileId(): string {
    return this.config.getOrThrow<string>('ROSTER_FILE_ID');
  }

  private get doneValue(): string {
    return this.config.get<string>('STATUS_DONE_VALUE') ?? DEFAULT_DONE_VALUE;
  }

  private get mapping(): ColumnMapping {
    const result = columnMappingSchema.safeParse({
      name: this.config.get<string>('COLUMN_NAME') ?? DEFAULT_COLUMN_MAPPING.name,
      national_id: this.config.get<string>('COLUMN_NATIONAL_ID') ?? DEFAULT_COLUMN_MAPPING.national_id,
      company: this.config.get<string>('COLUMN_COMPANY') ?? DEFAULT_COLUMN_MAPPING.company,
      status: this.config.get<string>('COLUMN_STATUS') ?? DEFAULT_COLUMN_MAPPING.status,
    });
    if (!result.success) {
      throw new ConfigurationError(`Invalid roster column mapping: ${result.error.issues.map((i) => i.message).join('; ')}`);
    }
    return result.data;
  }
}
