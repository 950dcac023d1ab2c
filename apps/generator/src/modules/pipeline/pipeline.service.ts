import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createId } from '@paralleldrive/cuid2';
import {
  DEFAULT_TEMPLATE_PATH,
  RUN_LIMITS,
  buildRunSummary,
  selectPending,
  type RosterRow,
  type RowState,
  type RunResult,
  type RunSummary,
} from '@certgen/shared';
import {
  ReconciliationWarning,
  RenderConversionError,
  StatusWriteError,
  UploadError,
  describeCause,
  isCertificateError,
  type CertificateError,
} from '../../common/errors/certificate-errors';
import { FILE_STORE, type FileStore } from '../../common/services/file-store';
import { KeyedLockService } from '../../common/services/keyed-lock.service';
import { FolderCache } from '../folder/folder-cache';
import { FolderResolverService } from '../folder/folder-resolver.service';
import { TemplateRendererService } from '../render/template-renderer.service';
import { ROSTER_SOURCE, type RosterSource } from '../roster/roster-source';
import { RunResultLog } from './run-result-log';

export interface RunOptions {
  /** Render only: no folder lookup, upload or status write-back */
  dryRun?: boolean;
  /** Stops dispatch of rows that have not started yet */
  signal?: AbortSignal;
}

interface RowContext {
  template: Buffer;
  folders: FolderCache;
  dryRun: boolean;
}

/** Status write-back goes through one writer at a time */
const STATUS_LOCK_KEY = 'roster-status';

/**
 * Runs one batch: every pending roster row is rendered, uploaded to its
 * company folder and marked done, in that order.
 *
 * Roster and template problems abort the run before any row starts.
 * After that a failing row is recorded and the run moves on; every row
 * ends up with exactly one result.
 */
@Injectable()
export class PipelineService {
  private readonly logger = new Logger(PipelineService.name);

  constructor(
    @Inject(ROSTER_SOURCE) private readonly roster: RosterSource,
    @Inject(FILE_STORE) private readonly store: FileStore,
    @Inject(FolderResolverService) private readonly folders: FolderResolverService,
    @Inject(TemplateRendererService) private readonly renderer: TemplateRendererService,
    @Inject(KeyedLockService) private readonly locks: KeyedLockService,
    @Inject(ConfigService) private readonly config: ConfigService,
  ) {}

  async run(options: RunOptions = {}): Promise<RunSummary> {
    const runId = createId();
    const startedAt = new Date();
    const dryRun = options.dryRun ?? false;
    this.logger.log(`Run ${runId} started${dryRun ? ' (dry run)' : ''}`);

    const table = await this.roster.load();
    const template = await this.renderer.loadTemplate(this.config.get<string>('TEMPLATE_PATH') ?? DEFAULT_TEMPLATE_PATH);

    const log = new RunResultLog();
    const pending = selectPending(table.rows);
    for (const row of table.rows) {
      if (row.status === 'done') {
        log.append({ ...this.baseResult(row), outcome: 'skipped', reason: 'already_done' });
      }
    }
    this.logger.log(
      `${this.roster.describe()}: ${table.rows.length} rows, ${pending.length} pending, ` +
        `${table.rows.length - pending.length} already done`,
    );

    const context: RowContext = { template, folders: new FolderCache(), dryRun };
    const queue = [...pending];
    const concurrency = Math.min(this.concurrency(), Math.max(queue.length, 1));

    const worker = async (): Promise<void> => {
      for (;;) {
        if (options.signal?.aborted) return;
        const row = queue.shift();
        if (!row) return;
        log.append(await this.processRow(row, context));
      }
    };
    await Promise.all(Array.from({ length: concurrency }, () => worker()));

    const cancelled = options.signal?.aborted ?? false;
    if (queue.length > 0) {
      this.logger.warn(`Run cancelled: ${queue.length} rows not started`);
    }
    for (const row of queue) {
      log.append({ ...this.baseResult(row), outcome: 'skipped', reason: 'cancelled' });
    }

    const summary = buildRunSummary({
      runId,
      startedAt,
      finishedAt: new Date(),
      dryRun,
      cancelled,
      results: log.entries(),
    });
    const { generated, skipped, failed } = summary.counts;
    this.logger.log(`Run ${runId} finished: ${generated} generated, ${skipped} skipped, ${failed} failed`);
    return summary;
  }

  /**
   * pending → rendering → uploading → marking_done → done.
   * Never throws: a failure in any state becomes a `failed` result.
   */
  private async processRow(row: RosterRow, context: RowContext): Promise<RunResult> {
    const base = this.baseResult(row);
    let state: RowState = 'pending';
    let fileName: string | undefined;

    try {
      state = 'rendering';
      const folder = context.dryRun ? undefined : await this.folders.resolve(row.company, context.folders);
      const artifact = await this.renderer.render(context.template, row).catch((err: unknown) => {
        throw isCertificateError(err) ? err : new RenderConversionError(describeCause(err), { cause: err });
      });
      fileName = artifact.fileName;

      if (!folder) {
        this.logger.log(`Row ${row.sheetRow}: rendered ${fileName} (dry run)`);
        return { ...base, outcome: 'skipped', reason: 'dry_run', fileName };
      }

      state = 'uploading';
      const uploadName = artifact.fileName;
      await this.store.uploadFile(folder.id, artifact.pdf, uploadName).catch((err: unknown) => {
        throw new UploadError(uploadName, err);
      });

      state = 'marking_done';
      await this.locks
        .withLock(STATUS_LOCK_KEY, () => this.roster.markDone(row))
        .catch((err: unknown) => {
          throw new StatusWriteError(row.sheetRow, err);
        });

      state = 'done';
      this.logger.log(`Row ${row.sheetRow}: ${fileName} uploaded to "${folder.name}"`);
      return { ...base, outcome: 'generated', fileName };
    } catch (err) {
      return this.failedResult(row, state, err, fileName);
    }
  }

  private failedResult(row: RosterRow, state: RowState, err: unknown, fileName?: string): RunResult {
    const error: CertificateError = isCertificateError(err)
      ? err
      : new RenderConversionError(describeCause(err), { cause: err });
    const result: RunResult = {
      ...this.baseResult(row),
      outcome: 'failed',
      failedAt: state,
      errorKind: error.kind,
      error: error.message,
      fileName,
    };

    this.logger.error(`Row ${row.sheetRow} failed while ${state}: ${error.message}`);
    if (error instanceof StatusWriteError && fileName) {
      const warning = new ReconciliationWarning(fileName, row.sheetRow);
      this.logger.warn(warning.message);
      return { ...result, warning: warning.message };
    }
    return result;
  }

  private baseResult(row: RosterRow): Pick<RunResult, 'rowId' | 'sheetRow' | 'company' | 'nationalId'> {
    return {
      rowId: row.rowId,
      sheetRow: row.sheetRow,
      company: row.company,
      nationalId: row.nationalId,
    };
  }

  private concurrency(): number {
    const configured = this.config.get<number>('ROW_CONCURRENCY') ?? RUN_LIMITS.DEFAULT_ROW_CONCURRENCY;
    return Math.min(Math.max(1, Math.trunc(configured)), RUN_LIMITS.MAX_ROW_CONCURRENCY);
  }
}
