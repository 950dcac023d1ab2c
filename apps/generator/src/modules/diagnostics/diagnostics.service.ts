import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DEFAULT_TEMPLATE_PATH, selectPending } from '@certgen/shared';
import { describeCause } from '../../common/errors/certificate-errors';
import { FILE_STORE, type FileStore } from '../../common/services/file-store';
import { TemplateRendererService } from '../render/template-renderer.service';
import { ROSTER_SOURCE, type RosterSource } from '../roster/roster-source';

export const DIAGNOSTIC_CHECKS = ['account', 'roster', 'certificates_folder', 'template'] as const;
export type DiagnosticCheckName = (typeof DIAGNOSTIC_CHECKS)[number];

export interface DiagnosticCheck {
  name: DiagnosticCheckName;
  ok: boolean;
  detail: string;
}

export interface DiagnosticReport {
  ok: boolean;
  checks: DiagnosticCheck[];
}

/**
 * Read-only preflight: is the token accepted, can the roster and the
 * certificates folder be reached, is the template usable.
 * Every check runs even when an earlier one fails.
 */
@Injectable()
export class DiagnosticsService {
  private readonly logger = new Logger(DiagnosticsService.name);

  constructor(
    @Inject(FILE_STORE) private readonly store: FileStore,
    @Inject(ROSTER_SOURCE) private readonly roster: RosterSource,
    @Inject(TemplateRendererService) private readonly renderer: TemplateRendererService,
    @Inject(ConfigService) private readonly config: ConfigService,
  ) {}

  async runChecks(): Promise<DiagnosticReport> {
    const checks: DiagnosticCheck[] = [];

    checks.push(await this.check('account', async () => `token accepted for ${await this.store.describeAccount()}`));

    checks.push(
      await this.check('roster', async () => {
        const table = await this.roster.load();
        const pending = selectPending(table.rows).length;
        return `${this.roster.describe()}, sheet "${table.sheetName}": ${table.rows.length} rows, ${pending} pending`;
      }),
    );

    checks.push(
      await this.check('certificates_folder', async () => {
        const parentId = this.config.getOrThrow<string>('CERTIFICATES_FOLDER_ID');
        const folders = await this.store.listFolders(parentId);
        return `drive item ${parentId}: ${folders.length} company folders`;
      }),
    );

    checks.push(
      await this.check('template', async () => {
        const templatePath = this.config.get<string>('TEMPLATE_PATH') ?? DEFAULT_TEMPLATE_PATH;
        const bytes = await this.renderer.loadTemplate(templatePath);
        return `${templatePath} (${bytes.length} bytes)`;
      }),
    );

    return { ok: checks.every((c) => c.ok), checks };
  }

  private async check(name: DiagnosticCheckName, run: () => Promise<string>): Promise<DiagnosticCheck> {
    try {
      const detail = await run();
      this.logger.log(`${name}: ok (${detail})`);
      return { name, ok: true, detail };
    } catch (err) {
      const detail = describeCause(err);
      this.logger.error(`${name}: ${detail}`);
      return { name, ok: false, detail };
    }
  }
}
