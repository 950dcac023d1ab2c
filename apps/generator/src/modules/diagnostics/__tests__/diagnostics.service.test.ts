import { beforeAll, describe, it, expect } from 'vitest';
import { StoreRequestError } from '../../../common/errors/certificate-errors';
import { CERTIFICATE_PARAGRAPHS, buildRosterWorkbook, buildTemplateDocx, testConfig, writeTempFile } from '../../../testing/fixtures';
import { InMemoryFileStore } from '../../../testing/in-memory-file-store';
import { TemplateRendererService } from '../../render/template-renderer.service';
import { DriveRosterSource } from '../../roster/drive-roster-source';
import { RosterReaderService } from '../../roster/roster-reader.service';
import { DiagnosticsService } from '../diagnostics.service';

let template: Buffer;
let templatePath: string;

beforeAll(async () => {
  template = await buildTemplateDocx(CERTIFICATE_PARAGRAPHS);
  templatePath = await writeTempFile('plantilla.docx', template);
});

function setup(config: Record<string, unknown> = {}) {
  const store = new InMemoryFileStore();
  const cfg = testConfig({ TEMPLATE_PATH: templatePath, ...config });
  const service = new DiagnosticsService(
    store,
    new DriveRosterSource(store, new RosterReaderService(), cfg),
    new TemplateRendererService(),
    cfg,
  );
  return { store, service };
}

describe('DiagnosticsService', () => {
  it('passes when every resource is reachable', async () => {
    const { store, service } = setup();
    store.files.set(
      'roster-1',
      await buildRosterWorkbook([
        ['Ana Gómez', 'V-1', 'Acme', 'si'],
        ['Luis Pérez', 'V-2', 'Beta', 'no'],
      ]),
    );
    store.folders.set('certs', [{ id: 'f1', name: 'Acme' }]);

    const report = await service.runChecks();

    expect(report).toEqual({
      ok: true,
      checks: [
        { name: 'account', ok: true, detail: 'token accepted for Test User <test.user@example.test>' },
        { name: 'roster', ok: true, detail: 'drive item roster-1, sheet "Hoja1": 2 rows, 1 pending' },
        { name: 'certificates_folder', ok: true, detail: 'drive item certs: 1 company folders' },
        { name: 'template', ok: true, detail: `${templatePath} (${template.length} bytes)` },
      ],
    });
  });

  it('runs every check and reports each failure', async () => {
    const { store, service } = setup({ TEMPLATE_PATH: '/nonexistent/plantilla.docx' });
    store.faults.describeAccount = () => new StoreRequestError('describeAccount', 'HTTP 401', 401, false);

    const report = await service.runChecks();

    expect(report.ok).toBe(false);
    expect(report.checks.map((c) => [c.name, c.ok])).toEqual([
      ['account', false],
      ['roster', false],
      ['certificates_folder', true],
      ['template', false],
    ]);
    expect(report.checks[0]?.detail).toBe('describeAccount: HTTP 401');
    expect(report.checks[1]?.detail).toBe('Roster roster-1 could not be downloaded: getFile: HTTP 404');
    expect(report.checks[3]?.detail).toMatch(/^Template not readable at \/nonexistent\/plantilla\.docx: /);
  });

  it('fails the roster check when a required column is missing', async () => {
    const { store, service } = setup();
    store.files.set('roster-1', await buildRosterWorkbook([['Ana Gómez', 'V-1']], { headers: ['Nombre', 'Cedula'] }));

    const report = await service.runChecks();

    expect(report.checks[1]).toEqual({
      name: 'roster',
      ok: false,
      detail: 'Roster is missing required columns: "compañia" (company), "certificado" (status)',
    });
  });
});
