/**
 * Batch Engine Tests
 *
 * Whole runs over a project directory with in-process collaborators:
 * incremental idempotence, bounded batches, provider subsets and
 * spreadsheet write-back.
 */

import {
  ConfigurationError,
  InMemorySpreadsheet,
  loadDivergenceSnapshot,
  openProjectState,
  runBatch,
  selectProviders,
  type Collaborators,
  type InvocationParams,
  type TextExtractor,
} from '@ledgerline/shared';
import {
  discovered,
  FakeTextExtractor,
  fixedClock,
  guideDetailText,
  makeProjectDir,
  PRINTED_REGISTRATION,
  removeDir,
  StaticDocumentSource,
  standardInvoiceText,
  testProject,
} from './helpers';

const ALFA_INVOICE = '/obra/01 - Alfa/NOTA FISCAL/NF 1234.pdf';
const ALFA_REPORT = '/obra/01 - Alfa/SEFIP/SEFIP 08-2023.pdf';
const BETA_INVOICE = '/obra/02 - Beta/NOTA FISCAL/NF 31.pdf';

function collaborators(): Collaborators & { text: FakeTextExtractor; spreadsheet: InMemorySpreadsheet } {
  const text = new FakeTextExtractor()
    .setText(
      ALFA_INVOICE,
      standardInvoiceText({ number: '1234', competence: '08/2023', total: '10.000,00', iss: '500,00', inss: '1.100,00' })
    )
    .setText(ALFA_REPORT, guideDetailText('08/2023', [[PRINTED_REGISTRATION, 12]]))
    .setText(
      BETA_INVOICE,
      standardInvoiceText({ number: '31', competence: '08/2023', total: '2.000,00', iss: '100,00', inss: '220,00' })
    );

  return {
    source: new StaticDocumentSource([
      discovered(ALFA_INVOICE),
      discovered(ALFA_REPORT, { kind: 'payroll-report' }),
      discovered(BETA_INVOICE, { provider: 2 }),
    ]),
    text,
    spreadsheet: new InMemorySpreadsheet([
      { provider: 1, competence: '2023-08', field: 'workers', value: 12 },
      { provider: 1, competence: '2023-08', field: 'invoice-total', value: 1000000 },
      { provider: 1, competence: '2023-08', field: 'inss', value: 100000 },
      { provider: 1, competence: '2023-08', field: 'iss', value: 50000 },
    ]),
  };
}

describe('Batch Engine', () => {
  let projectDir: string;

  const params = (overrides: Partial<InvocationParams> = {}): InvocationParams => ({
    projectDir,
    mode: 'incremental',
    ocrEnabled: false,
    ...overrides,
  });

  beforeEach(async () => {
    projectDir = await makeProjectDir();
  });

  afterEach(async () => {
    await removeDir(projectDir);
  });

  it('should extract, merge and reconcile every document', async () => {
    const report = await runBatch(params(), collaborators(), { now: fixedClock() });

    expect(report.project_name).toBe('Residencial Aurora');
    expect(report.processed).toBe(3);
    expect(report.upserts).toEqual({ inserted: 3, unchanged: 0, superseded: 0, conflict: 0, 'out-of-scope': 0 });
    expect(report.divergences).toEqual({
      matched: 3,
      'missing-in-extraction': 0,
      'missing-in-spreadsheet': 3,
      'value-mismatch': 1,
    });
    expect(report.verdict).toEqual({
      status: 'action-needed',
      steps: [
        { stage: 'resolve-divergences', providers: [1], competences: ['2023-08'], count: 1 },
        { stage: 'update-spreadsheet', providers: [2], competences: ['2023-08'], count: 3 },
      ],
    });
  });

  it('should change nothing when re-run without new documents', async () => {
    const collab = collaborators();
    await runBatch(params(), collab);
    const entriesBefore = (await openProjectState(projectDir)).ledger.entries();
    const divergencesBefore = (await loadDivergenceSnapshot(projectDir))?.divergences;

    const second = await runBatch(params(), collab);

    expect(second.processed).toBe(0);
    expect(second.skipped).toBe(3);
    expect(second.upserts.inserted + second.upserts.superseded + second.upserts.conflict).toBe(0);
    expect((await openProjectState(projectDir)).ledger.entries()).toEqual(entriesBefore);
    expect((await loadDivergenceSnapshot(projectDir))?.divergences).toEqual(divergencesBefore);
    expect(collab.text.calls).toHaveLength(3);
  });

  it('should re-read everything in force mode without duplicating entries', async () => {
    const collab = collaborators();
    await runBatch(params(), collab);

    const forced = await runBatch(params({ mode: 'force' }), collab);

    expect(forced.processed).toBe(3);
    expect(forced.upserts.unchanged).toBe(3);
    expect((await openProjectState(projectDir)).ledger.entries()).toHaveLength(3);
  });

  it('should defer documents beyond the batch size to later runs', async () => {
    const collab = collaborators();

    const first = await runBatch(params({ batchSize: 1 }), collab);
    expect(first.processed).toBe(1);
    expect(first.deferred).toBe(2);
    expect(first.verdict.status === 'action-needed' ? first.verdict.steps[0] : null).toEqual({
      stage: 'extract',
      providers: [1, 2],
      competences: [],
      count: 2,
    });

    const second = await runBatch(params({ batchSize: 1 }), collab);
    expect(second.processed).toBe(1);
    expect(second.deferred).toBe(1);
    expect(second.skipped).toBe(1);

    expect(collab.text.calls).toEqual([ALFA_INVOICE, ALFA_REPORT]);
  });

  it('should leave unstarted documents queued when cancelled', async () => {
    const collab = collaborators();
    const controller = new AbortController();
    const text: TextExtractor = {
      extractText: (documentPath) => {
        if (documentPath === ALFA_INVOICE) controller.abort();
        return collab.text.extractText(documentPath);
      },
    };

    const first = await runBatch(params(), { ...collab, text }, { signal: controller.signal });

    expect(first.cancelled).toBe(true);
    expect(first.processed).toBe(1);
    const documents = (await openProjectState(projectDir)).documents;
    expect([ALFA_INVOICE, ALFA_REPORT, BETA_INVOICE].map((p) => documents.get(p)?.status)).toEqual([
      'extracted',
      'queued',
      'queued',
    ]);

    const second = await runBatch(params(), collab);

    expect(second.cancelled).toBe(false);
    expect(second.processed).toBe(2);
    expect(second.skipped).toBe(1);
    expect(second.upserts.inserted).toBe(2);
    expect(collab.text.calls).toEqual([ALFA_INVOICE, ALFA_REPORT, BETA_INVOICE]);
    expect((await openProjectState(projectDir)).ledger.entries()).toHaveLength(3);
    expect(second.divergences).toEqual({
      matched: 3,
      'missing-in-extraction': 0,
      'missing-in-spreadsheet': 3,
      'value-mismatch': 1,
    });
  });

  it('should only touch the providers of the subset', async () => {
    const collab = collaborators();

    const report = await runBatch(params({ providers: [2] }), collab);

    expect(report.processed).toBe(1);
    expect(collab.text.calls).toEqual([BETA_INVOICE]);
    const entries = (await openProjectState(projectDir)).ledger.entries();
    expect(entries.map((e) => e.record.provider)).toEqual([2]);
  });

  it('should append rows the spreadsheet lacks when write-back is on', async () => {
    const collab = collaborators();

    const report = await runBatch(params({ applySpreadsheetUpdates: true }), collab);

    expect(collab.spreadsheet.getCell(2, '2023-08', 'invoice-total')).toBe(200000);
    expect(collab.spreadsheet.getCell(2, '2023-08', 'inss')).toBe(22000);
    expect(report.divergences['missing-in-spreadsheet']).toBe(0);
    expect(report.divergences.matched).toBe(6);
    expect(report.cell_conflicts).toBe(0);
  });

  it('should fail before any work when the project is not configured', async () => {
    const collab = collaborators();
    await removeDir(projectDir);

    await expect(runBatch(params(), collab)).rejects.toBeInstanceOf(ConfigurationError);
    expect(collab.text.calls).toEqual([]);
  });

  describe('selectProviders', () => {
    const project = testProject();

    it('should default to the whole roster', () => {
      expect(Array.from(selectProviders(project).keys())).toEqual([1, 2]);
    });

    it('should reject indexes outside the roster', () => {
      expect(() => selectProviders(project, [2, 7])).toThrow(
        'Provider subset outside the roster: unknown provider 7'
      );
    });
  });
});
