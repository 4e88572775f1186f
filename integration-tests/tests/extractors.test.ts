/**
 * Field Extraction Tests
 *
 * Text-layer path of single documents: classification, layout extraction
 * and normalization into records.
 */

import {
  getRegisteredLayouts,
  hashContent,
  INVOICE_LAYOUTS,
  PAYROLL_LAYOUTS,
  processDocument,
  scanTenantWorkerCounts,
  selectWorkerCount,
  type PageText,
} from '@ledgerline/shared';
import {
  discovered,
  FakeTextExtractor,
  guideDetailText,
  PRINTED_REGISTRATION,
  REGISTRATION,
  standardInvoiceText,
  testProject,
} from './helpers';

const project = testProject({
  providers: [
    { index: 1, name: 'Construtora Alfa', folder: '01 - Alfa' },
    {
      index: 2,
      name: 'Vigilancia Beta',
      folder: '02 - Beta',
      overrides: { fixed_fields: { iss_rate: '5,00' } },
    },
  ],
});
const [alfa, beta] = project.providers;

function reversePage(text: string): string {
  return text
    .split('\n')
    .map((line) => Array.from(line).reverse().join(''))
    .reverse()
    .join('\n');
}

function pages(...texts: string[]): PageText[] {
  return texts.map((text, i) => ({ pageNumber: i + 1, text }));
}

describe('Field Extraction', () => {
  it('should register an extractor for every layout', () => {
    expect([...getRegisteredLayouts()].sort()).toEqual([...INVOICE_LAYOUTS, ...PAYROLL_LAYOUTS].sort());
  });

  describe('standard invoice', () => {
    const documentPath = '/obra/01 - Alfa/NOTA FISCAL/NF 1234.pdf';
    const text = new FakeTextExtractor().setText(
      documentPath,
      standardInvoiceText({ number: '1234', competence: '08/2023', total: '10.000,00', iss: '500,00', inss: '1.100,00' })
    );

    it('should extract number, competence and the tax columns', async () => {
      const outcome = await processDocument(discovered(documentPath), text, { project, provider: alfa });

      expect(outcome.status).toBe('extracted');
      expect(outcome.layout).toBe('standard-invoice');
      expect(outcome.competence).toBe('2023-08');
      expect(outcome.record?.identity_key).toBe('1:invoice:n1234:2023-08');
      expect(outcome.record?.fields).toEqual({
        total_value_cents: 1000000,
        inss_cents: 110000,
        iss_cents: 50000,
        iss_rate: null,
      });
      expect(outcome.record?.flags).toEqual([]);
    });

    it('should report completeness over the expected invoice fields', async () => {
      const outcome = await processDocument(discovered(documentPath), text, { project, provider: alfa });
      // every expected field but the ISS rate
      expect(outcome.completeness).toBeCloseTo(5 / 6);
    });

    it('should keep evidence for each extracted field', async () => {
      const outcome = await processDocument(discovered(documentPath), text, { project, provider: alfa });
      const evidence = outcome.record?.evidence ?? [];

      expect(evidence.map((e) => e.field)).toEqual(['document_number', 'competence', 'total_value', 'iss', 'inss']);
      expect(evidence.find((e) => e.field === 'document_number')?.quote).toBe('Número da Nota: 1234');
    });

    it('should read the supersede reference', async () => {
      const replacementPath = '/obra/01 - Alfa/NOTA FISCAL/NF 1240.pdf';
      const replacement = new FakeTextExtractor().setText(
        replacementPath,
        standardInvoiceText({
          number: '1240',
          competence: '08/2023',
          total: '9.000,00',
          iss: '450,00',
          inss: '990,00',
          supersedes: '1234',
        })
      );
      const outcome = await processDocument(discovered(replacementPath), replacement, { project, provider: alfa });

      expect(outcome.record?.document_number).toBe('1240');
      expect(outcome.record?.supersedes).toBe('1234');
    });

    it('should flag a competence outside the project range', async () => {
      const oldPath = '/obra/01 - Alfa/NOTA FISCAL/NF 900.pdf';
      const old = new FakeTextExtractor().setText(
        oldPath,
        standardInvoiceText({ number: '900', competence: '05/2022', total: '1.000,00', iss: '50,00', inss: '110,00' })
      );
      const outcome = await processDocument(discovered(oldPath), old, { project, provider: alfa });

      expect(outcome.status).toBe('needs-manual-review');
      expect(outcome.reason).toBe('needs-manual-review, competence-out-of-range');
      expect(outcome.record?.flags).toEqual(['needs-manual-review', 'competence-out-of-range']);
    });
  });

  describe('provider rules', () => {
    it('should treat a missing INSS of a security service as zero', async () => {
      const documentPath = '/obra/01 - Alfa/NOTA FISCAL/NF 77.pdf';
      const text = new FakeTextExtractor().setText(
        documentPath,
        [
          'NOTA FISCAL ELETRÔNICA DE SERVIÇOS - NFS-e',
          'Número da Nota: 77',
          'Competência: 09/2023',
          'Discriminação: SERVIÇOS DE VIGILÂNCIA PATRIMONIAL',
          'VALOR SERVIÇOS   DEDUÇÕES   VALOR ISS',
          '8.000,00   0,00   400,00',
        ].join('\n')
      );
      const outcome = await processDocument(discovered(documentPath), text, { project, provider: alfa });

      expect(outcome.record?.fields).toEqual({
        total_value_cents: 800000,
        inss_cents: 0,
        iss_cents: 40000,
        iss_rate: null,
      });
    });

    it('should apply fixed field values configured for the provider', async () => {
      const documentPath = '/obra/02 - Beta/NOTA FISCAL/NF 31.pdf';
      const text = new FakeTextExtractor().setText(
        documentPath,
        standardInvoiceText({ number: '31', competence: '08/2023', total: '2.000,00', iss: '100,00', inss: '220,00' })
      );
      const outcome = await processDocument(discovered(documentPath, { provider: 2 }), text, {
        project,
        provider: beta,
      });

      expect(outcome.record?.kind).toBe('invoice');
      expect(outcome.record?.kind === 'invoice' ? outcome.record.fields.iss_rate : null).toBe(5);
      expect(outcome.completeness).toBe(1);
    });
  });

  describe('payroll report', () => {
    const documentPath = '/obra/01 - Alfa/SEFIP/SEFIP 08-2023.pdf';

    it('should take the worker count of the project registration only', async () => {
      const text = new FakeTextExtractor().setText(
        documentPath,
        guideDetailText('08/2023', [
          [PRINTED_REGISTRATION, 12],
          ['98.765.43210/98', 35],
        ])
      );
      const document = discovered(documentPath, { kind: 'payroll-report' });
      const outcome = await processDocument(document, text, { project, provider: alfa });

      expect(outcome.status).toBe('extracted');
      expect(outcome.layout).toBe('fgts-guide-detail');
      expect(outcome.record?.fields).toEqual({ worker_count: 12 });
      expect(outcome.record?.identity_key).toBe(
        `1:payroll-report:h${hashContent(documentPath).slice(0, 16)}:2023-08`
      );
    });

    it('should leave the count missing when the registration is not listed', async () => {
      const text = new FakeTextExtractor().setText(documentPath, guideDetailText('08/2023', [['98.765.43210/98', 35]]));
      const outcome = await processDocument(discovered(documentPath, { kind: 'payroll-report' }), text, {
        project,
        provider: alfa,
      });

      expect(outcome.status).toBe('pending-ocr');
      expect(outcome.reason).toBe('missing fields: worker_count');
      expect(outcome.completeness).toBe(0.5);
      expect(outcome.record?.fields).toEqual({ worker_count: null });
    });

    it('should restore a text layer that reads upside down', async () => {
      const upright = guideDetailText('08/2023', [
        [PRINTED_REGISTRATION, 12],
        ['98.765.43210/98', 35],
      ]);
      const text = new FakeTextExtractor().setText(documentPath, reversePage(upright));
      const outcome = await processDocument(discovered(documentPath, { kind: 'payroll-report' }), text, {
        project,
        provider: alfa,
      });

      expect(outcome.record?.rotation).toBe(180);
      expect(outcome.record?.fields).toEqual({ worker_count: 12 });
    });
  });

  describe('tenant scan', () => {
    it('should ignore the all-tenants aggregate', () => {
      const scan = scanTenantWorkerCounts(
        pages(
          guideDetailText('08/2023', [
            [PRINTED_REGISTRATION, 12],
            ['98.765.43210/98', 35],
          ])
        )
      );

      expect(scan.tenantBlocks).toBe(2);
      expect(scan.tenantCounts.map((c) => [c.tenants, c.count])).toEqual([
        [[REGISTRATION], '12'],
        [['987654321098'], '35'],
      ]);
      expect(scan.documentCounts).toEqual([]);
      expect(selectWorkerCount(scan, REGISTRATION).field?.value).toBe('12');
    });

    it('should read counts closing a tenant row', () => {
      const scan = scanTenantWorkerCounts(
        pages(['CNO 98.765.43210/98  Obra Beta  35', `CNO ${PRINTED_REGISTRATION}  Obra Aurora  12`].join('\n'))
      );
      expect(selectWorkerCount(scan, REGISTRATION)).toEqual({
        field: { value: '12', pageNumber: 1, quote: `CNO ${PRINTED_REGISTRATION} Obra Aurora 12` },
        reason: 'tenant row matching registration number',
      });
    });

    it('should use a document-level count for single-tenant reports', () => {
      const scan = scanTenantWorkerCounts(pages('Competência: 08/2023\nQtd. Trabalhadores: 9'));
      expect(selectWorkerCount(scan, REGISTRATION).field?.value).toBe('9');
    });
  });

  describe('unreadable documents', () => {
    it('should report a PDF that cannot be read as a classification failure', async () => {
      const documentPath = '/obra/01 - Alfa/NOTA FISCAL/NF broken.pdf';
      const text = new FakeTextExtractor().setFailure(documentPath, new Error('Invalid PDF structure'));
      const outcome = await processDocument(discovered(documentPath), text, { project, provider: alfa });

      expect(outcome).toEqual({
        status: 'classification-failed',
        layout: null,
        record: null,
        competence: null,
        reason: 'unreadable PDF: Invalid PDF structure',
        completeness: 0,
      });
    });

    it('should queue scanned documents for OCR', async () => {
      const documentPath = '/obra/01 - Alfa/SEFIP/08-2023/scan.pdf';
      const text = new FakeTextExtractor().setNoTextLayer(documentPath);
      const outcome = await processDocument(
        discovered(documentPath, { kind: 'payroll-report', path_competence: '2023-08' }),
        text,
        { project, provider: alfa }
      );

      expect(outcome.status).toBe('pending-ocr');
      expect(outcome.reason).toBe('no text layer');
      expect(outcome.competence).toBe('2023-08');
    });
  });
});
