/**
 * OCR Fallback Tests
 *
 * Rotation handling, attempt selection and the retry queue of documents
 * the text layer could not read.
 */

import {
  ConfigurationError,
  InMemorySpreadsheet,
  openProjectState,
  pickBestAttempt,
  recognizeDocument,
  runBatch,
  type InvocationParams,
  type OcrAttempt,
} from '@ledgerline/shared';
import {
  discovered,
  FakeOcrEngine,
  FakeTextExtractor,
  guideDetailText,
  makeProjectDir,
  PRINTED_REGISTRATION,
  removeDir,
  StaticDocumentSource,
  testProject,
} from './helpers';

const project = testProject();
const provider = project.providers[0];
const recognizeOptions = { maxPages: 5, minConfidence: 0.6 };

const SCAN_PATH = '/obra/01 - Alfa/SEFIP/08-2023/scan.pdf';
const scan = discovered(SCAN_PATH, { kind: 'payroll-report', path_competence: '2023-08' });

function report(workers: number): string {
  return guideDetailText('08/2023', [
    [PRINTED_REGISTRATION, workers],
    ['98.765.43210/98', 35],
  ]);
}

function attempt(overrides: Partial<OcrAttempt>): OcrAttempt {
  return {
    rotation: 0,
    confidence: 0.8,
    extraction: {
      classification: 'fgts-guide-detail',
      layout: 'fgts-guide-detail',
      reason: 'guide detail anchors',
      normalization: null,
    },
    completeness: 0.5,
    sufficient: false,
    error: null,
    ...overrides,
  };
}

describe('OCR Fallback', () => {
  describe('recognizeDocument', () => {
    it('should keep the rotated read when the upright one is unreadable', async () => {
      const engine = new FakeOcrEngine()
        .set(SCAN_PATH, 0, { text: '#@! ilegivel', confidence: 0.3 })
        .set(SCAN_PATH, 180, { text: report(12), confidence: 0.9 });

      const recognition = await recognizeDocument(scan, engine, { project, provider }, recognizeOptions);

      expect(recognition.recovered).toBe(true);
      expect(recognition.attempts.map((a) => [a.rotation, a.sufficient])).toEqual([
        [0, false],
        [180, true],
      ]);
      expect(recognition.outcome.status).toBe('extracted');
      expect(recognition.outcome.record?.rotation).toBe(180);
      expect(recognition.outcome.record?.source).toBe('ocr');
      expect(recognition.outcome.record?.confidence).toBe(0.9);
      expect(recognition.outcome.record?.fields).toEqual({ worker_count: 12 });
    });

    it('should not rotate when the upright read is sufficient', async () => {
      const engine = new FakeOcrEngine().set(SCAN_PATH, 0, { text: report(12), confidence: 0.95 });

      const recognition = await recognizeDocument(scan, engine, { project, provider }, recognizeOptions);

      expect(recognition.recovered).toBe(true);
      expect(engine.requests).toEqual([{ path: SCAN_PATH, maxPages: 5, rotation: 0 }]);
    });

    it('should not merge a worker count of zero read by OCR', async () => {
      const engine = new FakeOcrEngine()
        .set(SCAN_PATH, 0, { text: report(0), confidence: 0.9 })
        .set(SCAN_PATH, 180, new Error('render failed'));

      const recognition = await recognizeDocument(scan, engine, { project, provider }, recognizeOptions);

      expect(recognition.recovered).toBe(false);
      expect(recognition.outcome).toEqual({
        status: 'ocr-exhausted',
        layout: 'fgts-guide-detail',
        record: null,
        competence: '2023-08',
        reason: 'OCR insufficient: needs-manual-review, ocr-zero-suspicious',
        completeness: 1,
      });
    });

    it('should treat a low-confidence read as insufficient', async () => {
      const engine = new FakeOcrEngine()
        .set(SCAN_PATH, 0, { text: report(12), confidence: 0.4 })
        .set(SCAN_PATH, 180, new Error('render failed'));

      const recognition = await recognizeDocument(scan, engine, { project, provider }, recognizeOptions);

      expect(recognition.outcome.status).toBe('ocr-exhausted');
      expect(recognition.outcome.reason).toBe('OCR insufficient: needs-manual-review, ocr-low-confidence');
      expect(recognition.attempts[1].error).toBe('render failed');
    });

    it('should report engine failures on every rotation', async () => {
      const engine = new FakeOcrEngine()
        .set(SCAN_PATH, 0, new Error('timeout'))
        .set(SCAN_PATH, 180, new Error('timeout'));

      const recognition = await recognizeDocument(scan, engine, { project, provider }, recognizeOptions);

      expect(recognition.outcome.reason).toBe('OCR failed: timeout; timeout');
      expect(recognition.outcome.competence).toBe('2023-08');
    });
  });

  describe('pickBestAttempt', () => {
    it('should prefer a sufficient attempt over a more complete one', () => {
      const best = pickBestAttempt([
        attempt({ rotation: 0, completeness: 1, sufficient: false }),
        attempt({ rotation: 180, completeness: 0.5, sufficient: true }),
      ]);
      expect(best?.rotation).toBe(180);
    });

    it('should break completeness ties by confidence', () => {
      const best = pickBestAttempt([
        attempt({ rotation: 0, confidence: 0.7 }),
        attempt({ rotation: 180, confidence: 0.8 }),
      ]);
      expect(best?.rotation).toBe(180);
    });

    it('should keep the upright read on an exact tie', () => {
      const best = pickBestAttempt([attempt({ rotation: 0 }), attempt({ rotation: 180 })]);
      expect(best?.rotation).toBe(0);
    });

    it('should skip attempts that produced nothing', () => {
      expect(pickBestAttempt([attempt({ extraction: null, error: 'timeout' })])).toBeNull();
    });
  });

  describe('queue', () => {
    let projectDir: string;

    const params = (): InvocationParams => ({ projectDir, mode: 'incremental', ocrEnabled: true });

    beforeEach(async () => {
      projectDir = await makeProjectDir();
    });

    afterEach(async () => {
      await removeDir(projectDir);
    });

    it('should recover a scanned report within the run', async () => {
      const collaborators = {
        source: new StaticDocumentSource([scan]),
        text: new FakeTextExtractor().setNoTextLayer(SCAN_PATH),
        ocr: new FakeOcrEngine().set(SCAN_PATH, 0, { text: report(12), confidence: 0.9 }),
        spreadsheet: new InMemorySpreadsheet(),
      };

      const result = await runBatch(params(), collaborators);

      expect(result.processed).toBe(1);
      expect(result.ocr).toEqual({ attempted: 1, recovered: 1, exhausted: 0 });
      expect(result.upserts.inserted).toBe(1);
      expect(result.divergences['missing-in-spreadsheet']).toBe(1);
      expect(result.verdict).toEqual({
        status: 'action-needed',
        steps: [{ stage: 'update-spreadsheet', providers: [1], competences: ['2023-08'], count: 1 }],
      });

      const state = await openProjectState(projectDir);
      expect(state.documents.get(SCAN_PATH)).toMatchObject({ status: 'extracted', ocr_attempts: 1 });
    });

    it('should retry an unreadable scan on later runs until attempts run out', async () => {
      const collaborators = {
        source: new StaticDocumentSource([scan]),
        text: new FakeTextExtractor().setNoTextLayer(SCAN_PATH),
        ocr: new FakeOcrEngine()
          .set(SCAN_PATH, 0, { text: 'borrado', confidence: 0.2 })
          .set(SCAN_PATH, 180, { text: 'oparrob', confidence: 0.2 }),
        spreadsheet: new InMemorySpreadsheet(),
      };

      const first = await runBatch(params(), collaborators);
      expect(first.ocr).toEqual({ attempted: 1, recovered: 0, exhausted: 1 });
      expect(first.verdict).toEqual({
        status: 'action-needed',
        steps: [{ stage: 'ocr', providers: [1], competences: ['2023-08'], count: 1 }],
      });

      const second = await runBatch(params(), collaborators);
      expect(second.processed).toBe(0);
      expect(second.skipped).toBe(1);
      expect(second.ocr.attempted).toBe(1);

      const third = await runBatch(params(), collaborators);
      expect(third.verdict).toEqual({
        status: 'action-needed',
        steps: [{ stage: 'manual-review', providers: [1], competences: ['2023-08'], count: 1 }],
      });

      const fourth = await runBatch(params(), collaborators);
      expect(fourth.ocr.attempted).toBe(0);
      expect(collaborators.ocr.requests).toHaveLength(6);
    });

    it('should refuse to run OCR without an engine', async () => {
      const collaborators = {
        source: new StaticDocumentSource([scan]),
        text: new FakeTextExtractor(),
        spreadsheet: new InMemorySpreadsheet(),
      };

      await expect(runBatch(params(), collaborators)).rejects.toBeInstanceOf(ConfigurationError);
    });
  });
});
