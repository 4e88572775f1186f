/**
 * OCR Fallback Orchestrator
 *
 * Recovers documents the text layer could not fully read. Each attempt
 * recognizes the document upright and, when that read is insufficient,
 * rotated 180 degrees; the better read wins. Documents that stay
 * insufficient become `ocr-exhausted` and are retried by later runs until
 * their attempts run out.
 *
 * Recognition runs in parallel; merging stays serialized in queue order.
 * A document is persisted as `pending-ocr` before its recognition starts,
 * so an interrupted run leaves it queued rather than half-merged.
 */

import { withChildContext } from '../context';
import { logger } from '../logger';
import { extractionDurationHistogram, ocrAttemptsCounter } from '../metrics';
import type { DocumentIndex } from '../state/document-index';
import { isOcrRetryable } from '../state/document-index';
import type { DiscoveredDocument, ProjectConfig, Provider, Rotation, UpsertOutcome } from '../types';
import type { OcrEngine } from './collaborators';
import type { CommitContext } from './commit';
import { commitOutcome } from './commit';
import { mapWithConcurrency, withTimeout } from './concurrency';
import type { DocumentOutcome, PageExtraction, ProcessingContext } from './document-processor';
import { extractFromPages, outcomeFromPages } from './document-processor';

// ============================================================================
// Single Document
// ============================================================================

const ROTATIONS: readonly Rotation[] = [0, 180];

export interface OcrAttempt {
  rotation: Rotation;
  confidence: number;
  extraction: PageExtraction | null;
  completeness: number;
  sufficient: boolean;
  error: string | null;
}

export interface OcrRecognition {
  outcome: DocumentOutcome;
  attempts: OcrAttempt[];
  recovered: boolean;
}

export interface RecognizeOptions {
  maxPages: number;
  minConfidence: number;
}

/**
 * A read is sufficient when it yields a complete record, confidently read,
 * with no worker count of zero that OCR may have invented.
 */
export function isSufficient(extraction: PageExtraction, confidence: number, minConfidence: number): boolean {
  const normalization = extraction.normalization;
  if (!normalization || !normalization.record) return false;
  if (normalization.missing.length > 0) return false;
  if (confidence < minConfidence) return false;
  return !normalization.flags.includes('ocr-zero-suspicious');
}

/**
 * Best attempt: sufficient first, then completeness, then confidence.
 * Exact ties keep the earlier attempt, which is the upright one.
 */
export function pickBestAttempt(attempts: OcrAttempt[]): OcrAttempt | null {
  let best: OcrAttempt | null = null;
  for (const attempt of attempts) {
    if (attempt.extraction === null) continue;
    if (best === null || compareAttempts(attempt, best) > 0) {
      best = attempt;
    }
  }
  return best;
}

function compareAttempts(a: OcrAttempt, b: OcrAttempt): number {
  if (a.sufficient !== b.sufficient) return a.sufficient ? 1 : -1;
  if (a.completeness !== b.completeness) return a.completeness - b.completeness;
  return a.confidence - b.confidence;
}

async function attemptRotation(
  document: DiscoveredDocument,
  rotation: Rotation,
  engine: OcrEngine,
  ctx: ProcessingContext,
  options: RecognizeOptions
): Promise<OcrAttempt> {
  try {
    const result = await engine.recognize({ path: document.path, maxPages: options.maxPages, rotation });
    const extraction = extractFromPages(document, result.pages, ctx, {
      source: 'ocr',
      confidence: result.confidence,
      rotation,
    });
    const sufficient = isSufficient(extraction, result.confidence, options.minConfidence);
    ocrAttemptsCounter.inc({ rotation: String(rotation), outcome: sufficient ? 'sufficient' : 'insufficient' });
    return {
      rotation,
      confidence: result.confidence,
      extraction,
      completeness: extraction.normalization?.completeness ?? 0,
      sufficient,
      error: null,
    };
  } catch (error) {
    ocrAttemptsCounter.inc({ rotation: String(rotation), outcome: 'error' });
    logger.warn('OCR recognition failed', {
      path: document.path,
      rotation,
      error: error instanceof Error ? error.message : String(error),
    });
    return {
      rotation,
      confidence: 0,
      extraction: null,
      completeness: 0,
      sufficient: false,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

function exhausted(document: DiscoveredDocument, best: OcrAttempt | null, reason: string): DocumentOutcome {
  return {
    status: 'ocr-exhausted',
    layout: best?.extraction?.layout ?? null,
    record: null,
    competence: best?.extraction?.normalization?.competence ?? document.path_competence,
    reason,
    completeness: best?.completeness ?? 0,
  };
}

/**
 * One OCR attempt on one document: upright, then rotated if needed.
 */
export async function recognizeDocument(
  document: DiscoveredDocument,
  engine: OcrEngine,
  ctx: ProcessingContext,
  options: RecognizeOptions
): Promise<OcrRecognition> {
  const startTime = Date.now();
  const attempts: OcrAttempt[] = [];

  for (const rotation of ROTATIONS) {
    const attempt = await attemptRotation(document, rotation, engine, ctx, options);
    attempts.push(attempt);
    if (attempt.sufficient) break;
  }

  extractionDurationHistogram.observe({ source: 'ocr' }, (Date.now() - startTime) / 1000);

  const best = pickBestAttempt(attempts);
  if (best === null || best.extraction === null) {
    const errors = attempts.map((a) => a.error).filter((e): e is string => e !== null);
    return { outcome: exhausted(document, null, `OCR failed: ${errors.join('; ')}`), attempts, recovered: false };
  }

  const outcome = outcomeFromPages(document, best.extraction);
  if (outcome.status === 'filtered-out') {
    return { outcome, attempts, recovered: false };
  }
  if (!best.sufficient) {
    const detail = outcome.reason ?? `confidence ${best.confidence.toFixed(2)}`;
    return { outcome: exhausted(document, best, `OCR insufficient: ${detail}`), attempts, recovered: false };
  }

  if (best.rotation === 180) {
    logger.info('Document recovered rotated', { path: document.path });
  }
  return { outcome, attempts, recovered: true };
}

// ============================================================================
// Queue
// ============================================================================

export interface OcrQueueOptions {
  engine: OcrEngine;
  providers: Map<number, Provider>;
  recognize: RecognizeOptions;
  maxAttempts: number;
  maxPasses: number;
  timeoutMs: number;
  concurrency: number;
  /** Persist the project state; called after every merged document. */
  persist: () => Promise<void>;
  signal?: AbortSignal;
}

export interface OcrQueueReport {
  attempted: number;
  recovered: number;
  exhausted: number;
  passes: number;
  upserts: Partial<Record<UpsertOutcome, number>>;
}

interface PassResult {
  document: DiscoveredDocument;
  recognition: OcrRecognition;
}

function retryable(documents: DocumentIndex, queue: DiscoveredDocument[], maxAttempts: number): DiscoveredDocument[] {
  return queue.filter((document) => {
    const status = documents.get(document.path);
    return status !== undefined && isOcrRetryable(status, maxAttempts);
  });
}

/**
 * Drain the OCR queue in passes, until a pass improves nothing or the
 * pass limit is reached. `queue` is in discovery order.
 */
export async function drainOcrQueue(
  queue: DiscoveredDocument[],
  project: ProjectConfig,
  commit: CommitContext,
  options: OcrQueueOptions
): Promise<OcrQueueReport> {
  const report: OcrQueueReport = { attempted: 0, recovered: 0, exhausted: 0, passes: 0, upserts: {} };

  for (let pass = 1; pass <= options.maxPasses; pass++) {
    if (options.signal?.aborted) break;
    const work = retryable(commit.documents, queue, options.maxAttempts);
    if (work.length === 0) break;

    report.passes = pass;
    for (const document of work) {
      commit.documents.upsert(document, { status: 'pending-ocr', updated_at: commit.now() });
    }
    await options.persist();

    logger.info('OCR pass started', { pass, documents: work.length });

    const results = await mapWithConcurrency(
      work,
      options.concurrency,
      async (document): Promise<PassResult | null> => {
        const provider = options.providers.get(document.provider);
        if (!provider) return null;
        const recognition = await withChildContext(
          { providerIndex: document.provider, documentPath: document.path },
          () =>
            withTimeout(
              recognizeDocument(document, options.engine, { project, provider }, options.recognize),
              options.timeoutMs,
              () => new Error(`OCR timed out after ${options.timeoutMs}ms`)
            )
        ).catch((error: unknown): OcrRecognition => {
          const message = error instanceof Error ? error.message : String(error);
          logger.warn('OCR attempt abandoned', { path: document.path, error: message });
          return { outcome: exhausted(document, null, message), attempts: [], recovered: false };
        });
        return { document, recognition };
      },
      options.signal
    );

    let improved = false;
    for (const result of results) {
      if (!result) continue;
      const { document, recognition } = result;
      const before = commit.documents.get(document.path);
      const attempts = (before?.ocr_attempts ?? 0) + 1;

      const { upsert, status } = commitOutcome(commit, document, recognition.outcome, { ocr_attempts: attempts });
      await options.persist();
      if (upsert) report.upserts[upsert] = (report.upserts[upsert] ?? 0) + 1;

      report.attempted++;
      if (recognition.recovered) {
        report.recovered++;
        improved = true;
      } else if (status.status === 'ocr-exhausted') {
        report.exhausted++;
        if (status.best_completeness > (before?.best_completeness ?? 0)) improved = true;
      } else {
        improved = true;
      }
    }

    if (!improved) {
      logger.info('OCR pass made no progress', { pass });
      break;
    }
  }

  return report;
}
