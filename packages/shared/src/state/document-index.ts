/**
 * Document Index
 *
 * Per-document processing status: what was seen, by which content hash,
 * and where it stands (extracted, waiting for OCR, flagged for review...).
 * Drives incremental selection and the OCR retry queue.
 */

import { InvalidRequestError, NotFoundError } from '../errors';
import type { DiscoveredDocument, DocumentState, DocumentStatus, RunMode } from '../types';

/** Statuses that need no further work while the file is unchanged. */
const SETTLED: readonly DocumentState[] = [
  'extracted',
  'filtered-out',
  'classification-failed',
  'needs-manual-review',
  'reviewed',
];

/** Statuses a human may acknowledge. */
const REVIEWABLE: readonly DocumentState[] = ['needs-manual-review', 'classification-failed', 'ocr-exhausted'];

export function isOcrRetryable(status: DocumentStatus, maxOcrAttempts: number): boolean {
  if (status.ocr_attempts >= maxOcrAttempts) return false;
  return status.status === 'pending-ocr' || status.status === 'ocr-exhausted';
}

export type DocumentStatusPatch = Partial<Omit<DocumentStatus, 'path'>>;

export class DocumentIndex {
  private readonly byPath = new Map<string, DocumentStatus>();

  constructor(documents: DocumentStatus[] = []) {
    for (const doc of documents) {
      this.byPath.set(doc.path, doc);
    }
  }

  get(path: string): DocumentStatus | undefined {
    return this.byPath.get(path);
  }

  all(): DocumentStatus[] {
    return Array.from(this.byPath.values()).sort((a, b) => a.path.localeCompare(b.path));
  }

  withStatus(...statuses: DocumentState[]): DocumentStatus[] {
    return this.all().filter((d) => statuses.includes(d.status));
  }

  /**
   * Create or update the status of a discovered document.
   */
  upsert(document: DiscoveredDocument, patch: DocumentStatusPatch): DocumentStatus {
    const existing = this.byPath.get(document.path);
    const sameContent = existing?.content_hash === document.content_hash;
    const next: DocumentStatus = {
      path: document.path,
      provider: document.provider,
      kind: document.kind,
      content_hash: document.content_hash,
      status: existing?.status ?? 'queued',
      layout: existing?.layout ?? null,
      identity_key: existing?.identity_key ?? null,
      competence: existing?.competence ?? document.path_competence,
      ocr_attempts: sameContent && existing ? existing.ocr_attempts : 0,
      best_completeness: sameContent && existing ? existing.best_completeness : 0,
      last_batch_id: existing?.last_batch_id ?? '',
      updated_at: existing?.updated_at ?? new Date().toISOString(),
      reason: existing?.reason ?? null,
      ...patch,
    };
    this.byPath.set(document.path, next);
    return next;
  }

  /**
   * Whether a discovered document needs its text layer (re)extracted.
   *
   * Incremental runs take new and changed files plus those queued by an
   * earlier, bounded batch. Documents waiting on OCR are not re-extracted:
   * the OCR queue picks them up. Forced runs redo everything.
   */
  needsExtraction(document: DiscoveredDocument, mode: RunMode): boolean {
    if (mode === 'force') return true;
    const status = this.byPath.get(document.path);
    if (!status || status.content_hash !== document.content_hash) return true;
    return status.status === 'queued';
  }

  /**
   * Whether an incremental run would leave the document alone.
   */
  isSettled(path: string, maxOcrAttempts: number): boolean {
    const status = this.byPath.get(path);
    if (!status) return false;
    if (SETTLED.includes(status.status)) return true;
    return status.status === 'ocr-exhausted' && status.ocr_attempts >= maxOcrAttempts;
  }

  /**
   * Documents that failed OCR but may be retried.
   */
  retryableOcr(maxOcrAttempts: number): DocumentStatus[] {
    return this.all().filter((d) => isOcrRetryable(d, maxOcrAttempts));
  }

  /**
   * Acknowledge a document flagged for manual review. It stays settled
   * until its content changes.
   */
  markReviewed(path: string, at: string): DocumentStatus {
    const status = this.byPath.get(path);
    if (!status) {
      throw new NotFoundError(`Document ${path} not found`);
    }
    if (!REVIEWABLE.includes(status.status)) {
      throw new InvalidRequestError(`Document ${path} is ${status.status}, not awaiting review`);
    }
    const next: DocumentStatus = { ...status, status: 'reviewed', updated_at: at };
    this.byPath.set(path, next);
    return next;
  }
}
