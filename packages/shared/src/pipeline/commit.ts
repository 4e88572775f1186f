/**
 * Merge step: the serialization point between parallel document work and
 * the project state. Callers apply outcomes one at a time, in discovery
 * order, and persist after each.
 */

import { logger } from '../logger';
import { documentsProcessedCounter, ledgerUpsertsCounter } from '../metrics';
import type { DocumentIndex, DocumentStatusPatch } from '../state/document-index';
import type { LedgerStore } from '../state/ledger-store';
import type { DiscoveredDocument, DocumentStatus, UpsertOutcome } from '../types';
import type { DocumentOutcome } from './document-processor';

export interface CommitContext {
  ledger: LedgerStore;
  documents: DocumentIndex;
  batchId: string;
  now: () => string;
}

export interface CommitResult {
  upsert: UpsertOutcome | null;
  status: DocumentStatus;
}

export function commitOutcome(
  ctx: CommitContext,
  document: DiscoveredDocument,
  outcome: DocumentOutcome,
  patch: DocumentStatusPatch = {}
): CommitResult {
  let upsert: UpsertOutcome | null = null;
  if (outcome.record) {
    const result = ctx.ledger.upsert(outcome.record, { batchId: ctx.batchId });
    upsert = result.outcome;
    ledgerUpsertsCounter.inc({ outcome: upsert });
    if (upsert === 'conflict') {
      logger.warn('Conflicting record stored for review', {
        identity_key: outcome.record.identity_key,
        path: document.path,
      });
    }
  }

  const previous = ctx.documents.get(document.path);
  const sameContent = previous?.content_hash === document.content_hash;
  const previousBest = sameContent && previous ? previous.best_completeness : 0;

  const status = ctx.documents.upsert(document, {
    status: outcome.status,
    layout: outcome.layout,
    identity_key: outcome.record?.identity_key ?? (sameContent ? previous?.identity_key ?? null : null),
    competence: outcome.competence,
    best_completeness: Math.max(previousBest, outcome.completeness),
    last_batch_id: ctx.batchId,
    updated_at: ctx.now(),
    reason: outcome.reason,
    ...patch,
  });

  documentsProcessedCounter.inc({
    kind: document.kind,
    layout: outcome.layout ?? 'none',
    status: outcome.status,
  });

  return { upsert, status };
}
