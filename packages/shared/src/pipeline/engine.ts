/**
 * Batch Engine
 *
 * One bounded, resumable run over one project:
 * 1. Load the project configuration (fatal when invalid)
 * 2. Discover the documents of the provider subset
 * 3. Extract new, changed and queued documents through their text layer
 * 4. Drain the OCR queue, when enabled
 * 5. Reconcile the ledger against the spreadsheet, optionally writing back
 * 6. Persist the divergences and return the verdict
 *
 * State is persisted after every merged document, so a run that stops
 * early loses no completed work.
 */

import { ulid } from 'ulid';
import { config } from '../config';
import { runWithContextAsync, withChildContext } from '../context';
import { ConfigurationError } from '../errors';
import { logger } from '../logger';
import { batchDurationHistogram, divergencesGauge } from '../metrics';
import { findProvider, loadProjectConfig } from '../project-config';
import {
  applyCellUpdates,
  countByClassification,
  planCellUpdates,
  reconcile,
  type CellWriteReport,
  type Tolerances,
} from '../reconciliation/divergence';
import { buildVerdict } from '../reconciliation/reporter';
import { openProjectState, saveDivergenceSnapshot, saveProjectState } from '../state/project-state';
import { isOcrRetryable } from '../state/document-index';
import type {
  BatchReport,
  Divergence,
  InvocationParams,
  ProjectConfig,
  Provider,
  UpsertOutcome,
} from '../types';
import type { Collaborators } from './collaborators';
import { commitOutcome, type CommitContext } from './commit';
import { mapWithConcurrency } from './concurrency';
import { processDocument } from './document-processor';
import { drainOcrQueue } from './ocr-orchestrator';

export interface RunOptions {
  signal?: AbortSignal;
  now?: () => string;
  tolerances?: Tolerances;
}

export function emptyUpserts(): Record<UpsertOutcome, number> {
  return { inserted: 0, unchanged: 0, superseded: 0, conflict: 0, 'out-of-scope': 0 };
}

function isUpsertOutcome(value: string): value is UpsertOutcome {
  return value in emptyUpserts();
}

/**
 * Providers a run may touch. Unknown indexes in the subset are a
 * configuration error.
 */
export function selectProviders(project: ProjectConfig, subset?: number[]): Map<number, Provider> {
  if (!subset || subset.length === 0) {
    return new Map(project.providers.map((p) => [p.index, p]));
  }

  const selected = new Map<number, Provider>();
  const unknown: number[] = [];
  for (const index of subset) {
    const provider = findProvider(project, index);
    if (provider) {
      selected.set(index, provider);
    } else {
      unknown.push(index);
    }
  }
  if (unknown.length > 0) {
    throw new ConfigurationError(
      'Provider subset outside the roster',
      unknown.map((index) => `unknown provider ${index}`)
    );
  }
  return selected;
}

export async function runBatch(
  params: InvocationParams,
  collaborators: Collaborators,
  options: RunOptions = {}
): Promise<BatchReport> {
  const project = await loadProjectConfig(params.projectDir);
  const providers = selectProviders(project, params.providers);
  if (params.ocrEnabled && !collaborators.ocr) {
    throw new ConfigurationError('OCR is enabled but no OCR engine is configured');
  }

  const batchId = ulid();
  const endTimer = batchDurationHistogram.startTimer({ mode: params.mode });

  return runWithContextAsync({ correlationId: batchId, runId: batchId, projectName: project.project_name }, async () => {
    try {
      const report = await executeBatch(batchId, project, providers, params, collaborators, options);
      endTimer({ status: report.cancelled ? 'cancelled' : 'completed' });
      return report;
    } catch (error) {
      endTimer({ status: 'failed' });
      logger.error('Batch failed', error);
      throw error;
    }
  });
}

async function executeBatch(
  batchId: string,
  project: ProjectConfig,
  providers: Map<number, Provider>,
  params: InvocationParams,
  collaborators: Collaborators,
  options: RunOptions
): Promise<BatchReport> {
  const now = options.now ?? (() => new Date().toISOString());
  const signal = options.signal;
  const state = await openProjectState(params.projectDir, { now });
  const persist = (): Promise<void> => saveProjectState(state);

  const commit: CommitContext = {
    ledger: state.ledger.batchScope(Array.from(providers.keys())),
    documents: state.documents,
    batchId,
    now,
  };

  logger.info('Batch started', {
    mode: params.mode,
    providers: Array.from(providers.keys()),
    batchSize: params.batchSize ?? null,
    ocrEnabled: params.ocrEnabled,
  });

  // ==========================================================================
  // Selection
  // ==========================================================================

  const discovered = (await collaborators.source.discover(project, Array.from(providers.values()))).filter(
    (document) => providers.has(document.provider)
  );

  const pending = discovered.filter((document) => state.documents.needsExtraction(document, params.mode));
  const limit = params.batchSize ?? pending.length;
  const selected = pending.slice(0, limit);
  const deferred = pending.slice(limit);

  if (params.mode === 'force') {
    for (const document of selected) {
      state.documents.upsert(document, { ocr_attempts: 0, best_completeness: 0 });
    }
  }
  for (const document of deferred) {
    state.documents.upsert(document, { status: 'queued', last_batch_id: batchId, updated_at: now() });
  }
  if (deferred.length > 0) await persist();

  // ==========================================================================
  // Text Layer
  // ==========================================================================

  const upserts = emptyUpserts();
  const outcomes = await mapWithConcurrency(
    selected,
    config.workerConcurrency,
    async (document) => {
      const provider = providers.get(document.provider);
      if (!provider) return undefined;
      return withChildContext({ providerIndex: document.provider, documentPath: document.path }, () =>
        processDocument(document, collaborators.text, { project, provider })
      );
    },
    signal
  );

  let processed = 0;
  for (let i = 0; i < selected.length; i++) {
    const outcome = outcomes[i];
    if (!outcome) {
      state.documents.upsert(selected[i], { status: 'queued', updated_at: now() });
      continue;
    }
    const { upsert } = commitOutcome(commit, selected[i], outcome);
    if (upsert) upserts[upsert]++;
    processed++;
    await persist();
  }

  // ==========================================================================
  // OCR
  // ==========================================================================

  let ocr = { attempted: 0, recovered: 0, exhausted: 0 };
  if (params.ocrEnabled && collaborators.ocr && !signal?.aborted) {
    const queue = discovered
      .filter((document) => {
        const status = state.documents.get(document.path);
        return status !== undefined && isOcrRetryable(status, config.ocrMaxAttempts);
      })
      .slice(0, params.batchSize ?? discovered.length);

    const drained = await drainOcrQueue(queue, project, commit, {
      engine: collaborators.ocr,
      providers,
      recognize: { maxPages: config.ocrMaxPages, minConfidence: config.ocrMinConfidence },
      maxAttempts: config.ocrMaxAttempts,
      maxPasses: config.ocrMaxPasses,
      timeoutMs: config.ocrTimeoutMs,
      concurrency: config.workerConcurrency,
      persist,
      signal,
    });
    for (const [outcome, count] of Object.entries(drained.upserts)) {
      if (isUpsertOutcome(outcome)) upserts[outcome] += count;
    }
    ocr = drained;
  }

  // ==========================================================================
  // Reconciliation
  // ==========================================================================

  const cancelled = signal?.aborted ?? false;
  let snapshot = await collaborators.spreadsheet.readSnapshot();
  let divergences: Divergence[] = reconcile(state.ledger, snapshot, state.resolutions, project, options.tolerances);

  let writes: CellWriteReport = { applied: [], conflicts: [], appendedRows: 0 };
  if (params.applySpreadsheetUpdates && !cancelled) {
    writes = await applyCellUpdates(collaborators.spreadsheet, planCellUpdates(divergences, snapshot));
    if (writes.applied.length > 0 || writes.appendedRows > 0) {
      snapshot = await collaborators.spreadsheet.readSnapshot();
      divergences = reconcile(state.ledger, snapshot, state.resolutions, project, options.tolerances);
    }
  }

  await persist();
  await saveDivergenceSnapshot(params.projectDir, batchId, divergences, now());

  const counts = countByClassification(divergences);
  for (const [classification, count] of Object.entries(counts)) {
    divergencesGauge.set({ classification }, count);
  }

  const roster = new Set(project.providers.map((p) => p.index));
  const verdict = buildVerdict({
    documents: state.documents.all().filter((d) => roster.has(d.provider)),
    divergences,
    ocrMaxAttempts: config.ocrMaxAttempts,
  });

  const report: BatchReport = {
    batch_id: batchId,
    project_name: project.project_name,
    mode: params.mode,
    processed,
    skipped: discovered.length - pending.length,
    deferred: deferred.length,
    upserts,
    ocr: { attempted: ocr.attempted, recovered: ocr.recovered, exhausted: ocr.exhausted },
    divergences: counts,
    cell_updates_applied: writes.applied.length,
    cell_conflicts: writes.conflicts.length,
    cancelled,
    verdict,
  };

  logger.info('Batch completed', {
    processed: report.processed,
    skipped: report.skipped,
    deferred: report.deferred,
    ocr: report.ocr,
    divergences: report.divergences,
    verdict: verdict.status,
  });

  return report;
}
