/**
 * Divergence Resolver
 *
 * Compares ledger aggregates with a spreadsheet snapshot, applies human
 * resolution policies and plans the spreadsheet writes that follow.
 * Divergences are always recomputed; only resolutions are stored.
 */

import { config } from '../config';
import { isWithinRange } from '../competence';
import { InvalidRequestError, SpreadsheetWriteConflictError } from '../errors';
import { logger } from '../logger';
import { cellWritesCounter } from '../metrics';
import type { LedgerStore } from '../state/ledger-store';
import { RECONCILED_FIELDS } from '../types';
import type {
  CellUpdate,
  Divergence,
  DivergenceClassification,
  ProjectConfig,
  ReconciledField,
  Resolution,
  ResolutionPolicy,
  SpreadsheetRow,
  SpreadsheetSnapshot,
} from '../types';
import { aggregateLedger, divergenceKey, type LedgerAggregate } from './aggregate';
import type { SpreadsheetGateway } from './spreadsheet';

// ============================================================================
// Detection
// ============================================================================

export interface Tolerances {
  moneyCents: number;
  workers: number;
}

export function defaultTolerances(): Tolerances {
  return { moneyCents: config.moneyToleranceCents, workers: config.workerTolerance };
}

function toleranceFor(field: ReconciledField, tolerances: Tolerances): number {
  return field === 'workers' ? tolerances.workers : tolerances.moneyCents;
}

function classify(
  spreadsheet: number | null,
  aggregate: LedgerAggregate | undefined,
  tolerance: number,
  zeroCellsAreEmpty: boolean
): DivergenceClassification | null {
  if (aggregate?.ambiguous) return 'value-mismatch';
  const extracted = aggregate?.value ?? null;
  if (extracted === null) {
    return spreadsheet === null ? null : 'missing-in-extraction';
  }
  if (spreadsheet === null) {
    return extracted === 0 && zeroCellsAreEmpty ? 'matched' : 'missing-in-spreadsheet';
  }
  return Math.abs(extracted - spreadsheet) <= tolerance ? 'matched' : 'value-mismatch';
}

/**
 * A resolution holds while the values it was taken on are still the
 * current ones. For `accept-document` the extracted side is the value
 * after the chosen document was accepted.
 */
export function isResolutionEffective(
  resolution: Resolution,
  current: { spreadsheet_value: number | null; extracted_value: number | null }
): boolean {
  const extracted = resolution.policy === 'accept-document' ? resolution.resolved_value : resolution.extracted_value;
  return resolution.spreadsheet_value === current.spreadsheet_value && extracted === current.extracted_value;
}

/**
 * Classify every provider x competence x field cell that has a value on
 * either side. Spreadsheet cells holding zero count as empty when the
 * project says so.
 */
export function detectDivergences(
  aggregates: ReadonlyMap<string, LedgerAggregate>,
  snapshot: SpreadsheetSnapshot,
  resolutions: ReadonlyMap<string, Resolution>,
  project: ProjectConfig,
  tolerances: Tolerances = defaultTolerances()
): Divergence[] {
  const providers = new Set(project.providers.map((p) => p.index));
  const sheet = new Map<string, number | null>();
  for (const cell of snapshot.cells) {
    if (!providers.has(cell.provider) || !isWithinRange(cell.competence, project.competence_range)) continue;
    const value = cell.value === 0 && project.zero_cells_are_empty ? null : cell.value;
    sheet.set(divergenceKey(cell.provider, cell.competence, cell.field), value);
  }

  const cells = new Map<string, { provider: number; competence: string; field: ReconciledField }>();
  for (const cell of snapshot.cells) {
    const key = divergenceKey(cell.provider, cell.competence, cell.field);
    if (sheet.has(key)) cells.set(key, cell);
  }
  for (const aggregate of aggregates.values()) {
    cells.set(aggregate.key, aggregate);
  }

  const divergences: Divergence[] = [];
  for (const [key, cell] of cells) {
    const aggregate = aggregates.get(key);
    const spreadsheetValue = sheet.get(key) ?? null;
    const classification = classify(
      spreadsheetValue,
      aggregate,
      toleranceFor(cell.field, tolerances),
      project.zero_cells_are_empty
    );
    if (classification === null) continue;

    const current = {
      spreadsheet_value: spreadsheetValue,
      extracted_value: aggregate && !aggregate.ambiguous ? aggregate.value : null,
    };
    const stored = resolutions.get(key);
    const resolution =
      classification !== 'matched' && stored && isResolutionEffective(stored, current) ? stored : null;

    divergences.push({
      key,
      provider: cell.provider,
      competence: cell.competence,
      field: cell.field,
      classification,
      ...current,
      candidates: aggregate?.candidates ?? [],
      resolution,
    });
  }

  return divergences.sort(
    (a, b) =>
      a.provider - b.provider ||
      a.competence.localeCompare(b.competence) ||
      RECONCILED_FIELDS.indexOf(a.field) - RECONCILED_FIELDS.indexOf(b.field)
  );
}

/**
 * Aggregate the ledger and detect divergences in one step.
 */
export function reconcile(
  store: LedgerStore,
  snapshot: SpreadsheetSnapshot,
  resolutions: ReadonlyMap<string, Resolution>,
  project: ProjectConfig,
  tolerances?: Tolerances
): Divergence[] {
  return detectDivergences(aggregateLedger(store, project), snapshot, resolutions, project, tolerances);
}

export function countByClassification(divergences: Divergence[]): Record<DivergenceClassification, number> {
  const counts: Record<DivergenceClassification, number> = {
    matched: 0,
    'missing-in-extraction': 0,
    'missing-in-spreadsheet': 0,
    'value-mismatch': 0,
  };
  for (const divergence of divergences) {
    counts[divergence.classification]++;
  }
  return counts;
}

// ============================================================================
// Resolution
// ============================================================================

export interface ResolverContext {
  store: LedgerStore;
  project: ProjectConfig;
  /** Stored resolutions, updated in place. */
  resolutions: Map<string, Resolution>;
  now?: () => string;
}

export interface ResolutionRequest {
  policy: ResolutionPolicy;
  /** Required for `accept-document`. */
  entryId?: string;
}

function isSameRequest(resolution: Resolution, request: ResolutionRequest): boolean {
  return resolution.policy === request.policy && resolution.chosen_entry_id === (request.entryId ?? null);
}

function isAlreadyAccepted(ctx: ResolverContext, entryId: string | undefined, key: string): boolean {
  if (!entryId) return false;
  const state = ctx.store.getEntry(entryId)?.state;
  return state?.status === 'manually-resolved' && state.resolution === key;
}

function checkPolicy(divergence: Divergence, request: ResolutionRequest): void {
  if (divergence.classification === 'matched') {
    throw new InvalidRequestError(`Divergence ${divergence.key} is matched; nothing to resolve`);
  }
  if (divergence.classification === 'missing-in-extraction' && request.policy !== 'keep-spreadsheet') {
    throw new InvalidRequestError(`Divergence ${divergence.key} has no extracted value to accept`);
  }
  if (request.policy === 'accept-extracted' && divergence.extracted_value === null) {
    throw new InvalidRequestError(
      `Divergence ${divergence.key} has disagreeing candidates; accept a specific document instead`
    );
  }
  if (request.policy === 'accept-document') {
    if (!request.entryId) {
      throw new InvalidRequestError('accept-document requires an entry id');
    }
    const entryId = request.entryId;
    if (!divergence.candidates.some((c) => c.entry_id === entryId)) {
      throw new InvalidRequestError(`Entry ${entryId} is not a candidate of divergence ${divergence.key}`);
    }
  }
}

function applyPolicy(divergence: Divergence, request: ResolutionRequest, ctx: ResolverContext): number | null {
  switch (request.policy) {
    case 'keep-spreadsheet':
      return divergence.spreadsheet_value;
    case 'accept-extracted':
      return divergence.extracted_value;
    case 'accept-document':
      if (!request.entryId) {
        throw new InvalidRequestError('accept-document requires an entry id');
      }
      ctx.store.acceptEntry(request.entryId, divergence.key);
      return aggregateLedger(ctx.store, ctx.project).get(divergence.key)?.value ?? null;
  }
}

/**
 * Apply one resolution policy to one divergence. Reapplying the resolution
 * already in effect is a no-op and returns it unchanged.
 */
export function resolveDivergence(
  divergence: Divergence,
  request: ResolutionRequest,
  ctx: ResolverContext
): Resolution {
  const existing = ctx.resolutions.get(divergence.key);
  if (
    existing &&
    isSameRequest(existing, request) &&
    (isResolutionEffective(existing, divergence) || isAlreadyAccepted(ctx, request.entryId, divergence.key))
  ) {
    logger.debug('Resolution already in effect', { divergence_key: divergence.key, policy: request.policy });
    return existing;
  }

  checkPolicy(divergence, request);

  const resolvedValue = applyPolicy(divergence, request, ctx);

  const resolution: Resolution = {
    key: divergence.key,
    policy: request.policy,
    spreadsheet_value: divergence.spreadsheet_value,
    extracted_value: divergence.extracted_value,
    chosen_entry_id: request.entryId ?? null,
    resolved_value: resolvedValue,
    resolved_at: (ctx.now ?? (() => new Date().toISOString()))(),
  };
  ctx.resolutions.set(divergence.key, resolution);

  logger.info('Divergence resolved', {
    divergence_key: divergence.key,
    classification: divergence.classification,
    policy: resolution.policy,
    chosen_entry_id: resolution.chosen_entry_id,
    resolved_value: resolution.resolved_value,
  });

  return resolution;
}

export interface BulkFilter {
  provider?: number;
  competence?: string;
  field?: ReconciledField;
}

/**
 * Apply one policy to every unresolved divergence matching `filter`.
 * Choosing a document is a per-divergence decision and is not available
 * in bulk.
 */
export function resolveAll(
  divergences: Divergence[],
  policy: Exclude<ResolutionPolicy, 'accept-document'>,
  ctx: ResolverContext,
  filter: BulkFilter = {}
): Resolution[] {
  const applied: Resolution[] = [];
  for (const divergence of divergences) {
    if (divergence.resolution !== null) continue;
    if (filter.provider !== undefined && divergence.provider !== filter.provider) continue;
    if (filter.competence !== undefined && divergence.competence !== filter.competence) continue;
    if (filter.field !== undefined && divergence.field !== filter.field) continue;

    const eligible =
      policy === 'keep-spreadsheet'
        ? divergence.classification === 'value-mismatch'
        : (divergence.classification === 'value-mismatch' ||
            divergence.classification === 'missing-in-spreadsheet') &&
          divergence.extracted_value !== null;
    if (!eligible) continue;

    applied.push(resolveDivergence(divergence, { policy }, ctx));
  }
  return applied;
}

// ============================================================================
// Spreadsheet updates
// ============================================================================

/**
 * The value the spreadsheet should hold for a divergence, or null when the
 * spreadsheet needs no write.
 */
export function spreadsheetTarget(divergence: Divergence): number | null {
  if (divergence.classification === 'missing-in-spreadsheet') {
    return divergence.resolution?.policy === 'keep-spreadsheet' ? null : divergence.extracted_value;
  }
  if (divergence.classification === 'value-mismatch' && divergence.resolution) {
    if (divergence.resolution.policy === 'keep-spreadsheet') return null;
    const value = divergence.resolution.resolved_value;
    return value !== null && value !== divergence.spreadsheet_value ? value : null;
  }
  return null;
}

export interface CellUpdatePlan {
  updates: CellUpdate[];
  appends: SpreadsheetRow[];
}

/**
 * Turn divergences into spreadsheet writes. Each update is conditioned on
 * the raw snapshot value of its cell; rows the spreadsheet lacks are
 * appended instead.
 */
export function planCellUpdates(divergences: Divergence[], snapshot: SpreadsheetSnapshot): CellUpdatePlan {
  const raw = new Map<string, number | null>();
  const rows = new Set<string>();
  for (const cell of snapshot.cells) {
    raw.set(divergenceKey(cell.provider, cell.competence, cell.field), cell.value);
    rows.add(`${cell.provider}|${cell.competence}`);
  }

  const updates: CellUpdate[] = [];
  const appends = new Map<string, SpreadsheetRow>();
  for (const divergence of divergences) {
    const value = spreadsheetTarget(divergence);
    if (value === null) continue;

    const rowKey = `${divergence.provider}|${divergence.competence}`;
    if (rows.has(rowKey)) {
      updates.push({
        provider: divergence.provider,
        competence: divergence.competence,
        field: divergence.field,
        expected: raw.get(divergence.key) ?? null,
        value,
        divergence_key: divergence.key,
      });
      continue;
    }

    const row = appends.get(rowKey) ?? { provider: divergence.provider, competence: divergence.competence, values: {} };
    row.values[divergence.field] = value;
    appends.set(rowKey, row);
  }

  return { updates, appends: Array.from(appends.values()) };
}

export interface CellWriteReport {
  applied: CellUpdate[];
  conflicts: SpreadsheetWriteConflictError[];
  appendedRows: number;
}

/**
 * Write the plan. A cell that changed since the snapshot aborts that write
 * only; the rest proceed.
 */
export async function applyCellUpdates(gateway: SpreadsheetGateway, plan: CellUpdatePlan): Promise<CellWriteReport> {
  const report: CellWriteReport = { applied: [], conflicts: [], appendedRows: 0 };

  for (const update of plan.updates) {
    try {
      await gateway.writeCell(update);
      report.applied.push(update);
      cellWritesCounter.inc({ outcome: 'written' });
    } catch (error) {
      if (!(error instanceof SpreadsheetWriteConflictError)) {
        throw error;
      }
      report.conflicts.push(error);
      cellWritesCounter.inc({ outcome: 'conflict' });
      logger.warn('Spreadsheet write aborted: cell changed since snapshot', {
        cell: error.cellKey,
        expected: error.expected,
        actual: error.actual,
      });
    }
  }

  if (plan.appends.length > 0) {
    await gateway.appendRows(plan.appends);
    report.appendedRows = plan.appends.length;
    cellWritesCounter.inc({ outcome: 'appended' }, plan.appends.length);
  }

  return report;
}
