/**
 * Incremental Ledger Store
 *
 * Per-project ledger of extracted records keyed by document identity.
 * Every record ever merged is kept; its EntryState says whether it counts
 * toward aggregates (`active`, `manually-resolved`) or is history
 * (`superseded`) or awaits a decision (`conflicting`).
 */

import { ulid } from 'ulid';
import { recordsEquivalent } from '../normalizer';
import { NotFoundError, ScopeViolationError } from '../errors';
import { logger } from '../logger';
import type {
  CompetenceKey,
  DocumentKind,
  EntryState,
  EntryStatus,
  ExtractedRecord,
  InvoiceFields,
  LedgerEntry,
  PayrollFields,
  SupersedeReason,
  UpsertOutcome,
} from '../types';

export interface UpsertOptions {
  batchId: string;
  /**
   * Explicit supersede marker: the record replaces every live entry under
   * its key, whichever file they came from.
   */
  reprocess?: boolean;
}

export interface UpsertResult {
  outcome: UpsertOutcome;
  entry: LedgerEntry | null;
}

export interface LedgerQuery {
  provider?: number;
  competence?: CompetenceKey;
  kind?: DocumentKind;
  /** Defaults to the counting states. */
  states?: EntryStatus[];
}

const COUNTING_STATES: readonly EntryStatus[] = ['active', 'manually-resolved'];
const LIVE_STATES: readonly EntryStatus[] = ['active', 'manually-resolved', 'conflicting'];

export function isCounting(entry: LedgerEntry): boolean {
  return COUNTING_STATES.includes(entry.state.status);
}

export function isLive(entry: LedgerEntry): boolean {
  return LIVE_STATES.includes(entry.state.status);
}

/**
 * Entries shared between a store and its batch-scoped views.
 */
interface LedgerData {
  entries: LedgerEntry[];
  byKey: Map<string, LedgerEntry[]>;
}

export class LedgerStore {
  private readonly data: LedgerData;
  private readonly scope: ReadonlySet<number> | null;
  private readonly now: () => string;

  constructor(
    entries: LedgerEntry[] = [],
    options: { now?: () => string } = {},
    shared?: { data: LedgerData; scope: ReadonlySet<number> }
  ) {
    this.now = options.now ?? (() => new Date().toISOString());
    if (shared) {
      this.data = shared.data;
      this.scope = shared.scope;
      return;
    }
    this.scope = null;
    this.data = { entries: [], byKey: new Map() };
    for (const entry of entries) {
      this.index(entry);
    }
  }

  /**
   * A view that shares this store's entries but refuses writes for
   * providers outside `providers`.
   */
  batchScope(providers: number[]): LedgerStore {
    return new LedgerStore([], { now: this.now }, { data: this.data, scope: new Set(providers) });
  }

  inScope(provider: number): boolean {
    return this.scope === null || this.scope.has(provider);
  }

  /**
   * Merge a record under its identity key.
   *
   * - equal to a live entry under the key: no-op
   * - nothing live under the key: insert (already superseded when a live
   *   entry names this document as the one it replaces)
   * - differs, with a supersede marker: the live entries become history
   * - differs, without one: stored as `conflicting` for the resolver
   *
   * A re-extraction of the same source file is its own supersede marker,
   * including when it lands under a different identity key (a document
   * number read by OCR that the text layer lacked).
   */
  upsert(record: ExtractedRecord, options: UpsertOptions): UpsertResult {
    if (!this.inScope(record.provider)) {
      logger.warn('Upsert outside batch scope ignored', {
        identity_key: record.identity_key,
        provider: record.provider,
      });
      return { outcome: 'out-of-scope', entry: null };
    }

    const sameKey = this.data.byKey.get(record.identity_key) ?? [];
    const live = sameKey.filter(isLive);

    const equivalent =
      live.find((e) => recordsEquivalent(e.record, record)) ??
      (live.length === 0
        ? sameKey.find(
            (e) =>
              e.state.status === 'superseded' &&
              e.state.reason === 'document-reference' &&
              recordsEquivalent(e.record, record)
          )
        : undefined);
    const at = this.now();

    if (equivalent) {
      // Another file may already hold these values; this file's earlier
      // reads under other keys still retire.
      const retired = this.supersedeSameSource(record, equivalent, at);
      return { outcome: retired > 0 ? 'superseded' : 'unchanged', entry: equivalent };
    }

    if (live.length === 0) {
      const superseder = this.findSuperseder(record);
      const state: EntryState = superseder
        ? { status: 'superseded', by: superseder.entry_id, at, reason: 'document-reference' }
        : { status: 'active' };
      const entry = this.append(record, options.batchId, at, state);
      const replacedCount = this.supersedeSameSource(record, entry, at);
      this.applyDocumentReference(entry, at);
      return { outcome: replacedCount > 0 ? 'superseded' : 'inserted', entry };
    }

    const replaced = options.reprocess ? live : live.filter((e) => sameSource(e.record, record));
    const competing = live.filter((e) => !replaced.includes(e));

    if (competing.length === 0) {
      const entry = this.append(record, options.batchId, at, { status: 'active' });
      for (const old of replaced) {
        this.markSuperseded(old, entry.entry_id, at, 'reprocess');
      }
      this.supersedeSameSource(record, entry, at);
      this.applyDocumentReference(entry, at);
      return { outcome: 'superseded', entry };
    }

    const counted = competing.find(isCounting) ?? competing[0];
    const entry = this.append(record, options.batchId, at, { status: 'conflicting', with: counted.entry_id });
    for (const old of replaced) {
      this.markSuperseded(old, entry.entry_id, at, 'reprocess');
    }
    this.supersedeSameSource(record, entry, at);
    logger.warn('Merge conflict recorded', {
      identity_key: record.identity_key,
      entry_id: entry.entry_id,
      conflicts_with: counted.entry_id,
    });
    return { outcome: 'conflict', entry };
  }

  query(filter: LedgerQuery = {}): LedgerEntry[] {
    const states = filter.states ?? COUNTING_STATES;
    return this.data.entries.filter(
      (e) =>
        states.includes(e.state.status) &&
        (filter.provider === undefined || e.record.provider === filter.provider) &&
        (filter.competence === undefined || e.record.competence === filter.competence) &&
        (filter.kind === undefined || e.record.kind === filter.kind)
    );
  }

  /**
   * Every entry ever stored under an identity key, oldest first.
   */
  history(identityKey: string): LedgerEntry[] {
    return [...(this.data.byKey.get(identityKey) ?? [])];
  }

  getEntry(entryId: string): LedgerEntry | undefined {
    return this.data.entries.find((e) => e.entry_id === entryId);
  }

  entries(): LedgerEntry[] {
    return [...this.data.entries];
  }

  /**
   * Make `entryId` the value that counts: it becomes `manually-resolved` and
   * the other live entries it competes with become history. For payroll
   * reports every live entry of the same provider and competence competes;
   * for invoices only those under the same identity key.
   */
  acceptEntry(entryId: string, resolutionKey: string): LedgerEntry {
    const chosen = this.getEntry(entryId);
    if (!chosen) {
      throw new NotFoundError(`Ledger entry ${entryId} not found`);
    }
    this.assertWritable(chosen.record.provider);

    const at = this.now();
    const competitors = this.data.entries.filter(
      (e) =>
        e !== chosen &&
        isLive(e) &&
        (e.identity_key === chosen.identity_key ||
          (chosen.record.kind === 'payroll-report' &&
            e.record.kind === 'payroll-report' &&
            e.record.provider === chosen.record.provider &&
            e.record.competence === chosen.record.competence))
    );

    const alreadyAccepted =
      chosen.state.status === 'manually-resolved' && chosen.state.resolution === resolutionKey;
    if (alreadyAccepted && competitors.length === 0) {
      return chosen;
    }

    for (const other of competitors) {
      this.markSuperseded(other, chosen.entry_id, at, 'manual-resolution');
    }
    if (!alreadyAccepted) {
      chosen.state = { status: 'manually-resolved', resolution: resolutionKey, at };
    }

    logger.info('Ledger entry accepted', {
      entry_id: entryId,
      resolution: resolutionKey,
      superseded: competitors.map((e) => e.entry_id),
    });
    return chosen;
  }

  /**
   * Record a human correction of an entry's fields as a new
   * `manually-resolved` entry that supersedes the live ones under the key.
   */
  manualEdit(
    entryId: string,
    patch: Partial<InvoiceFields> | Partial<PayrollFields>,
    options: { batchId: string; resolutionKey: string }
  ): LedgerEntry {
    const base = this.getEntry(entryId);
    if (!base) {
      throw new NotFoundError(`Ledger entry ${entryId} not found`);
    }
    this.assertWritable(base.record.provider);

    const record: ExtractedRecord =
      base.record.kind === 'invoice'
        ? { ...base.record, fields: { ...base.record.fields, ...pickInvoiceFields(patch) } }
        : { ...base.record, fields: { ...base.record.fields, ...pickPayrollFields(patch) } };

    const at = this.now();
    const live = (this.data.byKey.get(base.identity_key) ?? []).filter(isLive);
    const entry = this.append(record, options.batchId, at, {
      status: 'manually-resolved',
      resolution: options.resolutionKey,
      at,
    });
    for (const old of live) {
      this.markSuperseded(old, entry.entry_id, at, 'manual-edit');
    }
    return entry;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private assertWritable(provider: number): void {
    if (!this.inScope(provider)) {
      throw new ScopeViolationError(provider);
    }
  }

  private index(entry: LedgerEntry): void {
    this.data.entries.push(entry);
    const list = this.data.byKey.get(entry.identity_key);
    if (list) {
      list.push(entry);
    } else {
      this.data.byKey.set(entry.identity_key, [entry]);
    }
  }

  private append(record: ExtractedRecord, batchId: string, at: string, state: EntryState): LedgerEntry {
    const entry: LedgerEntry = {
      entry_id: ulid(),
      identity_key: record.identity_key,
      record,
      batch_id: batchId,
      processed_at: at,
      state,
    };
    this.index(entry);
    return entry;
  }

  private markSuperseded(entry: LedgerEntry, by: string, at: string, reason: SupersedeReason): void {
    entry.state = { status: 'superseded', by, at, reason };
  }

  /**
   * Live entries under other identity keys that came from the same source
   * file as `record` become history of `replacement`.
   */
  private supersedeSameSource(record: ExtractedRecord, replacement: LedgerEntry, at: string): number {
    let replaced = 0;
    for (const other of this.data.entries) {
      if (
        other !== replacement &&
        isLive(other) &&
        other.identity_key !== record.identity_key &&
        sameSource(other.record, record)
      ) {
        this.markSuperseded(other, replacement.entry_id, at, 'reprocess');
        replaced++;
      }
    }
    return replaced;
  }

  /**
   * A live entry of the same provider and kind that names this record's
   * document number as the one it replaces.
   */
  private findSuperseder(record: ExtractedRecord): LedgerEntry | undefined {
    if (!record.document_number) return undefined;
    return this.data.entries.find(
      (e) =>
        isLive(e) &&
        e.identity_key !== record.identity_key &&
        e.record.provider === record.provider &&
        e.record.kind === record.kind &&
        e.record.supersedes === record.document_number
    );
  }

  /**
   * The new entry replaces the live entries whose document number it names.
   */
  private applyDocumentReference(entry: LedgerEntry, at: string): void {
    if (!isLive(entry)) return;
    const target = entry.record.supersedes;
    if (!target) return;

    for (const other of this.data.entries) {
      if (
        other !== entry &&
        isLive(other) &&
        other.identity_key !== entry.identity_key &&
        other.record.provider === entry.record.provider &&
        other.record.kind === entry.record.kind &&
        other.record.document_number === target
      ) {
        this.markSuperseded(other, entry.entry_id, at, 'document-reference');
        logger.info('Entry superseded by document reference', {
          superseded: other.entry_id,
          by: entry.entry_id,
          document_number: target,
        });
      }
    }
  }
}

/**
 * Two records read from the same physical document: same provider and kind,
 * and the same file path or the same file bytes.
 */
function sameSource(a: ExtractedRecord, b: ExtractedRecord): boolean {
  return (
    a.provider === b.provider &&
    a.kind === b.kind &&
    (a.path === b.path || a.content_hash === b.content_hash)
  );
}

function pickInvoiceFields(patch: Partial<InvoiceFields> | Partial<PayrollFields>): Partial<InvoiceFields> {
  const picked: Partial<InvoiceFields> = {};
  if ('total_value_cents' in patch) picked.total_value_cents = patch.total_value_cents;
  if ('inss_cents' in patch) picked.inss_cents = patch.inss_cents;
  if ('iss_cents' in patch) picked.iss_cents = patch.iss_cents;
  if ('iss_rate' in patch) picked.iss_rate = patch.iss_rate;
  return picked;
}

function pickPayrollFields(patch: Partial<InvoiceFields> | Partial<PayrollFields>): Partial<PayrollFields> {
  return 'worker_count' in patch ? { worker_count: patch.worker_count } : {};
}
