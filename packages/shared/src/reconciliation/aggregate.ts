/**
 * Ledger Aggregation
 *
 * Reduces the ledger to one value per provider x competence x field: the
 * worker count of the month's payroll reports and the sums of the month's
 * invoices.
 */

import { isWithinRange } from '../competence';
import { isAggregatable } from '../normalizer';
import { isCounting, type LedgerStore } from '../state/ledger-store';
import type {
  AggregateCandidate,
  CompetenceKey,
  LedgerEntry,
  ProjectConfig,
  ReconciledField,
} from '../types';

export interface LedgerAggregate {
  key: string;
  provider: number;
  competence: CompetenceKey;
  field: ReconciledField;
  /** Null when nothing was extracted or the candidates disagree. */
  value: number | null;
  /**
   * Set when the value cannot be decided without a human: conflicting
   * entries under one identity key, or payroll reports that disagree.
   */
  ambiguous: boolean;
  candidates: AggregateCandidate[];
}

const FIELD_BY_NAME: Record<string, ReconciledField> = {
  workers: 'workers',
  'invoice-total': 'invoice-total',
  inss: 'inss',
  iss: 'iss',
};

export function divergenceKey(provider: number, competence: CompetenceKey, field: ReconciledField): string {
  return `${provider}|${competence}|${field}`;
}

export function parseDivergenceKey(
  key: string
): { provider: number; competence: CompetenceKey; field: ReconciledField } | null {
  const match = key.match(/^(\d+)\|(\d{4}-\d{2})\|(workers|invoice-total|inss|iss)$/);
  if (!match) return null;
  const field = FIELD_BY_NAME[match[3]];
  if (!field) return null;
  return { provider: parseInt(match[1], 10), competence: match[2], field };
}

const INVOICE_FIELDS: ReadonlyArray<ReconciledField> = ['invoice-total', 'inss', 'iss'];

function fieldValue(entry: LedgerEntry, field: ReconciledField): number | null {
  const record = entry.record;
  if (record.kind === 'payroll-report') {
    return field === 'workers' ? record.fields.worker_count : null;
  }
  switch (field) {
    case 'invoice-total':
      return record.fields.total_value_cents;
    case 'inss':
      return record.fields.inss_cents;
    case 'iss':
      return record.fields.iss_cents;
    default:
      return null;
  }
}

function toCandidate(entry: LedgerEntry, value: number): AggregateCandidate {
  return {
    entry_id: entry.entry_id,
    value,
    path: entry.record.path,
    document_number: entry.record.document_number,
  };
}

function candidatesOf(entries: LedgerEntry[], field: ReconciledField): AggregateCandidate[] {
  const candidates: AggregateCandidate[] = [];
  for (const entry of entries) {
    const value = fieldValue(entry, field);
    if (value !== null) candidates.push(toCandidate(entry, value));
  }
  return candidates;
}

/**
 * Payroll: every counted report of the month must agree on the worker count.
 */
function aggregateWorkers(entries: LedgerEntry[]): Pick<LedgerAggregate, 'value' | 'ambiguous' | 'candidates'> {
  const candidates = candidatesOf(entries, 'workers');
  if (candidates.length === 0) {
    return { value: null, ambiguous: false, candidates };
  }
  const distinct = new Set(candidates.map((c) => c.value));
  if (distinct.size > 1 || entries.some((e) => e.state.status === 'conflicting')) {
    return { value: null, ambiguous: true, candidates };
  }
  return { value: candidates[0].value, ambiguous: false, candidates };
}

/**
 * Invoices: the month's counted invoices add up, unless one of them has a
 * pending merge conflict.
 */
function aggregateInvoiceField(
  entries: LedgerEntry[],
  field: ReconciledField
): Pick<LedgerAggregate, 'value' | 'ambiguous' | 'candidates'> {
  const candidates = candidatesOf(entries, field);
  if (candidates.length > 0 && entries.some((e) => e.state.status === 'conflicting')) {
    return { value: null, ambiguous: true, candidates };
  }

  const counted = entries.filter(isCounting);
  const values = counted.map((e) => fieldValue(e, field)).filter((v): v is number => v !== null);
  if (values.length === 0) {
    return { value: null, ambiguous: false, candidates };
  }
  return { value: values.reduce((sum, v) => sum + v, 0), ambiguous: false, candidates };
}

/**
 * Aggregate the live ledger entries of the project's providers within the
 * covered competence range. Entries flagged as suspicious OCR zeros do not
 * count.
 */
export function aggregateLedger(store: LedgerStore, project: ProjectConfig): Map<string, LedgerAggregate> {
  const providers = new Set(project.providers.map((p) => p.index));
  const live = store
    .query({ states: ['active', 'manually-resolved', 'conflicting'] })
    .filter(
      (e) =>
        providers.has(e.record.provider) &&
        isWithinRange(e.record.competence, project.competence_range) &&
        isAggregatable(e.record)
    );

  const groups = new Map<string, LedgerEntry[]>();
  for (const entry of live) {
    const groupKey = `${entry.record.provider}|${entry.record.competence}|${entry.record.kind}`;
    const group = groups.get(groupKey);
    if (group) {
      group.push(entry);
    } else {
      groups.set(groupKey, [entry]);
    }
  }

  const aggregates = new Map<string, LedgerAggregate>();
  for (const entries of groups.values()) {
    const { provider, competence, kind } = entries[0].record;
    const fields: ReadonlyArray<ReconciledField> = kind === 'payroll-report' ? ['workers'] : INVOICE_FIELDS;

    for (const field of fields) {
      const result = kind === 'payroll-report' ? aggregateWorkers(entries) : aggregateInvoiceField(entries, field);
      if (result.value === null && !result.ambiguous && result.candidates.length === 0) continue;
      const key = divergenceKey(provider, competence, field);
      aggregates.set(key, { key, provider, competence, field, ...result });
    }
  }

  return aggregates;
}
