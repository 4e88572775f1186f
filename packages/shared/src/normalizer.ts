/**
 * Normalizer
 *
 * Converts raw extracted tokens into canonical values and builds the
 * ExtractedRecord for a document, including its identity key.
 */

import crypto from 'crypto';
import { competenceKey, isWithinRange } from './competence';
import type {
  CompetenceKey,
  DiscoveredDocument,
  DocumentKind,
  ExtractedRecord,
  ExtractionSource,
  FieldEvidence,
  FieldName,
  InvoiceFields,
  Layout,
  PayrollFields,
  ProjectConfig,
  Provider,
  RecordFlag,
  Rotation,
} from './types';
import type { RawExtraction } from './extractors/types';

// ============================================================================
// Token Parsing
// ============================================================================

/**
 * Parse a monetary token to integer cents.
 *
 * Brazilian notation: `.` groups thousands, `,` separates decimals
 * (`1.234,56` -> 123456). A lone `.` followed by exactly two digits and no
 * comma is read as a decimal point (`1234.56`), which is how OCR engines
 * sometimes transcribe amounts.
 */
export function parseMoneyToCents(raw: string | null | undefined): number | null {
  if (!raw) return null;
  let token = raw.replace(/R\$/gi, '').replace(/\s+/g, '');
  let negative = false;

  if (/^\(.*\)$/.test(token)) {
    negative = true;
    token = token.slice(1, -1);
  }
  if (token.startsWith('-')) {
    negative = true;
    token = token.slice(1);
  }

  let integerPart: string;
  let fractionPart: string;

  if (token.includes(',')) {
    const [intRaw, fracRaw, ...rest] = token.split(',');
    if (rest.length > 0) return null;
    integerPart = intRaw.replace(/\./g, '');
    fractionPart = fracRaw;
  } else if (/^\d+\.\d{2}$/.test(token)) {
    [integerPart, fractionPart] = token.split('.');
  } else {
    integerPart = token.replace(/\./g, '');
    fractionPart = '';
  }

  if (!/^\d+$/.test(integerPart) || !/^\d*$/.test(fractionPart)) return null;

  const padded = (fractionPart + '000').slice(0, 3);
  let cents = parseInt(integerPart, 10) * 100 + parseInt(padded.slice(0, 2), 10);
  if (parseInt(padded[2], 10) >= 5) cents += 1;

  return negative ? -cents : cents;
}

/**
 * Parse a percentage token (`5,00`, `5%`, `2.5`) to a number on the 0-100 scale.
 * Range is not enforced here: callers flag out-of-range values.
 */
export function parsePercentage(raw: string | null | undefined): number | null {
  if (!raw) return null;
  const token = raw.replace(/%/g, '').replace(/\s+/g, '');
  if (!/^-?\d+(?:[.,]\d+)?$/.test(token)) return null;
  const value = parseFloat(token.replace(',', '.'));
  return Math.round(value * 10000) / 10000;
}

export function isPercentageInRange(value: number): boolean {
  return value >= 0 && value <= 100;
}

export function parseWorkerCount(raw: string | null | undefined): number | null {
  if (!raw) return null;
  const token = raw.replace(/\s+/g, '');
  if (!/^\d+$/.test(token)) return null;
  return parseInt(token, 10);
}

/**
 * Normalize a document number to its significant digits.
 *
 * Drops a trailing single-character check-digit segment (`1234-5` -> `1234`),
 * formatting separators and leading zeros (`000.123` -> `123`).
 */
export function normalizeDocumentNumber(raw: string | null | undefined): string | null {
  if (!raw) return null;
  let token = raw.trim().replace(/\s+/g, '');
  token = token.replace(/-[0-9Xx]$/, '');
  token = token.replace(/[./-]/g, '');
  if (!/^[0-9A-Za-z]+$/.test(token)) return null;
  token = token.replace(/^0+/, '').toUpperCase();
  return token.length > 0 ? token : null;
}

// ============================================================================
// Identity
// ============================================================================

export function hashContent(content: Uint8Array | string): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}

export interface IdentityInput {
  provider: number;
  kind: DocumentKind;
  documentNumber: string | null;
  contentHash: string;
  competence: CompetenceKey;
}

/**
 * Deterministic identity key: `provider:kind:n<number>|h<hash>:YYYY-MM`.
 * The content hash stands in only when the document number is absent.
 */
export function computeIdentityKey(input: IdentityInput): string {
  const documentPart = input.documentNumber
    ? `n${input.documentNumber}`
    : `h${input.contentHash.slice(0, 16)}`;
  return `${input.provider}:${input.kind}:${documentPart}:${input.competence}`;
}

// ============================================================================
// Record Building
// ============================================================================

const REQUIRED_FIELDS: Record<DocumentKind, FieldName[]> = {
  invoice: ['document_number', 'competence', 'total_value'],
  'payroll-report': ['competence', 'worker_count'],
};

const EXPECTED_FIELDS: Record<DocumentKind, FieldName[]> = {
  invoice: ['document_number', 'competence', 'total_value', 'inss', 'iss', 'iss_rate'],
  'payroll-report': ['competence', 'worker_count'],
};

export function requiredFields(kind: DocumentKind, provider?: Provider): FieldName[] {
  const fields = REQUIRED_FIELDS[kind];
  if (kind === 'payroll-report' && provider?.overrides?.worker_count_optional) {
    return fields.filter((f) => f !== 'worker_count');
  }
  return fields;
}

export interface NormalizeInput {
  document: DiscoveredDocument;
  layout: Layout;
  source: ExtractionSource;
  confidence: number;
  rotation: Rotation;
  raw: RawExtraction;
  project: ProjectConfig;
  provider: Provider;
  minConfidence: number;
}

export interface NormalizationResult {
  /** Null when no competence could be determined: nothing can be keyed. */
  record: ExtractedRecord | null;
  competence: CompetenceKey | null;
  missing: FieldName[];
  flags: RecordFlag[];
  /** Fraction of expected fields present, 0-1. */
  completeness: number;
}

export function buildRecord(input: NormalizeInput): NormalizationResult {
  const { document, raw, provider } = input;
  const kind = document.kind;
  const flags: RecordFlag[] = [];
  const present = new Set<FieldName>();

  const competence = competenceKey(raw.fields.competence?.value) ?? document.path_competence;
  if (competence) present.add('competence');

  const documentNumber = normalizeDocumentNumber(raw.fields.document_number?.value);
  if (documentNumber) present.add('document_number');

  let invoiceFields: InvoiceFields | null = null;
  let payrollFields: PayrollFields | null = null;

  if (kind === 'invoice') {
    invoiceFields = {
      total_value_cents: parseMoneyToCents(raw.fields.total_value?.value),
      inss_cents: parseMoneyToCents(raw.fields.inss?.value),
      iss_cents: parseMoneyToCents(raw.fields.iss?.value),
      iss_rate: parsePercentage(raw.fields.iss_rate?.value),
    };
    if (invoiceFields.total_value_cents !== null) present.add('total_value');
    if (invoiceFields.inss_cents !== null) present.add('inss');
    if (invoiceFields.iss_cents !== null) present.add('iss');
    if (invoiceFields.iss_rate !== null) {
      present.add('iss_rate');
      if (!isPercentageInRange(invoiceFields.iss_rate)) {
        flags.push('rate-out-of-range');
      }
    }
  } else {
    payrollFields = { worker_count: parseWorkerCount(raw.fields.worker_count?.value) };
    if (payrollFields.worker_count !== null) {
      present.add('worker_count');
      if (payrollFields.worker_count === 0 && input.source === 'ocr') {
        flags.push('ocr-zero-suspicious');
      }
    }
  }

  const missing = requiredFields(kind, provider).filter((f) => !present.has(f));
  for (const field of missing) {
    flags.push(`field-missing:${field}`);
  }

  if (competence && !isWithinRange(competence, input.project.competence_range)) {
    flags.push('competence-out-of-range');
  }
  if (input.source === 'ocr' && input.confidence < input.minConfidence) {
    flags.push('ocr-low-confidence');
  }
  if (flags.length > 0) {
    flags.unshift('needs-manual-review');
  }

  const expected = EXPECTED_FIELDS[kind];
  const completeness = expected.filter((f) => present.has(f)).length / expected.length;

  if (!competence) {
    return { record: null, competence: null, missing, flags, completeness };
  }

  const identityKey = computeIdentityKey({
    provider: document.provider,
    kind,
    documentNumber,
    contentHash: document.content_hash,
    competence,
  });

  const evidence: FieldEvidence[] = [];
  for (const [field, value] of Object.entries(raw.fields)) {
    if (!value || !isFieldName(field) || !present.has(field)) continue;
    evidence.push({ field, page_number: value.pageNumber, quote: value.quote });
  }

  const base = {
    identity_key: identityKey,
    provider: document.provider,
    layout: input.layout,
    document_number: documentNumber,
    content_hash: document.content_hash,
    competence,
    source: input.source,
    confidence: input.confidence,
    rotation: input.rotation,
    flags,
    supersedes: normalizeDocumentNumber(raw.supersedes),
    path: document.path,
    evidence,
  };

  const record: ExtractedRecord =
    invoiceFields !== null
      ? { ...base, kind: 'invoice', fields: invoiceFields }
      : { ...base, kind: 'payroll-report', fields: payrollFields ?? { worker_count: null } };

  return { record, competence, missing, flags, completeness };
}

const FIELD_NAMES: readonly FieldName[] = [
  'document_number',
  'competence',
  'total_value',
  'inss',
  'iss',
  'iss_rate',
  'worker_count',
];

function isFieldName(value: string): value is FieldName {
  return FIELD_NAMES.some((f) => f === value);
}

/**
 * Normalized field equality: the basis of the no-op merge rule.
 */
export function recordsEquivalent(a: ExtractedRecord, b: ExtractedRecord): boolean {
  if (a.identity_key !== b.identity_key || a.supersedes !== b.supersedes) return false;
  if (a.kind === 'invoice' && b.kind === 'invoice') {
    return (
      a.fields.total_value_cents === b.fields.total_value_cents &&
      a.fields.inss_cents === b.fields.inss_cents &&
      a.fields.iss_cents === b.fields.iss_cents &&
      a.fields.iss_rate === b.fields.iss_rate
    );
  }
  if (a.kind === 'payroll-report' && b.kind === 'payroll-report') {
    return a.fields.worker_count === b.fields.worker_count;
  }
  return false;
}

/**
 * A record counts toward aggregates only when it is not flagged as a
 * suspicious OCR zero.
 */
export function isAggregatable(record: ExtractedRecord): boolean {
  return !record.flags.includes('ocr-zero-suspicious');
}
