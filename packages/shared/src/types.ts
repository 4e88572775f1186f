/**
 * Shared TypeScript Types
 *
 * Types for the fiscal document ledger, matching JSON schemas in docs/contracts/
 */

// ============================================================================
// Document Classification
// ============================================================================

export type DocumentKind = 'invoice' | 'payroll-report';

export type InvoiceLayout =
  | 'standard-invoice'
  | 'inline-legacy-invoice'
  | 'security-service-invoice';

export type PayrollLayout =
  | 'classic-payroll-summary'
  | 'fgts-guide-detail'
  | 'fgts-digital-guide';

export type Layout = InvoiceLayout | PayrollLayout;

export type ClassificationOutcome = Layout | 'ocr-required' | 'unrecognized' | 'filtered-out';

export const INVOICE_LAYOUTS: readonly InvoiceLayout[] = [
  'standard-invoice',
  'inline-legacy-invoice',
  'security-service-invoice',
];

export const PAYROLL_LAYOUTS: readonly PayrollLayout[] = [
  'classic-payroll-summary',
  'fgts-guide-detail',
  'fgts-digital-guide',
];

export function isInvoiceLayout(layout: Layout): layout is InvoiceLayout {
  return INVOICE_LAYOUTS.some((l) => l === layout);
}

export function layoutKind(layout: Layout): DocumentKind {
  return isInvoiceLayout(layout) ? 'invoice' : 'payroll-report';
}

export type Rotation = 0 | 180;

export type ExtractionSource = 'text' | 'ocr';

/** Canonical competence key, `YYYY-MM`. */
export type CompetenceKey = string;

export interface CompetencePeriod {
  year: number;
  month: number;
}

export type ServiceCategory = 'construction' | 'security';

// ============================================================================
// Project Configuration
// ============================================================================

export type InvoiceFieldName = 'total_value' | 'inss' | 'iss' | 'iss_rate';

export type FieldName = 'document_number' | 'competence' | InvoiceFieldName | 'worker_count';

export interface ProviderOverrides {
  /** Raw tokens used instead of extracting the field, e.g. `{ inss: '0,00' }`. */
  fixed_fields?: Partial<Record<InvoiceFieldName, string>>;
  worker_count_optional?: boolean;
  service_category?: ServiceCategory;
}

export interface Provider {
  index: number;
  name: string;
  folder: string;
  document_kinds: DocumentKind[];
  overrides?: ProviderOverrides;
}

export interface ProjectConfig {
  schema_version: '1.0';
  /** 12-digit CNO registration number, digits only. */
  registration_number: string;
  project_name: string;
  providers: Provider[];
  competence_range: {
    start: CompetenceKey;
    end: CompetenceKey;
  };
  subfolders: Record<DocumentKind, string[]>;
  zero_cells_are_empty: boolean;
}

// ============================================================================
// Documents
// ============================================================================

export interface PageText {
  pageNumber: number;
  text: string;
}

export interface DiscoveredDocument {
  provider: number;
  kind: DocumentKind;
  path: string;
  filename: string;
  content_hash: string;
  /** Competence derived from folder names or the filename. */
  path_competence: CompetenceKey | null;
}

export type DocumentState =
  | 'queued'
  | 'extracted'
  | 'pending-ocr'
  | 'ocr-exhausted'
  | 'needs-manual-review'
  | 'classification-failed'
  | 'filtered-out'
  | 'reviewed';

export interface DocumentStatus {
  path: string;
  provider: number;
  kind: DocumentKind;
  content_hash: string;
  status: DocumentState;
  layout: Layout | null;
  identity_key: string | null;
  competence: CompetenceKey | null;
  ocr_attempts: number;
  best_completeness: number;
  last_batch_id: string;
  updated_at: string;
  reason: string | null;
}

// ============================================================================
// Extracted Records
// ============================================================================

export type RecordFlag =
  | 'needs-manual-review'
  | 'rate-out-of-range'
  | 'competence-out-of-range'
  | 'ocr-zero-suspicious'
  | 'ocr-low-confidence'
  | `field-missing:${FieldName}`;

export interface FieldEvidence {
  field: FieldName;
  page_number: number;
  quote: string;
}

export interface InvoiceFields {
  total_value_cents: number | null;
  inss_cents: number | null;
  iss_cents: number | null;
  /** Percentage 0-100. */
  iss_rate: number | null;
}

export interface PayrollFields {
  worker_count: number | null;
}

interface RecordBase {
  identity_key: string;
  provider: number;
  layout: Layout;
  document_number: string | null;
  content_hash: string;
  competence: CompetenceKey;
  source: ExtractionSource;
  confidence: number;
  rotation: Rotation;
  flags: RecordFlag[];
  /** Document number of an earlier document this one replaces. */
  supersedes: string | null;
  path: string;
  evidence: FieldEvidence[];
}

export interface InvoiceRecord extends RecordBase {
  kind: 'invoice';
  fields: InvoiceFields;
}

export interface PayrollRecord extends RecordBase {
  kind: 'payroll-report';
  fields: PayrollFields;
}

export type ExtractedRecord = InvoiceRecord | PayrollRecord;

// ============================================================================
// Ledger
// ============================================================================

export type SupersedeReason = 'reprocess' | 'document-reference' | 'manual-resolution' | 'manual-edit';

export type EntryState =
  | { status: 'active' }
  | { status: 'superseded'; by: string; at: string; reason: SupersedeReason }
  | { status: 'manually-resolved'; resolution: string; at: string }
  | { status: 'conflicting'; with: string };

export type EntryStatus = EntryState['status'];

export interface LedgerEntry {
  entry_id: string;
  identity_key: string;
  record: ExtractedRecord;
  batch_id: string;
  processed_at: string;
  state: EntryState;
}

export type UpsertOutcome = 'inserted' | 'unchanged' | 'superseded' | 'conflict' | 'out-of-scope';

// ============================================================================
// Spreadsheet & Divergences
// ============================================================================

export type ReconciledField = 'workers' | 'invoice-total' | 'inss' | 'iss';

export const RECONCILED_FIELDS: readonly ReconciledField[] = ['workers', 'invoice-total', 'inss', 'iss'];

export interface SpreadsheetCell {
  provider: number;
  competence: CompetenceKey;
  field: ReconciledField;
  /** Worker count, or cents for money fields. */
  value: number | null;
}

export interface SpreadsheetSnapshot {
  cells: SpreadsheetCell[];
  taken_at: string;
}

/** A new spreadsheet row for a provider x competence the sheet lacks. */
export interface SpreadsheetRow {
  provider: number;
  competence: CompetenceKey;
  values: Partial<Record<ReconciledField, number>>;
}

export interface CellUpdate {
  provider: number;
  competence: CompetenceKey;
  field: ReconciledField;
  /** Snapshot value the write is conditioned on. */
  expected: number | null;
  value: number;
  divergence_key: string;
}

export type DivergenceClassification =
  | 'matched'
  | 'missing-in-extraction'
  | 'missing-in-spreadsheet'
  | 'value-mismatch';

export interface AggregateCandidate {
  entry_id: string;
  value: number;
  path: string;
  document_number: string | null;
}

export type ResolutionPolicy = 'keep-spreadsheet' | 'accept-extracted' | 'accept-document';

export interface Resolution {
  key: string;
  policy: ResolutionPolicy;
  spreadsheet_value: number | null;
  extracted_value: number | null;
  chosen_entry_id: string | null;
  resolved_value: number | null;
  resolved_at: string;
}

export interface Divergence {
  key: string;
  provider: number;
  competence: CompetenceKey;
  field: ReconciledField;
  classification: DivergenceClassification;
  spreadsheet_value: number | null;
  /** Null when the candidates disagree or nothing was extracted. */
  extracted_value: number | null;
  candidates: AggregateCandidate[];
  resolution: Resolution | null;
}

// ============================================================================
// Verdict & Runs
// ============================================================================

export type ActionStage =
  | 'extract'
  | 'ocr'
  | 'manual-review'
  | 'resolve-divergences'
  | 'update-spreadsheet';

export interface ActionStep {
  stage: ActionStage;
  providers: number[];
  competences: CompetenceKey[];
  count: number;
}

export type Verdict =
  | { status: 'up-to-date' }
  | { status: 'action-needed'; steps: ActionStep[] };

export type RunMode = 'incremental' | 'force';

export interface InvocationParams {
  projectDir: string;
  /** Provider subset; all providers of the roster when absent. */
  providers?: number[];
  /** Maximum number of documents extracted in this run. */
  batchSize?: number;
  mode: RunMode;
  ocrEnabled: boolean;
  /** Write missing and accepted values back to the spreadsheet. */
  applySpreadsheetUpdates?: boolean;
}

export interface BatchReport {
  batch_id: string;
  project_name: string;
  mode: RunMode;
  processed: number;
  skipped: number;
  deferred: number;
  upserts: Record<UpsertOutcome, number>;
  ocr: {
    attempted: number;
    recovered: number;
    exhausted: number;
  };
  divergences: Record<DivergenceClassification, number>;
  cell_updates_applied: number;
  cell_conflicts: number;
  cancelled: boolean;
  verdict: Verdict;
}

// ============================================================================
// Persisted State
// ============================================================================

export interface LedgerFile {
  schema_version: '1.0';
  entries: LedgerEntry[];
}

export interface DocumentIndexFile {
  schema_version: '1.0';
  documents: DocumentStatus[];
}

export interface ResolutionsFile {
  schema_version: '1.0';
  resolutions: Resolution[];
}

export interface DivergenceSnapshotFile {
  schema_version: '1.0';
  generated_at: string;
  batch_id: string;
  divergences: Divergence[];
}

// ============================================================================
// API Types
// ============================================================================

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
