/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  withChildContext,
  asyncLocalStorage,
  type RunContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config } from './config';

// Errors
export {
  LedgerError,
  ConfigurationError,
  StateCorruptionError,
  SpreadsheetWriteConflictError,
  ScopeViolationError,
  NotFoundError,
  InvalidRequestError,
  isLedgerError,
  type ErrorCode,
} from './errors';

// Types
export * from './types';

// Metrics
export {
  register,
  batchDurationHistogram,
  documentsProcessedCounter,
  extractionDurationHistogram,
  ledgerUpsertsCounter,
  ocrAttemptsCounter,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  divergencesGauge,
  cellWritesCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export {
  validateProjectConfig,
  validateLedgerFile,
  validateDocumentIndexFile,
  validateResolutionsFile,
  validateDivergenceSnapshotFile,
  type ValidationResult,
} from './schemas';

// Project configuration
export {
  parseProjectConfig,
  loadProjectConfig,
  createProjectConfig,
  reconfigureProject,
  findProvider,
  type ProjectConfigPatch,
} from './project-config';

// Competence & normalization
export {
  parseCompetence,
  formatCompetence,
  competenceKey,
  isCompetenceKey,
  compareCompetence,
  isWithinRange,
  competenceFromPath,
} from './competence';
export {
  parseMoneyToCents,
  parsePercentage,
  parseWorkerCount,
  normalizeDocumentNumber,
  hashContent,
  computeIdentityKey,
  requiredFields,
  buildRecord,
  recordsEquivalent,
  isAggregatable,
  type NormalizeInput,
  type NormalizationResult,
} from './normalizer';

// Classification & extraction
export { classifyDocument, getClassificationRules, type ClassificationInput, type ClassificationResult } from './classifier';
export {
  type LayoutExtractor,
  type ExtractionContext,
  type RawExtraction,
  type RawField,
  BaseExtractor,
  getExtractorOrThrow,
  getRegisteredLayouts,
  normalizeTextOrientation,
  scanTenantWorkerCounts,
  selectWorkerCount,
} from './extractors';

// State store
export { LedgerStore, isCounting, isLive, type UpsertOptions, type UpsertResult, type LedgerQuery } from './state/ledger-store';
export { DocumentIndex, isOcrRetryable, type DocumentStatusPatch } from './state/document-index';
export {
  openProjectState,
  saveProjectState,
  saveDivergenceSnapshot,
  loadDivergenceSnapshot,
  type ProjectState,
} from './state/project-state';
export {
  STATE_FILES,
  stateDirFor,
  stateFilePath,
  readJsonFile,
  writeJsonAtomic,
  isMissingFileError,
} from './state/persistence';

// Reconciliation
export { aggregateLedger, divergenceKey, parseDivergenceKey, type LedgerAggregate } from './reconciliation/aggregate';
export {
  defaultTolerances,
  detectDivergences,
  reconcile,
  countByClassification,
  resolveDivergence,
  resolveAll,
  isResolutionEffective,
  spreadsheetTarget,
  planCellUpdates,
  applyCellUpdates,
  type Tolerances,
  type ResolverContext,
  type ResolutionRequest,
  type BulkFilter,
  type CellUpdatePlan,
  type CellWriteReport,
} from './reconciliation/divergence';
export { InMemorySpreadsheet, type SpreadsheetGateway } from './reconciliation/spreadsheet';
export { buildVerdict, type VerdictInput } from './reconciliation/reporter';

// Pipeline
export type {
  Collaborators,
  DocumentSource,
  OcrEngine,
  OcrRequest,
  OcrResult,
  TextExtractor,
  TextLayer,
} from './pipeline/collaborators';
export { mapWithConcurrency, withTimeout } from './pipeline/concurrency';
export { processDocument, type DocumentOutcome } from './pipeline/document-processor';
export {
  recognizeDocument,
  pickBestAttempt,
  isSufficient,
  drainOcrQueue,
  type OcrAttempt,
  type OcrRecognition,
} from './pipeline/ocr-orchestrator';
export { runBatch, selectProviders, type RunOptions } from './pipeline/engine';
