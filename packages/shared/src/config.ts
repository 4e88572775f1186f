/**
 * Centralized Configuration
 *
 * Engine-wide settings, tunable via environment variables. Per-project
 * settings live in ProjectConfig (see project-config.ts).
 */

export interface Config {
  // State store
  stateDirName: string;

  // Document processing
  workerConcurrency: number;
  minTextChars: number;

  // OCR
  ocrMaxPages: number;
  ocrMinConfidence: number;
  ocrMaxAttempts: number;
  ocrMaxPasses: number;
  ocrTimeoutMs: number;

  // Reconciliation
  moneyToleranceCents: number;
  workerTolerance: number;

  // LLM vision (OCR engine)
  ocrModel: string;
  llmRequestTimeoutMs: number;
  openaiApiKey: string;

  // HTTP
  reviewApiPort: number;
  metricsPort: number;
}

export const config: Config = {
  // State store
  stateDirName: process.env.STATE_DIR_NAME || '.ledger-state',

  // Document processing
  workerConcurrency: parseInt(process.env.WORKER_CONCURRENCY || '4', 10),
  minTextChars: parseInt(process.env.MIN_TEXT_CHARS || '50', 10),

  // OCR
  ocrMaxPages: parseInt(process.env.OCR_MAX_PAGES || '6', 10),
  ocrMinConfidence: parseFloat(process.env.OCR_MIN_CONFIDENCE || '0.6'),
  ocrMaxAttempts: parseInt(process.env.OCR_MAX_ATTEMPTS || '3', 10),
  ocrMaxPasses: parseInt(process.env.OCR_MAX_PASSES || '2', 10),
  ocrTimeoutMs: parseInt(process.env.OCR_TIMEOUT_MS || '120000', 10),

  // Reconciliation
  moneyToleranceCents: parseInt(process.env.MONEY_TOLERANCE_CENTS || '1', 10),
  workerTolerance: parseInt(process.env.WORKER_TOLERANCE || '0', 10),

  // LLM vision (OCR engine)
  ocrModel: process.env.LLM_MODEL_OCR || 'gpt-4o',
  llmRequestTimeoutMs: parseInt(process.env.LLM_REQUEST_TIMEOUT_MS || '90000', 10),
  openaiApiKey: process.env.OPENAI_API_KEY || '',

  // HTTP
  reviewApiPort: parseInt(process.env.PORT || '8081', 10),
  metricsPort: parseInt(process.env.METRICS_PORT || '0', 10),
};
