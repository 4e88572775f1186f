/**
 * Prometheus Metrics
 *
 * Metrics for monitoring batch runs, OCR fallback, reconciliation and the
 * review API.
 */

import http from 'node:http';
import * as promClient from 'prom-client';
import { logger } from './logger';

// Create a Registry for metrics
export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on Alpine/restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: err instanceof Error ? err.message : String(err),
  });
}

// ============================================================================
// Batch Metrics
// ============================================================================

export const batchDurationHistogram = new promClient.Histogram({
  name: 'ledgerline_batch_duration_seconds',
  help: 'Duration of one batch run in seconds',
  labelNames: ['mode', 'status'],
  buckets: [1, 5, 10, 30, 60, 120, 300, 600, 1800],
  registers: [register],
});

export const documentsProcessedCounter = new promClient.Counter({
  name: 'ledgerline_documents_processed_total',
  help: 'Total number of documents processed, by resulting status',
  labelNames: ['kind', 'layout', 'status'],
  registers: [register],
});

export const extractionDurationHistogram = new promClient.Histogram({
  name: 'ledgerline_extraction_duration_seconds',
  help: 'Duration of text extraction, classification and field extraction per document',
  labelNames: ['source'],
  buckets: [0.05, 0.1, 0.5, 1, 2, 5, 10, 30],
  registers: [register],
});

export const ledgerUpsertsCounter = new promClient.Counter({
  name: 'ledgerline_ledger_upserts_total',
  help: 'Ledger merges by outcome',
  labelNames: ['outcome'],
  registers: [register],
});

// ============================================================================
// OCR Metrics
// ============================================================================

export const ocrAttemptsCounter = new promClient.Counter({
  name: 'ledgerline_ocr_attempts_total',
  help: 'OCR recognition attempts by rotation and outcome',
  labelNames: ['rotation', 'outcome'],
  registers: [register],
});

export const llmRequestsCounter = new promClient.Counter({
  name: 'ledgerline_llm_requests_total',
  help: 'Total number of LLM vision requests',
  labelNames: ['model', 'status'],
  registers: [register],
});

export const llmRequestDurationHistogram = new promClient.Histogram({
  name: 'ledgerline_llm_request_duration_seconds',
  help: 'Duration of LLM vision requests',
  labelNames: ['model'],
  buckets: [1, 2, 5, 10, 20, 30, 60, 120],
  registers: [register],
});

// ============================================================================
// Reconciliation Metrics
// ============================================================================

export const divergencesGauge = new promClient.Gauge({
  name: 'ledgerline_divergences',
  help: 'Divergences of the last reconciliation by classification',
  labelNames: ['classification'],
  registers: [register],
});

export const cellWritesCounter = new promClient.Counter({
  name: 'ledgerline_spreadsheet_cell_writes_total',
  help: 'Spreadsheet cell writes by outcome',
  labelNames: ['outcome'],
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'ledgerline_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'ledgerline_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

/**
 * Get Prometheus metrics endpoint handler
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}

/**
 * Start a minimal HTTP server for /metrics (for the batch runner).
 * Uses Node built-in http - no express required.
 */
export function serveMetrics(port: number): http.Server {
  const server = http.createServer((req, res) => {
    if (req.url === '/metrics' && req.method === 'GET') {
      getMetrics()
        .then((body) => {
          res.setHeader('Content-Type', getMetricsContentType());
          res.end(body);
        })
        .catch((err: unknown) => {
          logger.error('Metrics rendering failed', err);
          res.statusCode = 500;
          res.end();
        });
    } else {
      res.statusCode = 404;
      res.end();
    }
  });
  server.listen(port, () => {
    logger.info('Metrics server listening', { port });
  });
  return server;
}
