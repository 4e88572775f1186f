/**
 * Batch Runner
 *
 * Runs one bounded batch over one project and prints the BatchReport as
 * JSON on stdout. Document-level failures are part of the report; only
 * configuration and state errors fail the process.
 */

import type http from 'http';
import { config, isLedgerError, logger, runBatch, serveMetrics, type Collaborators } from '@ledgerline/shared';
import { FilesystemDocumentSource } from './lib/document-source';
import { VisionOcrEngine } from './lib/ocr';
import { parseRunnerSettings } from './lib/params';
import { PdfTextExtractor } from './lib/pdf';
import { JsonFileSpreadsheet } from './lib/spreadsheet';

const controller = new AbortController();
let metricsServer: http.Server | null = null;

async function main(): Promise<void> {
  const { params, spreadsheetPath } = parseRunnerSettings(process.env);

  if (config.metricsPort > 0) {
    metricsServer = serveMetrics(config.metricsPort);
  }

  const collaborators: Collaborators = {
    source: new FilesystemDocumentSource(params.projectDir),
    text: new PdfTextExtractor(),
    ocr: params.ocrEnabled && config.openaiApiKey ? new VisionOcrEngine() : undefined,
    spreadsheet: new JsonFileSpreadsheet(spreadsheetPath),
  };

  const report = await runBatch(params, collaborators, { signal: controller.signal });
  process.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
}

// Cooperative cancellation: documents in flight finish and are merged
function shutdown(signal: string): void {
  logger.info(`${signal} received, finishing in-flight documents`);
  controller.abort();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

main()
  .catch((error: unknown) => {
    logger.error('Batch run failed', error, isLedgerError(error) ? { code: error.code } : {});
    process.exitCode = 1;
  })
  .finally(() => {
    metricsServer?.close();
  });
