/**
 * Review API
 *
 * Serves one project's review surface.
 */

import { config, logger } from '@ledgerline/shared';
import { createApp } from './app';

const projectDir = process.env.PROJECT_DIR || process.cwd();
const port = config.reviewApiPort;

const app = createApp({ projectDir });

// Start server
const server = app.listen(port, () => {
  logger.info('Review API started', { port, projectDir });
});

// Graceful shutdown
function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down`);
  server.close(() => {
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
