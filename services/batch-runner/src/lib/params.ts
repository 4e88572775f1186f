/**
 * Invocation Parameters
 *
 * The surrounding orchestration invokes one run per process and passes
 * its parameters as environment variables.
 */

import path from 'path';
import { ConfigurationError, type InvocationParams, type RunMode } from '@ledgerline/shared';

export interface RunnerSettings {
  params: InvocationParams;
  /** JSON export of the control spreadsheet. */
  spreadsheetPath: string;
}

function parseFlag(name: string, raw: string | undefined, fallback: boolean, problems: string[]): boolean {
  if (raw === undefined || raw === '') return fallback;
  const value = raw.trim().toLowerCase();
  if (['1', 'true', 'yes'].includes(value)) return true;
  if (['0', 'false', 'no'].includes(value)) return false;
  problems.push(`${name} must be true or false`);
  return fallback;
}

function parseMode(raw: string | undefined, problems: string[]): RunMode {
  if (raw === undefined || raw === '' || raw === 'incremental') return 'incremental';
  if (raw === 'force') return 'force';
  problems.push('MODE must be incremental or force');
  return 'incremental';
}

export function parseRunnerSettings(env: NodeJS.ProcessEnv): RunnerSettings {
  const problems: string[] = [];

  const projectDir = env.PROJECT_DIR;
  if (!projectDir) {
    problems.push('PROJECT_DIR is required');
  }

  let providers: number[] | undefined;
  if (env.PROVIDERS) {
    providers = env.PROVIDERS.split(',').map((p) => parseInt(p.trim(), 10));
    if (providers.some((p) => !Number.isInteger(p) || p < 1)) {
      problems.push('PROVIDERS must be a comma-separated list of provider indexes');
    }
  }

  let batchSize: number | undefined;
  if (env.BATCH_SIZE) {
    batchSize = parseInt(env.BATCH_SIZE, 10);
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      problems.push('BATCH_SIZE must be a positive integer');
    }
  }

  const params: InvocationParams = {
    projectDir: path.resolve(projectDir || '.'),
    providers,
    batchSize,
    mode: parseMode(env.MODE, problems),
    ocrEnabled: parseFlag('OCR_ENABLED', env.OCR_ENABLED, false, problems),
    applySpreadsheetUpdates: parseFlag('APPLY_SPREADSHEET_UPDATES', env.APPLY_SPREADSHEET_UPDATES, false, problems),
  };

  if (problems.length > 0) {
    throw new ConfigurationError('Invalid invocation parameters', problems);
  }

  return {
    params,
    spreadsheetPath: path.resolve(params.projectDir, env.SPREADSHEET_PATH || 'spreadsheet.json'),
  };
}
