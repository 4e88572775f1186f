/**
 * State File Persistence
 *
 * JSON files under `<project>/<stateDir>/`, written atomically (temp file
 * then rename) and schema-validated on load.
 */

import fs from 'fs/promises';
import path from 'path';
import { ulid } from 'ulid';
import { config } from '../config';
import { StateCorruptionError } from '../errors';
import { logger } from '../logger';
import type { ValidationResult } from '../schemas';

export const STATE_FILES = {
  project: 'project.json',
  ledger: 'ledger.json',
  documents: 'documents.json',
  resolutions: 'resolutions.json',
  divergences: 'divergences.json',
} as const;

export type StateFileName = (typeof STATE_FILES)[keyof typeof STATE_FILES];

export function stateDirFor(projectDir: string): string {
  return path.join(projectDir, config.stateDirName);
}

export function stateFilePath(projectDir: string, file: StateFileName): string {
  return path.join(stateDirFor(projectDir), file);
}

/**
 * fs errors raised from another realm (a test VM context) fail
 * `instanceof Error`, so only the shape is checked.
 */
export function isMissingFileError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read and parse a JSON file. Returns null when the file does not exist.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) return null;
    throw error;
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    throw new StateCorruptionError(path.basename(filePath), [
      error instanceof Error ? error.message : String(error),
    ]);
  }
}

/**
 * Load a state file through its validator. A missing file yields `fallback`;
 * a file that fails validation is fatal.
 */
export async function loadStateFile<T>(
  filePath: string,
  validate: (data: unknown) => ValidationResult<T>,
  fallback: () => T
): Promise<T> {
  const data = await readJsonFile(filePath);
  if (data === null) {
    return fallback();
  }
  const result = validate(data);
  if (!result.valid) {
    throw new StateCorruptionError(path.basename(filePath), result.errors);
  }
  return result.value;
}

/**
 * Write JSON so that readers only ever see the previous or the new
 * content: write to a sibling temp file, then rename over the target.
 */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${ulid()}.tmp`;
  try {
    await fs.writeFile(tmpPath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true });
    throw error;
  }
  logger.debug('State file written', { file: path.basename(filePath) });
}
