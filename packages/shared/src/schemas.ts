/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for the project configuration and the
 * persisted state files.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import type { SchemaObject, ValidateFunction } from 'ajv';
import { logger } from './logger';
import type {
  DivergenceSnapshotFile,
  DocumentIndexFile,
  LedgerFile,
  ProjectConfig,
  ResolutionsFile,
} from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
  useDefaults: true,
});
addFormats(ajv);

function loadSchema(schemaName: string): SchemaObject {
  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Relative to shared package in development
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to shared package dist
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  const schemaPath = possiblePaths.find((p) => fs.existsSync(p));
  if (!schemaPath) {
    throw new Error(`Schema file not found: ${schemaName}`);
  }
  return JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
}

// Validators - compiled lazily on first use
let projectConfigValidator: ValidateFunction<ProjectConfig> | null = null;
let ledgerValidator: ValidateFunction<LedgerFile> | null = null;
let documentIndexValidator: ValidateFunction<DocumentIndexFile> | null = null;
let resolutionsValidator: ValidateFunction<ResolutionsFile> | null = null;
let divergenceSnapshotValidator: ValidateFunction<DivergenceSnapshotFile> | null = null;

export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; errors: string[] };

function run<T>(validate: ValidateFunction<T>, data: unknown, label: string): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, value: data };
  }
  const errors = (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`);
  logger.warn(`${label} validation failed`, { errors });
  return { valid: false, errors };
}

/**
 * Validate a ProjectConfig against project_config.schema.json.
 * Fills schema defaults in place.
 */
export function validateProjectConfig(data: unknown): ValidationResult<ProjectConfig> {
  if (!projectConfigValidator) {
    projectConfigValidator = ajv.compile<ProjectConfig>(loadSchema('project_config.schema.json'));
  }
  return run(projectConfigValidator, data, 'ProjectConfig');
}

export function validateLedgerFile(data: unknown): ValidationResult<LedgerFile> {
  if (!ledgerValidator) {
    ledgerValidator = ajv.compile<LedgerFile>(loadSchema('ledger_state.schema.json'));
  }
  return run(ledgerValidator, data, 'Ledger state');
}

export function validateDocumentIndexFile(data: unknown): ValidationResult<DocumentIndexFile> {
  if (!documentIndexValidator) {
    documentIndexValidator = ajv.compile<DocumentIndexFile>(loadSchema('document_index.schema.json'));
  }
  return run(documentIndexValidator, data, 'Document index');
}

function getResolutionsValidator(): ValidateFunction<ResolutionsFile> {
  if (!resolutionsValidator) {
    resolutionsValidator = ajv.compile<ResolutionsFile>(loadSchema('resolutions.schema.json'));
  }
  return resolutionsValidator;
}

export function validateResolutionsFile(data: unknown): ValidationResult<ResolutionsFile> {
  return run(getResolutionsValidator(), data, 'Resolutions');
}

export function validateDivergenceSnapshotFile(data: unknown): ValidationResult<DivergenceSnapshotFile> {
  if (!divergenceSnapshotValidator) {
    // Divergences embed resolutions: their schema must be registered first
    getResolutionsValidator();
    divergenceSnapshotValidator = ajv.compile<DivergenceSnapshotFile>(
      loadSchema('divergence_snapshot.schema.json')
    );
  }
  return run(divergenceSnapshotValidator, data, 'Divergence snapshot');
}
