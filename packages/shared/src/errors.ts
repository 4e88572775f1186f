/**
 * Error Taxonomy
 *
 * Fatal errors abort a run; per-cell errors abort one spreadsheet write.
 * Document-level failures are never thrown out of a batch: they become a
 * DocumentStatus or a record flag.
 */

export type ErrorCode =
  | 'configuration_invalid'
  | 'state_corrupt'
  | 'spreadsheet_write_conflict'
  | 'scope_violation'
  | 'not_found'
  | 'invalid_request';

export class LedgerError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Invalid or missing project configuration. Fatal for the whole run.
 */
export class ConfigurationError extends LedgerError {
  readonly problems: string[];

  constructor(message: string, problems: string[] = []) {
    super('configuration_invalid', problems.length > 0 ? `${message}: ${problems.join('; ')}` : message);
    this.problems = problems;
  }
}

/**
 * A persisted state file exists but does not match its contract.
 */
export class StateCorruptionError extends LedgerError {
  readonly file: string;

  constructor(file: string, problems: string[]) {
    super('state_corrupt', `State file ${file} is invalid: ${problems.join('; ')}`);
    this.file = file;
  }
}

/**
 * A spreadsheet cell changed between snapshot and write.
 */
export class SpreadsheetWriteConflictError extends LedgerError {
  readonly cellKey: string;
  readonly expected: number | null;
  readonly actual: number | null;

  constructor(cellKey: string, expected: number | null, actual: number | null) {
    super(
      'spreadsheet_write_conflict',
      `Cell ${cellKey} changed since snapshot (expected ${String(expected)}, found ${String(actual)})`
    );
    this.cellKey = cellKey;
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * A batch-scoped store was asked to touch a provider outside its scope.
 */
export class ScopeViolationError extends LedgerError {
  constructor(providerIndex: number) {
    super('scope_violation', `Provider ${providerIndex} is outside the batch scope`);
  }
}

export class NotFoundError extends LedgerError {
  constructor(message: string) {
    super('not_found', message);
  }
}

export class InvalidRequestError extends LedgerError {
  constructor(message: string) {
    super('invalid_request', message);
  }
}

export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError;
}
