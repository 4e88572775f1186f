/**
 * Spreadsheet Collaborator
 *
 * The authoritative spreadsheet is owned by a human; the engine reads a
 * snapshot and writes back through compare-and-set cell updates and
 * row appends.
 */

import { SpreadsheetWriteConflictError } from '../errors';
import { RECONCILED_FIELDS } from '../types';
import type {
  CellUpdate,
  CompetenceKey,
  ReconciledField,
  SpreadsheetCell,
  SpreadsheetRow,
  SpreadsheetSnapshot,
} from '../types';
import { divergenceKey } from './aggregate';

export interface SpreadsheetGateway {
  readSnapshot(): Promise<SpreadsheetSnapshot>;
  /**
   * Write one cell if it still holds `update.expected`; otherwise reject
   * with SpreadsheetWriteConflictError and leave it untouched.
   */
  writeCell(update: CellUpdate): Promise<void>;
  /** Add rows without rewriting existing cells. */
  appendRows(rows: SpreadsheetRow[]): Promise<void>;
}

/**
 * Spreadsheet held in memory. Used as the working copy of file-backed
 * gateways and in tests.
 */
export class InMemorySpreadsheet implements SpreadsheetGateway {
  private readonly byKey = new Map<string, SpreadsheetCell>();
  private readonly now: () => string;

  constructor(cells: SpreadsheetCell[] = [], options: { now?: () => string } = {}) {
    this.now = options.now ?? (() => new Date().toISOString());
    for (const cell of cells) {
      this.byKey.set(divergenceKey(cell.provider, cell.competence, cell.field), { ...cell });
    }
  }

  async readSnapshot(): Promise<SpreadsheetSnapshot> {
    return { cells: this.cells(), taken_at: this.now() };
  }

  async writeCell(update: CellUpdate): Promise<void> {
    const key = divergenceKey(update.provider, update.competence, update.field);
    const current = this.byKey.get(key)?.value ?? null;
    if (current !== update.expected) {
      throw new SpreadsheetWriteConflictError(key, update.expected, current);
    }
    this.byKey.set(key, {
      provider: update.provider,
      competence: update.competence,
      field: update.field,
      value: update.value,
    });
  }

  async appendRows(rows: SpreadsheetRow[]): Promise<void> {
    for (const row of rows) {
      for (const field of RECONCILED_FIELDS) {
        const key = divergenceKey(row.provider, row.competence, field);
        if (this.byKey.has(key)) continue;
        this.byKey.set(key, {
          provider: row.provider,
          competence: row.competence,
          field,
          value: row.values[field] ?? null,
        });
      }
    }
  }

  /** A human edit. */
  setCell(provider: number, competence: CompetenceKey, field: ReconciledField, value: number | null): void {
    this.byKey.set(divergenceKey(provider, competence, field), { provider, competence, field, value });
  }

  getCell(provider: number, competence: CompetenceKey, field: ReconciledField): number | null {
    return this.byKey.get(divergenceKey(provider, competence, field))?.value ?? null;
  }

  cells(): SpreadsheetCell[] {
    return Array.from(this.byKey.values())
      .map((cell) => ({ ...cell }))
      .sort(
        (a, b) =>
          a.provider - b.provider ||
          a.competence.localeCompare(b.competence) ||
          RECONCILED_FIELDS.indexOf(a.field) - RECONCILED_FIELDS.indexOf(b.field)
      );
  }
}
