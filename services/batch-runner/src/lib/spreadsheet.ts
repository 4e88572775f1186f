/**
 * JSON Spreadsheet Gateway
 *
 * Spreadsheet collaborator over a JSON export of the control sheet
 * (`{ "cells": [{ provider, competence, field, value }] }`). Every
 * operation re-reads the file, so compare-and-set sees edits made after
 * the snapshot.
 */

import {
  InMemorySpreadsheet,
  RECONCILED_FIELDS,
  isCompetenceKey,
  readJsonFile,
  writeJsonAtomic,
  StateCorruptionError,
  type CellUpdate,
  type ReconciledField,
  type SpreadsheetCell,
  type SpreadsheetGateway,
  type SpreadsheetRow,
  type SpreadsheetSnapshot,
} from '@ledgerline/shared';

function isReconciledField(value: unknown): value is ReconciledField {
  return RECONCILED_FIELDS.some((f) => f === value);
}

function isSpreadsheetCell(value: unknown): value is SpreadsheetCell {
  return (
    typeof value === 'object' &&
    value !== null &&
    'provider' in value &&
    typeof value.provider === 'number' &&
    'competence' in value &&
    typeof value.competence === 'string' &&
    isCompetenceKey(value.competence) &&
    'field' in value &&
    isReconciledField(value.field) &&
    'value' in value &&
    (value.value === null || typeof value.value === 'number')
  );
}

export function parseSpreadsheetFile(filePath: string, data: unknown): SpreadsheetCell[] {
  if (data === null) return [];
  if (typeof data !== 'object' || !('cells' in data) || !Array.isArray(data.cells)) {
    throw new StateCorruptionError(filePath, ['expected an object with a "cells" array']);
  }
  const problems: string[] = [];
  const cells: SpreadsheetCell[] = [];
  data.cells.forEach((cell: unknown, i: number) => {
    if (isSpreadsheetCell(cell)) {
      cells.push(cell);
    } else {
      problems.push(`/cells/${i} is not a valid cell`);
    }
  });
  if (problems.length > 0) {
    throw new StateCorruptionError(filePath, problems);
  }
  return cells;
}

export class JsonFileSpreadsheet implements SpreadsheetGateway {
  constructor(private readonly filePath: string) {}

  private async load(): Promise<InMemorySpreadsheet> {
    return new InMemorySpreadsheet(parseSpreadsheetFile(this.filePath, await readJsonFile(this.filePath)));
  }

  private async save(sheet: InMemorySpreadsheet): Promise<void> {
    await writeJsonAtomic(this.filePath, { cells: sheet.cells() });
  }

  async readSnapshot(): Promise<SpreadsheetSnapshot> {
    return (await this.load()).readSnapshot();
  }

  async writeCell(update: CellUpdate): Promise<void> {
    const sheet = await this.load();
    await sheet.writeCell(update);
    await this.save(sheet);
  }

  async appendRows(rows: SpreadsheetRow[]): Promise<void> {
    const sheet = await this.load();
    await sheet.appendRows(rows);
    await this.save(sheet);
  }
}
