/**
 * Project State
 *
 * The persisted engine state of one project: ledger, document index,
 * resolutions and the derived divergence snapshot. Re-opening the state
 * directory reproduces the in-memory state of the last completed write.
 */

import {
  validateDivergenceSnapshotFile,
  validateDocumentIndexFile,
  validateLedgerFile,
  validateResolutionsFile,
} from '../schemas';
import { logger } from '../logger';
import type { Divergence, DivergenceSnapshotFile, Resolution } from '../types';
import { DocumentIndex } from './document-index';
import { LedgerStore } from './ledger-store';
import { loadStateFile, stateFilePath, STATE_FILES, writeJsonAtomic } from './persistence';

export interface ProjectState {
  projectDir: string;
  ledger: LedgerStore;
  documents: DocumentIndex;
  /** Keyed by divergence key. */
  resolutions: Map<string, Resolution>;
}

export async function openProjectState(
  projectDir: string,
  options: { now?: () => string } = {}
): Promise<ProjectState> {
  const ledgerFile = await loadStateFile(
    stateFilePath(projectDir, STATE_FILES.ledger),
    validateLedgerFile,
    () => ({ schema_version: '1.0' as const, entries: [] })
  );
  const documentFile = await loadStateFile(
    stateFilePath(projectDir, STATE_FILES.documents),
    validateDocumentIndexFile,
    () => ({ schema_version: '1.0' as const, documents: [] })
  );
  const resolutionFile = await loadStateFile(
    stateFilePath(projectDir, STATE_FILES.resolutions),
    validateResolutionsFile,
    () => ({ schema_version: '1.0' as const, resolutions: [] })
  );

  logger.debug('Project state opened', {
    entries: ledgerFile.entries.length,
    documents: documentFile.documents.length,
    resolutions: resolutionFile.resolutions.length,
  });

  return {
    projectDir,
    ledger: new LedgerStore(ledgerFile.entries, options),
    documents: new DocumentIndex(documentFile.documents),
    resolutions: new Map(resolutionFile.resolutions.map((r) => [r.key, r])),
  };
}

/**
 * Persist ledger, document index and resolutions.
 */
export async function saveProjectState(state: ProjectState): Promise<void> {
  await writeJsonAtomic(stateFilePath(state.projectDir, STATE_FILES.ledger), {
    schema_version: '1.0',
    entries: state.ledger.entries(),
  });
  await writeJsonAtomic(stateFilePath(state.projectDir, STATE_FILES.documents), {
    schema_version: '1.0',
    documents: state.documents.all(),
  });
  await writeJsonAtomic(stateFilePath(state.projectDir, STATE_FILES.resolutions), {
    schema_version: '1.0',
    resolutions: Array.from(state.resolutions.values()).sort((a, b) => a.key.localeCompare(b.key)),
  });
}

export async function saveDivergenceSnapshot(
  projectDir: string,
  batchId: string,
  divergences: Divergence[],
  generatedAt: string
): Promise<void> {
  const snapshot: DivergenceSnapshotFile = {
    schema_version: '1.0',
    generated_at: generatedAt,
    batch_id: batchId,
    divergences,
  };
  await writeJsonAtomic(stateFilePath(projectDir, STATE_FILES.divergences), snapshot);
}

/**
 * The divergences of the last run, or null before the first one.
 */
export async function loadDivergenceSnapshot(projectDir: string): Promise<DivergenceSnapshotFile | null> {
  return loadStateFile<DivergenceSnapshotFile | null>(
    stateFilePath(projectDir, STATE_FILES.divergences),
    validateDivergenceSnapshotFile,
    () => null
  );
}
