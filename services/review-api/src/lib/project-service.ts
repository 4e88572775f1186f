/**
 * Project Service
 *
 * Reads and updates one project's persisted state on behalf of the API.
 * Writes are serialized; the API must not run while a batch is writing
 * the same project.
 */

import {
  loadDivergenceSnapshot,
  loadProjectConfig,
  openProjectState,
  reconcile,
  resolveAll,
  resolveDivergence,
  saveDivergenceSnapshot,
  saveProjectState,
  NotFoundError,
  type BulkFilter,
  type Divergence,
  type DivergenceSnapshotFile,
  type DocumentState,
  type DocumentStatus,
  type ProjectConfig,
  type ProjectState,
  type Resolution,
  type ResolutionPolicy,
  type ResolutionRequest,
  type SpreadsheetSnapshot,
} from '@ledgerline/shared';

export interface ResolveResult {
  resolution: Resolution;
  /** The divergence after the resolution; null once it no longer diverges. */
  divergence: Divergence | null;
}

/**
 * The spreadsheet as the last run saw it, rebuilt from its divergences.
 */
export function snapshotFromDivergences(divergences: Divergence[], takenAt: string): SpreadsheetSnapshot {
  return {
    cells: divergences
      .filter((d) => d.spreadsheet_value !== null)
      .map((d) => ({ provider: d.provider, competence: d.competence, field: d.field, value: d.spreadsheet_value })),
    taken_at: takenAt,
  };
}

export class ProjectService {
  private readonly now: () => string;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly projectDir: string,
    options: { now?: () => string } = {}
  ) {
    this.now = options.now ?? (() => new Date().toISOString());
  }

  async project(): Promise<ProjectConfig> {
    return loadProjectConfig(this.projectDir);
  }

  async divergenceSnapshot(): Promise<DivergenceSnapshotFile> {
    const snapshot = await loadDivergenceSnapshot(this.projectDir);
    if (!snapshot) {
      throw new NotFoundError('No batch has run for this project yet');
    }
    return snapshot;
  }

  async documents(status?: DocumentState): Promise<DocumentStatus[]> {
    const state = await openProjectState(this.projectDir, { now: this.now });
    return status === undefined ? state.documents.all() : state.documents.withStatus(status);
  }

  async resolve(key: string, request: ResolutionRequest): Promise<ResolveResult> {
    return this.exclusive(async () => {
      const { project, state, snapshot } = await this.load();
      const divergence = snapshot.divergences.find((d) => d.key === key);
      if (!divergence) {
        throw new NotFoundError(`Divergence ${key} not found`);
      }

      const resolution = resolveDivergence(divergence, request, {
        store: state.ledger,
        project,
        resolutions: state.resolutions,
        now: this.now,
      });
      const divergences = await this.persist(project, state, snapshot);

      return { resolution, divergence: divergences.find((d) => d.key === key) ?? null };
    });
  }

  async resolveAll(
    policy: Exclude<ResolutionPolicy, 'accept-document'>,
    filter: BulkFilter
  ): Promise<Resolution[]> {
    return this.exclusive(async () => {
      const { project, state, snapshot } = await this.load();
      const resolutions = resolveAll(
        snapshot.divergences,
        policy,
        { store: state.ledger, project, resolutions: state.resolutions, now: this.now },
        filter
      );
      await this.persist(project, state, snapshot);
      return resolutions;
    });
  }

  async markReviewed(documentPath: string): Promise<DocumentStatus> {
    return this.exclusive(async () => {
      const state = await openProjectState(this.projectDir, { now: this.now });
      const status = state.documents.markReviewed(documentPath, this.now());
      await saveProjectState(state);
      return status;
    });
  }

  private async load(): Promise<{ project: ProjectConfig; state: ProjectState; snapshot: DivergenceSnapshotFile }> {
    const project = await this.project();
    const snapshot = await this.divergenceSnapshot();
    const state = await openProjectState(this.projectDir, { now: this.now });
    return { project, state, snapshot };
  }

  /**
   * Save the state and the divergences recomputed against the same
   * spreadsheet values.
   */
  private async persist(
    project: ProjectConfig,
    state: ProjectState,
    snapshot: DivergenceSnapshotFile
  ): Promise<Divergence[]> {
    await saveProjectState(state);
    const divergences = reconcile(
      state.ledger,
      snapshotFromDivergences(snapshot.divergences, snapshot.generated_at),
      state.resolutions,
      project
    );
    await saveDivergenceSnapshot(this.projectDir, snapshot.batch_id, divergences, this.now());
    return divergences;
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(fn, fn);
    // The chain only orders writes; callers see the failure through `run`
    this.tail = run.catch(() => undefined);
    return run;
  }
}
