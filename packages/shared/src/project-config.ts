/**
 * Project Configuration
 *
 * Loads, validates and (explicitly) reconfigures a project's
 * ProjectConfig. The loaded object is deeply frozen and passed down to
 * every component; nothing reads project settings from globals.
 */

import { compareCompetence } from './competence';
import { ConfigurationError } from './errors';
import { logger } from './logger';
import { validateProjectConfig } from './schemas';
import { readJsonFile, stateFilePath, STATE_FILES, writeJsonAtomic } from './state/persistence';
import type { ProjectConfig, Provider } from './types';

/**
 * Fields an explicit reconfiguration may change. The schema version is not
 * one of them.
 */
export type ProjectConfigPatch = Partial<Omit<ProjectConfig, 'schema_version'>>;

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Checks the schema cannot express.
 */
function semanticProblems(project: ProjectConfig): string[] {
  const problems: string[] = [];

  const seenIndexes = new Set<number>();
  const seenFolders = new Set<string>();
  for (const provider of project.providers) {
    if (seenIndexes.has(provider.index)) {
      problems.push(`duplicate provider index ${provider.index}`);
    }
    seenIndexes.add(provider.index);

    const folder = provider.folder.toLowerCase();
    if (seenFolders.has(folder)) {
      problems.push(`duplicate provider folder "${provider.folder}"`);
    }
    seenFolders.add(folder);
  }

  if (compareCompetence(project.competence_range.start, project.competence_range.end) > 0) {
    problems.push(
      `competence range starts after it ends (${project.competence_range.start} > ${project.competence_range.end})`
    );
  }

  return problems;
}

/**
 * Validate raw configuration data. Schema defaults are filled in.
 */
export function parseProjectConfig(data: unknown): ProjectConfig {
  const result = validateProjectConfig(data);
  if (!result.valid) {
    throw new ConfigurationError('Invalid project configuration', result.errors);
  }
  const problems = semanticProblems(result.value);
  if (problems.length > 0) {
    throw new ConfigurationError('Invalid project configuration', problems);
  }
  return deepFreeze(result.value);
}

/**
 * Load the configuration of the project at `projectDir`. Fatal for the run
 * when missing or invalid.
 */
export async function loadProjectConfig(projectDir: string): Promise<ProjectConfig> {
  const filePath = stateFilePath(projectDir, STATE_FILES.project);
  const data = await readJsonFile(filePath);
  if (data === null) {
    throw new ConfigurationError(`Project configuration not found at ${filePath}`);
  }
  const project = parseProjectConfig(data);

  logger.info('Project configuration loaded', {
    project_name: project.project_name,
    provider_count: project.providers.length,
    competence_range: project.competence_range,
  });

  return project;
}

/**
 * Project setup: write the first configuration of a project.
 */
export async function createProjectConfig(projectDir: string, data: unknown): Promise<ProjectConfig> {
  const project = parseProjectConfig(data);
  await writeJsonAtomic(stateFilePath(projectDir, STATE_FILES.project), project);
  logger.info('Project configuration created', { project_name: project.project_name });
  return project;
}

/**
 * The explicit reconfiguration step: apply `patch` to the stored
 * configuration, validate the result and persist it.
 */
export async function reconfigureProject(projectDir: string, patch: ProjectConfigPatch): Promise<ProjectConfig> {
  const current = await loadProjectConfig(projectDir);
  const next = parseProjectConfig({
    ...structuredClone(current),
    ...structuredClone(patch),
    schema_version: current.schema_version,
  });
  await writeJsonAtomic(stateFilePath(projectDir, STATE_FILES.project), next);

  logger.info('Project reconfigured', {
    project_name: next.project_name,
    changed: Object.keys(patch),
  });

  return next;
}

export function findProvider(project: ProjectConfig, index: number): Provider | undefined {
  return project.providers.find((p) => p.index === index);
}
