/**
 * Filesystem Document Source
 *
 * Walks a project directory read-only:
 *   <project>/<provider folder>/<kind subfolder>/<year>/<month>/<file>.pdf
 * Kind subfolders are matched by name (accents and case ignored) against
 * ProjectConfig.subfolders; the year / month levels are optional.
 */

import fs from 'fs';
import path from 'path';
import {
  competenceFromPath,
  hashContent,
  isMissingFileError,
  logger,
  type DiscoveredDocument,
  type DocumentKind,
  type DocumentSource,
  type ProjectConfig,
  type Provider,
} from '@ledgerline/shared';

const KIND_ORDER: readonly DocumentKind[] = ['invoice', 'payroll-report'];

/**
 * Payroll report variants, most complete first. One report per
 * provider x month is kept.
 */
const PAYROLL_PRIORITY: ReadonlyArray<{ pattern: RegExp; rank: number }> = [
  { pattern: /relatorio\s*re\b/, rank: 4 },
  { pattern: /sefip\s*completa/, rank: 3 },
  { pattern: /sefip/, rank: 2 },
  { pattern: /fgts/, rank: 1 },
];

export function foldName(value: string): string {
  return value
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[_-]+/g, ' ')
    .toLowerCase()
    .trim();
}

export function payrollPriority(filename: string): number {
  const folded = foldName(filename);
  return PAYROLL_PRIORITY.find((p) => p.pattern.test(folded))?.rank ?? 0;
}

async function listPdfFiles(dir: string): Promise<string[]> {
  const entries = await fs.promises.readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listPdfFiles(fullPath)));
    } else if (entry.isFile() && entry.name.toLowerCase().endsWith('.pdf')) {
      files.push(fullPath);
    }
  }
  return files;
}

async function findChildDirectory(parent: string, name: string): Promise<string | null> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(parent, { withFileTypes: true });
  } catch (error) {
    if (isMissingFileError(error)) return null;
    throw error;
  }
  const wanted = foldName(name);
  const match = entries.find((e) => e.isDirectory() && foldName(e.name) === wanted);
  return match ? path.join(parent, match.name) : null;
}

/**
 * Keep the highest-priority payroll report per provider x competence.
 * Reports without a competence hint are all kept; their content decides.
 */
export function selectPayrollReports(documents: DiscoveredDocument[]): DiscoveredDocument[] {
  const best = new Map<string, DiscoveredDocument>();
  const kept: DiscoveredDocument[] = [];

  for (const document of documents) {
    if (document.kind !== 'payroll-report' || document.path_competence === null) {
      kept.push(document);
      continue;
    }
    const key = `${document.provider}|${document.path_competence}`;
    const current = best.get(key);
    if (!current || payrollPriority(document.filename) > payrollPriority(current.filename)) {
      best.set(key, document);
    }
  }

  const selected = new Set(best.values());
  return documents.filter((d) => kept.includes(d) || selected.has(d));
}

export class FilesystemDocumentSource implements DocumentSource {
  constructor(private readonly projectDir: string) {}

  async discover(project: ProjectConfig, providers: Provider[]): Promise<DiscoveredDocument[]> {
    const documents: DiscoveredDocument[] = [];
    const ordered = [...providers].sort((a, b) => a.index - b.index);

    for (const provider of ordered) {
      const providerDir = await findChildDirectory(this.projectDir, provider.folder);
      if (!providerDir) {
        logger.warn('Provider folder not found', { provider: provider.index, folder: provider.folder });
        continue;
      }

      for (const kind of KIND_ORDER) {
        if (!provider.document_kinds.includes(kind)) continue;
        const seen = new Set<string>();

        for (const subfolder of project.subfolders[kind]) {
          const kindDir = await findChildDirectory(providerDir, subfolder);
          if (!kindDir || seen.has(kindDir)) continue;
          seen.add(kindDir);

          for (const filePath of await listPdfFiles(kindDir)) {
            const content = await fs.promises.readFile(filePath);
            documents.push({
              provider: provider.index,
              kind,
              path: filePath,
              filename: path.basename(filePath),
              content_hash: hashContent(content),
              path_competence: competenceFromPath(path.relative(kindDir, filePath)),
            });
          }
        }
      }
    }

    const selected = selectPayrollReports(documents);
    logger.info('Documents discovered', {
      providers: ordered.length,
      found: documents.length,
      selected: selected.length,
    });
    return selected;
  }
}
