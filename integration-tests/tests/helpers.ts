/**
 * Test Helpers
 *
 * In-process stand-ins for the engine's collaborators, project fixtures
 * and document text builders.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  computeIdentityKey,
  createProjectConfig,
  hashContent,
  parseProjectConfig,
  type CompetenceKey,
  type DiscoveredDocument,
  type DocumentSource,
  type InvoiceRecord,
  type OcrEngine,
  type OcrRequest,
  type OcrResult,
  type PayrollRecord,
  type ProjectConfig,
  type Provider,
  type Rotation,
  type TextExtractor,
  type TextLayer,
} from '@ledgerline/shared';

export const REGISTRATION = '123456789012';

// ============================================================================
// Projects
// ============================================================================

export function projectData(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    schema_version: '1.0',
    registration_number: REGISTRATION,
    project_name: 'Residencial Aurora',
    providers: [
      { index: 1, name: 'Construtora Alfa', folder: '01 - Alfa' },
      { index: 2, name: 'Vigilancia Beta', folder: '02 - Beta' },
    ],
    competence_range: { start: '2023-01', end: '2024-12' },
    ...overrides,
  };
}

export function testProject(overrides: Record<string, unknown> = {}): ProjectConfig {
  return parseProjectConfig(projectData(overrides));
}

export async function makeProjectDir(data: Record<string, unknown> = projectData()): Promise<string> {
  const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'ledgerline-'));
  await createProjectConfig(dir, data);
  return dir;
}

export async function makeTempDir(): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), 'ledgerline-'));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}

export function fixedClock(start = '2024-03-01T12:00:00.000Z'): () => string {
  let tick = 0;
  const base = Date.parse(start);
  return () => new Date(base + 1000 * tick++).toISOString();
}

// ============================================================================
// Documents
// ============================================================================

export function discovered(
  documentPath: string,
  overrides: Partial<Omit<DiscoveredDocument, 'path'>> = {}
): DiscoveredDocument {
  return {
    provider: 1,
    kind: 'invoice',
    filename: path.basename(documentPath),
    content_hash: hashContent(documentPath),
    path_competence: null,
    ...overrides,
    path: documentPath,
  };
}

export class StaticDocumentSource implements DocumentSource {
  constructor(public documents: DiscoveredDocument[]) {}

  async discover(_project: ProjectConfig, providers: Provider[]): Promise<DiscoveredDocument[]> {
    const wanted = new Set(providers.map((p) => p.index));
    return this.documents.filter((d) => wanted.has(d.provider));
  }
}

export class FakeTextExtractor implements TextExtractor {
  private readonly layers = new Map<string, TextLayer | Error>();
  readonly calls: string[] = [];

  setText(documentPath: string, ...pages: string[]): this {
    this.layers.set(documentPath, {
      kind: 'text',
      pages: pages.map((text, i) => ({ pageNumber: i + 1, text })),
    });
    return this;
  }

  setNoTextLayer(documentPath: string): this {
    this.layers.set(documentPath, { kind: 'no-text-layer' });
    return this;
  }

  setFailure(documentPath: string, error: Error): this {
    this.layers.set(documentPath, error);
    return this;
  }

  async extractText(documentPath: string): Promise<TextLayer> {
    this.calls.push(documentPath);
    const layer = this.layers.get(documentPath) ?? { kind: 'no-text-layer' };
    if (layer instanceof Error) throw layer;
    return layer;
  }
}

export class FakeOcrEngine implements OcrEngine {
  private readonly results = new Map<string, OcrResult | Error>();
  readonly requests: OcrRequest[] = [];

  set(documentPath: string, rotation: Rotation, result: { text: string; confidence: number } | Error): this {
    this.results.set(
      `${documentPath}@${rotation}`,
      result instanceof Error ? result : { pages: [{ pageNumber: 1, text: result.text }], confidence: result.confidence }
    );
    return this;
  }

  async recognize(request: OcrRequest): Promise<OcrResult> {
    this.requests.push(request);
    const result = this.results.get(`${request.path}@${request.rotation}`);
    if (result === undefined) {
      throw new Error(`no OCR result for ${request.path} at ${request.rotation}`);
    }
    if (result instanceof Error) throw result;
    return result;
  }
}

// ============================================================================
// Document text
// ============================================================================

export interface InvoiceText {
  number: string;
  competence: string;
  total: string;
  iss: string;
  inss: string;
  supersedes?: string;
}

/**
 * A standard NFS-e: header row with the service total and ISS, federal
 * withholding table with INSS in its 3rd column.
 */
export function standardInvoiceText(invoice: InvoiceText): string {
  return [
    'PREFEITURA MUNICIPAL DE CAMPINAS',
    'NOTA FISCAL ELETRÔNICA DE SERVIÇOS - NFS-e',
    `Número da Nota: ${invoice.number}`,
    `Competência: ${invoice.competence}`,
    'Prestador: Construtora Alfa Ltda',
    ...(invoice.supersedes ? [`Esta NFS-e substitui a NFS-e nº ${invoice.supersedes}`] : []),
    'VALOR SERVIÇOS   DEDUÇÕES   VALOR ISS',
    `${invoice.total}   0,00   ${invoice.iss}`,
    'PIS (R$) COFINS (R$) INSS (R$) IR (R$) CSLL (R$)',
    `0,00 0,00 ${invoice.inss} 0,00 0,00`,
  ].join('\n');
}

/**
 * An FGTS "Detalhe da Guia" report with one block per tenant and an
 * all-tenants total.
 */
export function guideDetailText(competence: string, tenants: Array<[string, number]>): string {
  const total = tenants.reduce((sum, [, count]) => sum + count, 0);
  return [
    'Detalhe da Guia',
    'Empregador: Construtora Alfa Ltda',
    `Competência: ${competence}`,
    ...tenants.flatMap(([registration, count]) => [
      `Tomador: CNO ${registration} Obra`,
      `Qtd. Trabalhadores: ${count}`,
    ]),
    'TOTAL Todos os Tomadores',
    `Qtd. Trabalhadores: ${total}`,
  ].join('\n');
}

/** The project's registration number as printed in reports. */
export const PRINTED_REGISTRATION = '12.345.67890/12';

// ============================================================================
// Records
// ============================================================================

export interface InvoiceRecordInput {
  provider?: number;
  competence: CompetenceKey;
  number: string | null;
  totalCents: number;
  inssCents?: number | null;
  issCents?: number | null;
  path?: string;
  supersedes?: string | null;
}

export function invoiceRecord(input: InvoiceRecordInput): InvoiceRecord {
  const provider = input.provider ?? 1;
  const recordPath = input.path ?? `/project/${provider}/NF ${input.number ?? 'sem numero'}.pdf`;
  const contentHash = hashContent(recordPath);
  return {
    identity_key: computeIdentityKey({
      provider,
      kind: 'invoice',
      documentNumber: input.number,
      contentHash,
      competence: input.competence,
    }),
    provider,
    kind: 'invoice',
    layout: 'standard-invoice',
    document_number: input.number,
    content_hash: contentHash,
    competence: input.competence,
    source: 'text',
    confidence: 1,
    rotation: 0,
    flags: [],
    supersedes: input.supersedes ?? null,
    path: recordPath,
    evidence: [],
    fields: {
      total_value_cents: input.totalCents,
      inss_cents: input.inssCents ?? null,
      iss_cents: input.issCents ?? null,
      iss_rate: null,
    },
  };
}

export interface PayrollRecordInput {
  provider?: number;
  competence: CompetenceKey;
  workers: number | null;
  path?: string;
  source?: 'text' | 'ocr';
}

export function payrollRecord(input: PayrollRecordInput): PayrollRecord {
  const provider = input.provider ?? 1;
  const recordPath = input.path ?? `/project/${provider}/SEFIP ${input.competence}.pdf`;
  const contentHash = hashContent(recordPath);
  return {
    identity_key: computeIdentityKey({
      provider,
      kind: 'payroll-report',
      documentNumber: null,
      contentHash,
      competence: input.competence,
    }),
    provider,
    kind: 'payroll-report',
    layout: 'fgts-guide-detail',
    document_number: null,
    content_hash: contentHash,
    competence: input.competence,
    source: input.source ?? 'text',
    confidence: 1,
    rotation: 0,
    flags: [],
    supersedes: null,
    path: recordPath,
    evidence: [],
    fields: { worker_count: input.workers },
  };
}
