/**
 * Document Processor
 *
 * Text-layer path of one document: text extraction, orientation fix,
 * layout classification, field extraction and normalization. Never
 * throws for document-level problems; they become the outcome's status.
 */

import { classifyDocument } from '../classifier';
import { config } from '../config';
import { getExtractorOrThrow, normalizeTextOrientation } from '../extractors';
import { combinedText } from '../extractors/text-utils';
import { logger } from '../logger';
import { extractionDurationHistogram } from '../metrics';
import { buildRecord, type NormalizationResult } from '../normalizer';
import { INVOICE_LAYOUTS, PAYROLL_LAYOUTS } from '../types';
import type {
  ClassificationOutcome,
  CompetenceKey,
  DiscoveredDocument,
  DocumentState,
  ExtractedRecord,
  ExtractionSource,
  Layout,
  PageText,
  ProjectConfig,
  Provider,
  Rotation,
} from '../types';
import type { TextExtractor, TextLayer } from './collaborators';

export interface DocumentOutcome {
  status: DocumentState;
  layout: Layout | null;
  /** Also set for incomplete extractions waiting on OCR: the partial record. */
  record: ExtractedRecord | null;
  competence: CompetenceKey | null;
  reason: string | null;
  /** 0-1 */
  completeness: number;
}

export interface ProcessingContext {
  project: ProjectConfig;
  provider: Provider;
}

export function isLayout(outcome: ClassificationOutcome): outcome is Layout {
  return INVOICE_LAYOUTS.some((l) => l === outcome) || PAYROLL_LAYOUTS.some((l) => l === outcome);
}

export interface PageExtraction {
  classification: ClassificationOutcome;
  layout: Layout | null;
  reason: string;
  normalization: NormalizationResult | null;
}

/**
 * Classify pages and, for a known layout, extract and normalize their
 * fields. Shared by the text-layer and OCR paths.
 */
export function extractFromPages(
  document: DiscoveredDocument,
  pages: PageText[],
  ctx: ProcessingContext,
  read: { source: ExtractionSource; confidence: number; rotation: Rotation }
): PageExtraction {
  const classification = classifyDocument({
    text: combinedText(pages),
    kind: document.kind,
    filename: document.filename,
  });
  if (!isLayout(classification.outcome)) {
    return {
      classification: classification.outcome,
      layout: null,
      reason: classification.reason,
      normalization: null,
    };
  }

  const layout = classification.outcome;
  const extractor = getExtractorOrThrow(layout);
  const extraction = extractor.extract(pages, { project: ctx.project, provider: ctx.provider, document });
  for (const warning of extraction.warnings) {
    logger.warn('Extraction warning', { layout, warning });
  }

  const normalization = buildRecord({
    document,
    layout,
    source: read.source,
    confidence: read.confidence,
    rotation: read.rotation,
    raw: extraction,
    project: ctx.project,
    provider: ctx.provider,
    minConfidence: config.ocrMinConfidence,
  });

  return { classification: layout, layout, reason: classification.reason, normalization };
}

function describeMissing(missing: string[]): string {
  return `missing fields: ${missing.join(', ')}`;
}

/**
 * Outcome of a page extraction, for either source.
 */
export function outcomeFromPages(document: DiscoveredDocument, result: PageExtraction): DocumentOutcome {
  const { classification, normalization } = result;

  if (classification === 'filtered-out' || classification === 'unrecognized') {
    return {
      status: classification === 'filtered-out' ? 'filtered-out' : 'classification-failed',
      layout: null,
      record: null,
      competence: document.path_competence,
      reason: result.reason,
      completeness: 0,
    };
  }

  if (classification === 'ocr-required' || normalization === null) {
    return {
      status: 'pending-ocr',
      layout: result.layout,
      record: null,
      competence: document.path_competence,
      reason: result.reason,
      completeness: 0,
    };
  }

  if (normalization.record === null || normalization.missing.length > 0) {
    return {
      status: 'pending-ocr',
      layout: result.layout,
      record: normalization.record,
      competence: normalization.competence ?? document.path_competence,
      reason: describeMissing(normalization.missing),
      completeness: normalization.completeness,
    };
  }

  const flagged = normalization.flags.length > 0;
  return {
    status: flagged ? 'needs-manual-review' : 'extracted',
    layout: result.layout,
    record: normalization.record,
    competence: normalization.competence,
    reason: flagged ? normalization.flags.join(', ') : null,
    completeness: normalization.completeness,
  };
}

/**
 * Process one document through its text layer.
 */
export async function processDocument(
  document: DiscoveredDocument,
  text: TextExtractor,
  ctx: ProcessingContext
): Promise<DocumentOutcome> {
  const startTime = Date.now();

  let layer: TextLayer;
  try {
    layer = await text.extractText(document.path);
  } catch (error) {
    logger.error('Text extraction failed', error, { path: document.path });
    return {
      status: 'classification-failed',
      layout: null,
      record: null,
      competence: document.path_competence,
      reason: `unreadable PDF: ${error instanceof Error ? error.message : String(error)}`,
      completeness: 0,
    };
  }

  if (layer.kind === 'no-text-layer') {
    return {
      status: 'pending-ocr',
      layout: null,
      record: null,
      competence: document.path_competence,
      reason: 'no text layer',
      completeness: 0,
    };
  }

  const { pages, rotation } = normalizeTextOrientation(layer.pages);
  if (rotation === 180) {
    logger.info('Reversed text layer restored', { path: document.path });
  }

  const result = extractFromPages(document, pages, ctx, { source: 'text', confidence: 1, rotation });
  const outcome = outcomeFromPages(document, result);

  extractionDurationHistogram.observe({ source: 'text' }, (Date.now() - startTime) / 1000);
  logger.info('Document processed', {
    path: document.path,
    kind: document.kind,
    layout: outcome.layout,
    status: outcome.status,
    reason: outcome.reason,
  });

  return outcome;
}
