/**
 * External Collaborators
 *
 * Contracts of the components the engine consumes but does not own: the
 * document source, the PDF text layer, the OCR engine and the spreadsheet.
 */

import type { DiscoveredDocument, PageText, ProjectConfig, Provider, Rotation } from '../types';
import type { SpreadsheetGateway } from '../reconciliation/spreadsheet';

export type TextLayer =
  | { kind: 'text'; pages: PageText[] }
  | { kind: 'no-text-layer' };

export interface TextExtractor {
  extractText(path: string): Promise<TextLayer>;
}

export interface OcrRequest {
  path: string;
  /** Upper bound on the pages rendered and recognized. */
  maxPages: number;
  rotation: Rotation;
}

export interface OcrResult {
  pages: PageText[];
  /** 0-1 */
  confidence: number;
}

export interface OcrEngine {
  recognize(request: OcrRequest): Promise<OcrResult>;
}

/**
 * Finds the documents of the given providers, in a stable discovery order.
 */
export interface DocumentSource {
  discover(project: ProjectConfig, providers: Provider[]): Promise<DiscoveredDocument[]>;
}

export interface Collaborators {
  source: DocumentSource;
  text: TextExtractor;
  /** Absent when no OCR engine is configured. */
  ocr?: OcrEngine;
  spreadsheet: SpreadsheetGateway;
}
