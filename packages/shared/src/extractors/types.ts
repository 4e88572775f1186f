/**
 * Layout Extractor Types
 *
 * Interfaces for the per-layout extraction architecture.
 */

import type {
  DiscoveredDocument,
  DocumentKind,
  FieldName,
  Layout,
  PageText,
  ProjectConfig,
  Provider,
} from '../types';

/**
 * A raw (string) field value with the page and text it was read from.
 */
export interface RawField {
  value: string;
  pageNumber: number;
  quote: string;
}

export interface RawExtraction {
  fields: Partial<Record<FieldName, RawField>>;
  /** Raw document number of an earlier document this one replaces. */
  supersedes: string | null;
  warnings: string[];
}

/**
 * Everything an extractor may read besides the page text.
 */
export interface ExtractionContext {
  project: ProjectConfig;
  provider: Provider;
  document: DiscoveredDocument;
}

/**
 * One extractor per layout. Extraction is a pure function of the page
 * text and the context.
 */
export interface LayoutExtractor {
  readonly layout: Layout;
  readonly kind: DocumentKind;
  readonly description: string;

  extract(pages: PageText[], ctx: ExtractionContext): RawExtraction;
}

export function emptyExtraction(): RawExtraction {
  return { fields: {}, supersedes: null, warnings: [] };
}
