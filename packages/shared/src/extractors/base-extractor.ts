/**
 * Base Layout Extractor
 *
 * Abstract base class providing common functionality for layout extractors:
 * timing and logging, provider field overrides, and the no-INSS rule for
 * security services.
 */

import type { DocumentKind, InvoiceFieldName, Layout, PageText, Provider } from '../types';
import type { ExtractionContext, LayoutExtractor, RawExtraction } from './types';
import { detectServiceCategory } from './invoice-patterns';
import { combinedText } from './text-utils';
import { logger } from '../logger';

const OVERRIDABLE_FIELDS: readonly InvoiceFieldName[] = ['total_value', 'inss', 'iss', 'iss_rate'];

export abstract class BaseExtractor implements LayoutExtractor {
  abstract readonly layout: Layout;
  abstract readonly kind: DocumentKind;
  abstract readonly description: string;

  /**
   * Layout-specific field extraction. Must not consult anything but the
   * pages and the context.
   */
  protected abstract extractFields(pages: PageText[], ctx: ExtractionContext): RawExtraction;

  extract(pages: PageText[], ctx: ExtractionContext): RawExtraction {
    const startTime = Date.now();

    logger.debug('Starting extraction', {
      layout: this.layout,
      document_path: ctx.document.path,
      page_count: pages.length,
    });

    const extraction = this.extractFields(pages, ctx);
    if (this.kind === 'invoice') {
      this.applySecurityServiceRule(pages, extraction, ctx.provider);
    }
    const overriddenFields = this.applyOverrides(extraction, ctx.provider);

    logger.info('Extraction complete', {
      layout: this.layout,
      document_path: ctx.document.path,
      fields: Object.keys(extraction.fields),
      overridden_fields: overriddenFields,
      warning_count: extraction.warnings.length,
      duration_ms: Date.now() - startTime,
    });

    return extraction;
  }

  /**
   * Forced field values configured for the provider replace whatever was
   * extracted.
   */
  protected applyOverrides(extraction: RawExtraction, provider: Provider): InvoiceFieldName[] {
    const fixed = provider.overrides?.fixed_fields;
    if (!fixed || this.kind !== 'invoice') return [];

    const overridden: InvoiceFieldName[] = [];
    for (const field of OVERRIDABLE_FIELDS) {
      const value = fixed[field];
      if (value === undefined) continue;
      extraction.fields[field] = { value, pageNumber: 0, quote: `provider override for ${field}` };
      overridden.push(field);
    }
    return overridden;
  }

  /**
   * Surveillance and security services have no INSS retention: a missing
   * INSS is zero, not a gap.
   */
  protected applySecurityServiceRule(pages: PageText[], extraction: RawExtraction, provider: Provider): void {
    if (extraction.fields.inss) return;
    const category = provider.overrides?.service_category ?? detectServiceCategory(combinedText(pages));
    if (category !== 'security') return;
    extraction.fields.inss = { value: '0,00', pageNumber: 0, quote: 'security service: no INSS retention' };
  }
}
