/**
 * Inline Legacy NFS-e Extractor
 *
 * Older municipal layout that prints "VALOR TOTAL DO SERVIÇO R$ x" on a
 * single line and the withholdings as label/value pairs.
 */

import { BaseExtractor } from '../base-extractor';
import type { ExtractionContext, RawExtraction } from '../types';
import type { DocumentKind, Layout, PageText } from '../../types';
import { emptyExtraction } from '../types';
import {
  extractDocumentNumber,
  extractInlineTotal,
  extractInss,
  extractInvoiceCompetence,
  extractIssBlock,
  extractSupersedeReference,
} from '../invoice-patterns';

export class InlineLegacyInvoiceExtractor extends BaseExtractor {
  readonly layout: Layout = 'inline-legacy-invoice';
  readonly kind: DocumentKind = 'invoice';
  readonly description = 'Legacy NFS-e with inline total and label/value withholdings';

  protected extractFields(pages: PageText[], ctx: ExtractionContext): RawExtraction {
    const extraction = emptyExtraction();
    const { fields } = extraction;

    const documentNumber = extractDocumentNumber(pages, ctx.document.filename);
    if (documentNumber) fields.document_number = documentNumber;

    const competence = extractInvoiceCompetence(pages);
    if (competence) fields.competence = competence;

    const total = extractInlineTotal(pages);
    if (total) fields.total_value = total;

    const issBlock = extractIssBlock(pages);
    if (issBlock.iss) fields.iss = issBlock.iss;
    if (issBlock.rate) fields.iss_rate = issBlock.rate;

    const inss = extractInss(pages);
    if (inss) fields.inss = inss;

    const supersedes = extractSupersedeReference(pages);
    if (supersedes) extraction.supersedes = supersedes.value;

    return extraction;
  }
}

export const inlineLegacyInvoiceExtractor = new InlineLegacyInvoiceExtractor();
