/**
 * Security Service NFS-e Extractor
 *
 * Layout used by surveillance providers: the competence is the
 * "Data Fato Gerador" date, ISS sits next to "ALÍQUOTA", and there is no
 * INSS retention.
 */

import { BaseExtractor } from '../base-extractor';
import type { ExtractionContext, RawExtraction } from '../types';
import type { DocumentKind, Layout, PageText } from '../../types';
import { emptyExtraction } from '../types';
import {
  extractDocumentNumber,
  extractInlineTotal,
  extractInvoiceCompetence,
  extractLabelledTotal,
  extractSecurityIss,
  extractServiceTotalsRow,
  extractSupersedeReference,
} from '../invoice-patterns';

export class SecurityServiceInvoiceExtractor extends BaseExtractor {
  readonly layout: Layout = 'security-service-invoice';
  readonly kind: DocumentKind = 'invoice';
  readonly description = 'Security service NFS-e keyed by fact generator date';

  protected extractFields(pages: PageText[], ctx: ExtractionContext): RawExtraction {
    const extraction = emptyExtraction();
    const { fields } = extraction;

    const documentNumber = extractDocumentNumber(pages, ctx.document.filename);
    if (documentNumber) fields.document_number = documentNumber;

    const competence = extractInvoiceCompetence(pages);
    if (competence) fields.competence = competence;

    const total =
      extractServiceTotalsRow(pages).total ?? extractInlineTotal(pages) ?? extractLabelledTotal(pages);
    if (total) fields.total_value = total;

    const { iss, rate } = extractSecurityIss(pages);
    if (iss) fields.iss = iss;
    if (rate) fields.iss_rate = rate;

    fields.inss = { value: '0,00', pageNumber: 0, quote: 'security service: no INSS retention' };

    const supersedes = extractSupersedeReference(pages);
    if (supersedes) extraction.supersedes = supersedes.value;

    return extraction;
  }
}

export const securityServiceInvoiceExtractor = new SecurityServiceInvoiceExtractor();
