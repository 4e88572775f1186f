/**
 * Standard NFS-e Extractor
 *
 * Layout with a "VALOR SERVIÇOS ... VALOR ISS" header row, a federal
 * withholding table (PIS/COFINS/INSS/IR) and an ISS deductions block.
 */

import { BaseExtractor } from '../base-extractor';
import type { ExtractionContext, RawExtraction } from '../types';
import type { DocumentKind, Layout, PageText } from '../../types';
import { emptyExtraction } from '../types';
import {
  extractDocumentNumber,
  extractInss,
  extractInvoiceCompetence,
  extractIssBlock,
  extractLabelledTotal,
  extractServiceTotalsRow,
  extractSupersedeReference,
} from '../invoice-patterns';

export class StandardInvoiceExtractor extends BaseExtractor {
  readonly layout: Layout = 'standard-invoice';
  readonly kind: DocumentKind = 'invoice';
  readonly description = 'NFS-e with service value header row and tax tables';

  protected extractFields(pages: PageText[], ctx: ExtractionContext): RawExtraction {
    const extraction = emptyExtraction();
    const { fields } = extraction;

    const documentNumber = extractDocumentNumber(pages, ctx.document.filename);
    if (documentNumber) fields.document_number = documentNumber;

    const competence = extractInvoiceCompetence(pages);
    if (competence) fields.competence = competence;

    const totals = extractServiceTotalsRow(pages);
    const total = totals.total ?? extractLabelledTotal(pages);
    if (total) fields.total_value = total;

    const issBlock = extractIssBlock(pages);
    const iss = issBlock.iss ?? totals.iss;
    if (iss) fields.iss = iss;
    if (issBlock.rate) fields.iss_rate = issBlock.rate;

    const inss = extractInss(pages);
    if (inss) fields.inss = inss;

    const supersedes = extractSupersedeReference(pages);
    if (supersedes) extraction.supersedes = supersedes.value;

    if (issBlock.iss && totals.iss && issBlock.iss.value !== totals.iss.value) {
      extraction.warnings.push(
        `ISS differs between header row (${totals.iss.value}) and deductions block (${issBlock.iss.value})`
      );
    }

    return extraction;
  }
}

export const standardInvoiceExtractor = new StandardInvoiceExtractor();
