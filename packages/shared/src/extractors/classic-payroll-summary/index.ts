/**
 * Classic SEFIP Closing Summary Extractor
 *
 * SEFIP reports carry one "RESUMO DO FECHAMENTO" page per tenant; the worker
 * count is read from the page of the project's registration number.
 */

import { BaseExtractor } from '../base-extractor';
import type { ExtractionContext, RawExtraction } from '../types';
import type { DocumentKind, Layout, PageText } from '../../types';
import { emptyExtraction } from '../types';
import { extractClassicWorkerCount, extractPayrollCompetence } from '../payroll-patterns';

export class ClassicPayrollSummaryExtractor extends BaseExtractor {
  readonly layout: Layout = 'classic-payroll-summary';
  readonly kind: DocumentKind = 'payroll-report';
  readonly description = 'SEFIP closing summary, one page per tenant';

  protected extractFields(pages: PageText[], ctx: ExtractionContext): RawExtraction {
    const extraction = emptyExtraction();

    const competence = extractPayrollCompetence(pages);
    if (competence) extraction.fields.competence = competence;

    const selection = extractClassicWorkerCount(pages, ctx.project.registration_number);
    if (selection.field) {
      extraction.fields.worker_count = selection.field;
    } else {
      extraction.warnings.push(selection.reason);
    }

    return extraction;
  }
}

export const classicPayrollSummaryExtractor = new ClassicPayrollSummaryExtractor();
