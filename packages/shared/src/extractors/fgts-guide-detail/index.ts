/**
 * FGTS Guide Detail Extractor
 *
 * "Detalhe da Guia" / "Relatório da Guia" reports list worker counts per
 * tenant; only the block of the project's registration number is taken.
 */

import { BaseExtractor } from '../base-extractor';
import type { ExtractionContext, RawExtraction } from '../types';
import type { DocumentKind, Layout, PageText } from '../../types';
import { emptyExtraction } from '../types';
import {
  extractPayrollCompetence,
  scanTenantWorkerCounts,
  selectWorkerCount,
} from '../payroll-patterns';

export class FgtsGuideDetailExtractor extends BaseExtractor {
  readonly layout: Layout = 'fgts-guide-detail';
  readonly kind: DocumentKind = 'payroll-report';
  readonly description = 'FGTS guide detail with per-tenant worker counts';

  protected extractFields(pages: PageText[], ctx: ExtractionContext): RawExtraction {
    const extraction = emptyExtraction();

    const competence = extractPayrollCompetence(pages);
    if (competence) extraction.fields.competence = competence;

    const selection = selectWorkerCount(scanTenantWorkerCounts(pages), ctx.project.registration_number);
    if (selection.field) {
      extraction.fields.worker_count = selection.field;
    } else {
      extraction.warnings.push(selection.reason);
    }

    return extraction;
  }
}

export const fgtsGuideDetailExtractor = new FgtsGuideDetailExtractor();
