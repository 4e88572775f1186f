/**
 * FGTS Digital Guide (GFD) Extractor
 *
 * The guide summary row carries competence and worker count together.
 * Guides issued for several tenants are filtered like the detail report.
 */

import { BaseExtractor } from '../base-extractor';
import type { ExtractionContext, RawExtraction } from '../types';
import type { DocumentKind, Layout, PageText } from '../../types';
import { emptyExtraction } from '../types';
import {
  extractGuideRow,
  extractPayrollCompetence,
  scanTenantWorkerCounts,
  selectWorkerCount,
} from '../payroll-patterns';

export class FgtsDigitalGuideExtractor extends BaseExtractor {
  readonly layout: Layout = 'fgts-digital-guide';
  readonly kind: DocumentKind = 'payroll-report';
  readonly description = 'FGTS Digital guide summary row';

  protected extractFields(pages: PageText[], ctx: ExtractionContext): RawExtraction {
    const extraction = emptyExtraction();
    const { fields } = extraction;
    const row = extractGuideRow(pages);

    const competence = extractPayrollCompetence(pages) ?? row?.competence;
    if (competence) fields.competence = competence;

    const scan = scanTenantWorkerCounts(pages);
    if (scan.tenantBlocks > 0) {
      const selection = selectWorkerCount(scan, ctx.project.registration_number);
      if (selection.field) {
        fields.worker_count = selection.field;
      } else {
        extraction.warnings.push(selection.reason);
      }
      return extraction;
    }

    if (row) {
      fields.worker_count = row.workerCount;
    } else {
      extraction.warnings.push('guide summary row not found');
    }

    return extraction;
  }
}

export const fgtsDigitalGuideExtractor = new FgtsDigitalGuideExtractor();
