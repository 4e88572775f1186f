/**
 * Payroll Report (SEFIP / FGTS) Extraction Patterns
 *
 * Worker counts in payroll reports are often listed per tenant (the
 * "tomador" a crew was allocated to, identified by its CNO/CEI number).
 * Only the count of the project's own registration is ever taken; the
 * aggregate over all tenants is ignored.
 */

import type { PageText } from '../types';
import type { RawField } from './types';
import {
  collapseNumberSeparators,
  containsRegistration,
  digitRuns,
  matchField,
  rawField,
  splitLines,
} from './text-utils';

// ============================================================================
// Competence
// ============================================================================

const PAYROLL_COMPETENCE_PATTERNS: readonly RegExp[] = [
  /Compet[êe]ncia\s*:?\s*(\d{2}\/\d{4})/i,
  /\bCOMP\.?\s*:?\s*(\d{2}\/\d{4})/i,
  /Per[íi]odo\s+de\s+Apura[çc][ãa]o\s*:?\s*(\d{2}\/\d{4})/i,
];

export function extractPayrollCompetence(pages: PageText[]): RawField | null {
  for (const pattern of PAYROLL_COMPETENCE_PATTERNS) {
    const field = matchField(pages, pattern);
    if (field) return field;
  }
  return null;
}

// ============================================================================
// Tenant filtering
// ============================================================================

const TENANT_LINE = /Tomador|\bCNO\b|\bCEI\b/i;
const WORKER_COUNT_LINE = /Qtd\.?\s*(?:de\s+)?Trabalhadores\s*:?\s*(\d+)/i;
const AGGREGATE_LINE = /\bTOTA(?:L|IS)\b|Todos\s+os\s+Tomadores/i;
const TENANT_ID_MIN_DIGITS = 11;

export interface TenantWorkerCount {
  /** Registration numbers (digits only) that identify the tenant. */
  tenants: string[];
  count: string;
  pageNumber: number;
  source: string;
}

export interface TenantScan {
  tenantCounts: TenantWorkerCount[];
  /** Counts found outside any tenant block. */
  documentCounts: TenantWorkerCount[];
  tenantBlocks: number;
}

/**
 * Walk the report line by line, attributing every worker count to the
 * tenant block it appears in. Two shapes are recognised:
 * - block: a "Tomador/CNO ..." header line followed by "Qtd. Trabalhadores: N"
 * - row: "CNO 12.345.67890/12  Obra Alfa  12" with the count closing the line
 * Aggregate lines ("Total", "Todos os Tomadores") close the current block.
 */
export function scanTenantWorkerCounts(pages: PageText[]): TenantScan {
  const scan: TenantScan = { tenantCounts: [], documentCounts: [], tenantBlocks: 0 };
  let current: string[] | null = null;
  let inAggregate = false;

  for (const line of splitLines(pages)) {
    if (!line.text) continue;

    const tenantIds = TENANT_LINE.test(line.text) ? digitRuns(line.text, TENANT_ID_MIN_DIGITS) : [];
    if (tenantIds.length > 0) {
      scan.tenantBlocks++;
      current = tenantIds;
      inAggregate = false;

      const collapsed = collapseNumberSeparators(line.text);
      const lastId = tenantIds[tenantIds.length - 1];
      const rest = collapsed.slice(collapsed.lastIndexOf(lastId) + lastId.length);
      const inlineCount = WORKER_COUNT_LINE.exec(rest) ?? rest.match(/\s(\d{1,5})\s*$/);
      if (inlineCount) {
        scan.tenantCounts.push({
          tenants: tenantIds,
          count: inlineCount[1],
          pageNumber: line.pageNumber,
          source: line.text,
        });
      }
      continue;
    }

    if (scan.tenantBlocks > 0 && AGGREGATE_LINE.test(line.text)) {
      inAggregate = true;
      current = null;
    }

    const countMatch = WORKER_COUNT_LINE.exec(line.text);
    if (!countMatch || inAggregate) continue;

    const entry: TenantWorkerCount = {
      tenants: current ?? [],
      count: countMatch[1],
      pageNumber: line.pageNumber,
      source: line.text,
    };
    if (current) {
      scan.tenantCounts.push(entry);
    } else {
      scan.documentCounts.push(entry);
    }
  }

  return scan;
}

export interface WorkerCountSelection {
  field: RawField | null;
  reason: string;
}

/**
 * Pick the worker count for the project's registration number. When the
 * report lists tenants, only the matching tenant counts; a lone
 * document-level count is used only for single-tenant reports.
 */
export function selectWorkerCount(scan: TenantScan, registrationNumber: string): WorkerCountSelection {
  if (scan.tenantBlocks > 0) {
    const match = scan.tenantCounts.find((c) => c.tenants.includes(registrationNumber));
    if (!match) {
      return { field: null, reason: 'registration number not listed among tenants' };
    }
    return {
      field: rawField(match.count, match.pageNumber, match.source),
      reason: 'tenant row matching registration number',
    };
  }

  const [first] = scan.documentCounts;
  if (!first) {
    return { field: null, reason: 'no worker count found' };
  }
  return {
    field: rawField(first.count, first.pageNumber, first.source),
    reason: 'single-tenant document count',
  };
}

// ============================================================================
// Classic SEFIP closing summary
// ============================================================================

const CLOSING_SUMMARY = /RESUMO\s+DO\s+FECHAMENTO/i;
const CATEGORY_ROW = /\b0[1l]\s+(\d+)\s+[\d.,]+/;
const TOTALS_ROW = /TOTAIS\s*:\s*(\d+)/i;
const GUIDE_ORIGIN_ROW = /(\d{1,3})\s+Origem:\s*Gest[aã]o\s+de\s+Guias/i;
const TENANT_MENTION = /Tomador|\bCNO\b|\bCEI\b/i;

function workerCountOnPage(page: PageText): RawField | null {
  for (const pattern of [CATEGORY_ROW, TOTALS_ROW, GUIDE_ORIGIN_ROW]) {
    const match = pattern.exec(page.text);
    if (match) return rawField(match[1], page.pageNumber, match[0]);
  }
  return null;
}

/**
 * The classic SEFIP report has one "RESUMO DO FECHAMENTO" page per tenant.
 * Take the summary page carrying the registration number; failing that, a
 * page next to one that mentions it; a report without tenant pages falls
 * back to its only summary page.
 */
export function extractClassicWorkerCount(pages: PageText[], registrationNumber: string): WorkerCountSelection {
  const summaries = pages.filter((p) => CLOSING_SUMMARY.test(p.text));

  for (const page of summaries) {
    if (!containsRegistration(page.text, registrationNumber)) continue;
    const field = workerCountOnPage(page);
    if (field) return { field, reason: 'summary page of the registration number' };
  }

  const registrationPages = pages.filter((p) => containsRegistration(p.text, registrationNumber));
  for (const page of registrationPages) {
    const neighbours = pages.filter((p) => Math.abs(p.pageNumber - page.pageNumber) === 1);
    for (const neighbour of neighbours) {
      const field = workerCountOnPage(neighbour);
      if (field) return { field, reason: 'page adjacent to the registration number' };
    }
  }

  const mentionsTenants = pages.some((p) => TENANT_MENTION.test(p.text));
  if (summaries.length === 1 && !mentionsTenants) {
    const field = workerCountOnPage(summaries[0]);
    if (field) return { field, reason: 'single summary page' };
  }

  return { field: null, reason: 'no summary page for the registration number' };
}

// ============================================================================
// FGTS Digital guide (GFD)
// ============================================================================

const GUIDE_ROW = /(\d{2}\/\d{4})\s+(\d+)\s+[\d.,]+(?:\s|$)/;
const GUIDE_ROW_AFTER_HEADER = /Trabalhadores[^\n]*\n[^\n]*?(\d{2}\/\d{4})\s+(\d+)/i;

export interface GuideRow {
  competence: RawField;
  workerCount: RawField;
}

/**
 * A GFD summary row reads "MM/YYYY  <workers>  <amount>".
 */
export function extractGuideRow(pages: PageText[]): GuideRow | null {
  for (const pattern of [GUIDE_ROW, GUIDE_ROW_AFTER_HEADER]) {
    for (const page of pages) {
      const match = pattern.exec(page.text);
      if (match) {
        return {
          competence: rawField(match[1], page.pageNumber, match[0]),
          workerCount: rawField(match[2], page.pageNumber, match[0]),
        };
      }
    }
  }
  return null;
}
