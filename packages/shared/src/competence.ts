/**
 * Competence Periods
 *
 * A competence is the (year, month) a fiscal fact refers to. Canonical
 * string form is `YYYY-MM`, which also sorts chronologically.
 */

import type { CompetenceKey, CompetencePeriod } from './types';

const MIN_YEAR = 2000;
const MAX_YEAR = 2099;

const MONTH_NAMES: Record<string, number> = {
  jan: 1,
  janeiro: 1,
  fev: 2,
  fevereiro: 2,
  mar: 3,
  marco: 3,
  abr: 4,
  abril: 4,
  mai: 5,
  maio: 5,
  jun: 6,
  junho: 6,
  jul: 7,
  julho: 7,
  ago: 8,
  agosto: 8,
  set: 9,
  setembro: 9,
  out: 10,
  outubro: 10,
  nov: 11,
  novembro: 11,
  dez: 12,
  dezembro: 12,
};

function stripAccents(value: string): string {
  return value.normalize('NFD').replace(/[\u0300-\u036f]/g, '');
}

function toPeriod(year: number, month: number): CompetencePeriod | null {
  if (!Number.isInteger(year) || !Number.isInteger(month)) return null;
  if (year < MIN_YEAR || year > MAX_YEAR) return null;
  if (month < 1 || month > 12) return null;
  return { year, month };
}

/**
 * Parse a competence token.
 *
 * Accepts `MM/YYYY`, `MM-YYYY`, `MM.YYYY`, `MM YYYY`, `YYYY-MM`, `YYYY/MM`,
 * full dates `DD/MM/YYYY` and month names (`Abril/2025`, `ABR-2025`).
 */
export function parseCompetence(raw: string | null | undefined): CompetencePeriod | null {
  if (!raw) return null;
  const token = stripAccents(raw.trim()).toLowerCase();

  const fullDate = token.match(/^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})$/);
  if (fullDate) {
    return toPeriod(parseInt(fullDate[3], 10), parseInt(fullDate[2], 10));
  }

  const monthFirst = token.match(/^(\d{1,2})\s*[/.\-\s]\s*(\d{4})$/);
  if (monthFirst) {
    return toPeriod(parseInt(monthFirst[2], 10), parseInt(monthFirst[1], 10));
  }

  const yearFirst = token.match(/^(\d{4})\s*[/.-]\s*(\d{1,2})$/);
  if (yearFirst) {
    return toPeriod(parseInt(yearFirst[1], 10), parseInt(yearFirst[2], 10));
  }

  const named = token.match(/^([a-z]+)\s*(?:[/.\-\s]|de)\s*(\d{4})$/);
  if (named) {
    const month = MONTH_NAMES[named[1]];
    return month ? toPeriod(parseInt(named[2], 10), month) : null;
  }

  return null;
}

export function formatCompetence(period: CompetencePeriod): CompetenceKey {
  return `${period.year}-${String(period.month).padStart(2, '0')}`;
}

export function competenceKey(raw: string | null | undefined): CompetenceKey | null {
  const period = parseCompetence(raw);
  return period ? formatCompetence(period) : null;
}

export function isCompetenceKey(value: string): boolean {
  const match = value.match(/^(\d{4})-(\d{2})$/);
  return match !== null && toPeriod(parseInt(match[1], 10), parseInt(match[2], 10)) !== null;
}

export function compareCompetence(a: CompetenceKey, b: CompetenceKey): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function isWithinRange(
  key: CompetenceKey,
  range: { start: CompetenceKey; end: CompetenceKey }
): boolean {
  return key >= range.start && key <= range.end;
}

/**
 * Derive a competence from a document path.
 *
 * Looks at the deepest path segments first: a `MM YYYY` / `MM-YYYY` token in a
 * folder or file name, or a `YYYY/MM` folder pair.
 */
export function competenceFromPath(filePath: string): CompetenceKey | null {
  const segments = filePath.split(/[\\/]+/).filter((s) => s.length > 0);

  for (let i = segments.length - 1; i >= 0; i--) {
    const segment = segments[i];

    const inline = segment.match(/(?<!\d)(\d{1,2})\s*[-.\s]\s*(\d{4})(?!\d)/);
    if (inline) {
      const period = toPeriod(parseInt(inline[2], 10), parseInt(inline[1], 10));
      if (period) return formatCompetence(period);
    }

    if (/^\d{1,2}$/.test(segment) && i > 0 && /^\d{4}$/.test(segments[i - 1])) {
      const period = toPeriod(parseInt(segments[i - 1], 10), parseInt(segment, 10));
      if (period) return formatCompetence(period);
    }
  }

  return null;
}
