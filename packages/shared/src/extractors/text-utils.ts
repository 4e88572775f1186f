/**
 * Text helpers shared by the layout extractors.
 */

import type { PageText } from '../types';
import type { RawField } from './types';

/** Brazilian money token: `1.234,56`, `0,00`. */
export const MONEY_PATTERN = /\d{1,3}(?:\.\d{3})*,\d{2}|\d+,\d{2}/g;

export interface PageLine {
  pageNumber: number;
  index: number;
  text: string;
}

export function splitLines(pages: PageText[]): PageLine[] {
  const lines: PageLine[] = [];
  for (const page of pages) {
    page.text.split(/\r?\n/).forEach((text, index) => {
      lines.push({ pageNumber: page.pageNumber, index, text: text.trim() });
    });
  }
  return lines;
}

export function combinedText(pages: PageText[]): string {
  return pages.map((p) => p.text).join('\n');
}

export function findMoneyValues(text: string): string[] {
  return text.match(MONEY_PATTERN) ?? [];
}

/**
 * Collapse number separators so `12.345.67890/12` reads `123456789012`.
 * Whitespace is kept: it separates table columns.
 */
export function collapseNumberSeparators(text: string): string {
  return text.replace(/(\d)[./-](?=\d)/g, '$1');
}

export function digitRuns(text: string, minLength: number): string[] {
  const pattern = new RegExp(`\\d{${minLength},}`, 'g');
  return collapseNumberSeparators(text).match(pattern) ?? [];
}

export function containsRegistration(text: string, registrationNumber: string): boolean {
  return text.replace(/[\s./-]/g, '').includes(registrationNumber);
}

export function quote(text: string, maxLength = 160): string {
  const singleLine = text.replace(/\s+/g, ' ').trim();
  return singleLine.length > maxLength ? `${singleLine.slice(0, maxLength - 3)}...` : singleLine;
}

export function rawField(value: string, pageNumber: number, source: string): RawField {
  return { value: value.trim(), pageNumber, quote: quote(source) };
}

/**
 * Page number of the page containing character `offset` of `combinedText(pages)`.
 */
export function pageAtOffset(pages: PageText[], offset: number): number {
  let cursor = 0;
  for (const page of pages) {
    cursor += page.text.length + 1;
    if (offset < cursor) return page.pageNumber;
  }
  return pages.length > 0 ? pages[pages.length - 1].pageNumber : 1;
}

/**
 * Run a regex over the combined text and return the first capture group as a field.
 */
export function matchField(
  pages: PageText[],
  pattern: RegExp,
  group = 1
): RawField | null {
  const text = combinedText(pages);
  const match = pattern.exec(text);
  if (!match || match[group] === undefined) return null;
  return rawField(match[group], pageAtOffset(pages, match.index), match[0]);
}
