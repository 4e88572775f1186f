/**
 * Text Orientation
 *
 * Some scans carry a text layer that reads upside down: characters of each
 * line reversed and lines in reverse order. Detect that by keyword scoring
 * and restore reading order.
 */

import type { PageText, Rotation } from '../types';

const KEYWORDS = [
  'Trabalhadores',
  'Detalhe',
  'Guia',
  'Empregador',
  'FECHAMENTO',
  'RESUMO',
  'Competência',
  'Tomador',
  'Nota Fiscal',
  'Prestador',
];

const SHORT_LINE = 30;

function reverseString(value: string): string {
  return Array.from(value).reverse().join('');
}

function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count++;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
}

export function orientationScores(text: string): { upright: number; reversed: number } {
  const lower = text.toLowerCase();
  let upright = 0;
  let reversed = 0;
  for (const keyword of KEYWORDS) {
    upright += countOccurrences(lower, keyword.toLowerCase());
    reversed += countOccurrences(lower, reverseString(keyword).toLowerCase());
  }
  return { upright, reversed };
}

export function isReversedText(text: string): boolean {
  const { upright, reversed } = orientationScores(text);
  return reversed > upright && reversed >= 2;
}

/**
 * Reverse characters per line and the line order, then merge runs of short
 * fragments into single lines.
 */
export function reverseText(text: string): string {
  const lines = text
    .split(/\r?\n/)
    .map(reverseString)
    .reverse();

  const merged: string[] = [];
  let buffer: string[] = [];
  for (const line of lines) {
    const trimmed = line.trim();
    if (trimmed.length > 0 && trimmed.length < SHORT_LINE) {
      buffer.push(trimmed);
      continue;
    }
    if (buffer.length > 0) {
      merged.push(buffer.join(' '));
      buffer = [];
    }
    merged.push(trimmed);
  }
  if (buffer.length > 0) merged.push(buffer.join(' '));

  return merged.join('\n');
}

/**
 * Normalize the orientation of a document's pages. The document is
 * considered rotated when its combined text scores as reversed.
 */
export function normalizeTextOrientation(pages: PageText[]): { pages: PageText[]; rotation: Rotation } {
  const combined = pages.map((p) => p.text).join('\n');
  if (!isReversedText(combined)) {
    return { pages, rotation: 0 };
  }
  return {
    pages: pages.map((p) => ({ pageNumber: p.pageNumber, text: reverseText(p.text) })),
    rotation: 180,
  };
}
