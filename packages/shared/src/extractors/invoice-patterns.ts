/**
 * Service Invoice (NFS-e) Extraction Patterns
 *
 * Municipal NFS-e layouts differ mostly in where the totals sit:
 * - Standard: a "VALOR SERVIÇOS ... VALOR ISS" header row with values on the next line
 * - Inline legacy: "VALOR TOTAL DO SERVIÇO R$ 1.234,56" on one line
 * - Security services: "Data Fato Gerador" instead of "Competência", ISS next to "ALÍQUOTA"
 *
 * Tax tables are addressed by column:
 * - "PIS (R$) COFINS (R$) INSS (R$) IR (R$) ..." -> 3rd value is INSS
 * - "Deduções / Base de Cálculo / Alíquota / Valor do ISS" -> 3rd is the rate, 4th is ISS
 */

import type { PageText, ServiceCategory } from '../types';
import type { RawField } from './types';
import {
  combinedText,
  findMoneyValues,
  matchField,
  pageAtOffset,
  rawField,
  splitLines,
  type PageLine,
} from './text-utils';

const MONEY = '(\\d{1,3}(?:\\.\\d{3})*,\\d{2}|\\d+,\\d{2})';

// ============================================================================
// Document Number
// ============================================================================

const COLLECTION_LINE_PATTERN = /Tipo\s*\/\s*Local\s+de\s+Recolhimento/i;
const NUMBER_LABEL_PATTERN = /(?:N[º°o]\.?|N[úu]mero)\s*(?:da\s+)?(?:Nota(?:\s+Fiscal)?|NFS-?e)/i;
const NUMBER_TOKEN_PATTERN = /^\s*:?\s*(\d[\d./-]*)/;
const FILENAME_NUMBER_PATTERN = /(?:NFS-?E?|NF)\s*[-_.nº°]*\s*(\d+)/i;

/** Numbers printed on the collection line are small sequential note numbers. */
const MAX_COLLECTION_LINE_NUMBER = 100000;

function numberAfterLabel(lines: PageLine[], i: number, labelEnd: number): RawField | null {
  const sameLine = lines[i].text.slice(labelEnd).match(NUMBER_TOKEN_PATTERN);
  if (sameLine) {
    return rawField(sameLine[1], lines[i].pageNumber, lines[i].text);
  }
  for (let j = i + 1; j <= i + 2 && j < lines.length; j++) {
    const next = lines[j].text.match(NUMBER_TOKEN_PATTERN);
    if (next) {
      return rawField(next[1], lines[j].pageNumber, `${lines[i].text} ${lines[j].text}`);
    }
  }
  return null;
}

/**
 * Extract the invoice number.
 *
 * Order: trailing number of the collection line, a "Nº da Nota Fiscal" /
 * "Número da Nota" label (same line or the next two), "NFS-e Nº", then the
 * filename (`NF 123.pdf`).
 */
export function extractDocumentNumber(pages: PageText[], filename: string): RawField | null {
  const lines = splitLines(pages);

  for (const line of lines) {
    if (!COLLECTION_LINE_PATTERN.test(line.text)) continue;
    const trailing = line.text.match(/(\d+)\s*$/);
    if (trailing && parseInt(trailing[1], 10) < MAX_COLLECTION_LINE_NUMBER) {
      return rawField(trailing[1], line.pageNumber, line.text);
    }
  }

  for (let i = 0; i < lines.length; i++) {
    const label = NUMBER_LABEL_PATTERN.exec(lines[i].text);
    if (!label) continue;
    const field = numberAfterLabel(lines, i, label.index + label[0].length);
    if (field) return field;
  }

  const nfseNumber = matchField(pages, /NFS-?e\s*N[º°o]\.?\s*:?\s*(\d+)/i);
  if (nfseNumber) return nfseNumber;

  const fromFilename = filename.match(FILENAME_NUMBER_PATTERN);
  if (fromFilename) {
    return { value: fromFilename[1], pageNumber: 0, quote: filename };
  }

  return null;
}

// ============================================================================
// Competence
// ============================================================================

const MONTH_TOKEN = '(\\d{1,2}\\/\\d{1,2}\\/\\d{4}|\\d{1,2}\\s*\\/\\s*\\d{4}|[A-Za-zçÇ]+\\s*(?:\\/|de)\\s*\\d{4})';

const COMPETENCE_PATTERNS: readonly RegExp[] = [
  new RegExp(`Compet[êe]ncia\\s*(?:da\\s+NFS-?e)?\\s*:?\\s*${MONTH_TOKEN}`, 'i'),
  /Per[íi]odo\s*(?:de\s+)?(?:Refer[êe]ncia|Apura[çc][ãa]o)?\s*:?\s*(\d{1,2}\/\d{4})/i,
  /M[ÊE]S\s*\/\s*COMP\w*\s*:?\s*(\d{1,2}\/\d{4})/i,
];

const FACT_GENERATOR_PATTERN = /Data\s+(?:do\s+)?Fato\s+Gerador/i;
const REFERENCE_PATTERN = new RegExp(
  `referente\\s+(?:ao?\\s+)?(?:m[êe]s\\s+(?:de\\s+)?)?${MONTH_TOKEN}`,
  'i'
);

/**
 * Extract the competence token of an invoice.
 *
 * Order: "Competência", "Período", "MÊS/COMP", the "Data Fato Gerador" date
 * (same or next line), then a "referente a ..." phrase in the description.
 */
export function extractInvoiceCompetence(pages: PageText[]): RawField | null {
  for (const pattern of COMPETENCE_PATTERNS) {
    const field = matchField(pages, pattern);
    if (field) return field;
  }

  const lines = splitLines(pages);
  for (let i = 0; i < lines.length; i++) {
    if (!FACT_GENERATOR_PATTERN.test(lines[i].text)) continue;
    for (let j = i; j <= i + 1 && j < lines.length; j++) {
      const date = lines[j].text.match(/(\d{2}\/\d{2}\/\d{4})/);
      if (date) {
        return rawField(date[1], lines[j].pageNumber, `${lines[i].text} ${j > i ? lines[j].text : ''}`);
      }
    }
  }

  return matchField(pages, REFERENCE_PATTERN);
}

// ============================================================================
// Totals
// ============================================================================

const SERVICE_VALUE_HEADER = /VALOR\s+(?:DOS?\s+)?SERVI[ÇC]OS?/i;
const INLINE_TOTAL_PATTERN = new RegExp(
  `VALOR\\s+TOTAL\\s+(?:DO\\s+|DA\\s+)?(?:NOTA|SERVI[ÇC]OS?)\\s*:?\\s*R\\$\\s*${MONEY}`,
  'i'
);
const LABELLED_TOTAL_PATTERN = new RegExp(
  `VALOR\\s+(?:DOS?\\s+)?SERVI[ÇC]OS?\\s*(?:\\(R\\$\\))?\\s*:?\\s*(?:R\\$)?\\s*${MONEY}`,
  'i'
);

export interface ServiceTotals {
  total: RawField | null;
  /** Last column of the header row, when the row carries the ISS amount. */
  iss: RawField | null;
}

/**
 * Header row "VALOR SERVIÇOS ... VALOR ISS" with values on the next line:
 * the first value is the service total and the last is ISS.
 */
export function extractServiceTotalsRow(pages: PageText[]): ServiceTotals {
  const lines = splitLines(pages);
  for (let i = 0; i < lines.length - 1; i++) {
    const line = lines[i];
    if (!SERVICE_VALUE_HEADER.test(line.text) || !/ISS/i.test(line.text)) continue;
    const next = lines[i + 1];
    const values = findMoneyValues(next.text);
    if (values.length === 0) continue;
    const source = `${line.text} ${next.text}`;
    return {
      total: rawField(values[0], next.pageNumber, source),
      iss: values.length > 1 ? rawField(values[values.length - 1], next.pageNumber, source) : null,
    };
  }
  return { total: null, iss: null };
}

export function extractInlineTotal(pages: PageText[]): RawField | null {
  return matchField(pages, INLINE_TOTAL_PATTERN);
}

export function extractLabelledTotal(pages: PageText[]): RawField | null {
  return matchField(pages, LABELLED_TOTAL_PATTERN);
}

// ============================================================================
// Taxes
// ============================================================================

const ISS_LABEL = /Valor\s+d[oe]\s+(?:ISSQN|ISS)/i;
const ISS_DEDUCTIONS_ROW = /Dedu|Base\s+de/i;
const INSS_HEADER = /INSS\s*\(R\$\)/i;
const IR_HEADER = /IR\s*\(R\$\)/i;
const INSS_MULTI_COLUMN = /PIS|COFINS/i;
const INLINE_INSS_PATTERN = new RegExp(`INSS\\s*(?:\\(R\\$\\))?\\s*:?\\s*(?:R\\$\\s*)?${MONEY}`, 'i');
const SECURITY_RATE_PATTERN = /AL[ÍI]QUOTA[\s\S]*?ISS/i;
const SECURITY_WINDOW = 200;

export interface IssFields {
  iss: RawField | null;
  rate: RawField | null;
}

/**
 * ISS from the "Valor do ISS" block. On a deductions row
 * (Deduções / Base de Cálculo / Alíquota / Valor do ISS) the values line
 * holds the rate in the 3rd column and ISS in the 4th.
 */
export function extractIssBlock(pages: PageText[]): IssFields {
  const lines = splitLines(pages);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const label = ISS_LABEL.exec(line.text);
    if (!label) continue;

    if (ISS_DEDUCTIONS_ROW.test(line.text)) {
      const next = lines[i + 1];
      if (!next) continue;
      const values = findMoneyValues(next.text);
      if (values.length < 4) continue;
      const source = `${line.text} ${next.text}`;
      return {
        rate: rawField(values[2], next.pageNumber, source),
        iss: rawField(values[3], next.pageNumber, source),
      };
    }

    const sameLine = findMoneyValues(line.text.slice(label.index + label[0].length));
    if (sameLine.length > 0) {
      return { iss: rawField(sameLine[0], line.pageNumber, line.text), rate: null };
    }
    const next = lines[i + 1];
    const nextValues = next ? findMoneyValues(next.text) : [];
    if (next && nextValues.length > 0) {
      return { iss: rawField(nextValues[0], next.pageNumber, `${line.text} ${next.text}`), rate: null };
    }
  }
  return { iss: null, rate: null };
}

/**
 * Security-service layout: ISS is the last amount within a short window
 * after "ALÍQUOTA ... ISS"; the rate is the first when there are several.
 */
export function extractSecurityIss(pages: PageText[]): IssFields {
  const text = combinedText(pages);
  const match = SECURITY_RATE_PATTERN.exec(text);
  if (!match) return { iss: null, rate: null };

  const start = match.index + match[0].length;
  const window = text.slice(start, start + SECURITY_WINDOW);
  const values = findMoneyValues(window);
  if (values.length === 0) return { iss: null, rate: null };

  const pageNumber = pageAtOffset(pages, start);
  const source = `${match[0]} ${window}`;
  return {
    iss: rawField(values[values.length - 1], pageNumber, source),
    rate: values.length > 1 ? rawField(values[0], pageNumber, source) : null,
  };
}

/**
 * INSS from the federal withholding table. With PIS and COFINS columns
 * present INSS is the 3rd value of the next line, otherwise the first.
 */
export function extractInss(pages: PageText[]): RawField | null {
  const lines = splitLines(pages);
  for (let i = 0; i < lines.length - 1; i++) {
    const line = lines[i];
    if (!INSS_HEADER.test(line.text) || !IR_HEADER.test(line.text)) continue;
    const next = lines[i + 1];
    const values = findMoneyValues(next.text);
    const column = INSS_MULTI_COLUMN.test(line.text) ? 2 : 0;
    if (values.length > column) {
      return rawField(values[column], next.pageNumber, `${line.text} ${next.text}`);
    }
  }
  return matchField(pages, INLINE_INSS_PATTERN);
}

// ============================================================================
// Supersede reference & service category
// ============================================================================

const SUPERSEDE_PATTERN =
  /substitui[^\n]*?\b(?:NFS-?e|NF|Nota\s+Fiscal)\s*(?:n?[º°ª.]+|n[úu]mero)?\s*:?\s*0*(\d+)/i;

export function extractSupersedeReference(pages: PageText[]): RawField | null {
  return matchField(pages, SUPERSEDE_PATTERN);
}

const SECURITY_SERVICE_PATTERNS: readonly RegExp[] = [
  /VIGIL[ÂA]NCIA/i,
  /SEGURAN[ÇC]A\s+(?:PATRIMONIAL|PRIVADA|ELETR[ÔO]NICA)/i,
  /MONITORAMENTO/i,
  /\b11\.02\b/,
  /\bRONDA\b/i,
];

/**
 * Surveillance and security services carry no INSS retention.
 */
export function detectServiceCategory(text: string): ServiceCategory {
  return SECURITY_SERVICE_PATTERNS.some((p) => p.test(text)) ? 'security' : 'construction';
}
