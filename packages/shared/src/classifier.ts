/**
 * Layout Classifier
 *
 * Ordered rule table over document text. The first matching rule wins;
 * rules are mutually exclusive by anchor phrase within a document kind.
 */

import { config } from './config';
import type { ClassificationOutcome, DocumentKind } from './types';

export interface ClassificationInput {
  /** Null when the document has no text layer. */
  text: string | null;
  kind: DocumentKind;
  filename: string;
}

export interface ClassificationResult {
  outcome: ClassificationOutcome;
  matchedRule: string;
  reason: string;
}

interface ClassificationRule {
  name: string;
  kinds: readonly DocumentKind[];
  outcome: ClassificationOutcome;
  matches: (input: NormalizedInput) => boolean;
  reason: string;
}

interface NormalizedInput {
  text: string;
  /** First characters of the text, where document titles live. */
  head: string;
  /** Upper-case filename without accents. */
  filename: string;
  meaningfulChars: number;
}

const HEAD_LENGTH = 400;

function foldAccents(value: string): string {
  return value.normalize('NFD').replace(/[\u0300-\u036f]/g, '');
}

// ============================================================================
// Non-target anchors
// ============================================================================

const NON_TARGET_FILENAMES: Record<DocumentKind, readonly string[]> = {
  'payroll-report': [
    'BOLETO FGTS',
    'CREDITO INSS',
    'COMPENSACAO INSS',
    'DCTFWEB',
    'FOLHA DE PAGAMENTO',
    'FOLHA DE PONTO',
    'GUIA DO FGTS',
    'HOLERITE',
    'CONTRACHEQUE',
    'COMPROVANTE DE DECLARACAO',
    'COMPROVANTE DE PIX',
    'PROTOCOLO DE ENVIO',
    'PARCELAMENTO',
    'RELATORIO ANALITICO DA GPS',
  ],
  invoice: [
    'BOLETO',
    'COMPROVANTE DE PAGAMENTO',
    'COMPROVANTE DE PIX',
    'DARF',
    'GUIA ISS',
    'RECIBO',
  ],
};

const NON_TARGET_TEXT: Record<DocumentKind, readonly RegExp[]> = {
  'payroll-report': [
    /RECIBO\s+DE\s+PAGAMENTO\s+DE\s+SAL[AÁ]RIO/i,
    /CONTRACHEQUE|HOLERITE/i,
    /PEDIDO\s+DE\s+(?:RESTITUI[ÇC][ÃA]O|COMPENSA[ÇC][ÃA]O)/i,
    /DOCUMENTO\s+DE\s+ARRECADA[ÇC][ÃA]O/i,
  ],
  invoice: [
    /RECIBO\s+DO\s+PAGADOR/i,
    /COMPROVANTE\s+DE\s+(?:PAGAMENTO|TRANSFER[ÊE]NCIA)/i,
    /DOCUMENTO\s+DE\s+ARRECADA[ÇC][ÃA]O/i,
  ],
};

function isNonTarget(input: NormalizedInput, kind: DocumentKind): boolean {
  if (NON_TARGET_FILENAMES[kind].some((anchor) => input.filename.includes(anchor))) {
    return true;
  }
  return NON_TARGET_TEXT[kind].some((pattern) => pattern.test(input.head));
}

// ============================================================================
// Layout anchors
// ============================================================================

export const LAYOUT_ANCHORS = {
  factGeneratorDate: /Data\s+(?:do\s+)?Fato\s+Gerador/i,
  competence: /Compet[êe]ncia/i,
  inlineTotal: /VALOR\s+TOTAL\s+(?:DO\s+|DA\s+)?SERVI[ÇC]OS?\s*:?\s*R\$/i,
  serviceValueHeader: /VALOR\s+(?:DOS?\s+)?SERVI[ÇC]OS?|NOTA\s+FISCAL\s+(?:ELETR[ÔO]NICA\s+)?DE\s+SERVI[ÇC]OS?/i,
  guideDetail: /(?:Detalhe|Relat[óo]rio)\s+da\s+Guia/i,
  digitalGuide: /Guia\s+do\s+FGTS\s+Digital|\bGFD\b/i,
  closingSummary: /RESUMO\s+DO\s+FECHAMENTO/i,
};

const RULES: readonly ClassificationRule[] = [
  {
    name: 'no-text-layer',
    kinds: ['invoice', 'payroll-report'],
    outcome: 'ocr-required',
    matches: (input) => input.meaningfulChars < config.minTextChars,
    reason: 'no extractable text',
  },
  {
    name: 'non-target-payroll',
    kinds: ['payroll-report'],
    outcome: 'filtered-out',
    matches: (input) => isNonTarget(input, 'payroll-report'),
    reason: 'not a payroll report',
  },
  {
    name: 'non-target-invoice',
    kinds: ['invoice'],
    outcome: 'filtered-out',
    matches: (input) => isNonTarget(input, 'invoice'),
    reason: 'not a service invoice',
  },
  {
    name: 'security-service-invoice',
    kinds: ['invoice'],
    outcome: 'security-service-invoice',
    matches: (input) =>
      LAYOUT_ANCHORS.factGeneratorDate.test(input.text) && !LAYOUT_ANCHORS.competence.test(input.text),
    reason: '"Data Fato Gerador" present without "Competência"',
  },
  {
    name: 'inline-legacy-invoice',
    kinds: ['invoice'],
    outcome: 'inline-legacy-invoice',
    matches: (input) => LAYOUT_ANCHORS.inlineTotal.test(input.text),
    reason: 'inline "VALOR TOTAL DO SERVIÇO R$" marker',
  },
  {
    name: 'standard-invoice',
    kinds: ['invoice'],
    outcome: 'standard-invoice',
    matches: (input) => LAYOUT_ANCHORS.serviceValueHeader.test(input.text),
    reason: 'service value table header',
  },
  {
    name: 'fgts-guide-detail',
    kinds: ['payroll-report'],
    outcome: 'fgts-guide-detail',
    matches: (input) => LAYOUT_ANCHORS.guideDetail.test(input.text),
    reason: '"Detalhe da Guia" report',
  },
  {
    name: 'fgts-digital-guide',
    kinds: ['payroll-report'],
    outcome: 'fgts-digital-guide',
    matches: (input) => LAYOUT_ANCHORS.digitalGuide.test(input.text),
    reason: 'FGTS Digital guide',
  },
  {
    name: 'classic-payroll-summary',
    kinds: ['payroll-report'],
    outcome: 'classic-payroll-summary',
    matches: (input) => LAYOUT_ANCHORS.closingSummary.test(input.text),
    reason: '"RESUMO DO FECHAMENTO" page',
  },
];

/**
 * Classify a document's layout from its text.
 */
export function classifyDocument(input: ClassificationInput): ClassificationResult {
  const text = input.text ?? '';
  const normalized: NormalizedInput = {
    text,
    head: text.slice(0, HEAD_LENGTH),
    filename: foldAccents(input.filename).toUpperCase(),
    meaningfulChars: text.replace(/\s+/g, '').length,
  };

  for (const rule of RULES) {
    if (!rule.kinds.includes(input.kind)) continue;
    if (rule.matches(normalized)) {
      return { outcome: rule.outcome, matchedRule: rule.name, reason: rule.reason };
    }
  }

  return { outcome: 'unrecognized', matchedRule: 'none', reason: 'no layout anchor matched' };
}

export function getClassificationRules(): ReadonlyArray<{ name: string; kinds: readonly DocumentKind[]; outcome: ClassificationOutcome }> {
  return RULES.map(({ name, kinds, outcome }) => ({ name, kinds, outcome }));
}
