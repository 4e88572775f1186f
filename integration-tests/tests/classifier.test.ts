/**
 * Layout Classifier Tests
 */

import { classifyDocument, getClassificationRules } from '@ledgerline/shared';
import { guideDetailText, PRINTED_REGISTRATION, standardInvoiceText } from './helpers';

const STANDARD = standardInvoiceText({
  number: '1234',
  competence: '08/2023',
  total: '10.000,00',
  iss: '500,00',
  inss: '1.100,00',
});

describe('Layout Classifier', () => {
  describe('invoices', () => {
    it('should classify a service value header as a standard invoice', () => {
      const result = classifyDocument({ text: STANDARD, kind: 'invoice', filename: 'NF 1234.pdf' });
      expect(result.outcome).toBe('standard-invoice');
      expect(result.matchedRule).toBe('standard-invoice');
    });

    it('should classify an inline total as the legacy layout', () => {
      const text = [
        'PREFEITURA MUNICIPAL DE SOROCABA',
        'NOTA FISCAL DE SERVIÇOS ELETRÔNICA',
        'VALOR TOTAL DO SERVIÇO R$ 1.500,00',
      ].join('\n');
      expect(classifyDocument({ text, kind: 'invoice', filename: 'NF 88.pdf' }).outcome).toBe('inline-legacy-invoice');
    });

    it('should classify "Data Fato Gerador" without competence as a security service invoice', () => {
      const text = [
        'NOTA FISCAL DE SERVIÇOS ELETRÔNICA',
        'Data Fato Gerador: 15/08/2023',
        'SERVIÇO DE VIGILÂNCIA PATRIMONIAL',
        'ALÍQUOTA ISS 5,00 250,00',
      ].join('\n');
      expect(classifyDocument({ text, kind: 'invoice', filename: 'NF 9.pdf' }).outcome).toBe(
        'security-service-invoice'
      );
    });

    it('should prefer the standard layout when competence is also present', () => {
      const text = `Data Fato Gerador: 15/08/2023\n${STANDARD}`;
      expect(classifyDocument({ text, kind: 'invoice', filename: 'NF 1234.pdf' }).outcome).toBe('standard-invoice');
    });

    it('should filter out payment slips by filename', () => {
      const result = classifyDocument({ text: STANDARD, kind: 'invoice', filename: 'Boleto 08-2023.pdf' });
      expect(result.outcome).toBe('filtered-out');
      expect(result.matchedRule).toBe('non-target-invoice');
    });

    it('should report documents without anchors as unrecognized', () => {
      const text = 'Relatório interno de medição da obra, sem valores fiscais declarados neste documento.';
      expect(classifyDocument({ text, kind: 'invoice', filename: 'medicao.pdf' })).toEqual({
        outcome: 'unrecognized',
        matchedRule: 'none',
        reason: 'no layout anchor matched',
      });
    });
  });

  describe('payroll reports', () => {
    it('should classify a guide detail report', () => {
      const text = guideDetailText('08/2023', [[PRINTED_REGISTRATION, 12]]);
      expect(classifyDocument({ text, kind: 'payroll-report', filename: 'SEFIP 08-2023.pdf' }).outcome).toBe(
        'fgts-guide-detail'
      );
    });

    it('should classify an FGTS Digital guide', () => {
      const text = [
        'Guia do FGTS Digital - GFD',
        'Empregador: Construtora Alfa Ltda',
        'Competência Trabalhadores Valor',
        '08/2023 12 1.234,56',
      ].join('\n');
      expect(classifyDocument({ text, kind: 'payroll-report', filename: 'GFD 08-2023.pdf' }).outcome).toBe(
        'fgts-digital-guide'
      );
    });

    it('should classify a closing summary as the classic layout', () => {
      const text = [
        'RESUMO DO FECHAMENTO - EMPRESA',
        'Competência: 08/2023',
        `CNO ${PRINTED_REGISTRATION}`,
        'TOTAIS: 15',
      ].join('\n');
      expect(classifyDocument({ text, kind: 'payroll-report', filename: 'SEFIP.pdf' }).outcome).toBe(
        'classic-payroll-summary'
      );
    });

    it('should filter out pay slips', () => {
      const text = guideDetailText('08/2023', [[PRINTED_REGISTRATION, 12]]);
      expect(classifyDocument({ text, kind: 'payroll-report', filename: 'Holerite agosto.pdf' }).outcome).toBe(
        'filtered-out'
      );
    });

    it('should not apply invoice layouts to payroll reports', () => {
      expect(classifyDocument({ text: STANDARD, kind: 'payroll-report', filename: 'SEFIP.pdf' }).outcome).toBe(
        'unrecognized'
      );
    });
  });

  it('should require OCR when the text layer is nearly empty', () => {
    const result = classifyDocument({ text: '  NF 12  \n', kind: 'invoice', filename: 'NF 12.pdf' });
    expect(result.outcome).toBe('ocr-required');
  });

  it('should require OCR when there is no text at all', () => {
    expect(classifyDocument({ text: null, kind: 'payroll-report', filename: 'SEFIP.pdf' }).outcome).toBe(
      'ocr-required'
    );
  });

  it('should evaluate rules in a fixed order', () => {
    expect(getClassificationRules().map((r) => r.name)).toEqual([
      'no-text-layer',
      'non-target-payroll',
      'non-target-invoice',
      'security-service-invoice',
      'inline-legacy-invoice',
      'standard-invoice',
      'fgts-guide-detail',
      'fgts-digital-guide',
      'classic-payroll-summary',
    ]);
  });
});
