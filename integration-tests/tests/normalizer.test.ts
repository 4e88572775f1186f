/**
 * Normalizer Tests
 */

import {
  competenceFromPath,
  competenceKey,
  computeIdentityKey,
  normalizeDocumentNumber,
  parseMoneyToCents,
  parsePercentage,
  parseWorkerCount,
  recordsEquivalent,
  requiredFields,
} from '@ledgerline/shared';
import { invoiceRecord, testProject } from './helpers';

describe('Normalizer', () => {
  describe('parseMoneyToCents', () => {
    it.each([
      ['1.234,56', 123456],
      ['R$ 10.000,00', 1000000],
      ['0,00', 0],
      ['1234.56', 123456],
      ['(1.000,00)', -100000],
      ['-15,5', -1550],
    ])('should parse %s', (raw, cents) => {
      expect(parseMoneyToCents(raw)).toBe(cents);
    });

    it('should reject tokens that are not amounts', () => {
      expect(parseMoneyToCents('abc')).toBeNull();
      expect(parseMoneyToCents('1,2,3')).toBeNull();
      expect(parseMoneyToCents('')).toBeNull();
    });
  });

  describe('parsePercentage', () => {
    it('should read comma and dot decimals with or without a percent sign', () => {
      expect(parsePercentage('5%')).toBe(5);
      expect(parsePercentage('2,5')).toBe(2.5);
      expect(parsePercentage('3.75 %')).toBe(3.75);
    });

    it('should leave range checks to the caller', () => {
      expect(parsePercentage('150')).toBe(150);
    });
  });

  describe('parseWorkerCount', () => {
    it('should accept plain integers only', () => {
      expect(parseWorkerCount('12')).toBe(12);
      expect(parseWorkerCount('1.2')).toBeNull();
    });
  });

  describe('normalizeDocumentNumber', () => {
    it('should drop separators, leading zeros and a check digit', () => {
      expect(normalizeDocumentNumber('000.123')).toBe('123');
      expect(normalizeDocumentNumber('1234-5')).toBe('1234');
      expect(normalizeDocumentNumber(' 2023/45 ')).toBe('202345');
    });

    it('should treat an all-zero number as absent', () => {
      expect(normalizeDocumentNumber('0000')).toBeNull();
    });
  });

  describe('competence', () => {
    it.each([
      ['08/2023', '2023-08'],
      ['15/08/2023', '2023-08'],
      ['2023-08', '2023-08'],
      ['Abril/2025', '2025-04'],
      ['março de 2024', '2024-03'],
    ])('should read %s', (raw, key) => {
      expect(competenceKey(raw)).toBe(key);
    });

    it('should reject impossible months', () => {
      expect(competenceKey('13/2023')).toBeNull();
    });

    it('should derive competence from year and month folders', () => {
      expect(competenceFromPath('NOTA FISCAL/2023/08/NF 1.pdf')).toBe('2023-08');
      expect(competenceFromPath('SEFIP/SEFIP 08-2023.pdf')).toBe('2023-08');
      expect(competenceFromPath('SEFIP/relatorio.pdf')).toBeNull();
    });
  });

  describe('identity', () => {
    it('should key by document number when there is one', () => {
      expect(
        computeIdentityKey({
          provider: 3,
          kind: 'invoice',
          documentNumber: '1234',
          contentHash: 'ab'.repeat(32),
          competence: '2023-08',
        })
      ).toBe('3:invoice:n1234:2023-08');
    });

    it('should fall back to the content hash prefix', () => {
      expect(
        computeIdentityKey({
          provider: 3,
          kind: 'payroll-report',
          documentNumber: null,
          contentHash: '0123456789abcdef'.repeat(4),
          competence: '2023-08',
        })
      ).toBe('3:payroll-report:h0123456789abcdef:2023-08');
    });

    it('should compare records by normalized fields', () => {
      const a = invoiceRecord({ competence: '2023-08', number: '10', totalCents: 5000 });
      const moved = { ...a, path: '/elsewhere/NF 10.pdf' };
      const changed = invoiceRecord({ competence: '2023-08', number: '10', totalCents: 5001 });

      expect(recordsEquivalent(a, moved)).toBe(true);
      expect(recordsEquivalent(a, changed)).toBe(false);
    });
  });

  describe('requiredFields', () => {
    it('should drop the worker count for providers where it is optional', () => {
      const project = testProject({
        providers: [{ index: 1, name: 'Alfa', folder: 'Alfa', overrides: { worker_count_optional: true } }],
      });
      expect(requiredFields('payroll-report', project.providers[0])).toEqual(['competence']);
      expect(requiredFields('invoice')).toEqual(['document_number', 'competence', 'total_value']);
    });
  });
});
