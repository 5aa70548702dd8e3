import Decimal from 'decimal.js';
import { divide, formatBRL, formatQuantity, parseDecimal, toMoneyNumber, toMoneyString } from './decimal.util';

describe('decimal.util', () => {
  describe('parseDecimal', () => {
    it('should pass numeric cells through', () => {
      expect(parseDecimal(10.5)?.toString()).toBe('10.5');
      expect(parseDecimal(0)?.toString()).toBe('0');
    });

    it('should parse plain decimal strings', () => {
      expect(parseDecimal('1234.56')?.toString()).toBe('1234.56');
      expect(parseDecimal(' 40 ')?.toString()).toBe('40');
    });

    it('should parse pt-BR formatted strings', () => {
      expect(parseDecimal('1.234,56')?.toString()).toBe('1234.56');
      expect(parseDecimal('10,5')?.toString()).toBe('10.5');
      expect(parseDecimal('R$ 2.000,00')?.toString()).toBe('2000');
    });

    it('should read dotted groups of three digits as thousands', () => {
      expect(parseDecimal('1.000')?.toString()).toBe('1000');
      expect(parseDecimal('12.500')?.toString()).toBe('12500');
      expect(parseDecimal('1.000.000')?.toString()).toBe('1000000');
      expect(parseDecimal('12.500,00')?.toString()).toBe('12500');
      expect(parseDecimal('-3.250')?.toString()).toBe('-3250');
    });

    it('should keep other dotted values as plain decimals', () => {
      expect(parseDecimal('10.5')?.toString()).toBe('10.5');
      expect(parseDecimal('0.25')?.toString()).toBe('0.25');
      expect(parseDecimal('1234.5678')?.toString()).toBe('1234.5678');
    });

    it('should return null for anything else', () => {
      expect(parseDecimal('abc')).toBeNull();
      expect(parseDecimal('')).toBeNull();
      expect(parseDecimal(null)).toBeNull();
      expect(parseDecimal(true)).toBeNull();
      expect(parseDecimal(Number.NaN)).toBeNull();
      expect(parseDecimal(new Date(2024, 0, 1))).toBeNull();
    });
  });

  describe('money formatting', () => {
    it('should round half up to cents', () => {
      expect(toMoneyString(new Decimal('10.005'))).toBe('10.01');
      expect(toMoneyString(new Decimal('200'))).toBe('200.00');
      expect(toMoneyNumber(new Decimal('13.3333'))).toBe(13.33);
    });

    it('should format Brazilian currency with thousands separators', () => {
      expect(formatBRL(new Decimal('1234567.5'))).toBe('R$ 1.234.567,50');
      expect(formatBRL(new Decimal('200'))).toBe('R$ 200,00');
      expect(formatBRL(new Decimal('-35.1'))).toBe('-R$ 35,10');
    });

    it('should format quantities without trailing zeros', () => {
      expect(formatQuantity(new Decimal('60'))).toBe('60');
      expect(formatQuantity(new Decimal('1.50'))).toBe('1,5');
      expect(formatQuantity(new Decimal('12000'))).toBe('12.000');
    });
  });

  describe('divide', () => {
    it('should throw on division by zero', () => {
      expect(() => divide(new Decimal(1), new Decimal(0))).toThrow('Division by zero');
    });
  });
});
