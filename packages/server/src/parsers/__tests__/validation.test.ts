import { describe, it, expect } from 'vitest';
import {
  US_DATE_FORMATS,
  cleanDescription,
  isLikelyPayment,
  isValidDescription,
  parseAmount,
  parseStatementDate,
} from '../validation.js';

describe('parseAmount', () => {
  it('should strip currency symbols and thousands separators', () => {
    expect(parseAmount('$1,234.56')).toBe(1234.56);
    expect(parseAmount(' 42 ')).toBe(42);
  });

  it('should treat parentheses and a trailing minus as negative', () => {
    expect(parseAmount('(12.00)')).toBe(-12);
    expect(parseAmount('45.00-')).toBe(-45);
    expect(parseAmount('-$7.25')).toBe(-7.25);
  });

  it('should reject text that is not an amount', () => {
    expect(parseAmount('')).toBeNull();
    expect(parseAmount('abc')).toBeNull();
    expect(parseAmount('12.3.4')).toBeNull();
    expect(parseAmount(null)).toBeNull();
  });

  it('should reject amounts beyond one million', () => {
    expect(parseAmount('2,000,000.00')).toBeNull();
    expect(parseAmount(Number.POSITIVE_INFINITY)).toBeNull();
    expect(parseAmount('1000000')).toBe(1_000_000);
  });
});

describe('parseStatementDate', () => {
  it('should parse US dates into ISO form', () => {
    expect(parseStatementDate('01/15/2024', US_DATE_FORMATS)).toBe('2024-01-15');
    expect(parseStatementDate('1/5/24', US_DATE_FORMATS)).toBe('2024-01-05');
  });

  it('should reject impossible dates instead of rolling them over', () => {
    expect(parseStatementDate('02/30/2024', US_DATE_FORMATS)).toBeNull();
    expect(parseStatementDate('13/45/2024', US_DATE_FORMATS)).toBeNull();
  });

  it('should reject years outside 2000 to 2100', () => {
    expect(parseStatementDate('01/15/1999', US_DATE_FORMATS)).toBeNull();
    expect(parseStatementDate('01/15/2101', US_DATE_FORMATS)).toBeNull();
  });

  it('should only accept the formats it is given', () => {
    expect(parseStatementDate('2024-01-15', US_DATE_FORMATS)).toBeNull();
    expect(parseStatementDate('2024-01-15', ['YYYY-MM-DD'])).toBe('2024-01-15');
  });
});

describe('descriptions', () => {
  it('should collapse whitespace', () => {
    expect(cleanDescription('  STARBUCKS   STORE\t123 ')).toBe('STARBUCKS STORE 123');
  });

  it('should bound description length', () => {
    expect(isValidDescription('')).toBe(false);
    expect(isValidDescription('x'.repeat(500))).toBe(true);
    expect(isValidDescription('x'.repeat(501))).toBe(false);
  });
});

describe('isLikelyPayment', () => {
  it('should recognise card payment descriptions', () => {
    expect(isLikelyPayment('AUTOMATIC PAYMENT - THANK YOU')).toBe(true);
    expect(isLikelyPayment('Payment Thank You-Mobile')).toBe(true);
  });

  it('should recognise a payment raw category', () => {
    expect(isLikelyPayment('ACME CORP', 'Payment/Credit')).toBe(true);
  });

  it('should not flag ordinary purchases', () => {
    expect(isLikelyPayment('STARBUCKS STORE 123', 'Food & Drink')).toBe(false);
    expect(isLikelyPayment('STARBUCKS STORE 123', null)).toBe(false);
  });
});
