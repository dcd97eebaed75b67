import { describe, it, expect } from 'vitest';
import { ParseError } from '../../errors.js';
import { amexYearEndPdfParser, cleanAmexDescription } from '../amex-year-end-pdf-parser.js';
import { chasePdfParser, resolveStatementYear } from '../chase-pdf-parser.js';
import { chaseReportPdfParser } from '../chase-report-pdf-parser.js';
import { coinbasePdfParser } from '../coinbase-pdf-parser.js';
import { createParseContext } from '../types.js';
import { collect, pdfDocument } from './helpers.js';

describe('resolveStatementYear', () => {
  it('should put December rows of a January statement in the previous year', () => {
    const yearFor = resolveStatementYear('Opening/Closing Date 12/15/23 - 01/14/24');
    expect(yearFor?.(12)).toBe(2023);
    expect(yearFor?.(1)).toBe(2024);
  });

  it('should fall back to the statement date', () => {
    const yearFor = resolveStatementYear('Statement Date: 02/14/2024');
    expect(yearFor?.(2)).toBe(2024);
    expect(yearFor?.(11)).toBe(2023);
  });

  it('should fall back to a month heading', () => {
    expect(resolveStatementYear('March 2024 statement')?.(3)).toBe(2024);
  });

  it('should return null when no year is printed', () => {
    expect(resolveStatementYear('no dates here')).toBeNull();
  });
});

describe('chase-pdf parser', () => {
  it('should parse rows across a year boundary and join wrapped descriptions', async () => {
    const document = pdfDocument([
      'CHASE',
      'Opening/Closing Date 12/15/23 - 01/14/24',
      'ACCOUNT ACTIVITY',
      'Date of Transaction Merchant Name or Transaction Description $ Amount',
      'PAYMENTS AND OTHER CREDITS',
      '12/20 AUTOMATIC PAYMENT - THANK YOU -450.00',
      'PURCHASE',
      '12/18 STARBUCKS STORE 123 SEATTLE WA 5.75',
      '01/03 WHOLE FOODS MARKET #10 SEATTLE WA 84.12',
      '01/05 AMAZON MKTPL*AB12CD34E',
      'AMZN.COM/BILL WA 23.99',
      '01/09 REFUND SOMETHING -10.00',
    ]);
    const context = createParseContext();

    const candidates = await collect(chasePdfParser, document, context);

    expect(candidates).toEqual([
      { date: '2023-12-18', description: 'STARBUCKS STORE 123 SEATTLE WA', amount: -5.75, rawCategory: null },
      { date: '2024-01-03', description: 'WHOLE FOODS MARKET #10 SEATTLE WA', amount: -84.12, rawCategory: null },
      { date: '2024-01-05', description: 'AMAZON MKTPL*AB12CD34E AMZN.COM/BILL WA', amount: -23.99, rawCategory: null },
      { date: '2024-01-09', description: 'REFUND SOMETHING', amount: 10, rawCategory: null },
    ]);
    expect(context.stats.paymentsFiltered).toBe(1);
  });

  it('should fail on a row with a missing amount, naming the row', async () => {
    const document = pdfDocument([
      'CHASE',
      'Statement Date: 02/14/2024',
      'ACCOUNT ACTIVITY',
      '02/01 GOOD MERCHANT 5.00',
      '02/02 BROKEN MERCHANT',
      '02/03 ANOTHER 7.00',
    ]);

    const error = await collect(chasePdfParser, document).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({
      row: 5,
      message: 'Row 5: expected date, description and amount in "02/02 BROKEN MERCHANT"',
    });
  });

  it('should not take the amount of a summary line that follows a row missing its amount', async () => {
    const document = pdfDocument([
      'Statement Date: 02/14/2024',
      '02/01 GOOD MERCHANT 5.00',
      '02/02 BROKEN MERCHANT',
      'Total fees charged in 2024 $35.00',
    ]);

    const error = await collect(chasePdfParser, document).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({
      row: 3,
      message: 'Row 3: expected date, description and amount in "02/02 BROKEN MERCHANT"',
    });
  });

  it('should fail when the statement year cannot be found', async () => {
    const document = pdfDocument(['CHASE', 'ACCOUNT ACTIVITY', '02/01 GOOD MERCHANT 5.00']);
    await expect(collect(chasePdfParser, document)).rejects.toThrow(
      'Could not determine the statement year for this Chase statement'
    );
  });
});

describe('chase-report-pdf parser', () => {
  it('should carry the category heading onto its rows', async () => {
    const document = pdfDocument([
      'Chase Spending Report',
      'Spending by Category',
      'FOOD_AND_DRINK',
      'Jan 26, 2025 Jan 28, 2025 STARBUCKS STORE 123 $5.75',
      'Jan 27, 2025 Jan 29, 2025 SWEETGREEN SEATTLE $14.20',
      'AUTOMOTIVE',
      'Jan 26, 2025 Jan 29, 2025 UNCLE IKES CAR WASH $20.25',
    ]);

    const candidates = await collect(chaseReportPdfParser, document);

    expect(candidates).toEqual([
      { date: '2025-01-26', description: 'STARBUCKS STORE 123', amount: -5.75, rawCategory: 'Food & Dining' },
      { date: '2025-01-27', description: 'SWEETGREEN SEATTLE', amount: -14.2, rawCategory: 'Food & Dining' },
      { date: '2025-01-26', description: 'UNCLE IKES CAR WASH', amount: -20.25, rawCategory: 'Gas' },
    ]);
  });

  it('should reject a row without its posted date', async () => {
    const document = pdfDocument([
      'Chase Spending Report',
      'FOOD_AND_DRINK',
      'Jan 30, 2025 MISSING POSTED DATE $9.99',
    ]);

    await expect(collect(chaseReportPdfParser, document)).rejects.toMatchObject({ row: 3 });
  });
});

describe('amex-year-end-pdf parser', () => {
  it('should clean descriptions and use the category heading', async () => {
    const document = pdfDocument([
      'Year-End Summary',
      'Prepared for',
      'J DOE',
      'Includes charges from 01/01/2024 through 12/31/2024',
      'Restaurant',
      '01/12/2024 January SWEETGREEN SEATTLE WA $14.20',
      '01/20/2024 February CAFE LUNA 12345 $9.50',
      'Airline',
      '03/02/2024 March DELTA AIR LINES ATLANTA GA $401.97',
      'Subtotal',
    ]);

    const candidates = await collect(amexYearEndPdfParser, document);

    expect(candidates).toEqual([
      { date: '2024-01-12', description: 'SWEETGREEN SEATTLE', amount: -14.2, rawCategory: 'Restaurant' },
      { date: '2024-01-20', description: 'CAFE LUNA', amount: -9.5, rawCategory: 'Restaurant' },
      { date: '2024-03-02', description: 'DELTA AIR LINES ATLANTA', amount: -401.97, rawCategory: 'Airline' },
    ]);
  });

  it('should reject a row whose billing month is not a month', async () => {
    const document = pdfDocument([
      'Year-End Summary',
      'Restaurant',
      '04/01/2024 COFFEE SHOP $5.00',
    ]);

    await expect(collect(amexYearEndPdfParser, document)).rejects.toMatchObject({ row: 3 });
  });

  it('should strip trailing store numbers and state codes', () => {
    expect(cleanAmexDescription('TARGET 00012345 MN')).toBe('TARGET 00012345');
    expect(cleanAmexDescription('CAFE LUNA   12345')).toBe('CAFE LUNA');
  });
});

describe('coinbase-pdf parser', () => {
  it('should credit payments and debit purchases', async () => {
    const document = pdfDocument([
      'Coinbase Card Statement',
      'Payments and Credits',
      'Sep 2, 2025 PAYMENT RECEIVED 250.00',
      'Transactions',
      'Sep 4, 2025 BLUE BOTTLE COFFEE $6.50',
      'Sept 14, 2025 WHOLE FOODS MARKET $42.10',
      'Total transactions $48.60',
    ]);

    const candidates = await collect(coinbasePdfParser, document);

    expect(candidates).toEqual([
      { date: '2025-09-02', description: 'PAYMENT RECEIVED', amount: 250, rawCategory: null },
      { date: '2025-09-04', description: 'BLUE BOTTLE COFFEE', amount: -6.5, rawCategory: null },
      { date: '2025-09-14', description: 'WHOLE FOODS MARKET', amount: -42.1, rawCategory: null },
    ]);
  });
});
