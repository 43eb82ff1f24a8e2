import { describe, it, expect } from 'vitest';
import {
  CSV_RECOMMENDATION_REVIEW,
  CSV_RECOMMENDATION_VALID,
  parseCsv,
  validateCsvLine,
} from '../../../../src/processing/parsers/csv.parser';
import {
  ProcessingErrorCode,
  ProcessingStatus,
} from '../../../../src/shared/interfaces/processing-result.interface';

const HEADER = 'date,product,category,price,quantity,discount';

describe('CSV parser', () => {
  describe('validateCsvLine', () => {
    it('accepts a well-formed sale', () => {
      expect(validateCsvLine('2024-01-01,Widget,Tools,10.00,2,10')).toEqual({
        valid: true,
        record: {
          date: '2024-01-01',
          product: 'Widget',
          category: 'Tools',
          price: 10,
          quantity: 2,
          discount: 10,
        },
      });
    });

    it('parses numbers leniently', () => {
      const validation = validateCsvLine('2024-01-01,Widget,Tools,19.99USD,2.5,5');
      expect(validation).toEqual({
        valid: true,
        record: expect.objectContaining({ price: 19.99, quantity: 2, discount: 5 }),
      });
    });

    it('rejects a line with the wrong field count', () => {
      expect(validateCsvLine('a,b,c')).toEqual({
        valid: false,
        reason: 'Incomplete line (3 fields instead of 6)',
      });
    });

    it('rejects a short date', () => {
      expect(validateCsvLine('2024,Widget,Tools,10,2,10')).toEqual({
        valid: false,
        reason: 'Invalid date format (too short)',
      });
    });

    it('joins every failing check in field order', () => {
      expect(validateCsvLine(',Widget,Tools,abc,0,150')).toEqual({
        valid: false,
        reason:
          "Empty date, Invalid price: 'abc', Quantity must be positive (found: 0), Discount too high: 150% (max 100%)",
      });
    });

    it('reports empty and negative values', () => {
      expect(validateCsvLine('2024-01-01, , ,-3,,-5')).toEqual({
        valid: false,
        reason:
          'Empty product name, Empty category, Price must be positive (found: -3), Empty quantity, Negative discount: -5%',
      });
    });

    it('accepts the discount bounds', () => {
      expect(validateCsvLine('2024-01-01,Widget,Tools,1,1,0').valid).toBe(true);
      expect(validateCsvLine('2024-01-01,Widget,Tools,1,1,100').valid).toBe(true);
    });
  });

  describe('parseCsv', () => {
    it('computes net sales with the discount applied', () => {
      const outcome = parseCsv(`${HEADER}\n2024-01-01,Widget,Tools,10.00,2,10`);

      expect(outcome).toEqual({
        status: ProcessingStatus.SUCCESS,
        metrics: {
          validRecords: 1,
          invalidRecords: 0,
          totalLines: 1,
          totalSales: 18,
          uniqueProducts: 1,
          successRate: 100,
          errorRate: 0,
          recommendation: CSV_RECOMMENDATION_VALID,
        },
        errors: [],
      });
    });

    it('keeps valid lines when one line is invalid', () => {
      const content = [
        HEADER,
        '2024-01-01,Widget,Tools,10.00,2,10',
        '2024-01-02,,Tools,5.00,1,0',
      ].join('\n');

      expect(parseCsv(content)).toEqual({
        status: ProcessingStatus.PARTIAL_SUCCESS,
        metrics: {
          validRecords: 1,
          invalidRecords: 1,
          totalLines: 2,
          totalSales: 18,
          uniqueProducts: 1,
          successRate: 50,
          errorRate: 50,
          recommendation: CSV_RECOMMENDATION_REVIEW,
        },
        errors: [{ line: 2, reason: 'Empty product name', content: '2024-01-02,,Tools,5.00,1,0' }],
      });
    });

    it('skips blank lines but keeps their line numbers', () => {
      const content = [HEADER, '', '2024-01-01,,Tools,5,1,0', '2024-01-01,Widget,Tools,10.00,2,10'].join(
        '\n',
      );
      const outcome = parseCsv(content);

      expect(outcome.status).toBe(ProcessingStatus.PARTIAL_SUCCESS);
      expect(outcome.metrics?.totalLines).toBe(2);
      expect(outcome.errors.map((error) => error.line)).toEqual([2]);
    });

    it('accepts CRLF line endings', () => {
      const outcome = parseCsv(`${HEADER}\r\n2024-01-01,Widget,Tools,10.00,2,10\r\n`);

      expect(outcome.status).toBe(ProcessingStatus.SUCCESS);
      expect(outcome.metrics?.totalLines).toBe(1);
    });

    it('counts unique products by trimmed name', () => {
      const content = [
        HEADER,
        '2024-01-01, Widget ,Tools,1,1,0',
        '2024-01-02,Widget,Tools,1,1,0',
        '2024-01-03,Gadget,Tools,1,1,0',
      ].join('\n');

      expect(parseCsv(content).metrics?.uniqueProducts).toBe(2);
    });

    it('rounds the total half up to two decimals', () => {
      expect(parseCsv(`${HEADER}\n2024-01-01,Widget,Tools,1.005,1,0`).metrics?.totalSales).toBe(1.01);
    });

    it('reports success and error rates over non-blank data lines', () => {
      const content = [
        HEADER,
        '2024-01-01,Widget,Tools,1,1,0',
        '',
        'broken',
        '2024-01-02,,Tools,1,1,0',
      ].join('\n');
      const outcome = parseCsv(content);

      expect(outcome.metrics).toMatchObject({
        totalLines: 3,
        successRate: 33.33,
        errorRate: 66.67,
        recommendation: 'Review data format on lines with errors',
      });
    });

    it.each([
      ['an empty file', ''],
      ['a header only', HEADER],
      ['a header followed by blank lines', `${HEADER}\n\n   \n`],
    ])('fails with NO_DATA for %s', (_label, content) => {
      expect(parseCsv(content)).toEqual({
        status: ProcessingStatus.FAILURE,
        errorCode: ProcessingErrorCode.NO_DATA,
        reason: 'No data after header',
        errors: [],
      });
    });

    it('fails with NO_VALID_RECORDS when every data line is invalid', () => {
      const outcome = parseCsv(`${HEADER}\nx\ny`);

      expect(outcome).toEqual({
        status: ProcessingStatus.FAILURE,
        errorCode: ProcessingErrorCode.NO_VALID_RECORDS,
        reason: 'All 2 data lines are invalid',
        metrics: {
          validRecords: 0,
          invalidRecords: 2,
          totalLines: 2,
          totalSales: 0,
          uniqueProducts: 0,
          successRate: 0,
          errorRate: 100,
          recommendation: CSV_RECOMMENDATION_REVIEW,
        },
        errors: [
          { line: 1, reason: 'Incomplete line (1 fields instead of 6)', content: 'x' },
          { line: 2, reason: 'Incomplete line (1 fields instead of 6)', content: 'y' },
        ],
      });
    });

    it('truncates long invalid lines in the snippet', () => {
      const longLine = 'x'.repeat(60);
      const outcome = parseCsv(`${HEADER}\n2024-01-01,Widget,Tools,1,1,0\n${longLine}`);

      expect(outcome.errors[0].content).toBe(`${'x'.repeat(50)}...`);
    });
  });
});
