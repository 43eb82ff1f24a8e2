import {
  CsvMetrics,
  LineError,
  ParseOutcome,
  ProcessingErrorCode,
  ProcessingStatus,
} from '../../shared/interfaces/processing-result.interface';
import {
  isBlank,
  lineError,
  parseLeadingFloat,
  parseLeadingInt,
  percentage,
  roundTo,
  splitLines,
} from './parsing-utils';

/**
 * Sales CSV validator.
 *
 * Expected layout: a header line, then `date,product,category,price,quantity,discount`.
 * Each data line is validated on its own; a bad line is recorded and the
 * scan continues. Blank lines are skipped but still advance the line number.
 */

export const CSV_COLUMN_COUNT = 6;
const MIN_DATE_LENGTH = 8;

export const CSV_RECOMMENDATION_VALID = 'File is valid';
export const CSV_RECOMMENDATION_REVIEW = 'Review data format on lines with errors';

export interface SaleRecord {
  date: string;
  product: string;
  category: string;
  price: number;
  quantity: number;
  discount: number;
}

export type CsvLineValidation =
  | { valid: true; record: SaleRecord }
  | { valid: false; reason: string };

export function validateCsvLine(line: string): CsvLineValidation {
  const fields = line.split(',');
  if (fields.length !== CSV_COLUMN_COUNT) {
    return {
      valid: false,
      reason: `Incomplete line (${fields.length} fields instead of ${CSV_COLUMN_COUNT})`,
    };
  }

  const [dateRaw, productRaw, categoryRaw, priceRaw, quantityRaw, discountRaw] = fields;
  const problems: string[] = [];

  const date = dateRaw.trim();
  if (date === '') {
    problems.push('Empty date');
  } else if (date.length < MIN_DATE_LENGTH) {
    problems.push('Invalid date format (too short)');
  }

  const product = productRaw.trim();
  if (product === '') problems.push('Empty product name');

  const category = categoryRaw.trim();
  if (category === '') problems.push('Empty category');

  const price = parseLeadingFloat(priceRaw);
  if (price === null) {
    problems.push(describeUnparsable('price', priceRaw));
  } else if (price <= 0) {
    problems.push(`Price must be positive (found: ${price})`);
  }

  const quantity = parseLeadingInt(quantityRaw);
  if (quantity === null) {
    problems.push(describeUnparsable('quantity', quantityRaw));
  } else if (quantity <= 0) {
    problems.push(`Quantity must be positive (found: ${quantity})`);
  }

  const discount = parseLeadingFloat(discountRaw);
  if (discount === null) {
    problems.push(describeUnparsable('discount', discountRaw));
  } else if (discount < 0) {
    problems.push(`Negative discount: ${discount}%`);
  } else if (discount > 100) {
    problems.push(`Discount too high: ${discount}% (max 100%)`);
  }

  if (problems.length > 0 || price === null || quantity === null || discount === null) {
    return { valid: false, reason: problems.join(', ') };
  }

  return { valid: true, record: { date, product, category, price, quantity, discount } };
}

function describeUnparsable(field: string, raw: string): string {
  const trimmed = raw.trim();
  if (trimmed === '') {
    return `Empty ${field}`;
  }
  return `Invalid ${field}: '${trimmed}'`;
}

export function netSale(record: SaleRecord): number {
  return record.price * record.quantity * (1 - record.discount / 100);
}

export function parseCsv(content: string): ParseOutcome<CsvMetrics> {
  const dataLines = splitLines(content).slice(1);

  const errors: LineError[] = [];
  const products = new Set<string>();
  let validRecords = 0;
  let totalLines = 0;
  let salesSum = 0;

  dataLines.forEach((line, index) => {
    if (isBlank(line)) return;
    totalLines++;

    const validation = validateCsvLine(line);
    if (!validation.valid) {
      errors.push(lineError(index + 1, validation.reason, line));
      return;
    }

    validRecords++;
    salesSum += netSale(validation.record);
    products.add(validation.record.product);
  });

  if (totalLines === 0) {
    return {
      status: ProcessingStatus.FAILURE,
      errorCode: ProcessingErrorCode.NO_DATA,
      reason: 'No data after header',
      errors: [],
    };
  }

  const metrics: CsvMetrics = {
    validRecords,
    invalidRecords: errors.length,
    totalLines,
    totalSales: roundTo(salesSum, 2),
    uniqueProducts: products.size,
    successRate: percentage(validRecords, totalLines),
    errorRate: percentage(errors.length, totalLines),
    recommendation: errors.length > 0 ? CSV_RECOMMENDATION_REVIEW : CSV_RECOMMENDATION_VALID,
  };

  if (errors.length === 0) {
    return { status: ProcessingStatus.SUCCESS, metrics, errors };
  }

  if (validRecords === 0) {
    return {
      status: ProcessingStatus.FAILURE,
      errorCode: ProcessingErrorCode.NO_VALID_RECORDS,
      reason: `All ${totalLines} data lines are invalid`,
      metrics,
      errors,
    };
  }

  return { status: ProcessingStatus.PARTIAL_SUCCESS, metrics, errors };
}
