import { describe, it, expect } from 'vitest';
import type { InvoiceRecord } from '../../types';
import { analyzeRecords } from '../Analyzer';

function record(fields: Partial<InvoiceRecord> & Pick<InvoiceRecord, 'sourcePath' | 'amountTotal'>): InvoiceRecord {
  return {
    rawModelText: '',
    extractionStatus: 'success',
    errors: [],
    attempts: 1,
    ...fields,
  };
}

const RECORDS: InvoiceRecord[] = [
  record({ sourcePath: 'a.jpg', amountTotal: 100, invoiceDate: '2024-03-05', vendorName: 'Acme', invoiceNumber: 'N1' }),
  record({
    sourcePath: 'b.jpg',
    amountTotal: 250.5,
    invoiceDate: '2024-03-20',
    vendorName: 'Acme',
    invoiceNumber: 'N2',
    extractionStatus: 'partial_failure',
    errors: ['buyer_not_found'],
  }),
  record({ sourcePath: 'c.jpg', amountTotal: 0, extractionStatus: 'failed', errors: ['amount_not_found'] }),
  record({ sourcePath: 'd.jpg', amountTotal: 4999.99, invoiceDate: '2024-04-01', vendorName: 'Globex', invoiceNumber: 'N1' }),
  record({ sourcePath: 'e.jpg', amountTotal: 50, extractionStatus: 'partial_failure', errors: ['vendor_not_found'] }),
];

describe('analyzeRecords', () => {
  it('should count and total valid records', () => {
    const analysis = analyzeRecords(RECORDS);

    expect(analysis.totalCount).toBe(5);
    expect(analysis.validCount).toBe(4);
    expect(analysis.partialCount).toBe(2);
    expect(analysis.failedCount).toBe(1);
    expect(analysis.totalAmount).toBe(5400.49);
    expect(analysis.averageAmount).toBe(1350.12);
  });

  it('should group by month and vendor in first-seen order', () => {
    const analysis = analyzeRecords(RECORDS);

    expect(analysis.byMonth).toEqual([
      { key: '2024-03', count: 2, subtotal: 350.5 },
      { key: '2024-04', count: 1, subtotal: 4999.99 },
      { key: 'unknown', count: 1, subtotal: 50 },
    ]);
    expect(analysis.byVendor).toEqual([
      { key: 'Acme', count: 2, subtotal: 350.5 },
      { key: 'Globex', count: 1, subtotal: 4999.99 },
      { key: 'unknown', count: 1, subtotal: 50 },
    ]);
  });

  it('should place amounts in half-open buckets', () => {
    const analysis = analyzeRecords([
      ...RECORDS,
      record({ sourcePath: 'f.jpg', amountTotal: 5000 }),
    ]);

    expect(analysis.byBucket.map((bucket) => [bucket.label, bucket.count, bucket.subtotal])).toEqual([
      ['0-100', 1, 50],
      ['100-500', 2, 350.5],
      ['500-1000', 0, 0],
      ['1000-5000', 1, 4999.99],
      ['5000+', 1, 5000],
    ]);
  });

  it('should list each repeated invoice number once', () => {
    const analysis = analyzeRecords([
      ...RECORDS,
      record({ sourcePath: 'g.jpg', amountTotal: 10, invoiceNumber: 'N1' }),
      record({ sourcePath: 'h.jpg', amountTotal: 10, invoiceNumber: 'N2' }),
    ]);

    expect(analysis.duplicateInvoiceNumbers).toEqual(['N1', 'N2']);
  });

  it('should warn about amounts far above the average', () => {
    expect(analyzeRecords(RECORDS).warnings).toEqual([
      {
        sourcePath: 'd.jpg',
        amount: 4999.99,
        message: 'Amount 4999.99 is more than 3x the average 1350.12',
      },
    ]);
  });

  it('should not flag outliers in tiny batches', () => {
    const analysis = analyzeRecords([
      record({ sourcePath: 'a.jpg', amountTotal: 1 }),
      record({ sourcePath: 'b.jpg', amountTotal: 1000 }),
    ]);

    expect(analysis.warnings).toEqual([]);
  });

  it('should be idempotent', () => {
    expect(analyzeRecords(RECORDS)).toEqual(analyzeRecords([...RECORDS]));
  });

  it('should handle an empty population', () => {
    const analysis = analyzeRecords([]);

    expect(analysis.totalAmount).toBe(0);
    expect(analysis.averageAmount).toBe(0);
    expect(analysis.byMonth).toEqual([]);
    expect(analysis.byBucket.every((bucket) => bucket.count === 0)).toBe(true);
  });

  it('should sum money in cents', () => {
    const analysis = analyzeRecords([
      record({ sourcePath: 'a.jpg', amountTotal: 0.1 }),
      record({ sourcePath: 'b.jpg', amountTotal: 0.2 }),
    ]);

    expect(analysis.totalAmount).toBe(0.3);
    expect(analysis.averageAmount).toBe(0.15);
  });
});
