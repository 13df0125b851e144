import type { InvoiceRecord } from './types';

/**
 * Record for a file that produced no amount
 */
export function createFailedRecord(
  sourcePath: string,
  errors: readonly string[],
  details: { rawModelText?: string; attempts?: number } = {}
): InvoiceRecord {
  return freezeRecord({
    sourcePath,
    amountTotal: 0,
    rawModelText: details.rawModelText ?? '',
    extractionStatus: 'failed',
    errors: errors.length > 0 ? [...errors] : ['unknown_error'],
    attempts: details.attempts ?? 0,
  });
}

/**
 * Freeze a record together with its nested values
 */
export function freezeRecord(record: InvoiceRecord): InvoiceRecord {
  Object.freeze(record.errors);
  if (record.classification) Object.freeze(record.classification);
  if (record.verification) Object.freeze(record.verification);
  return Object.freeze(record);
}

export function isValidRecord(record: InvoiceRecord): boolean {
  return record.extractionStatus !== 'failed';
}
