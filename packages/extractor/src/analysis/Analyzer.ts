import { monthOf } from '../parser/normalizers/date';
import { isValidRecord } from '../records';
import type { Analysis, AnalysisWarning, BucketTotal, GroupTotal, InvoiceRecord } from '../types';
import { formatAmount, fromCents, toCents } from '../utils';

export const UNKNOWN_GROUP = 'unknown';

/** Amounts above this multiple of the average are flagged */
export const OUTLIER_FACTOR = 3;

/** Fewer valid records than this make the average meaningless for outliers */
export const OUTLIER_MIN_RECORDS = 3;

export const AMOUNT_BUCKETS: ReadonlyArray<{ label: string; min: number; max: number | null }> = [
  { label: '0-100', min: 0, max: 100 },
  { label: '100-500', min: 100, max: 500 },
  { label: '500-1000', min: 500, max: 1000 },
  { label: '1000-5000', min: 1000, max: 5000 },
  { label: '5000+', min: 5000, max: null },
];

interface GroupAccumulator {
  count: number;
  cents: number;
}

class Grouping {
  private readonly groups = new Map<string, GroupAccumulator>();

  add(key: string, cents: number): void {
    const group = this.groups.get(key);
    if (group) {
      group.count++;
      group.cents += cents;
    } else {
      this.groups.set(key, { count: 1, cents });
    }
  }

  toArray(): GroupTotal[] {
    return Array.from(this.groups, ([key, group]) => ({
      key,
      count: group.count,
      subtotal: fromCents(group.cents),
    }));
  }
}

function bucketIndex(amount: number): number {
  const index = AMOUNT_BUCKETS.findIndex((bucket) => bucket.max === null || amount < bucket.max);
  return index === -1 ? AMOUNT_BUCKETS.length - 1 : index;
}

function findDuplicates(records: readonly InvoiceRecord[]): string[] {
  const seen = new Set<string>();
  const duplicates: string[] = [];

  for (const record of records) {
    const number = record.invoiceNumber?.trim();
    if (!number) continue;
    if (seen.has(number)) {
      if (!duplicates.includes(number)) duplicates.push(number);
    } else {
      seen.add(number);
    }
  }

  return duplicates;
}

/**
 * Aggregate a record population.
 *
 * Pure: the same records always give an equal Analysis. Totals and groups
 * cover valid records (status other than failed); money is summed in cents.
 */
export function analyzeRecords(records: readonly InvoiceRecord[]): Analysis {
  const valid = records.filter(isValidRecord);
  const byMonth = new Grouping();
  const byVendor = new Grouping();
  const buckets = AMOUNT_BUCKETS.map(() => ({ count: 0, cents: 0 }));
  let totalCents = 0;

  for (const record of valid) {
    const cents = toCents(record.amountTotal);
    totalCents += cents;
    byMonth.add(record.invoiceDate ? monthOf(record.invoiceDate) : UNKNOWN_GROUP, cents);
    byVendor.add(record.vendorName?.trim() || UNKNOWN_GROUP, cents);

    const bucket = buckets[bucketIndex(record.amountTotal)];
    bucket.count++;
    bucket.cents += cents;
  }

  const averageCents = valid.length > 0 ? Math.round(totalCents / valid.length) : 0;
  const averageAmount = fromCents(averageCents);

  const warnings: AnalysisWarning[] = [];
  if (valid.length >= OUTLIER_MIN_RECORDS && averageAmount > 0) {
    for (const record of valid) {
      if (record.amountTotal > averageAmount * OUTLIER_FACTOR) {
        warnings.push({
          sourcePath: record.sourcePath,
          amount: record.amountTotal,
          message: `Amount ${formatAmount(record.amountTotal)} is more than ${OUTLIER_FACTOR}x the average ${formatAmount(averageAmount)}`,
        });
      }
    }
  }

  const byBucket: BucketTotal[] = AMOUNT_BUCKETS.map((bucket, i) => ({
    key: bucket.label,
    label: bucket.label,
    min: bucket.min,
    max: bucket.max,
    count: buckets[i].count,
    subtotal: fromCents(buckets[i].cents),
  }));

  return {
    totalCount: records.length,
    validCount: valid.length,
    partialCount: valid.filter((record) => record.extractionStatus === 'partial_failure').length,
    failedCount: records.length - valid.length,
    totalAmount: fromCents(totalCents),
    averageAmount,
    byMonth: byMonth.toArray(),
    byVendor: byVendor.toArray(),
    byBucket,
    duplicateInvoiceNumbers: findDuplicates(records),
    warnings,
  };
}
