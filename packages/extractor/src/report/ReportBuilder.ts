import { relative } from 'node:path';
import type { Analysis, ExtractionStatus, InvoiceRecord } from '../types';

export interface ReportRow {
  index: number;
  /** Path relative to the scanned directory */
  file: string;
  amount: number;
  invoiceDate: string;
  invoiceNumber: string;
  vendor: string;
  buyer: string;
  tax: number | null;
  subtotal: number | null;
  items: string;
  status: ExtractionStatus;
  errors: string;
  invoiceType: string;
  expenseCategory: string;
  riskLevel: string;
  riskNotes: string;
}

export interface ReportSummary extends Analysis {
  root: string;
  generatedAt: string;
  provider?: string;
}

export interface Report {
  rows: ReportRow[];
  summary: ReportSummary;
}

export interface BuildReportOptions {
  root: string;
  generatedAt?: Date;
  /** Provider and model label shown in the summary */
  provider?: string;
}

function toRow(record: InvoiceRecord, index: number, root: string): ReportRow {
  return {
    index: index + 1,
    file: relative(root, record.sourcePath) || record.sourcePath,
    amount: record.amountTotal,
    invoiceDate: record.invoiceDate ?? '',
    invoiceNumber: record.invoiceNumber ?? '',
    vendor: record.vendorName ?? '',
    buyer: record.buyerName ?? '',
    tax: record.taxAmount ?? null,
    subtotal: record.subtotal ?? null,
    items: record.items ?? '',
    status: record.extractionStatus,
    errors: record.errors.join('; '),
    invoiceType: record.classification?.invoiceTypeName ?? '',
    expenseCategory: record.classification?.expenseCategoryName ?? '',
    riskLevel: record.verification?.riskLevel ?? '',
    riskNotes: record.verification?.riskNotes ?? '',
  };
}

/**
 * Flatten records and their analysis into the structure report writers consume
 */
export function buildReport(
  records: readonly InvoiceRecord[],
  analysis: Analysis,
  options: BuildReportOptions
): Report {
  return {
    rows: records.map((record, i) => toRow(record, i, options.root)),
    summary: {
      ...analysis,
      root: options.root,
      generatedAt: (options.generatedAt ?? new Date()).toISOString(),
      provider: options.provider,
    },
  };
}
