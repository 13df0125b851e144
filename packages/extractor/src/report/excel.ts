import { writeFile } from 'node:fs/promises';
import * as XLSX from 'xlsx';
import type { Report } from './ReportBuilder';

export const EXCEL_REPORT_NAME = 'invoice-summary.xlsx';

const DETAIL_HEADERS = [
  '#',
  'File',
  'Amount',
  'Date',
  'Invoice No.',
  'Vendor',
  'Buyer',
  'Tax',
  'Subtotal',
  'Items',
  'Invoice Type',
  'Expense Category',
  'Risk',
  'Risk Notes',
  'Status',
  'Errors',
];

/**
 * Workbook with a detail sheet and a summary sheet
 */
export function buildWorkbook(report: Report): XLSX.WorkBook {
  const detail = report.rows.map((row) => [
    row.index,
    row.file,
    row.amount,
    row.invoiceDate,
    row.invoiceNumber,
    row.vendor,
    row.buyer,
    row.tax ?? '',
    row.subtotal ?? '',
    row.items,
    row.invoiceType,
    row.expenseCategory,
    row.riskLevel,
    row.riskNotes,
    row.status,
    row.errors,
  ]);

  const { summary } = report;
  const summaryRows: Array<Array<string | number>> = [
    ['Directory', summary.root],
    ['Generated', summary.generatedAt],
    ['Files', summary.totalCount],
    ['Valid', summary.validCount],
    ['Partial', summary.partialCount],
    ['Failed', summary.failedCount],
    ['Total amount', summary.totalAmount],
    ['Average amount', summary.averageAmount],
    [],
    ['Month', 'Count', 'Subtotal'],
    ...summary.byMonth.map((g) => [g.key, g.count, g.subtotal]),
    [],
    ['Vendor', 'Count', 'Subtotal'],
    ...summary.byVendor.map((g) => [g.key, g.count, g.subtotal]),
    [],
    ['Range', 'Count', 'Subtotal'],
    ...summary.byBucket.map((g) => [g.key, g.count, g.subtotal]),
  ];

  if (summary.duplicateInvoiceNumbers.length > 0) {
    summaryRows.push([], ['Duplicate invoice numbers', summary.duplicateInvoiceNumbers.join(', ')]);
  }

  const workbook = XLSX.utils.book_new();
  const detailSheet = XLSX.utils.aoa_to_sheet([DETAIL_HEADERS, ...detail]);
  detailSheet['!cols'] = DETAIL_HEADERS.map((header) => ({ wch: header === 'File' || header === 'Vendor' || header === 'Buyer' ? 30 : 12 }));
  XLSX.utils.book_append_sheet(workbook, detailSheet, 'Invoices');
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(summaryRows), 'Summary');
  return workbook;
}

export async function writeExcelReport(report: Report, path: string): Promise<void> {
  const buffer: Buffer = XLSX.write(buildWorkbook(report), { bookType: 'xlsx', type: 'buffer' });
  await writeFile(path, buffer);
}
