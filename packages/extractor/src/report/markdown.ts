import { writeFile } from 'node:fs/promises';
import type { GroupTotal } from '../types';
import { formatAmount } from '../utils';
import type { Report } from './ReportBuilder';

export const MARKDOWN_REPORT_NAME = 'invoice-summary.md';

function cell(value: string | number | null | undefined): string {
  if (value === null || value === undefined || value === '') return '-';
  return String(value).replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

function table(headers: string[], align: string[], rows: Array<Array<string | number | null>>): string[] {
  return [
    `| ${headers.join(' | ')} |`,
    `|${align.join('|')}|`,
    ...rows.map((row) => `| ${row.map(cell).join(' | ')} |`),
  ];
}

function groupTable(label: string, groups: GroupTotal[]): string[] {
  return table(
    [label, 'Count', 'Subtotal'],
    ['---', '---:', '---:'],
    groups.map((group) => [group.key, group.count, formatAmount(group.subtotal)])
  );
}

export function renderMarkdownReport(report: Report): string {
  const { summary, rows } = report;
  const lines: string[] = [
    '# Invoice Summary',
    '',
    `- Directory: ${summary.root}`,
    `- Generated: ${summary.generatedAt}`,
  ];

  if (summary.provider) {
    lines.push(`- Provider: ${summary.provider}`);
  }

  lines.push(
    `- Files: ${summary.totalCount} (valid ${summary.validCount}, partial ${summary.partialCount}, failed ${summary.failedCount})`,
    `- Total amount: ${formatAmount(summary.totalAmount)}`,
    `- Average amount: ${formatAmount(summary.averageAmount)}`,
    '',
    '## Invoices',
    '',
    ...table(
      ['#', 'File', 'Amount', 'Date', 'Invoice No.', 'Vendor', 'Buyer', 'Status', 'Errors'],
      ['---:', '---', '---:', '---', '---', '---', '---', '---', '---'],
      rows.map((row) => [
        row.index,
        row.file,
        formatAmount(row.amount),
        row.invoiceDate,
        row.invoiceNumber,
        row.vendor,
        row.buyer,
        row.status,
        row.errors,
      ])
    ),
    '',
    '## By Month',
    '',
    ...groupTable('Month', summary.byMonth),
    '',
    '## By Vendor',
    '',
    ...groupTable('Vendor', summary.byVendor),
    '',
    '## By Amount Range',
    '',
    ...groupTable('Range', summary.byBucket)
  );

  if (summary.duplicateInvoiceNumbers.length > 0) {
    lines.push('', '## Duplicate Invoice Numbers', '', ...summary.duplicateInvoiceNumbers.map((n) => `- ${n}`));
  }

  if (summary.warnings.length > 0) {
    lines.push('', '## Warnings', '', ...summary.warnings.map((w) => `- ${w.sourcePath}: ${w.message}`));
  }

  lines.push('');
  return lines.join('\n');
}

export async function writeMarkdownReport(report: Report, path: string): Promise<void> {
  await writeFile(path, renderMarkdownReport(report), 'utf8');
}
