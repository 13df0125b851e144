import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as XLSX from 'xlsx';
import { analyzeRecords } from '../../analysis/Analyzer';
import type { InvoiceRecord } from '../../types';
import { buildReport } from '../ReportBuilder';
import { buildWorkbook, writeExcelReport } from '../excel';
import { renderMarkdownReport } from '../markdown';

const RECORDS: InvoiceRecord[] = [
  {
    sourcePath: '/data/invoices/a.jpg',
    amountTotal: 100,
    invoiceDate: '2024-03-05',
    invoiceNumber: 'N1',
    vendorName: 'A|B Co',
    buyerName: 'Globex',
    rawModelText: '{}',
    extractionStatus: 'success',
    errors: [],
    attempts: 1,
  },
  {
    sourcePath: '/data/invoices/sub/b.jpg',
    amountTotal: 0,
    rawModelText: 'unreadable',
    extractionStatus: 'failed',
    errors: ['amount_not_found'],
    attempts: 1,
  },
];

function report() {
  return buildReport(RECORDS, analyzeRecords(RECORDS), {
    root: '/data/invoices',
    generatedAt: new Date('2024-06-01T00:00:00Z'),
    provider: 'ollama llava @ localhost:11434',
  });
}

describe('buildReport', () => {
  it('should make file paths relative to the scanned directory', () => {
    const { rows, summary } = report();

    expect(rows.map((row) => row.file)).toEqual(['a.jpg', 'sub/b.jpg']);
    expect(rows[1]).toMatchObject({ index: 2, amount: 0, invoiceDate: '', tax: null, errors: 'amount_not_found' });
    expect(summary.generatedAt).toBe('2024-06-01T00:00:00.000Z');
    expect(summary.totalAmount).toBe(100);
  });
});

describe('renderMarkdownReport', () => {
  it('should render the summary, detail table and groups', () => {
    expect(renderMarkdownReport(report()).split('\n')).toEqual([
      '# Invoice Summary',
      '',
      '- Directory: /data/invoices',
      '- Generated: 2024-06-01T00:00:00.000Z',
      '- Provider: ollama llava @ localhost:11434',
      '- Files: 2 (valid 1, partial 0, failed 1)',
      '- Total amount: 100.00',
      '- Average amount: 100.00',
      '',
      '## Invoices',
      '',
      '| # | File | Amount | Date | Invoice No. | Vendor | Buyer | Status | Errors |',
      '|---:|---|---:|---|---|---|---|---|---|',
      '| 1 | a.jpg | 100.00 | 2024-03-05 | N1 | A\\|B Co | Globex | success | - |',
      '| 2 | sub/b.jpg | 0.00 | - | - | - | - | failed | amount_not_found |',
      '',
      '## By Month',
      '',
      '| Month | Count | Subtotal |',
      '|---|---:|---:|',
      '| 2024-03 | 1 | 100.00 |',
      '',
      '## By Vendor',
      '',
      '| Vendor | Count | Subtotal |',
      '|---|---:|---:|',
      '| A\\|B Co | 1 | 100.00 |',
      '',
      '## By Amount Range',
      '',
      '| Range | Count | Subtotal |',
      '|---|---:|---:|',
      '| 0-100 | 0 | 0.00 |',
      '| 100-500 | 1 | 100.00 |',
      '| 500-1000 | 0 | 0.00 |',
      '| 1000-5000 | 0 | 0.00 |',
      '| 5000+ | 0 | 0.00 |',
      '',
    ]);
  });

  it('should list duplicates and warnings when present', () => {
    const records: InvoiceRecord[] = [
      ...RECORDS,
      { ...RECORDS[0], sourcePath: '/data/invoices/c.jpg', amountTotal: 10 },
    ];
    const markdown = renderMarkdownReport(
      buildReport(records, analyzeRecords(records), { root: '/data/invoices' })
    );

    expect(markdown.endsWith('## Duplicate Invoice Numbers\n\n- N1\n')).toBe(true);
    expect(markdown).not.toContain('- Provider:');
  });
});

describe('excel report', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'report-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should build detail and summary sheets', () => {
    const workbook = buildWorkbook(report());

    expect(workbook.SheetNames).toEqual(['Invoices', 'Summary']);

    const detail = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets['Invoices'], { header: 1 });
    expect(detail[0]).toEqual([
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
    ]);
    expect(detail[1].slice(0, 3)).toEqual([1, 'a.jpg', 100]);
    expect(detail[1][14]).toBe('success');

    const summary = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets['Summary'], { header: 1 });
    expect(summary.slice(0, 8)).toEqual([
      ['Directory', '/data/invoices'],
      ['Generated', '2024-06-01T00:00:00.000Z'],
      ['Files', 2],
      ['Valid', 1],
      ['Partial', 0],
      ['Failed', 1],
      ['Total amount', 100],
      ['Average amount', 100],
    ]);
  });

  it('should write a readable xlsx file', async () => {
    const path = join(dir, 'summary.xlsx');

    await writeExcelReport(report(), path);

    const workbook = XLSX.read(await readFile(path), { type: 'buffer' });
    expect(workbook.SheetNames).toEqual(['Invoices', 'Summary']);
  });
});
