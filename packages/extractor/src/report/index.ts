export { buildReport } from './ReportBuilder';
export type { BuildReportOptions, Report, ReportRow, ReportSummary } from './ReportBuilder';
export { MARKDOWN_REPORT_NAME, renderMarkdownReport, writeMarkdownReport } from './markdown';
export { buildWorkbook, EXCEL_REPORT_NAME, writeExcelReport } from './excel';
