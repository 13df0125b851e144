import { join, resolve } from 'node:path';
import type { AppConfig } from '../config/AppConfig';
import { toBatchSettings, toProviderConfig } from '../config/AppConfig';
import { ConfigError } from '../errors';
import type { ExtractionClientOptions } from '../extraction/ExtractionClient';
import { PdftoppmRenderer, type PdfRenderer } from '../image/PdfRenderer';
import { silentLogger, type Logger } from '../logger';
import { createProvider } from '../providers';
import { describeProvider } from '../providers/config';
import type { ProviderAdapter } from '../providers/ProviderAdapter';
import { executeRenames, planRenames, type RenameOutcome } from '../rename/Renamer';
import { buildReport } from '../report/ReportBuilder';
import { EXCEL_REPORT_NAME, writeExcelReport } from '../report/excel';
import { MARKDOWN_REPORT_NAME, writeMarkdownReport } from '../report/markdown';
import { FileWalker } from '../walker/FileWalker';
import { BatchOrchestrator, type BatchResult } from './BatchOrchestrator';
import type { BatchEventListener } from './events';

export interface LedgerRunOptions {
  signal?: AbortSignal;
  onEvent?: BatchEventListener;
  logger?: Logger;
  /** Overrides the adapter chosen by `config.provider` */
  adapter?: ProviderAdapter;
  renderer?: PdfRenderer;
  client?: ExtractionClientOptions;
}

export interface LedgerRunResult extends BatchResult {
  root: string;
  reports: string[];
  renames?: RenameOutcome[];
}

/**
 * Scan `config.scanDirectory`, extract every invoice, then write the
 * enabled reports (and rename files) in that directory.
 * A cancelled run still reports on the files it finished.
 */
export async function runLedger(config: AppConfig, options: LedgerRunOptions = {}): Promise<LedgerRunResult> {
  if (!config.scanDirectory) {
    throw new ConfigError('scanDirectory is not set');
  }

  const root = resolve(config.scanDirectory);
  const logger = options.logger ?? silentLogger;
  const providerConfig = toProviderConfig(config);

  const orchestrator = new BatchOrchestrator({
    adapter: options.adapter ?? createProvider(providerConfig.kind),
    config: providerConfig,
    settings: toBatchSettings(config),
    renderer: options.renderer ?? new PdftoppmRenderer({ binary: config.pdftoppmPath }),
    logger,
    client: options.client,
  });

  const walker = new FileWalker(root, { excludeKeywords: config.excludeKeywords });
  const result = await orchestrator.run(walker, { signal: options.signal, onEvent: options.onEvent });

  const report = buildReport(result.records, result.analysis, {
    root,
    provider: describeProvider(providerConfig),
  });

  const reports: string[] = [];
  if (config.enableMarkdown) {
    const path = join(root, MARKDOWN_REPORT_NAME);
    await writeMarkdownReport(report, path);
    reports.push(path);
  }
  if (config.enableExcel) {
    const path = join(root, EXCEL_REPORT_NAME);
    await writeExcelReport(report, path);
    reports.push(path);
  }
  logger.info('Reports written', { reports });

  let renames: RenameOutcome[] | undefined;
  if (config.enableRename && !result.cancelled) {
    renames = await executeRenames(await planRenames(result.records), logger);
  }

  return { ...result, root, reports, renames };
}
