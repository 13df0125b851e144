import { analyzeRecords } from '../analysis/Analyzer';
import { AuthError, ConfigError, InvoiceLedgerError, describeError, errorMessage } from '../errors';
import { ExtractionClient, type AttemptEvent, type ExtractionClientOptions } from '../extraction/ExtractionClient';
import { loadImage } from '../image/ImageEncoder';
import { PdftoppmRenderer, type PdfRenderer } from '../image/PdfRenderer';
import { silentLogger, type Logger } from '../logger';
import {
  DEFAULT_CLASSIFICATION,
  DEFAULT_VERIFICATION,
  parseClassification,
  parseInvoiceCheck,
  parseInvoiceResponse,
  parseVerification,
} from '../parser/ResponseParser';
import { CLASSIFY_PROMPT, promptFor, VALIDATE_PROMPT, VERIFY_PROMPT } from '../parser/prompts';
import type { ProviderAdapter } from '../providers/ProviderAdapter';
import { createFailedRecord, freezeRecord, isValidRecord } from '../records';
import type { Analysis, EncodedImage, ExtractionMode, InvoiceRecord, ProviderConfig } from '../types';
import { fromCents, toCents } from '../utils';
import { stampEvent, type BatchEventInput, type BatchEventListener, type BatchProgress } from './events';

export interface BatchSettings {
  mode: ExtractionMode;
  /** Ask the model whether each file is an invoice before extracting */
  enableValidate: boolean;
  enableClassify: boolean;
  enableVerify: boolean;
  /** Files processed at the same time (1 = sequential) */
  concurrency: number;
}

export const DEFAULT_BATCH_SETTINGS: Readonly<BatchSettings> = Object.freeze({
  mode: 'full',
  enableValidate: false,
  enableClassify: false,
  enableVerify: false,
  concurrency: 1,
});

export interface BatchOrchestratorOptions {
  adapter: ProviderAdapter;
  config: ProviderConfig;
  settings?: Partial<BatchSettings>;
  renderer?: PdfRenderer;
  logger?: Logger;
  client?: ExtractionClientOptions;
}

export interface RunOptions {
  signal?: AbortSignal;
  onEvent?: BatchEventListener;
}

export interface BatchResult {
  records: InvoiceRecord[];
  analysis: Analysis;
  cancelled: boolean;
}

type Emit = (event: BatchEventInput) => void;

const noop: Emit = () => undefined;

/**
 * Drives a batch of files through load, extraction and parsing.
 *
 * Per-file failures become failed records and the batch goes on; a
 * ConfigError means no file can succeed and ends the batch.
 */
export class BatchOrchestrator {
  readonly settings: Readonly<BatchSettings>;
  private readonly adapter: ProviderAdapter;
  private readonly config: ProviderConfig;
  private readonly client: ExtractionClient;
  private readonly renderer: PdfRenderer;
  private readonly logger: Logger;

  constructor(options: BatchOrchestratorOptions) {
    this.adapter = options.adapter;
    this.config = options.config;
    this.settings = Object.freeze({ ...DEFAULT_BATCH_SETTINGS, ...options.settings });
    this.client = new ExtractionClient(options.adapter, options.config, options.client);
    this.renderer = options.renderer ?? new PdftoppmRenderer();
    this.logger = (options.logger ?? silentLogger).child('orchestrator', { provider: options.config.kind });

    if (!Number.isInteger(this.settings.concurrency) || this.settings.concurrency < 1) {
      throw new ConfigError(`concurrency must be an integer >= 1, got ${this.settings.concurrency}`);
    }
  }

  /**
   * Process one file into a frozen record.
   *
   * @throws ConfigError when the provider rejects the configuration
   */
  async processFile(sourcePath: string, emit: Emit = noop): Promise<InvoiceRecord> {
    let image: EncodedImage;
    try {
      image = await loadImage(sourcePath, this.renderer);
    } catch (error) {
      const tag = error instanceof InvoiceLedgerError ? describeError(error) : `file_read_error: ${errorMessage(error)}`;
      this.logger.warn('Could not load file', { sourcePath, error: tag });
      return createFailedRecord(sourcePath, [tag]);
    }

    const onAttempt = (event: AttemptEvent) => {
      emit({
        type: 'attempt',
        sourcePath,
        attempt: event.attempt,
        maxAttempts: event.maxAttempts,
        error: event.error ? describeError(event.error) : undefined,
        delayMs: event.delayMs,
      });
    };

    if (this.settings.enableValidate) {
      const rejected = await this.checkInvoice(sourcePath, image);
      if (rejected) return rejected;
    }

    const outcome = await this.client.extract(image.bytes, image.mimeType, promptFor(this.settings.mode), onAttempt);
    if (!outcome.success) {
      this.throwIfFatal(outcome.error);
      return createFailedRecord(sourcePath, [describeError(outcome.error)], { attempts: outcome.attempts });
    }

    const record = parseInvoiceResponse(outcome.text, {
      mode: this.settings.mode,
      sourcePath,
      attempts: outcome.attempts,
    });

    if (this.settings.mode !== 'full' || !isValidRecord(record)) {
      return record;
    }
    if (!this.settings.enableClassify && !this.settings.enableVerify) {
      return record;
    }

    return this.enrich(record, image);
  }

  /**
   * Process every file. Records keep the input order; after cancellation
   * only the files already started are included.
   */
  async run(files: Iterable<string> | AsyncIterable<string>, options: RunOptions = {}): Promise<BatchResult> {
    const emit: Emit = (event) => options.onEvent?.(stampEvent(event));

    this.adapter.validate(this.config);

    const paths: string[] = [];
    for await (const file of files) {
      paths.push(file);
    }

    const results: Array<InvoiceRecord | undefined> = new Array(paths.length);
    const counters = { processed: 0, valid: 0, partial: 0, failed: 0, cents: 0 };
    let next = 0;
    let fatal: unknown;

    this.logger.info('Batch started', { total: paths.length, mode: this.settings.mode });
    emit({ type: 'log', level: 'info', message: `Processing ${paths.length} files` });

    const worker = async () => {
      while (next < paths.length && fatal === undefined && !options.signal?.aborted) {
        const index = next++;
        const sourcePath = paths[index];
        emit({ type: 'log', level: 'info', message: `Processing ${sourcePath}`, sourcePath });

        let record: InvoiceRecord;
        try {
          record = await this.processFile(sourcePath, emit);
        } catch (error) {
          fatal = error;
          return;
        }

        results[index] = record;
        counters.processed++;
        if (record.extractionStatus === 'failed') {
          counters.failed++;
          emit({ type: 'log', level: 'warn', message: `Failed: ${record.errors.join(', ')}`, sourcePath });
        } else {
          counters.valid++;
          counters.cents += toCents(record.amountTotal);
          if (record.extractionStatus === 'partial_failure') counters.partial++;
        }

        const progress: BatchProgress = {
          processed: counters.processed,
          total: paths.length,
          validCount: counters.valid,
          partialCount: counters.partial,
          failedCount: counters.failed,
          totalAmount: fromCents(counters.cents),
          lastRecord: record,
        };
        emit({ type: 'progress', progress });
      }
    };

    const workerCount = Math.min(this.settings.concurrency, Math.max(paths.length, 1));
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    if (fatal !== undefined) {
      this.logger.error('Batch aborted', fatal);
      emit({ type: 'log', level: 'error', message: `Batch aborted: ${errorMessage(fatal)}` });
      throw fatal;
    }

    const records = results.filter((record): record is InvoiceRecord => record !== undefined);
    const cancelled = records.length < paths.length;
    const analysis = analyzeRecords(records);

    this.logger.info(cancelled ? 'Batch cancelled' : 'Batch finished', {
      processed: records.length,
      total: paths.length,
      totalAmount: analysis.totalAmount,
    });
    emit({ type: 'done', cancelled, analysis });

    return { records, analysis, cancelled };
  }

  /**
   * One unretried call; a failed check lets extraction go ahead unless the
   * provider refused the credentials or the configuration.
   */
  private async checkInvoice(sourcePath: string, image: EncodedImage): Promise<InvoiceRecord | undefined> {
    let answer: string;
    try {
      answer = await this.adapter.extract(image.bytes, image.mimeType, VALIDATE_PROMPT, this.config);
    } catch (error) {
      if (!(error instanceof InvoiceLedgerError)) throw error;
      this.throwIfFatal(error);
      if (error instanceof AuthError) {
        return createFailedRecord(sourcePath, [describeError(error)], { attempts: 1 });
      }
      this.logger.warn('Invoice check failed, assuming invoice', { sourcePath, error: describeError(error) });
      return undefined;
    }

    if (parseInvoiceCheck(answer)) return undefined;
    this.logger.info('Skipping non-invoice', { sourcePath });
    return createFailedRecord(sourcePath, ['not_an_invoice'], { rawModelText: answer });
  }

  private async enrich(record: InvoiceRecord, image: EncodedImage): Promise<InvoiceRecord> {
    let classification = record.classification;
    let verification = record.verification;

    if (this.settings.enableClassify) {
      const outcome = await this.client.extract(image.bytes, image.mimeType, CLASSIFY_PROMPT);
      if (outcome.success) {
        classification = parseClassification(outcome.text);
      } else {
        this.logger.warn('Classification failed', { sourcePath: record.sourcePath, error: describeError(outcome.error) });
        classification = { ...DEFAULT_CLASSIFICATION };
      }
    }

    if (this.settings.enableVerify) {
      const outcome = await this.client.extract(image.bytes, image.mimeType, VERIFY_PROMPT);
      if (outcome.success) {
        verification = parseVerification(outcome.text);
      } else {
        this.logger.warn('Verification failed', { sourcePath: record.sourcePath, error: describeError(outcome.error) });
        verification = { ...DEFAULT_VERIFICATION, riskNotes: `verification failed: ${outcome.error.message}` };
      }
    }

    return freezeRecord({ ...record, classification, verification });
  }

  private throwIfFatal(error: InvoiceLedgerError): void {
    if (error instanceof ConfigError) {
      throw error;
    }
  }
}
