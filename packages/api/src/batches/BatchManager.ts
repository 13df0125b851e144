import {
  ConfigError,
  createProvider,
  errorMessage,
  executeRenames,
  InvoiceLedgerError,
  planRenames,
  runLedger,
  silentLogger,
  toProviderConfig,
  type Analysis,
  type AppConfig,
  type BatchEvent,
  type BatchProgress,
  type InvoiceRecord,
  type LedgerRunOptions,
  type Logger,
  type RenameOutcome,
} from '@invoice-ledger/extractor';
import { ConflictError, NotFoundError } from '../lib/errors';
import { generateId } from '../lib/ulid';

export type BatchRunStatus = 'running' | 'completed' | 'cancelled' | 'failed';

export interface BatchRun {
  id: string;
  status: BatchRunStatus;
  root: string;
  mode: AppConfig['mode'];
  provider: AppConfig['provider'];
  startedAt: string;
  finishedAt: string | null;
  progress: Omit<BatchProgress, 'lastRecord'> | null;
  analysis: Analysis | null;
  records: InvoiceRecord[];
  reports: string[];
  renames: RenameOutcome[] | null;
  error: { code: string; message: string } | null;
}

export type BatchSummary = Omit<BatchRun, 'records' | 'renames'>;

export interface StoredEvent {
  seq: number;
  event: BatchEvent;
}

interface RunEntry {
  run: BatchRun;
  events: StoredEvent[];
  nextSeq: number;
  controller: AbortController;
  done: Promise<void>;
  /** Set while the files of the run are being renamed */
  renaming: Promise<RenameOutcome[]> | null;
}

export interface BatchManagerOptions {
  logger?: Logger;
  /** Events kept per run; older ones are dropped */
  maxEvents?: number;
  /** Passed to every run (adapter, renderer and retry overrides) */
  runOptions?: Pick<LedgerRunOptions, 'adapter' | 'renderer' | 'client'>;
}

const DEFAULT_MAX_EVENTS = 5000;

function toSummary(run: BatchRun): BatchSummary {
  const { records: _records, renames: _renames, ...summary } = run;
  return summary;
}

/**
 * In-process registry of batch runs.
 *
 * One run at a time: provider calls are the bottleneck and concurrent
 * runs would share the same rate limits.
 */
export class BatchManager {
  private readonly runs = new Map<string, RunEntry>();
  private readonly logger: Logger;
  private readonly maxEvents: number;

  constructor(private readonly options: BatchManagerOptions = {}) {
    this.logger = (options.logger ?? silentLogger).child('batches');
    this.maxEvents = options.maxEvents ?? DEFAULT_MAX_EVENTS;
  }

  /**
   * Start a run over `config.scanDirectory`. The provider configuration is
   * checked before anything starts.
   *
   * @throws ConfigError, ConflictError
   */
  start(config: AppConfig): BatchRun {
    if (!config.scanDirectory) {
      throw new ConfigError('scanDirectory is not set');
    }
    if (this.active()) {
      throw new ConflictError('A batch is already running');
    }

    const providerConfig = toProviderConfig(config);
    (this.options.runOptions?.adapter ?? createProvider(providerConfig.kind)).validate(providerConfig);

    const run: BatchRun = {
      id: generateId('batch'),
      status: 'running',
      root: config.scanDirectory,
      mode: config.mode,
      provider: config.provider,
      startedAt: new Date().toISOString(),
      finishedAt: null,
      progress: null,
      analysis: null,
      records: [],
      reports: [],
      renames: null,
      error: null,
    };

    const controller = new AbortController();
    const entry: RunEntry = { run, events: [], nextSeq: 1, controller, done: Promise.resolve(), renaming: null };
    this.runs.set(run.id, entry);

    const logger = this.logger.child('run', { batch_id: run.id });
    logger.info('Batch started', { root: run.root, provider: run.provider, mode: run.mode });

    entry.done = runLedger(config, {
      ...this.options.runOptions,
      signal: controller.signal,
      logger,
      onEvent: (event) => this.record(entry, event),
    }).then(
      (result) => {
        run.status = result.cancelled ? 'cancelled' : 'completed';
        run.root = result.root;
        run.records = result.records;
        run.analysis = result.analysis;
        run.reports = result.reports;
        run.renames = result.renames ?? null;
        run.finishedAt = new Date().toISOString();
        logger.info('Batch finished', { status: run.status, total_amount: result.analysis.totalAmount });
      },
      (error: unknown) => {
        run.status = 'failed';
        run.error = {
          code: error instanceof InvoiceLedgerError ? error.code : 'INTERNAL_ERROR',
          message: errorMessage(error),
        };
        run.finishedAt = new Date().toISOString();
        logger.error('Batch failed', error);
      }
    );

    return run;
  }

  list(): BatchSummary[] {
    return Array.from(this.runs.values(), (entry) => toSummary(entry.run)).reverse();
  }

  get(id: string): BatchRun {
    return this.entry(id).run;
  }

  /**
   * Events with a sequence number above `after`
   */
  events(id: string, after = 0): { events: StoredEvent[]; next: number } {
    const entry = this.entry(id);
    const events = entry.events.filter((stored) => stored.seq > after);
    return { events, next: entry.nextSeq - 1 };
  }

  /**
   * Request cancellation; the file in progress finishes first
   */
  cancel(id: string): BatchRun {
    const entry = this.entry(id);
    if (entry.run.status !== 'running') {
      throw new ConflictError(`Batch ${id} is not running`);
    }
    entry.controller.abort();
    return entry.run;
  }

  async rename(id: string): Promise<RenameOutcome[]> {
    const entry = this.entry(id);
    const { run } = entry;
    if (run.status !== 'completed' && run.status !== 'cancelled') {
      throw new ConflictError(`Batch ${id} has not finished`);
    }
    if (entry.renaming) {
      throw new ConflictError(`Files of batch ${id} are being renamed`);
    }
    if (run.renames) {
      throw new ConflictError(`Files of batch ${id} were already renamed`);
    }

    // Claimed before the first await so a concurrent call sees it
    entry.renaming = planRenames(run.records).then((plan) => executeRenames(plan, this.logger));
    try {
      run.renames = await entry.renaming;
      return run.renames;
    } finally {
      entry.renaming = null;
    }
  }

  /** Resolves when the run has settled */
  async wait(id: string): Promise<BatchRun> {
    const entry = this.entry(id);
    await entry.done;
    return entry.run;
  }

  private active(): RunEntry | undefined {
    for (const entry of this.runs.values()) {
      if (entry.run.status === 'running') return entry;
    }
    return undefined;
  }

  private entry(id: string): RunEntry {
    const entry = this.runs.get(id);
    if (!entry) {
      throw new NotFoundError(`Batch not found: ${id}`);
    }
    return entry;
  }

  private record(entry: RunEntry, event: BatchEvent): void {
    entry.events.push({ seq: entry.nextSeq++, event });
    if (entry.events.length > this.maxEvents) {
      entry.events.splice(0, entry.events.length - this.maxEvents);
    }

    if (event.type === 'progress') {
      const { lastRecord: _lastRecord, ...progress } = event.progress;
      entry.run.progress = progress;
    }
  }
}
