import { InvoiceLedgerError } from '../errors';
import type { ProviderAdapter } from '../providers/ProviderAdapter';
import type { ProviderConfig } from '../types';
import { computeBackoff, DEFAULT_BACKOFF, sleep as defaultSleep, type BackoffPolicy } from './backoff';

export interface AttemptEvent {
  attempt: number;
  maxAttempts: number;
  /** Set when the attempt failed */
  error?: InvoiceLedgerError;
  /** Wait before the next attempt, when one follows */
  delayMs?: number;
}

export type ExtractionOutcome =
  | { success: true; text: string; attempts: number }
  | { success: false; error: InvoiceLedgerError; attempts: number };

export interface ExtractionClientOptions {
  backoff?: BackoffPolicy;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Retry policy around one adapter and one batch configuration.
 *
 * Retryable failures (network, timeout, 5xx, rate limit, empty content) are
 * attempted again until maxRetries attempts have been made. Auth and
 * configuration failures end the call after the attempt that raised them.
 * Errors outside the ledger taxonomy are programming errors and propagate.
 */
export class ExtractionClient {
  private readonly backoff: BackoffPolicy;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly adapter: ProviderAdapter,
    private readonly config: ProviderConfig,
    options: ExtractionClientOptions = {}
  ) {
    this.backoff = options.backoff ?? DEFAULT_BACKOFF;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get maxAttempts(): number {
    return this.config.maxRetries;
  }

  async extract(
    imageBytes: Uint8Array,
    mimeType: string,
    prompt: string,
    onAttempt?: (event: AttemptEvent) => void
  ): Promise<ExtractionOutcome> {
    const maxAttempts = this.config.maxRetries;
    let lastError: InvoiceLedgerError | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const text = await this.adapter.extract(imageBytes, mimeType, prompt, this.config);
        onAttempt?.({ attempt, maxAttempts });
        return { success: true, text, attempts: attempt };
      } catch (error) {
        if (!(error instanceof InvoiceLedgerError)) {
          throw error;
        }
        lastError = error;

        if (!error.retryable || attempt === maxAttempts) {
          onAttempt?.({ attempt, maxAttempts, error });
          return { success: false, error, attempts: attempt };
        }

        const delayMs = computeBackoff(attempt, error, this.backoff);
        onAttempt?.({ attempt, maxAttempts, error, delayMs });
        await this.sleep(delayMs);
      }
    }

    // maxRetries >= 1 is enforced when the config is built
    return {
      success: false,
      error: lastError ?? new InvoiceLedgerError('No attempts were made', 'CONFIG_ERROR', false),
      attempts: maxAttempts,
    };
  }
}
