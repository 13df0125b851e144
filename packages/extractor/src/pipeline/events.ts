import type { LogLevel } from '../logger';
import type { Analysis, InvoiceRecord } from '../types';

export interface BatchProgress {
  processed: number;
  total: number;
  validCount: number;
  partialCount: number;
  failedCount: number;
  /** Sum of valid amounts so far */
  totalAmount: number;
  lastRecord?: InvoiceRecord;
}

export type BatchEvent =
  | { type: 'log'; timestamp: string; level: LogLevel; message: string; sourcePath?: string }
  | { type: 'progress'; timestamp: string; progress: BatchProgress }
  | {
      type: 'attempt';
      timestamp: string;
      sourcePath: string;
      attempt: number;
      maxAttempts: number;
      error?: string;
      delayMs?: number;
    }
  | { type: 'done'; timestamp: string; cancelled: boolean; analysis: Analysis };

export type BatchEventType = BatchEvent['type'];

export type BatchEventListener = (event: BatchEvent) => void;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export type BatchEventInput = DistributiveOmit<BatchEvent, 'timestamp'>;

export function stampEvent(event: BatchEventInput): BatchEvent {
  return { ...event, timestamp: new Date().toISOString() };
}
