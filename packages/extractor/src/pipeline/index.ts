export { BatchOrchestrator, DEFAULT_BATCH_SETTINGS } from './BatchOrchestrator';
export type { BatchOrchestratorOptions, BatchResult, BatchSettings, RunOptions } from './BatchOrchestrator';
export { runLedger } from './runLedger';
export type { LedgerRunOptions, LedgerRunResult } from './runLedger';
export { stampEvent } from './events';
export type { BatchEvent, BatchEventInput, BatchEventListener, BatchEventType, BatchProgress } from './events';
