export { ExtractionClient } from './ExtractionClient';
export type { AttemptEvent, ExtractionClientOptions, ExtractionOutcome } from './ExtractionClient';
export { computeBackoff, DEFAULT_BACKOFF, sleep } from './backoff';
export type { BackoffPolicy } from './backoff';
