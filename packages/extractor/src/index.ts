/**
 * @invoice-ledger/extractor
 *
 * Invoice extraction and aggregation: vision providers with retry,
 * tolerant parsing of model output, batch orchestration, statistics,
 * renaming and reports.
 */

// Types
export type {
  ProviderKind,
  OllamaConfig,
  VolcengineConfig,
  OpenRouterConfig,
  ProviderConfig,
  ExtractionMode,
  ExtractionStatus,
  EncodedImage,
  InvoiceClassification,
  InvoiceVerification,
  RiskLevel,
  ImageQuality,
  InvoiceRecord,
  GroupTotal,
  BucketTotal,
  AnalysisWarning,
  Analysis,
} from './types';

// Errors and logging
export * from './errors';
export { createLogger, silentLogger } from './logger';
export type { LogEntry, Logger, LoggerOptions, LogLevel } from './logger';

// Images
export { loadImage, toBase64, toDataUrl } from './image/ImageEncoder';
export { detectMimeType, isPdf, mimeTypeFromExtension } from './image/mime';
export { PdftoppmRenderer } from './image/PdfRenderer';
export type { PdfRenderer, PdftoppmOptions } from './image/PdfRenderer';

// Providers and extraction
export * from './providers';
export * from './extraction';

// Parsing
export * from './parser';

// Records, walking, orchestration
export { createFailedRecord, freezeRecord, isValidRecord } from './records';
export { DEFAULT_EXCLUDE_KEYWORDS, FileWalker, INVOICE_EXTENSIONS } from './walker/FileWalker';
export type { FileWalkerOptions } from './walker/FileWalker';
export * from './pipeline';

// Analysis, renaming, reports
export { AMOUNT_BUCKETS, analyzeRecords, OUTLIER_FACTOR, UNKNOWN_GROUP } from './analysis/Analyzer';
export { executeRenames, planRenames, sanitizeFileComponent } from './rename/Renamer';
export type { RenameOutcome, RenamePlanEntry, SkipReason } from './rename/Renamer';
export * from './report';

// Configuration
export * from './config';

export { formatAmount } from './utils';
