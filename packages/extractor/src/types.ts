// ============================================================================
// Provider configuration
// ============================================================================

export type ProviderKind = 'ollama' | 'volcengine' | 'openrouter';

interface ProviderConfigBase {
  /** Total attempts allowed per provider call (>= 1) */
  readonly maxRetries: number;

  /** Request timeout for a single HTTP call, independent of retries */
  readonly timeoutMs: number;
}

export interface OllamaConfig extends ProviderConfigBase {
  readonly kind: 'ollama';
  readonly host: string;
  readonly port: number;
  readonly model: string;
}

export interface VolcengineConfig extends ProviderConfigBase {
  readonly kind: 'volcengine';
  readonly apiKey: string;
  /** Inference endpoint id (ep-...), sent as the request's model */
  readonly endpointId: string;
  /** Human-readable model name, for logs and reports only */
  readonly model: string;
}

export interface OpenRouterConfig extends ProviderConfigBase {
  readonly kind: 'openrouter';
  readonly apiKey: string;
  readonly model: string;
}

export type ProviderConfig = OllamaConfig | VolcengineConfig | OpenRouterConfig;

// ============================================================================
// Extraction
// ============================================================================

/** `simple` extracts the amount only, `full` every invoice field */
export type ExtractionMode = 'simple' | 'full';

export type ExtractionStatus = 'success' | 'partial_failure' | 'failed';

export interface EncodedImage {
  sourcePath: string;
  bytes: Uint8Array;
  mimeType: string;
  /** True when the bytes were rendered from a PDF page */
  rasterized: boolean;
}

export interface InvoiceClassification {
  invoiceType: string;
  invoiceTypeName: string;
  expenseCategory: string;
  expenseCategoryName: string;
}

export type RiskLevel = 'low' | 'medium' | 'high';

export type ImageQuality = 'good' | 'fair' | 'poor';

export interface InvoiceVerification {
  riskLevel: RiskLevel;
  hasStamp: boolean;
  imageQuality: ImageQuality;
  riskNotes: string;
}

export interface InvoiceRecord {
  readonly sourcePath: string;
  readonly amountTotal: number;
  readonly invoiceDate?: string;
  readonly vendorName?: string;
  readonly buyerName?: string;
  readonly invoiceNumber?: string;
  readonly taxAmount?: number;
  readonly subtotal?: number;
  readonly items?: string;
  readonly rawModelText: string;
  readonly extractionStatus: ExtractionStatus;
  readonly errors: readonly string[];
  readonly classification?: Readonly<InvoiceClassification>;
  readonly verification?: Readonly<InvoiceVerification>;
  /** Provider attempts spent on the main extraction call */
  readonly attempts: number;
}

// ============================================================================
// Analysis
// ============================================================================

export interface GroupTotal {
  key: string;
  count: number;
  subtotal: number;
}

export interface BucketTotal extends GroupTotal {
  label: string;
  min: number;
  /** Exclusive upper bound, null for the open-ended last bucket */
  max: number | null;
}

export interface AnalysisWarning {
  sourcePath: string;
  amount: number;
  message: string;
}

export interface Analysis {
  totalCount: number;
  validCount: number;
  partialCount: number;
  failedCount: number;
  totalAmount: number;
  averageAmount: number;
  byMonth: GroupTotal[];
  byVendor: GroupTotal[];
  byBucket: BucketTotal[];
  duplicateInvoiceNumbers: string[];
  warnings: AnalysisWarning[];
}
