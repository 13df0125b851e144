export {
  DEFAULT_CLASSIFICATION,
  DEFAULT_VERIFICATION,
  extractJsonObject,
  parseClassification,
  parseInvoiceCheck,
  parseInvoiceResponse,
  parseVerification,
  stripModelNoise,
} from './ResponseParser';
export type { ParseOptions } from './ResponseParser';
export { parseAmount, parseChineseAmount, roundAmount, toHalfWidth } from './normalizers/amount';
export { monthOf, normalizeDate } from './normalizers/date';
export type { DateResult } from './normalizers/date';
export {
  CLASSIFY_PROMPT,
  FULL_PROMPT,
  promptFor,
  SIMPLE_PROMPT,
  VALIDATE_PROMPT,
  VERIFY_PROMPT,
} from './prompts';
