import { ParseError } from '../errors';
import { freezeRecord } from '../records';
import type {
  ExtractionMode,
  ImageQuality,
  InvoiceClassification,
  InvoiceRecord,
  InvoiceVerification,
  RiskLevel,
} from '../types';
import { isRecord, pickField, readText } from '../utils';
import { AMOUNT_TOKEN, parseAmount, toHalfWidth } from './normalizers/amount';
import { normalizeDate, type DateResult } from './normalizers/date';

export interface ParseOptions {
  mode: ExtractionMode;
  sourcePath: string;
  /** Provider attempts spent producing `text` */
  attempts?: number;
}

// ============================================================================
// Field keys and labels
// ============================================================================

const JSON_KEYS = {
  amount: ['total', 'amount', '价税合计', 'total_amount', 'amount_total'],
  invoiceNumber: ['invoice_no', 'invoice_number', '发票号码'],
  date: ['issue_date', 'date', 'invoice_date', '开票日期'],
  vendor: ['seller', 'vendor', 'vendor_name', 'seller_name', '销售方'],
  buyer: ['buyer', 'buyer_name', 'purchaser', '购买方'],
  tax: ['tax', 'tax_amount', '税额'],
  subtotal: ['subtotal', '金额'],
  items: ['items', '项目'],
} as const;

const AMOUNT_LABELS = [
  '价税合计',
  '小写',
  '合计金额',
  '金额合计',
  '总金额',
  '合计',
  'grand total',
  'total amount',
  'total',
  'amount',
];

const INVOICE_NUMBER_LABELS = ['发票号码', 'invoice\\s*(?:no\\.?|number|#)'];
const DATE_LABELS = ['开票日期', '日期', 'issue\\s*date', 'invoice\\s*date', 'date'];
const VENDOR_LABELS = ['销售方名称', '销售方', '销方', 'seller', 'vendor'];
const BUYER_LABELS = ['购买方名称', '购买方', '购方', 'buyer', 'purchaser'];

/** Values models write instead of leaving a field empty */
const EMPTY_MARKERS = new Set(['无', '未知', '空', 'n/a', 'na', 'none', 'null', 'unknown', '-']);

const LABEL_WINDOW = 40;

// ============================================================================
// JSON extraction
// ============================================================================

/**
 * Drop reasoning blocks some models emit before the answer
 */
export function stripModelNoise(text: string): string {
  return text.replace(/<think>[\s\S]*?<\/think>/gi, '').trim();
}

function findObjectEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }
    if (char === '"') inString = true;
    else if (char === '{') depth++;
    else if (char === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }

  return -1;
}

function jsonCandidates(text: string): string[] {
  const candidates: string[] = [];

  for (const match of text.matchAll(/```(?:json)?\s*([\s\S]*?)```/gi)) {
    candidates.push(match[1].trim());
  }

  for (let start = text.indexOf('{'); start !== -1; start = text.indexOf('{', start + 1)) {
    const end = findObjectEnd(text, start);
    if (end !== -1) candidates.push(text.slice(start, end + 1));
  }

  return candidates;
}

/**
 * First JSON object in a model answer, fenced or inline
 *
 * @throws ParseError when the text holds no parseable object
 */
export function extractJsonObject(text: string): Record<string, unknown> {
  const cleaned = stripModelNoise(text);

  for (const candidate of jsonCandidates(cleaned)) {
    try {
      const value: unknown = JSON.parse(candidate);
      if (isRecord(value)) return value;
    } catch {
      // not JSON, try the next candidate
    }
  }

  throw new ParseError('No JSON object found in model output');
}

// ============================================================================
// Pattern fallback
// ============================================================================

function labelPattern(label: string): string {
  return /^[a-z]/i.test(label) ? `\\b(?:${label})(?![a-z])` : label;
}

interface AmountCandidate {
  value: number;
  /** Written like money: decimals or a currency mark beside it */
  money: boolean;
}

const MONEY_PREFIX = /[¥￥$€]\s*$/;
const MONEY_SUFFIX = /^\s*元/;
const DECIMAL_TAIL = /[.,]\d{1,2}$/;

function amountCandidates(text: string): AmountCandidate[] {
  const candidates: AmountCandidate[] = [];

  for (const match of text.matchAll(new RegExp(AMOUNT_TOKEN.source, 'g'))) {
    const value = parseAmount(match[0]);
    if (value === null || value <= 0) continue;
    const start = match.index ?? 0;
    const money =
      DECIMAL_TAIL.test(match[0]) ||
      MONEY_PREFIX.test(text.slice(0, start)) ||
      MONEY_SUFFIX.test(text.slice(start + match[0].length));
    candidates.push({ value, money });
  }

  return candidates;
}

function amountInWindow(window: string): number | null {
  const candidates = amountCandidates(window);
  if (candidates.length === 0) {
    // 壹仟贰佰... and other numeral forms without digits
    const amount = parseAmount(window);
    return amount !== null && amount > 0 ? amount : null;
  }
  return (candidates.find((candidate) => candidate.money) ?? candidates[0]).value;
}

function findLabeledAmount(text: string): number | null {
  for (const label of AMOUNT_LABELS) {
    for (const match of text.matchAll(new RegExp(labelPattern(label), 'gi'))) {
      const from = (match.index ?? 0) + match[0].length;
      const amount = amountInWindow(text.slice(from, from + LABEL_WINDOW));
      if (amount !== null) return amount;
    }
  }

  // A bare number is an answer too
  const bare = new RegExp(`^[¥￥$]?\\s*${AMOUNT_TOKEN.source}\\s*元?$`);
  if (bare.test(text.trim())) {
    return parseAmount(text);
  }

  return null;
}

/** Largest money-shaped number anywhere in the text */
function findLargestAmount(text: string): number | null {
  const values = amountCandidates(text)
    .filter((candidate) => candidate.money)
    .map((candidate) => candidate.value);
  return values.length > 0 ? Math.max(...values) : null;
}

function findLabeledText(text: string, labels: readonly string[]): string | undefined {
  const pattern = new RegExp(
    `(?:${labels.map(labelPattern).join('|')})\\s*[:：]?\\s*([^\\n\\r,，;；|]{2,60})`,
    'i'
  );
  const match = text.match(pattern);
  return match ? cleanText(match[1]) : undefined;
}

function findInvoiceNumber(text: string): string | undefined {
  const pattern = new RegExp(
    `(?:${INVOICE_NUMBER_LABELS.map(labelPattern).join('|')})\\s*[:：]?\\s*([A-Za-z0-9-]{6,})`,
    'i'
  );
  return text.match(pattern)?.[1];
}

function findLabeledDate(text: string): DateResult | undefined {
  for (const label of DATE_LABELS) {
    const match = new RegExp(labelPattern(label), 'i').exec(text);
    if (!match) continue;
    const from = match.index + match[0].length;
    const result = normalizeDate(text.slice(from, from + LABEL_WINDOW));
    if (result.ok || result.reason === 'invalid') return result;
  }
  return undefined;
}

function cleanText(value: string): string | undefined {
  const cleaned = value.trim().replace(/^["'“”「『]+|["'“”」』。.]+$/g, '').trim();
  if (!cleaned || EMPTY_MARKERS.has(cleaned.toLowerCase())) return undefined;
  return cleaned;
}

// ============================================================================
// Invoice parsing
// ============================================================================

interface InvoiceFields {
  amount: number | null;
  invoiceNumber?: string;
  date?: DateResult;
  vendorName?: string;
  buyerName?: string;
  taxAmount?: number;
  subtotal?: number;
  items?: string;
}

function readNonNegative(value: unknown): number | undefined {
  const amount = parseAmount(value);
  return amount !== null && amount >= 0 ? amount : undefined;
}

function readItems(value: unknown): string | undefined {
  if (Array.isArray(value)) {
    const names = value.map(readText).filter((name): name is string => name !== undefined);
    return names.length > 0 ? names.join(', ') : undefined;
  }
  return readText(value);
}

function readDate(value: unknown): DateResult | undefined {
  const text = readText(value);
  return text ? normalizeDate(text) : undefined;
}

function fieldsFromJson(data: Record<string, unknown>): InvoiceFields {
  const text = (keys: readonly string[]) => {
    const value = readText(pickField(data, keys));
    return value === undefined ? undefined : cleanText(value);
  };

  return {
    amount: parseAmount(pickField(data, JSON_KEYS.amount)),
    invoiceNumber: text(JSON_KEYS.invoiceNumber),
    date: readDate(pickField(data, JSON_KEYS.date)),
    vendorName: text(JSON_KEYS.vendor),
    buyerName: text(JSON_KEYS.buyer),
    taxAmount: readNonNegative(pickField(data, JSON_KEYS.tax)),
    subtotal: readNonNegative(pickField(data, JSON_KEYS.subtotal)),
    items: readItems(pickField(data, JSON_KEYS.items)),
  };
}

function fieldsFromPatterns(text: string, mode: ExtractionMode): InvoiceFields {
  const labeled = findLabeledAmount(text);
  return {
    amount: labeled === null && mode === 'simple' ? findLargestAmount(text) : labeled,
    invoiceNumber: findInvoiceNumber(text),
    date: findLabeledDate(text),
    vendorName: findLabeledText(text, VENDOR_LABELS),
    buyerName: findLabeledText(text, BUYER_LABELS),
  };
}

function readFields(text: string, mode: ExtractionMode): InvoiceFields {
  try {
    return fieldsFromJson(extractJsonObject(text));
  } catch (error) {
    if (!(error instanceof ParseError)) throw error;
    return fieldsFromPatterns(toHalfWidth(stripModelNoise(text)), mode);
  }
}

/**
 * Turn one model answer into an invoice record.
 *
 * No positive amount means `failed` with `amount_not_found`. In full mode
 * every other missing field adds a tag and the record is `partial_failure`.
 */
export function parseInvoiceResponse(text: string, options: ParseOptions): InvoiceRecord {
  const fields = readFields(text, options.mode);
  const attempts = options.attempts ?? 1;
  const amount = fields.amount !== null && fields.amount > 0 ? fields.amount : null;

  if (amount === null) {
    return freezeRecord({
      sourcePath: options.sourcePath,
      amountTotal: 0,
      rawModelText: text,
      extractionStatus: 'failed',
      errors: ['amount_not_found'],
      attempts,
    });
  }

  if (options.mode === 'simple') {
    return freezeRecord({
      sourcePath: options.sourcePath,
      amountTotal: amount,
      rawModelText: text,
      extractionStatus: 'success',
      errors: [],
      attempts,
    });
  }

  const errors: string[] = [];
  if (!fields.invoiceNumber) errors.push('invoice_number_not_found');
  if (!fields.date) errors.push('date_not_found');
  else if (!fields.date.ok) errors.push(fields.date.reason === 'invalid' ? 'date_invalid' : 'date_not_found');
  if (!fields.vendorName) errors.push('vendor_not_found');
  if (!fields.buyerName) errors.push('buyer_not_found');

  return freezeRecord({
    sourcePath: options.sourcePath,
    amountTotal: amount,
    invoiceDate: fields.date?.ok ? fields.date.date : undefined,
    vendorName: fields.vendorName,
    buyerName: fields.buyerName,
    invoiceNumber: fields.invoiceNumber,
    taxAmount: fields.taxAmount,
    subtotal: fields.subtotal,
    items: fields.items,
    rawModelText: text,
    extractionStatus: errors.length > 0 ? 'partial_failure' : 'success',
    errors,
    attempts,
  });
}

// ============================================================================
// Auxiliary answers
// ============================================================================

/**
 * Answer to the is-this-an-invoice check.
 * An unreadable answer counts as an invoice; a JSON answer without the flag does not.
 */
export function parseInvoiceCheck(text: string): boolean {
  let data: Record<string, unknown>;
  try {
    data = extractJsonObject(text);
  } catch (error) {
    if (error instanceof ParseError) return true;
    throw error;
  }

  const flag = data.is_invoice;
  if (typeof flag === 'boolean') return flag;
  if (typeof flag === 'string') return flag.trim().toLowerCase() === 'true';
  return false;
}

const INVOICE_TYPES: Record<string, string> = {
  special_vat: '增值税专用发票',
  general_vat: '增值税普通发票',
  electronic: '电子发票',
  toll: '通行费发票',
  taxi: '出租车发票',
  train: '火车票',
  flight: '机票行程单',
  other: '其他类型',
};

const EXPENSE_CATEGORIES: Record<string, string> = {
  travel: '差旅',
  dining: '餐饮',
  office: '办公用品',
  transport: '交通',
  telecom: '通讯',
  conference: '会议',
  training: '培训',
  service: '服务费',
  material: '材料/设备',
  other: '其他',
};

export const DEFAULT_CLASSIFICATION: Readonly<InvoiceClassification> = Object.freeze({
  invoiceType: 'other',
  invoiceTypeName: INVOICE_TYPES.other,
  expenseCategory: 'other',
  expenseCategoryName: EXPENSE_CATEGORIES.other,
});

export const DEFAULT_VERIFICATION: Readonly<InvoiceVerification> = Object.freeze({
  riskLevel: 'low',
  hasStamp: true,
  imageQuality: 'good',
  riskNotes: '',
});

function readCode(value: unknown, table: Record<string, string>): string {
  const code = readText(value)?.toLowerCase();
  return code !== undefined && code in table ? code : 'other';
}

export function parseClassification(text: string): InvoiceClassification {
  let data: Record<string, unknown>;
  try {
    data = extractJsonObject(text);
  } catch (error) {
    if (error instanceof ParseError) return { ...DEFAULT_CLASSIFICATION };
    throw error;
  }

  const invoiceType = readCode(data.invoice_type, INVOICE_TYPES);
  const expenseCategory = readCode(data.expense_category, EXPENSE_CATEGORIES);

  return {
    invoiceType,
    invoiceTypeName: readText(data.invoice_type_name) ?? INVOICE_TYPES[invoiceType],
    expenseCategory,
    expenseCategoryName: readText(data.expense_category_name) ?? EXPENSE_CATEGORIES[expenseCategory],
  };
}

const RISK_LEVELS: readonly RiskLevel[] = ['low', 'medium', 'high'];
const IMAGE_QUALITIES: readonly ImageQuality[] = ['good', 'fair', 'poor'];

function readEnum<T extends string>(value: unknown, allowed: readonly T[], fallback: T): T {
  const text = readText(value)?.toLowerCase();
  return allowed.find((option) => option === text) ?? fallback;
}

export function parseVerification(text: string): InvoiceVerification {
  let data: Record<string, unknown>;
  try {
    data = extractJsonObject(text);
  } catch (error) {
    if (error instanceof ParseError) return { ...DEFAULT_VERIFICATION };
    throw error;
  }

  return {
    riskLevel: readEnum(data.risk_level, RISK_LEVELS, DEFAULT_VERIFICATION.riskLevel),
    hasStamp: typeof data.has_stamp === 'boolean' ? data.has_stamp : DEFAULT_VERIFICATION.hasStamp,
    imageQuality: readEnum(data.image_quality, IMAGE_QUALITIES, DEFAULT_VERIFICATION.imageQuality),
    riskNotes: readText(data.risk_notes) ?? '',
  };
}
