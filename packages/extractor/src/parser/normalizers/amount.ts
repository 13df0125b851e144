/**
 * Amount normalization
 *
 * Turns whatever a model wrote for a money value into a number:
 * full-width digits, currency marks, thousands separators in the
 * Chinese/US, European and Swiss styles, and uppercase Chinese numerals.
 */

const CURRENCY_MARKS = /[¥￥$€]|RMB|CNY|人民币|元整?|圆整?/gi;

/** Matches one written number, grouped or plain */
export const AMOUNT_TOKEN = /[-+]?(?:\d{1,3}(?:[ ,.']\d{3})+(?:[.,]\d{1,2})?|\d+(?:[.,]\d+)?)/;

const CHINESE_DIGITS: Record<string, number> = {
  零: 0, 〇: 0,
  壹: 1, 一: 1,
  贰: 2, 二: 2, 两: 2,
  叁: 3, 三: 3,
  肆: 4, 四: 4,
  伍: 5, 五: 5,
  陆: 6, 六: 6,
  柒: 7, 七: 7,
  捌: 8, 八: 8,
  玖: 9, 九: 9,
};

const CHINESE_UNITS: Record<string, number> = {
  拾: 10, 十: 10,
  佰: 100, 百: 100,
  仟: 1000, 千: 1000,
};

const CHINESE_SECTIONS: Record<string, number> = {
  万: 10_000,
  萬: 10_000,
  亿: 100_000_000,
};

/**
 * Full-width forms (U+FF01..U+FF5E) and the ideographic space to ASCII
 */
export function toHalfWidth(text: string): string {
  let result = '';
  for (const char of text) {
    const code = char.charCodeAt(0);
    if (code >= 0xff01 && code <= 0xff5e) {
      result += String.fromCharCode(code - 0xfee0);
    } else if (code === 0x3000) {
      result += ' ';
    } else {
      result += char;
    }
  }
  return result;
}

/**
 * Round half-up to two decimals.
 * Shifting through the exponent avoids 1.005 * 100 = 100.49999...
 */
export function roundAmount(value: number): number {
  if (!Number.isFinite(value)) return Number.NaN;
  const text = String(value);
  if (text.includes('e')) {
    return Math.round(value * 100) / 100;
  }
  return Number(`${Math.round(Number(`${text}e2`))}e-2`);
}

function hasChineseNumerals(text: string): boolean {
  for (const char of text) {
    if (char in CHINESE_DIGITS || char in CHINESE_UNITS || char in CHINESE_SECTIONS) return true;
  }
  return false;
}

function parseChineseInteger(text: string): number {
  let total = 0;
  let section = 0;
  let digit = 0;
  let seen = false;

  for (const char of text) {
    if (char in CHINESE_DIGITS) {
      digit = CHINESE_DIGITS[char];
      seen = true;
    } else if (char in CHINESE_UNITS) {
      // 拾 alone reads as 10
      section += (digit || 1) * CHINESE_UNITS[char];
      digit = 0;
      seen = true;
    } else if (char in CHINESE_SECTIONS) {
      const scale = CHINESE_SECTIONS[char];
      total = (total + section + digit) * scale;
      section = 0;
      digit = 0;
      seen = true;
    }
  }

  return seen ? total + section + digit : 0;
}

/**
 * Uppercase Chinese amount such as 壹仟贰佰叁拾肆元伍角陆分
 */
export function parseChineseAmount(text: string): number | null {
  if (!hasChineseNumerals(text)) return null;

  const yuan = text.search(/[元圆]/);
  const fractionStart = yuan >= 0 ? yuan + 1 : text.search(/[零〇一二三四五六七八九两壹贰叁肆伍陆柒捌玖][角分]/);
  const integerPart = fractionStart < 0 ? text : text.slice(0, yuan >= 0 ? yuan : fractionStart);
  const fractionPart = fractionStart < 0 ? '' : text.slice(fractionStart);

  let jiao = 0;
  let fen = 0;
  let pending = 0;
  for (const char of fractionPart) {
    if (char in CHINESE_DIGITS) {
      pending = CHINESE_DIGITS[char];
    } else if (char === '角') {
      jiao = pending;
      pending = 0;
    } else if (char === '分') {
      fen = pending;
      pending = 0;
    }
  }

  const value = parseChineseInteger(integerPart) + jiao / 10 + fen / 100;
  return value > 0 ? roundAmount(value) : null;
}

/**
 * Resolve thousands and decimal separators of a single numeric token
 */
function normalizeSeparators(token: string): string {
  let text = token.replace(/[\s']/g, '');
  const lastComma = text.lastIndexOf(',');
  const lastDot = text.lastIndexOf('.');

  if (lastComma > lastDot) {
    if (lastDot === -1) {
      const commas = text.split(',').length - 1;
      const afterComma = text.slice(lastComma + 1);
      // 1,234 and 1,234,567 group thousands; 12,5 is a decimal comma
      text = commas > 1 || afterComma.length === 3
        ? text.replace(/,/g, '')
        : text.replace(',', '.');
    } else {
      // European: 1.234,56
      text = text.replace(/\./g, '').replace(',', '.');
    }
  } else if (lastDot > lastComma) {
    const dots = text.split('.').length - 1;
    text = dots > 1 ? text.replace(/\./g, '') : text.replace(/,/g, '');
  }

  return text;
}

/**
 * Parse a money value written by a model.
 * Returns null when no number can be read; the sign is preserved.
 */
export function parseAmount(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? roundAmount(value) : null;
  }
  if (typeof value !== 'string') return null;

  const text = toHalfWidth(value).trim();
  if (!text) return null;

  if (!/\d/.test(text)) {
    return parseChineseAmount(text);
  }

  const cleaned = text.replace(CURRENCY_MARKS, ' ');
  const match = cleaned.match(AMOUNT_TOKEN);
  if (!match) return null;

  const parsed = Number.parseFloat(normalizeSeparators(match[0]));
  return Number.isFinite(parsed) ? roundAmount(parsed) : null;
}
