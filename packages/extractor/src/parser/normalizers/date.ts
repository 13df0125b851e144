import { toHalfWidth } from './amount';

export type DateResult =
  | { ok: true; date: string }
  | { ok: false; reason: 'unrecognized' | 'invalid' };

interface DatePattern {
  regex: RegExp;
  parts: (m: RegExpMatchArray) => [year: string, month: string, day: string];
}

const DATE_PATTERNS: DatePattern[] = [
  // 2024-03-05, 2024/3/5, 2024.3.5, 2024年3月5日
  {
    regex: /(\d{4})\s*[-/.年]\s*(\d{1,2})\s*[-/.月]\s*(\d{1,2})(?!\d)/,
    parts: (m) => [m[1], m[2], m[3]],
  },
  // DD/MM/YYYY or DD-MM-YYYY
  {
    regex: /(?<!\d)(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})(?!\d)/,
    parts: (m) => [m[3], m[2], m[1]],
  },
  // 20240305
  {
    regex: /(?<!\d)(\d{4})(\d{2})(\d{2})(?!\d)/,
    parts: (m) => [m[1], m[2], m[3]],
  },
];

function isValidDate(year: number, month: number, day: number): boolean {
  if (year < 1900 || year > 2100) return false;
  if (month < 1 || month > 12) return false;
  if (day < 1) return false;

  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

/**
 * Normalize the first date found in `value` to YYYY-MM-DD
 */
export function normalizeDate(value: string): DateResult {
  const text = toHalfWidth(value).trim();

  for (const pattern of DATE_PATTERNS) {
    const match = text.match(pattern.regex);
    if (!match) continue;

    const [year, month, day] = pattern.parts(match).map(Number);
    if (!isValidDate(year, month, day)) {
      return { ok: false, reason: 'invalid' };
    }

    return {
      ok: true,
      date: `${year}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`,
    };
  }

  return { ok: false, reason: 'unrecognized' };
}

/** `YYYY-MM` of an ISO date */
export function monthOf(isoDate: string): string {
  return isoDate.slice(0, 7);
}
