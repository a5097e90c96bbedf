// ═══════════════════════════════════════════════════════
// helpers.ts — Pure utility functions (zero dependencies)
// ═══════════════════════════════════════════════════════
import type { CalendarDate, DateFormat } from '../types.ts';

interface DatePattern {
  re: RegExp;
}

// Every pattern exposes named groups y / m / d.
const DATE_PATTERNS: Record<DateFormat, DatePattern> = {
  'YYYY-MM-DD': { re: /^(?<y>\d{4})-(?<m>\d{1,2})-(?<d>\d{1,2})$/ },
  'YYYY/MM/DD': { re: /^(?<y>\d{4})\/(?<m>\d{1,2})\/(?<d>\d{1,2})$/ },
  'DD/MM/YYYY': { re: /^(?<d>\d{1,2})\/(?<m>\d{1,2})\/(?<y>\d{4})$/ },
  'MM/DD/YYYY': { re: /^(?<m>\d{1,2})\/(?<d>\d{1,2})\/(?<y>\d{4})$/ },
  'DD.MM.YYYY': { re: /^(?<d>\d{1,2})\.(?<m>\d{1,2})\.(?<y>\d{4})$/ },
  'YYYY-MM-DD HH:mm:ss': { re: /^(?<y>\d{4})-(?<m>\d{1,2})-(?<d>\d{1,2})[ T](?:[01]\d|2[0-3]):[0-5]\d:[0-5]\d$/ },
};

export const DATE_FORMATS = [
  'YYYY-MM-DD',
  'YYYY/MM/DD',
  'DD/MM/YYYY',
  'MM/DD/YYYY',
  'DD.MM.YYYY',
  'YYYY-MM-DD HH:mm:ss',
] as const satisfies readonly DateFormat[];

/** Tried in this order; ISO first so "2024-01-02" never reads as day-first. */
export const DEFAULT_DATE_FORMATS: readonly DateFormat[] = [
  'YYYY-MM-DD',
  'YYYY-MM-DD HH:mm:ss',
  'YYYY/MM/DD',
  'DD.MM.YYYY',
  'DD/MM/YYYY',
];

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/** Format y/m/d → "YYYY-MM-DD" */
export function toCalendarDate(year: number, month: number, day: number): CalendarDate {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/**
 * Parse date text against the given formats, first valid match wins.
 * Returns null when nothing matches or the day does not exist (2023-02-29).
 */
export function parseCalendarDate(text: string, formats: readonly DateFormat[]): CalendarDate | null {
  const input = text.trim();
  for (const fmt of formats) {
    const groups = DATE_PATTERNS[fmt].re.exec(input)?.groups;
    if (!groups) continue;
    const year = parseInt(groups.y ?? '', 10);
    const month = parseInt(groups.m ?? '', 10);
    const day = parseInt(groups.d ?? '', 10);
    if (month < 1 || month > 12) continue;
    if (day < 1 || day > daysInMonth(year, month)) continue;
    return toCalendarDate(year, month, day);
  }
  return null;
}

/** Currency symbol from the ticker's country suffix ("CDR.PL" → "PLN") */
const CURRENCY_BY_SUFFIX: Record<string, string> = {
  PL: 'PLN',
  US: '$',
  EU: '€',
};

export function currencySymbol(ticker: string): string {
  const dot = ticker.lastIndexOf('.');
  if (dot < 0) return '$';
  return CURRENCY_BY_SUFFIX[ticker.slice(dot + 1).toUpperCase()] ?? '$';
}

/** Sum of numeric array (0 for empty) */
export const sum = (values: readonly number[]): number => values.reduce((s, v) => s + v, 0);

/** Arithmetic mean, null for empty input */
export function mean(values: readonly number[]): number | null {
  return values.length > 0 ? sum(values) / values.length : null;
}

/** Division that reports "no data" instead of Infinity/NaN */
export function ratioOrNull(num: number, den: number): number | null {
  return den === 0 ? null : num / den;
}
