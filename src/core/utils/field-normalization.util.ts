import { ActivationStatus } from '../../domain/esim';

const PLACEHOLDERS = new Set(['', '-', 'n/a', 'na', 'null', 'none', 'undefined']);

const DAY_MS = 24 * 60 * 60 * 1000;

const NAIVE_DATETIME = /^\d{4}-\d{2}-\d{2}[ T]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

const STATUS_BY_NAME = new Map<string, ActivationStatus>(
  Object.values(ActivationStatus).map((status) => [status.toLowerCase(), status]),
);

/**
 * Blank text or a provider placeholder like "N/A" or "-"
 */
export function isPlaceholder(value: string): boolean {
  return PLACEHOLDERS.has(value.trim().toLowerCase());
}

/**
 * Trimmed text, or null for blanks and provider placeholders
 */
export function presentText(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  return isPlaceholder(value) ? null : value.trim();
}

/**
 * Accepts epoch milliseconds, ISO-8601 and "YYYY-MM-DD HH:mm:ss".
 * Timestamps without an offset are read as UTC.
 */
export function parseTimestamp(value: string | number | null | undefined): Date | null {
  if (value === null || value === undefined) return null;

  if (typeof value === 'number') {
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? null : date;
  }

  const text = presentText(value);
  if (!text) return null;

  let normalized = text;
  if (NAIVE_DATETIME.test(text)) {
    normalized = `${text.replace(' ', 'T')}Z`;
  } else if (DATE_ONLY.test(text)) {
    normalized = `${text}T00:00:00Z`;
  }

  const date = new Date(normalized);
  return Number.isNaN(date.getTime()) ? null : date;
}

export function wholeDaysBetween(start: Date, end: Date): number {
  return Math.floor((end.getTime() - start.getTime()) / DAY_MS);
}

/**
 * Integer N from a "<N> Day(s)" fragment of a plan label
 */
export function parseValidityDays(label: string | null): number | null {
  if (!label) return null;
  const match = /(\d+)\s*Days?/i.exec(label);
  return match ? Number(match[1]) : null;
}

/**
 * Case-insensitive match against the known statuses; anything else is Unknown
 */
export function parseActivationStatus(value: string | null | undefined): ActivationStatus {
  const text = presentText(value);
  if (!text) return ActivationStatus.UNKNOWN;
  return STATUS_BY_NAME.get(text.toLowerCase()) ?? ActivationStatus.UNKNOWN;
}
