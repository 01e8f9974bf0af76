/**
 * Field Normalisation for Model-Extracted Transactions
 *
 * Dates, amounts, type labels and confidence arrive as loosely formatted
 * model output. Each helper returns null (or a fallback) instead of throwing.
 */

import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat';

dayjs.extend(customParseFormat);

// ============================================================================
// Dates
// ============================================================================

/** Tried in order, strict; the first format that round-trips wins */
export const DATE_FORMATS: readonly string[] = [
  'YYYY-MM-DD',
  'MM/DD/YYYY',
  'DD/MM/YYYY',
  'YYYY-MM-DD HH:mm:ss',
  'YYYY-MM-DD[T]HH:mm:ss',
  'YYYY/MM/DD',
  'MM-DD-YYYY',
  'M/D/YYYY',
  'MM/DD/YY',
  'MMM D, YYYY',
  'MMMM D, YYYY',
  'D MMM YYYY',
  'DD MMM YYYY',
];

export interface DateParseResult {
  date: string | null;
  reason: string | null;
}

export function parseTransactionDate(value: unknown): DateParseResult {
  if (value === null || value === undefined || value === '') {
    return { date: null, reason: null };
  }
  if (typeof value !== 'string') {
    return { date: null, reason: `date is not a string: ${JSON.stringify(value)}` };
  }

  const input = value.trim();
  for (const format of DATE_FORMATS) {
    const parsed = dayjs(input, format, true);
    if (parsed.isValid()) {
      return { date: parsed.format('YYYY-MM-DD'), reason: null };
    }
  }
  return { date: null, reason: `unrecognised date format: "${input}"` };
}

// ============================================================================
// Amounts
// ============================================================================

const DECIMAL_PATTERN = /^\d+(\.\d+)?$|^\.\d+$/;

function roundCents(value: number): number {
  const rounded = Math.round(value * 100) / 100;
  return rounded === 0 ? 0 : rounded;
}

/**
 * Parse a monetary value: numbers, or strings such as "$1,234.50",
 * "-12.00", "12.00-" and "(12.00)".
 */
export function parseAmount(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? roundCents(value) : null;
  }
  if (typeof value !== 'string') return null;

  let text = value.trim().replace(/[$€£¥,\s]/g, '');
  let negative = false;

  if (text.startsWith('(') && text.endsWith(')')) {
    negative = true;
    text = text.slice(1, -1);
  }
  if (text.endsWith('-')) {
    negative = !negative;
    text = text.slice(0, -1);
  }
  if (text.startsWith('-')) {
    negative = !negative;
    text = text.slice(1);
  } else if (text.startsWith('+')) {
    text = text.slice(1);
  }

  if (!DECIMAL_PATTERN.test(text)) return null;
  const amount = Number(text);
  return roundCents(negative ? -amount : amount);
}

// ============================================================================
// Transaction Types and Sign
// ============================================================================

const TYPE_ALIASES: Record<string, string> = {
  dr: 'debit',
  debits: 'debit',
  cr: 'credit',
  credits: 'credit',
  withdrawals: 'withdrawal',
  deposits: 'deposit',
  purchases: 'purchase',
  payments: 'payment',
  fees: 'fee',
  charge: 'fee',
  transfers: 'transfer',
  refunds: 'refund',
};

/** Labels whose amount must be <= 0 */
export const DEBIT_LIKE_TYPES: ReadonlySet<string> = new Set([
  'debit',
  'withdrawal',
  'payment',
  'purchase',
  'fee',
]);

/** Labels whose amount must be >= 0 */
export const CREDIT_LIKE_TYPES: ReadonlySet<string> = new Set(['credit', 'deposit', 'refund']);

export function normalizeTransactionType(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const label = value.toLowerCase().trim();
  if (!label) return null;
  return TYPE_ALIASES[label] ?? label;
}

/**
 * Force the amount's sign to agree with the type label. Labels outside both
 * tables keep the model's sign.
 */
export function normalizeSign(amount: number, transactionType: string | null): number {
  if (transactionType && DEBIT_LIKE_TYPES.has(transactionType)) {
    return amount > 0 ? -amount : amount;
  }
  if (transactionType && CREDIT_LIKE_TYPES.has(transactionType)) {
    return amount < 0 ? -amount : amount;
  }
  return amount;
}

// ============================================================================
// Confidence and Text
// ============================================================================

function toUnitInterval(value: unknown): number | null {
  if (typeof value !== 'number' || !Number.isFinite(value)) return null;
  const scaled = value > 1 ? value / 100 : value;
  return Math.min(1, Math.max(0, scaled));
}

/**
 * Item confidence, else the response-level confidence, else the fallback.
 * Values above 1 are read as percentages.
 */
export function resolveConfidence(
  itemConfidence: unknown,
  responseConfidence: unknown,
  fallback: number
): number {
  return toUnitInterval(itemConfidence) ?? toUnitInterval(responseConfidence) ?? fallback;
}

export function cleanText(value: unknown, maxLength: number): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value !== 'string' && typeof value !== 'number') return null;
  const text = String(value).trim();
  return text ? text.slice(0, maxLength) : null;
}
