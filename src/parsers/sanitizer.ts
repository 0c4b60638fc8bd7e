import { ValidationError } from '../utils/errors.ts';
import {
  MAX_POSITIONS,
  MAX_POSITION_PRICE,
  MAX_TOTAL_AMOUNT,
  type PositionPayload,
  type ReceiptPayload,
} from '../types/receipt.types.ts';

const REQUIRED_FIELDS = ['merchant', 'category', 'total_amount'] as const;
const STRING_FIELDS = ['merchant', 'category', 'text', 'description'] as const;
const PASSTHROUGH_FIELDS = ['text', 'description', 'is_income', 'reference_receipts_ids'] as const;
const QUANTITY_MAX_LENGTH = 50;

// Control characters other than \t \n \r
const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F]/g;
const HTML_TAGS = /<\/?[a-zA-Z!][^>]*>/g;

/**
 * Clean free text coming from the user or the AI.
 * Truncates first, then strips markup and control characters.
 */
export function sanitizeText(text: string | null | undefined, maxLength = 1000): string {
  if (!text) return '';

  let value = text;
  if (value.length > maxLength) {
    value = value.slice(0, maxLength);
    console.warn(`[Sanitizer] Text truncated to ${maxLength} characters`);
  }

  return value.replace(HTML_TAGS, '').replace(CONTROL_CHARS, '').trim();
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a number the way a JSON producer might write it: 12.5 or "12.5".
 */
export function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Accepts D-M-YYYY or DD-MM-YYYY with a real calendar day and returns the
 * zero-padded DD-MM-YYYY form, or null.
 */
export function normalizeDate(value: string): string | null {
  const match = /^(\d{1,2})-(\d{1,2})-(\d{4})$/.exec(value.trim());
  if (!match) return null;

  const day = Number(match[1]);
  const month = Number(match[2]);
  const year = Number(match[3]);
  if (month < 1 || month > 12 || day < 1) return null;

  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) return null;

  return `${String(day).padStart(2, '0')}-${String(month).padStart(2, '0')}-${year}`;
}

/**
 * Validate one line item. Returns null when the position has to be dropped.
 */
export function validatePosition(raw: Record<string, unknown>): PositionPayload | null {
  if (!('description' in raw) || !('price' in raw)) return null;
  if (raw.description === null || raw.description === undefined) return null;

  const price = toFiniteNumber(raw.price);
  if (price === null || price < 0 || price > MAX_POSITION_PRICE) return null;

  const position: PositionPayload = {
    description: sanitizeText(String(raw.description)),
    price,
  };

  if ('quantity' in raw && raw.quantity !== null && raw.quantity !== undefined) {
    position.quantity = sanitizeText(String(raw.quantity), QUANTITY_MAX_LENGTH);
  }
  if ('category' in raw && raw.category !== null && raw.category !== undefined) {
    position.category = sanitizeText(String(raw.category));
  }

  return position;
}

/**
 * Validate and clean the receipt object produced by the AI.
 * Throws ValidationError when the document cannot be used at all.
 */
export function validateReceiptJson(raw: unknown): ReceiptPayload {
  if (!isPlainObject(raw)) {
    throw new ValidationError('Invalid data format', { userFacing: false });
  }

  for (const field of REQUIRED_FIELDS) {
    if (!(field in raw)) {
      throw new ValidationError(`Missing required field: ${field}`, { userFacing: false });
    }
  }

  const data: Record<string, unknown> = { ...raw };

  for (const field of STRING_FIELDS) {
    const value = data[field];
    if (value !== null && value !== undefined && value !== '' && value !== false) {
      data[field] = sanitizeText(String(value));
    }
  }

  const totalAmount = toFiniteNumber(data.total_amount);
  if (totalAmount === null) {
    throw new ValidationError('Invalid total amount format', { userFacing: false });
  }
  if (totalAmount < 0 || totalAmount > MAX_TOTAL_AMOUNT) {
    throw new ValidationError(`Invalid total amount: ${totalAmount}`, { userFacing: false });
  }

  let date: string | null | undefined;
  if (data.date !== null && data.date !== undefined && data.date !== '') {
    const dateStr = String(data.date);
    const normalized = normalizeDate(dateStr);
    if (normalized) {
      date = normalized;
    } else {
      console.warn(`[Sanitizer] Invalid date format: ${dateStr}`);
      date = null;
    }
  } else if ('date' in data) {
    date = null;
  }

  let positions: PositionPayload[] | undefined;
  if (Array.isArray(data.positions)) {
    positions = [];
    for (const item of data.positions.slice(0, MAX_POSITIONS)) {
      if (!isPlainObject(item)) continue;
      const position = validatePosition(item);
      if (position) positions.push(position);
    }
  }

  const payload: ReceiptPayload = {
    merchant: data.merchant,
    category: data.category,
    total_amount: totalAmount,
  };
  for (const key of PASSTHROUGH_FIELDS) {
    if (key in data) payload[key] = data[key];
  }
  if (date !== undefined) payload.date = date;
  if (positions !== undefined) payload.positions = positions;

  return payload;
}
