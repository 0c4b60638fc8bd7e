import { ValidationError } from '../utils/errors.ts';
import { isPlainObject, toFiniteNumber } from './sanitizer.ts';
import {
  DEFAULT_CATEGORY,
  DEFAULT_MERCHANT,
  type Position,
  type Receipt,
} from '../types/receipt.types.ts';

const MAX_USER_ID = 2 ** 63;
const DIGITS = /^\d+$/;

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

export function validateUserId(userId: number): number {
  if (!Number.isInteger(userId) || userId <= 0 || userId > MAX_USER_ID) {
    throw new ValidationError('Invalid user ID', { userFacing: false });
  }
  return userId;
}

function toReferenceId(value: unknown): number | null {
  if (typeof value === 'number' && Number.isInteger(value) && value > 0) return value;
  if (typeof value === 'string' && DIGITS.test(value.trim())) {
    const id = Number(value.trim());
    return id > 0 ? id : null;
  }
  return null;
}

/**
 * Accepts a single id, a digit string, or a list of either.
 * Anything else becomes an empty list.
 */
export function normalizeReferenceIds(value: unknown): number[] {
  if (value === null || value === undefined) return [];

  if (Array.isArray(value)) {
    const ids: number[] = [];
    for (const item of value) {
      const id = toReferenceId(item);
      if (id === null) {
        console.warn(`[ReceiptParser] Invalid reference_receipts_ids: ${JSON.stringify(value)}`);
        return [];
      }
      if (!ids.includes(id)) ids.push(id);
    }
    return ids;
  }

  const id = toReferenceId(value);
  if (id === null) {
    console.warn(`[ReceiptParser] Invalid reference_receipts_ids: ${JSON.stringify(value)}`);
    return [];
  }
  return [id];
}

function parsePosition(raw: unknown, index: number): Position | null {
  if (!isPlainObject(raw)) {
    console.warn(`[ReceiptParser] Skipping position ${index}: not an object`);
    return null;
  }

  const description = nonEmptyString(raw.description);
  const price = toFiniteNumber(raw.price);
  if (description === undefined || price === null) {
    console.warn(`[ReceiptParser] Skipping position ${index}: missing description or price`);
    return null;
  }

  const quantity = raw.quantity === null || raw.quantity === undefined ? '1' : String(raw.quantity);

  return {
    description,
    quantity,
    category: nonEmptyString(raw.category) ?? DEFAULT_CATEGORY,
    price,
  };
}

/**
 * Build a Receipt from a validated payload. Field defaults live here and nowhere else.
 */
export function parseReceiptData(data: unknown, userId: number): Receipt {
  if (!isPlainObject(data)) {
    throw new ValidationError('Receipt data must be an object', { userFacing: false });
  }

  const totalAmount = toFiniteNumber(data.total_amount);
  if (totalAmount === null) {
    throw new ValidationError('Receipt is missing a numeric total_amount', { userFacing: false });
  }

  const positions: Position[] = [];
  if (Array.isArray(data.positions)) {
    data.positions.forEach((raw: unknown, index: number) => {
      const position = parsePosition(raw, index);
      if (position) positions.push(position);
    });
  }

  const receipt: Receipt = {
    userId: validateUserId(userId),
    merchant: nonEmptyString(data.merchant) ?? DEFAULT_MERCHANT,
    category: nonEmptyString(data.category) ?? DEFAULT_CATEGORY,
    totalAmount,
    isIncome: data.is_income === true || data.is_income === 'true',
    date: nonEmptyString(data.date) ?? null,
    positions,
    referenceReceiptIds: normalizeReferenceIds(data.reference_receipts_ids),
  };

  const description = nonEmptyString(data.description);
  if (description !== undefined) receipt.description = description;
  const text = nonEmptyString(data.text);
  if (text !== undefined) receipt.text = text;

  return receipt;
}

export function parseReceiptJson(json: string, userId: number): Receipt {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    throw new ValidationError('Receipt JSON could not be parsed', { userFacing: false, cause: error });
  }
  return parseReceiptData(data, userId);
}
