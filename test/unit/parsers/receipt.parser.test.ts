/**
 * Tests for receipt.parser.ts
 * Building Receipt objects from validated AI payloads
 */
import { describe, test, expect } from 'vitest';
import {
  normalizeReferenceIds,
  parseReceiptData,
  parseReceiptJson,
  validateUserId,
} from '../../../src/parsers/receipt.parser.ts';
import { ValidationError } from '../../../src/utils/errors.ts';

describe('parseReceiptData', () => {
  test('maps a complete payload', () => {
    const receipt = parseReceiptData({
      merchant: 'Tesco',
      category: 'food',
      total_amount: 12.5,
      date: '15-03-2024',
      description: 'Lunch',
      text: 'TESCO STORES',
      is_income: false,
      positions: [{ description: 'Sandwich', quantity: '2', category: 'food', price: 8.5 }],
      reference_receipts_ids: [3],
    }, 123);

    expect(receipt).toEqual({
      userId: 123,
      merchant: 'Tesco',
      category: 'food',
      totalAmount: 12.5,
      isIncome: false,
      date: '15-03-2024',
      description: 'Lunch',
      text: 'TESCO STORES',
      positions: [{ description: 'Sandwich', quantity: '2', category: 'food', price: 8.5 }],
      referenceReceiptIds: [3],
    });
  });

  test('fills defaults for missing fields', () => {
    const receipt = parseReceiptData({ total_amount: '7.20', positions: [{ description: 'Bread', price: 3 }] }, 123);

    expect(receipt).toEqual({
      userId: 123,
      merchant: 'Unknown Shop',
      category: 'other',
      totalAmount: 7.2,
      isIncome: false,
      date: null,
      positions: [{ description: 'Bread', quantity: '1', category: 'other', price: 3 }],
      referenceReceiptIds: [],
    });
  });

  test('accepts "true" as income', () => {
    expect(parseReceiptData({ total_amount: 100, is_income: 'true' }, 123).isIncome).toBe(true);
    expect(parseReceiptData({ total_amount: 100, is_income: 'yes' }, 123).isIncome).toBe(false);
  });

  test('stringifies numeric quantities', () => {
    const receipt = parseReceiptData({ total_amount: 3, positions: [{ description: 'Eggs', price: 3, quantity: 6 }] }, 123);

    expect(receipt.positions[0]?.quantity).toBe('6');
  });

  test('skips positions without description or price', () => {
    const receipt = parseReceiptData({
      total_amount: 3,
      positions: [{ description: '', price: 1 }, { description: 'Milk' }, 42, { description: 'Bread', price: 3 }],
    }, 123);

    expect(receipt.positions.map(p => p.description)).toEqual(['Bread']);
  });

  test('requires a numeric total', () => {
    expect(() => parseReceiptData({ merchant: 'Tesco' }, 123)).toThrow(ValidationError);
    expect(() => parseReceiptData('Tesco', 123)).toThrow('Receipt data must be an object');
  });

  test('rejects invalid user ids', () => {
    expect(() => parseReceiptData({ total_amount: 1 }, 0)).toThrow('Invalid user ID');
  });
});

describe('normalizeReferenceIds', () => {
  test.each([
    [5, [5]],
    ['5', [5]],
    [[5, '6'], [5, 6]],
    [[5, 5, 6], [5, 6]],
    [['abc'], []],
    [[5, 'abc'], []],
    [null, []],
    [undefined, []],
    [{ id: 5 }, []],
    [-3, []],
  ])('%j -> %j', (input, expected) => {
    expect(normalizeReferenceIds(input)).toEqual(expected);
  });
});

describe('validateUserId', () => {
  test('accepts positive integers', () => {
    expect(validateUserId(123456789)).toBe(123456789);
  });

  test.each([0, -1, 1.5, Number.NaN])('rejects %s', id => {
    expect(() => validateUserId(id)).toThrow('Invalid user ID');
  });
});

describe('parseReceiptJson', () => {
  test('parses JSON text', () => {
    expect(parseReceiptJson('{"merchant":"Tesco","total_amount":1}', 123).merchant).toBe('Tesco');
  });

  test('wraps parse errors', () => {
    expect(() => parseReceiptJson('{', 123)).toThrow('Receipt JSON could not be parsed');
  });
});
