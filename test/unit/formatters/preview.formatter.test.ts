/**
 * Tests for preview.formatter.ts
 */
import { describe, test, expect } from 'vitest';
import { formatCategory, formatPreview, groupPositions } from '../../../src/formatters/preview.formatter.ts';
import type { Preview } from '../../../src/types/workflow.types.ts';
import { createReceipt } from '../../helpers/factories.ts';

function preview(overrides: Partial<Preview> = {}): Preview {
  const receipt = createReceipt({
    positions: [
      { description: 'Coffee', quantity: '1', category: 'food', price: 4 },
      { description: 'Sandwich', quantity: '1', category: 'food', price: 8.5 },
      { description: 'Wine', quantity: '1', category: 'alcohol', price: 9 },
    ],
  });
  return {
    token: '1',
    merchant: 'Tesco',
    category: 'food',
    totalAmount: 21.5,
    isIncome: false,
    date: '15-03-2024',
    itemCount: 3,
    receipt,
    revised: false,
    elapsedMs: 2340,
    ...overrides,
  };
}

describe('groupPositions', () => {
  test('larger groups first, items by price descending', () => {
    const groups = groupPositions(preview().receipt.positions);

    expect(groups.map(g => g.category)).toEqual(['food', 'alcohol']);
    expect(groups[0]?.items.map(i => i.description)).toEqual(['Sandwich', 'Coffee']);
  });
});

describe('formatCategory', () => {
  test('adds the emoji and marks income', () => {
    expect(formatCategory('food', false)).toBe('🍔 food');
    expect(formatCategory('salary', true)).toBe('❓ salary (Income 💰)');
  });
});

describe('formatPreview', () => {
  test('renders a photo receipt with items', () => {
    const text = formatPreview(preview({ echo: { kind: 'image', text: 'paid by card' }, description: 'Lunch' }), 'image');

    expect(text).toBe([
      "Here's what I found in your receipt (AI request took 2.3s):",
      '',
      '📝 Your comment: paid by card',
      '💬 Description: Lunch',
      '',
      'Merchant: Tesco',
      'Category: 🍔 food',
      'Total Amount: 21.50',
      'Date: 15-03-2024',
      '',
      'Items (3):',
      '🍔 food:',
      '  • Sandwich (1) - 8.50',
      '  • Coffee (1) - 4.00',
      '🍷 alcohol:',
      '  • Wine (1) - 9.00',
      '',
      "💡 To make changes, just type what you'd like to adjust or send a voice message",
    ].join('\n'));
  });

  test('renders a revised text receipt without items or date', () => {
    const base = preview();
    const text = formatPreview({
      ...base,
      revised: true,
      date: null,
      itemCount: 0,
      receipt: { ...base.receipt, positions: [] },
      echo: { kind: 'text', text: 'total was 15' },
      totalAmount: 15,
      elapsedMs: 1000,
    }, 'text');

    expect(text).toBe([
      "Here's the updated receipt (AI request took 1.0s):",
      '',
      '📝 Your changes: total was 15',
      '',
      'Merchant: Tesco',
      'Category: 🍔 food',
      'Total Amount: 15.00',
      'Date: Unknown',
      '',
      "💡 To make changes, just type what you'd like to adjust or send a voice message",
    ].join('\n'));
  });

  test('uses the voice wording for voice input', () => {
    const text = formatPreview(preview({ echo: { kind: 'voice', text: 'lunch at tesco' } }), 'voice');
    const lines = text.split('\n');

    expect(lines[0]).toBe("Here's what I understood from your voice message (AI request took 2.3s):");
    expect(lines[2]).toBe('🎙️ Your message: "lunch at tesco"');
  });
});
