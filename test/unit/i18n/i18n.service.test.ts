import { describe, test, expect } from 'vitest';
import { formatAmount, t } from '../../../src/i18n/index.ts';

describe('t', () => {
  test('interpolates named parameters', () => {
    expect(t('ui.resolve.saved', { id: 7 })).toBe('✅ Receipt saved successfully! Receipt ID: 7');
  });

  test('leaves unknown placeholders in place', () => {
    expect(t('ui.transcript.receipt', { text: 'Lunch' })).toContain('{seconds}');
  });

  test('returns the path for a missing key', () => {
    expect(t('ui.does.not.exist')).toBe('ui.does.not.exist');
  });
});

describe('formatAmount', () => {
  test('uses two decimals', () => {
    expect(formatAmount(12.5)).toBe('12.50');
    expect(formatAmount(0)).toBe('0.00');
  });
});
