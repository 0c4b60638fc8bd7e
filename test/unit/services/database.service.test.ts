/**
 * Tests for the monthly summary window
 */
import { describe, test, expect } from 'vitest';
import { summarizeMonths } from '../../../src/services/database.service.ts';

describe('summarizeMonths', () => {
  const now = new Date(2024, 2, 15); // March 2024

  test('keeps the last N calendar months, newest first', () => {
    const rows = [
      { month: '12-2023', expenses: '40.00', income: '0', count: '2' },
      { month: '03-2024', expenses: '10.50', income: '0', count: '1' },
      { month: '01-2024', expenses: '25.00', income: '100.00', count: '3' },
      { month: '11-2023', expenses: '99.00', income: '0', count: '1' },
    ];

    expect(summarizeMonths(rows, 4, now)).toEqual([
      { month: '03-2024', expenses: 10.5, income: 0, count: 1 },
      { month: '01-2024', expenses: 25, income: 100, count: 3 },
      { month: '12-2023', expenses: 40, income: 0, count: 2 },
    ]);
  });

  test('one month means the current month only', () => {
    const rows = [
      { month: '03-2024', expenses: 5, income: 0, count: 1 },
      { month: '02-2024', expenses: 7, income: 0, count: 1 },
    ];

    expect(summarizeMonths(rows, 1, now).map(r => r.month)).toEqual(['03-2024']);
  });

  test('ignores future months and malformed keys', () => {
    const rows = [
      { month: '04-2024', expenses: 5, income: 0, count: 1 },
      { month: '3-2024', expenses: 5, income: 0, count: 1 },
      { month: '', expenses: 5, income: 0, count: 1 },
    ];

    expect(summarizeMonths(rows, 12, now)).toEqual([]);
  });

  test('orders by date, not by string', () => {
    const rows = [
      { month: '02-2024', expenses: 1, income: 0, count: 1 },
      { month: '12-2023', expenses: 1, income: 0, count: 1 },
      { month: '10-2023', expenses: 1, income: 0, count: 1 },
    ];

    expect(summarizeMonths(rows, 6, now).map(r => r.month)).toEqual(['02-2024', '12-2023', '10-2023']);
  });
});
