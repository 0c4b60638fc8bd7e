import { t, formatAmount } from '../i18n/index.ts';
import { getCategoryEmoji, type MonthlySummary, type StoredReceipt } from '../types/receipt.types.ts';

export function formatReceiptLine(receipt: StoredReceipt): string {
  const date = receipt.date ?? t('common.noDate');
  const sign = receipt.isIncome ? '+' : '';
  return `#${receipt.id} ${date} ${getCategoryEmoji(receipt.category)} ${receipt.merchant} (${receipt.category}): ${sign}${formatAmount(receipt.totalAmount)}`;
}

export function formatReceiptList(receipts: StoredReceipt[], requested: number): string {
  if (receipts.length === 0) {
    return t('ui.views.listEmpty');
  }
  return formatReceiptBlock(t('ui.views.listTitle', { count: requested }), receipts);
}

/**
 * Receipts found by /date; `date` is the DD-MM-YYYY day searched.
 */
export function formatReceiptsForDate(receipts: StoredReceipt[], date: string): string {
  if (receipts.length === 0) {
    return t('ui.views.dateEmpty', { date });
  }
  return formatReceiptBlock(t('ui.views.dateTitle', { date }), receipts);
}

function formatReceiptBlock(title: string, receipts: StoredReceipt[]): string {
  let expenses = 0;
  let income = 0;
  for (const receipt of receipts) {
    if (receipt.isIncome) income += receipt.totalAmount;
    else expenses += receipt.totalAmount;
  }

  const lines = [
    t('ui.views.listHeader', { title }),
    '',
    ...receipts.map(formatReceiptLine),
    '',
    t('ui.views.listTotals', { count: receipts.length }),
    t('ui.views.listExpenses', { amount: formatAmount(expenses) }),
  ];
  if (income > 0) {
    lines.push(t('ui.views.listIncome', { amount: formatAmount(income) }));
  }

  return lines.join('\n');
}

export function formatMonthlySummary(summary: MonthlySummary[], months: number): string {
  if (summary.length === 0) {
    return t('ui.views.summaryEmpty', { months });
  }

  const lines = [t('ui.views.summaryTitle'), ''];
  for (const month of summary) {
    lines.push(t('ui.views.summaryLine', {
      month: month.month,
      count: month.count,
      amount: formatAmount(month.expenses - month.income),
    }));
  }
  return lines.join('\n');
}
