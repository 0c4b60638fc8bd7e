import { t, formatAmount } from '../i18n/index.ts';
import { getCategoryEmoji, type Position } from '../types/receipt.types.ts';
import type { InputKind, Preview } from '../types/workflow.types.ts';

const PREFACE_KEYS: Record<InputKind, string> = {
  image: 'ui.preview.prefaceImage',
  voice: 'ui.preview.prefaceVoice',
  text: 'ui.preview.prefaceText',
};

const ECHO_KEYS: Record<InputKind, string> = {
  image: 'ui.preview.echoImage',
  voice: 'ui.preview.echoVoice',
  text: 'ui.preview.echoText',
};

const REVISION_ECHO_KEYS: Record<InputKind, string> = {
  image: 'ui.preview.echoChanges',
  voice: 'ui.preview.echoVoiceChanges',
  text: 'ui.preview.echoChanges',
};

function seconds(ms: number): string {
  return (ms / 1000).toFixed(1);
}

/**
 * Group items by category: categories with more items first, items by price descending.
 */
export function groupPositions(positions: Position[]): Array<{ category: string; items: Position[] }> {
  const groups = new Map<string, Position[]>();
  for (const position of positions) {
    const items = groups.get(position.category) ?? [];
    items.push(position);
    groups.set(position.category, items);
  }

  return [...groups.entries()]
    .map(([category, items]) => ({ category, items: [...items].sort((a, b) => b.price - a.price) }))
    .sort((a, b) => b.items.length - a.items.length);
}

export function formatCategory(category: string, isIncome: boolean): string {
  const label = `${getCategoryEmoji(category)} ${category}`;
  return isIncome ? `${label} (${t('common.income')})` : label;
}

export function formatPreview(preview: Preview, kind: InputKind): string {
  const lines: string[] = [];

  const prefaceKey = preview.revised ? 'ui.preview.prefaceRevised' : PREFACE_KEYS[kind];
  lines.push(t(prefaceKey, { seconds: seconds(preview.elapsedMs) }));
  lines.push('');

  if (preview.echo) {
    const echoKey = preview.revised ? REVISION_ECHO_KEYS[preview.echo.kind] : ECHO_KEYS[preview.echo.kind];
    lines.push(t(echoKey, { text: preview.echo.text }));
  }
  if (preview.description) {
    lines.push(t('ui.preview.description', { text: preview.description }));
  }
  if (preview.echo || preview.description) {
    lines.push('');
  }

  lines.push(t('ui.preview.merchant', { merchant: preview.merchant }));
  lines.push(t('ui.preview.category', { category: formatCategory(preview.category, preview.isIncome) }));
  lines.push(t('ui.preview.total', { amount: formatAmount(preview.totalAmount) }));
  lines.push(t('ui.preview.date', { date: preview.date ?? t('common.unknown') }));

  if (preview.itemCount > 0) {
    lines.push('');
    lines.push(t('ui.preview.items', { count: preview.itemCount }));
    for (const group of groupPositions(preview.receipt.positions)) {
      lines.push(`${getCategoryEmoji(group.category)} ${group.category}:`);
      for (const item of group.items) {
        lines.push(`  • ${item.description} (${item.quantity}) - ${formatAmount(item.price)}`);
      }
    }
  }

  lines.push('');
  lines.push(t('ui.preview.hint'));

  return lines.join('\n');
}
