import type { InlineKeyboardMarkup } from '../types/telegram.types.ts';
import type { ResolveAction } from '../types/workflow.types.ts';
import { t } from '../i18n/index.ts';

export interface ReceiptAction {
  action: ResolveAction;
  token: string;
}

const ACTION_DATA = /^(approve|reject):([A-Za-z0-9_-]{1,48})$/;

export function receiptActionsKeyboard(token: string): InlineKeyboardMarkup {
  return {
    inline_keyboard: [
      [
        { text: t('ui.preview.approve'), callback_data: `approve:${token}` },
        { text: t('ui.preview.reject'), callback_data: `reject:${token}` },
      ],
    ],
  };
}

/**
 * Parse `approve:<token>` / `reject:<token>` callback data. Returns null for anything else.
 */
export function parseActionData(data: string | undefined): ReceiptAction | null {
  if (!data) return null;
  const match = ACTION_DATA.exec(data);
  if (!match) return null;

  const [, action, token] = match;
  if ((action !== 'approve' && action !== 'reject') || token === undefined) return null;
  return { action, token };
}
