// Categories the extraction prompt offers; stored values stay open strings
export const RECEIPT_CATEGORIES = [
  'food',
  'alcohol',
  'transport',
  'clothes',
  'vacation',
  'flights',
  'sport',
  'healthcare',
  'beauty',
  'household',
  'car',
  'cat',
  'other',
] as const;

export type KnownCategory = (typeof RECEIPT_CATEGORIES)[number];

export const DEFAULT_MERCHANT = 'Unknown Shop';
export const DEFAULT_CATEGORY: KnownCategory = 'other';

export const MAX_TOTAL_AMOUNT = 1_000_000;
export const MAX_POSITION_PRICE = 100_000;
export const MAX_POSITIONS = 50;

export interface Position {
  description: string;
  quantity: string;
  category: string;
  price: number;
}

export interface Receipt {
  userId: number;
  merchant: string;
  category: string;
  totalAmount: number;
  isIncome: boolean;
  date: string | null;
  description?: string;
  text?: string;
  positions: Position[];
  referenceReceiptIds: number[];
}

// Row shape returned by the repository
export interface StoredReceipt extends Receipt {
  id: number;
  createdAt: string;
}

export interface MonthlySummary {
  month: string; // MM-YYYY
  expenses: number;
  income: number;
  count: number;
}

// Validated extraction payload (snake_case, as the AI emits it)
export interface ReceiptPayload {
  merchant: unknown;
  category: unknown;
  total_amount: number;
  date?: string | null;
  description?: unknown;
  text?: unknown;
  is_income?: unknown;
  positions?: PositionPayload[];
  reference_receipts_ids?: unknown;
  [key: string]: unknown;
}

export interface PositionPayload {
  description: string;
  price: number;
  quantity?: unknown;
  category?: unknown;
  [key: string]: unknown;
}

// Category emoji mapping
export const CATEGORY_EMOJI: Record<KnownCategory, string> = {
  food: '🍔',
  alcohol: '🍷',
  transport: '🚕',
  clothes: '👕',
  vacation: '🏖️',
  flights: '✈️',
  sport: '🏃',
  healthcare: '💊',
  beauty: '💄',
  household: '🏠',
  car: '🚗',
  cat: '🐈',
  other: '❓',
};

export function isKnownCategory(value: string): value is KnownCategory {
  return (RECEIPT_CATEGORIES as readonly string[]).includes(value);
}

export function getCategoryEmoji(category: string): string {
  const key = category.toLowerCase();
  return isKnownCategory(key) ? CATEGORY_EMOJI[key] : CATEGORY_EMOJI.other;
}
