import { RECEIPT_CATEGORIES } from '../types/receipt.types.ts';

const CATEGORY_LIST = RECEIPT_CATEGORIES.join(', ');

export const RECEIPT_JSON_STRUCTURE = `{
  "description": "brief description of the receipt, noting any changes made because of the user's comments",
  "category": "closest matching category from this list: ${CATEGORY_LIST}",
  "merchant": "name of the store or merchant",
  "is_income": "true only for refunds, salary or other money received, otherwise false",
  "positions": [
    {
      "description": "item description",
      "quantity": "item quantity as a number or weight",
      "category": "item category from this list: ${CATEGORY_LIST}. Cat food is 'cat'",
      "price": "item price as a number. Negative values are usually discounts; ignore those positions"
    }
  ],
  "total_amount": "total amount as a number",
  "date": "receipt date in DD-MM-YYYY format if visible, otherwise null. Convert other formats, e.g. 2024-05-15 becomes 15-05-2024",
  "reference_receipts_ids": "ids of earlier receipts this one refers to (a refund of a purchase), otherwise []"
}`;

function userAdjustments(comment: string): string {
  return `IMPORTANT: User comments override image data. Apply these rules:
- Override any field explicitly mentioned by the user
- Date without year: use the current year, format as DD-MM-YYYY
- Currency conversion: apply to all amounts, using exchange rates from the date of purchase
- Note the original currency in the "text" field if converted

User comments: "${comment}"`;
}

export function buildImagePrompt(currentDate: string, caption?: string): string {
  const base = `Analyze this receipt image and extract the following information. Current date for reference: ${currentDate}. Return ONLY a JSON object with these properties:
${RECEIPT_JSON_STRUCTURE}`;

  if (!caption) return base;

  return `${base}

Date handling: If the receipt shows a date without a year, use the current year. Format as DD-MM-YYYY.

${userAdjustments(caption)}`;
}

export function buildTextPrompt(currentDate: string, text: string): string {
  return `Create a receipt from a purchase description. Rules:
- One position if no items are specified, use the total as its price
- Default date: ${currentDate}. For dates without a year, use the current year. Resolve relative dates ("yesterday").
- Default merchant: Unknown
- Quantity: 1 if not specified
- Categories from the available list
- Extra context goes to description (direct style, no references to "the user")
- All output in ENGLISH (translate if needed)

Return ONLY a JSON object with this structure: ${RECEIPT_JSON_STRUCTURE}

User description: "${text}"`;
}

export function buildUpdatePrompt(currentDate: string, originalJson: string, comment: string): string {
  return `Update this JSON based on user comments: "${comment}"

Original JSON: ${originalJson}
Current date: ${currentDate}

Return ONLY the updated JSON object, nothing else. Update the "description" field to note the changes.
Date handling: If the user provides a date without a year, use the current year. Format as DD-MM-YYYY.
Language: Keep the original language unless explicitly changed. Description field in ENGLISH.

${userAdjustments(comment)}`;
}

export const SYSTEM_PROMPT = 'You turn receipts and purchase descriptions into JSON. Reply with a single JSON object and no commentary.';
