import type { SupportedLanguage } from '../config/types.ts';
import { getEnv } from '../config/env.ts';

import en from './locales/en.json';

export type Translations = typeof en;

// ============================================================
// Translation Registry
// ============================================================

const translations: Record<SupportedLanguage, Translations> = {
  en,
};

let currentLanguage: SupportedLanguage = 'en';
let initialized = false;

/**
 * Initialize i18n with the configured language.
 * Must be called after initConfig().
 */
export function initI18n(): void {
  if (initialized) return;

  currentLanguage = getEnv().LANGUAGE;
  initialized = true;

  console.log(`[i18n] Initialized with language: ${currentLanguage}`);
}

/**
 * Get translation by dot-notation path.
 * Example: t('ui.errors.stale')
 */
export function t(path: string, params?: Record<string, string | number>): string {
  let value = getNestedValue(translations[currentLanguage], path);

  // English is the fallback catalogue
  if (value === undefined) {
    value = getNestedValue(translations.en, path);
  }

  if (typeof value !== 'string') {
    console.warn(`[i18n] Missing translation: ${path}`);
    return path;
  }

  return params ? interpolate(value, params) : value;
}

/**
 * Format an amount with two decimals. Receipts carry no currency.
 */
export function formatAmount(amount: number): string {
  return amount.toFixed(2);
}

// ============================================================
// Helpers
// ============================================================

function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const key of path.split('.')) {
    if (current === null || typeof current !== 'object') return undefined;
    current = Reflect.get(current, key);
  }

  return current;
}

function interpolate(template: string, params: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => {
    const value = params[key];
    return value !== undefined ? String(value) : match;
  });
}
