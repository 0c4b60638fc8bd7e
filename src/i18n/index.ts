// i18n exports
export { initI18n, t, formatAmount } from './i18n.service.ts';
export type { Translations } from './i18n.service.ts';
