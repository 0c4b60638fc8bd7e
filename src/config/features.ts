import { isFeatureEnabled } from './env.ts';

/**
 * Feature flag helper with descriptive methods.
 */
export const Features = {
  /** Voice notes as receipts and as corrections */
  voiceMessages: (): boolean => isFeatureEnabled('FEATURE_VOICE_MESSAGES'),

  /** Receipts sent as image documents */
  imageDocuments: (): boolean => isFeatureEnabled('FEATURE_IMAGE_DOCUMENTS'),

  /** /list, /delete and /summary commands */
  receiptViews: (): boolean => isFeatureEnabled('FEATURE_RECEIPT_VIEWS'),
} as const;
