import { z } from 'zod';

export const NotificationLevelSchema = z.enum(['debug', 'info', 'success', 'highlight', 'warning', 'error']);

export type NotificationLevel = z.infer<typeof NotificationLevelSchema>;

export const NotificationLevel = {
  DEBUG: 'debug',
  INFO: 'info',
  SUCCESS: 'success',
  HIGHLIGHT: 'highlight',
  WARNING: 'warning',
  ERROR: 'error',
} as const satisfies Record<string, NotificationLevel>;

/**
 * Level priorities for filtering (lower = less severe)
 */
export const LEVEL_PRIORITIES = {
  debug: 0,
  info: 1,
  success: 2,
  highlight: 3,
  warning: 4,
  error: 5,
} as const satisfies Record<NotificationLevel, number>;
