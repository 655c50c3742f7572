import type { NotificationLevel } from './notification-level.js';

export { NotificationLevel } from './notification-level.js';

/**
 * Notifier interface for user-facing messages
 */
export type Notifier = {
  /**
   * Send a notification
   * @param level - Notification level
   * @param message - Message to send
   */
  notify(level: NotificationLevel, message: string): void;

  /**
   * Update progress on the same line (overwrites previous output)
   * @param message - Progress message to display
   */
  progress(message: string): void;

  /**
   * Finalize progress (add newline after last progress update)
   */
  endProgress(): void;
};
