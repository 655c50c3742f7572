import { type Logger, logger as defaultLogger } from '../utils/logger.js';
import { LEVEL_PRIORITIES, NotificationLevel } from './notification-level.js';
import type { Notifier } from './notifier.js';

type LineWriter = (chunk: string) => void;

/**
 * Console notifier for terminal output with configurable minimum level
 *
 * Progress goes to a single rewritable line; several downloads running at
 * once share it, the latest update wins.
 */
export class ConsoleNotifier implements Notifier {
  private lastProgressLength = 0;
  private readonly minLevel: NotificationLevel;
  private readonly logger: Logger;
  private readonly write: LineWriter;

  constructor(
    minLevel: NotificationLevel = NotificationLevel.INFO,
    logger: Logger = defaultLogger,
    write: LineWriter = (chunk) => {
      process.stdout.write(chunk);
    },
  ) {
    this.minLevel = minLevel;
    this.logger = logger;
    this.write = write;
  }

  private shouldNotify(level: NotificationLevel): boolean {
    return LEVEL_PRIORITIES[level] >= LEVEL_PRIORITIES[this.minLevel];
  }

  private clearProgressLine(): void {
    if (this.lastProgressLength > 0) {
      this.write(`\r${' '.repeat(this.lastProgressLength)}\r`);
    }
  }

  notify(level: NotificationLevel, message: string): void {
    if (!this.shouldNotify(level)) {
      return;
    }

    // An active progress line would otherwise swallow the log line
    this.clearProgressLine();
    this.lastProgressLength = 0;

    switch (level) {
      case NotificationLevel.DEBUG:
        this.logger.debug(message);
        break;
      case NotificationLevel.INFO:
        this.logger.info(message);
        break;
      case NotificationLevel.SUCCESS:
        this.logger.success(message);
        break;
      case NotificationLevel.WARNING:
        this.logger.warning(message);
        break;
      case NotificationLevel.ERROR:
        this.logger.error(message);
        break;
      case NotificationLevel.HIGHLIGHT:
        this.logger.highlight(message);
        break;
    }
  }

  progress(message: string): void {
    this.clearProgressLine();
    this.write(`\r${message}`);
    this.lastProgressLength = message.length;
  }

  endProgress(): void {
    if (this.lastProgressLength > 0) {
      this.write('\n');
      this.lastProgressLength = 0;
    }
  }
}
