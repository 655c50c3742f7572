/**
 * Log level
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  SUCCESS = 'SUCCESS',
  WARNING = 'WARNING',
  ERROR = 'ERROR',
  HIGHLIGHT = 'HIGHLIGHT',
}

/**
 * Logger configuration
 */
export type LoggerConfig = {
  level: LogLevel;
  useColors: boolean;
};

/**
 * ANSI color codes
 */
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
};

type LevelStyle = {
  emoji: string;
  color: string;
  stderr: boolean;
};

const LEVEL_ORDER: readonly LogLevel[] = [
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.SUCCESS,
  LogLevel.WARNING,
  LogLevel.ERROR,
  LogLevel.HIGHLIGHT,
];

const LEVEL_STYLES: Record<LogLevel, LevelStyle> = {
  [LogLevel.DEBUG]: { emoji: '🔍', color: colors.dim, stderr: false },
  [LogLevel.INFO]: { emoji: 'ℹ️', color: colors.blue, stderr: false },
  [LogLevel.SUCCESS]: { emoji: '✅', color: colors.green, stderr: false },
  [LogLevel.WARNING]: { emoji: '⚠️', color: colors.yellow, stderr: false },
  [LogLevel.ERROR]: { emoji: '❌', color: colors.red, stderr: true },
  [LogLevel.HIGHLIGHT]: { emoji: '🌟', color: colors.bright + colors.magenta, stderr: false },
};

/**
 * Parse a level name from config or the environment (case-insensitive)
 */
export function parseLogLevel(name: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  if (!name) return fallback;
  const upper = name.trim().toUpperCase();
  return LEVEL_ORDER.find((level) => level === upper) ?? fallback;
}

/**
 * Colors are on for an interactive stdout unless NO_COLOR is set
 */
export function shouldUseColors(env: NodeJS.ProcessEnv = process.env): boolean {
  if (env.NO_COLOR !== undefined && env.NO_COLOR !== '') return false;
  return process.stdout.isTTY === true;
}

/**
 * Logger class with colored console output
 */
export class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: config.level ?? LogLevel.INFO,
      useColors: config.useColors ?? shouldUseColors(),
    };
  }

  /**
   * Format date to human readable string (MM-DD HH:mm:ss)
   */
  private formatDate(date: Date): string {
    const pad = (value: number) => value.toString().padStart(2, '0');
    return `${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.config.level);
  }

  /**
   * Write one line at the given level
   */
  log(level: LogLevel, message: string): void {
    if (!this.shouldLog(level)) return;

    const style = LEVEL_STYLES[level];
    const body = this.config.useColors ? `${style.color}${message}${colors.reset}` : message;
    const line = `${this.formatDate(new Date())} ${style.emoji} ${body}`;

    if (style.stderr) {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  debug(message: string): void {
    this.log(LogLevel.DEBUG, message);
  }

  info(message: string): void {
    this.log(LogLevel.INFO, message);
  }

  success(message: string): void {
    this.log(LogLevel.SUCCESS, message);
  }

  warning(message: string): void {
    this.log(LogLevel.WARNING, message);
  }

  error(message: string): void {
    this.log(LogLevel.ERROR, message);
  }

  highlight(message: string): void {
    this.log(LogLevel.HIGHLIGHT, message);
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }
}

// Default logger instance
export const logger: Logger = new Logger();
