/**
 * Base error class for hh-downloader
 */
export class HhDownloaderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HhDownloaderError';
  }
}

/**
 * Configuration error (bad YAML, failed validation, missing credentials)
 */
export class ConfigError extends HhDownloaderError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Login was rejected or the account area never came back
 */
export class AuthError extends HhDownloaderError {
  constructor(
    message: string,
    public readonly username: string,
  ) {
    super(message);
    this.name = 'AuthError';
  }
}

/**
 * Downloads page could not be read
 */
export class ScrapeError extends HhDownloaderError {
  constructor(
    message: string,
    public readonly url: string,
  ) {
    super(message);
    this.name = 'ScrapeError';
  }
}

/**
 * Non-2xx response
 */
export class HttpError extends HhDownloaderError {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
    public readonly url: string,
  ) {
    super(`HTTP ${status}${statusText ? `: ${statusText}` : ''} (${url})`);
    this.name = 'HttpError';
  }
}

/**
 * Render any thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
