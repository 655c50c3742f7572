/**
 * Application context
 *
 * Built once per run from the loaded configuration and handed to whoever
 * needs it. Owns the single HTTP session, so every collaborator shares one
 * cookie jar.
 */

import { Authenticator } from './auth/authenticator.js';
import type { Config } from './config/config-schema.js';
import { BatchFetcher } from './downloader/batch-fetcher.js';
import { ItemDownloader } from './downloader/item-downloader.js';
import { type FetchLike, Session } from './http/session.js';
import { ConsoleNotifier } from './notifications/console-notifier.js';
import type { Notifier } from './notifications/notifier.js';
import { CatalogScraper } from './scraper/catalog-scraper.js';
import { type Logger, logger as defaultLogger } from './utils/logger.js';

export type AppContext = {
  readonly config: Config;
  readonly session: Session;
  readonly notifier: Notifier;
  readonly authenticator: Authenticator;
  readonly scraper: CatalogScraper;
  readonly fetcher: BatchFetcher;
};

export type AppContextOptions = {
  /** Underlying fetch for the session (tests pass a fake) */
  fetch?: FetchLike;
  notifier?: Notifier;
  logger?: Logger;
};

export function createAppContext(config: Config, options: AppContextOptions = {}): AppContext {
  const { site, download } = config;

  const notifier =
    options.notifier ?? new ConsoleNotifier(config.notifications.consoleMinLevel, options.logger ?? defaultLogger);
  const session = new Session({ baseUrl: site.baseUrl, userAgent: site.userAgent, fetch: options.fetch });

  const authenticator = new Authenticator(session, notifier, {
    loginPath: site.loginPath,
    downloadsPath: site.downloadsPath,
    accountPathMarker: site.accountPathMarker,
  });
  const scraper = new CatalogScraper(session, notifier, site.downloadsPath, site.selectors);
  const downloader = new ItemDownloader(session, notifier, {
    outputDir: download.outputDir,
    fallbackPrefix: download.fallbackPrefix,
    extension: download.extension,
  });
  const fetcher = new BatchFetcher(scraper, downloader, notifier);

  return { config, session, notifier, authenticator, scraper, fetcher };
}
