import { mkdir } from 'node:fs/promises';
import { boolean, command, flag, number, option, optional, string } from 'cmd-ts';
import { type AppContext, createAppContext } from './app-context.js';
import { resolveCredentials } from './auth/credentials.js';
import { loadConfig } from './config/config-loader.js';
import type { Config } from './config/config-schema.js';
import { summarizeReport } from './downloader/batch-fetcher.js';
import type { BatchReport } from './downloader/types.js';
import { AuthError, ConfigError, errorMessage } from './errors/custom-errors.js';
import type { CatalogEntry } from './types/catalog.types.js';
import { logger, parseLogLevel } from './utils/logger.js';

export type RunOptions = {
  /** Explicit config file; without it ./hh-downloader.yaml is read if present */
  configPath?: string;
  outputDir?: string;
  concurrency?: number;
  /** Print the catalog instead of downloading */
  list?: boolean;
};

export type RunResult = { kind: 'list'; entries: CatalogEntry[] } | { kind: 'download'; report: BatchReport };

export type AppDependencies = {
  loadConfig: typeof loadConfig;
  resolveCredentials: typeof resolveCredentials;
  createContext: (config: Config) => AppContext;
};

const defaultDependencies: AppDependencies = {
  loadConfig,
  resolveCredentials,
  createContext: (config) => createAppContext(config),
};

/**
 * Sign in, then list or download the catalog
 *
 * @throws ConfigError for bad configuration or missing credentials
 * @throws AuthError when the login does not reach the account area
 */
export async function runApp(options: RunOptions = {}, deps: AppDependencies = defaultDependencies): Promise<RunResult> {
  const config = await deps.loadConfig({
    configPath: options.configPath,
    overrides: { outputDir: options.outputDir, maxConcurrent: options.concurrency },
  });
  logger.setLevel(parseLogLevel(config.logLevel));
  logger.debug(`Site: ${config.site.baseUrl}, output: ${config.download.outputDir}`);

  await mkdir(config.download.outputDir, { recursive: true });

  const credentials = await deps.resolveCredentials({ configured: config.credentials });
  const context = deps.createContext(config);

  const signedIn = await context.authenticator.login(credentials);
  if (!signedIn) {
    // Fatal: the CLI handler exits with 1 here, unlike per-item failures
    throw new AuthError('could not reach the account area after signing in', credentials.username);
  }

  if (options.list) {
    const entries = await context.scraper.getDownloadLinks();
    for (const entry of entries) {
      logger.info(`${entry.title} -> ${entry.url}`);
    }
    if (entries.length === 0) {
      logger.warning('No episodes found');
    }
    return { kind: 'list', entries };
  }

  const report = await context.fetcher.downloadAll(config.download.maxConcurrent);

  for (const result of report.results) {
    if (result.status === 'failed') {
      logger.error(`Failed: ${result.entry.title} (${result.reason})`);
    }
  }

  const summary = summarizeReport(report);
  if (report.failed > 0) {
    logger.warning(summary);
  } else {
    logger.success(summary);
  }

  return { kind: 'download', report };
}

/**
 * Log an error that ends the run
 */
export function reportFatalError(error: unknown): void {
  if (error instanceof ConfigError) {
    logger.error(`Configuration error: ${error.message}`);
  } else if (error instanceof AuthError) {
    logger.error(`Login failed: ${error.message}`);
  } else {
    logger.error(`Fatal error: ${errorMessage(error)}`);
  }
}

// Define CLI using cmd-ts
export const cli = command({
  name: 'hh-downloader',
  description: 'Download purchased episodes from a WooCommerce account',
  version: '0.1.0',
  args: {
    config: option({
      type: optional(string),
      long: 'config',
      short: 'c',
      description: 'Path to configuration file (default: ./hh-downloader.yaml if present)',
    }),
    output: option({
      type: optional(string),
      long: 'output',
      short: 'o',
      description: 'Directory to save episodes into',
    }),
    concurrency: option({
      type: optional(number),
      long: 'concurrency',
      short: 'n',
      description: 'Number of simultaneous downloads (default: 3)',
    }),
    list: flag({
      type: boolean,
      long: 'list',
      short: 'l',
      description: 'List the catalog without downloading',
    }),
  },
  handler: async ({ config, output, concurrency, list }) => {
    try {
      await runApp({ configPath: config, outputDir: output, concurrency, list });
    } catch (error) {
      reportFatalError(error);
      process.exit(1);
    }
  },
});
