import { run } from 'cmd-ts';
import { cli, reportFatalError } from './app.js';
import { logger } from './utils/logger.js';

/**
 * hh-downloader - fetch every purchased episode from a WooCommerce account
 */

// Set up global error handlers
process.on('uncaughtException', (error) => {
  logger.error(`Uncaught exception: ${error.message}`);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled rejection: ${reason}`);
  process.exit(1);
});

export async function main(args: string[] = process.argv.slice(2)): Promise<void> {
  await run(cli, args);
}

main().catch((error: unknown) => {
  reportFatalError(error);
  process.exit(1);
});
