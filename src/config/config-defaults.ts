import { NotificationLevel } from '../notifications/notification-level.js';
import type { Config } from './config-schema.js';

export const DEFAULT_CONFIG_PATH = './hh-downloader.yaml';

export const DEFAULT_OUTPUT_DIR = 'dan_carlin_episodes';

export const DEFAULT_MAX_CONCURRENT = 3;

/**
 * WooCommerce markup the scraper relies on
 */
export const DEFAULT_SELECTORS: Config['site']['selectors'] = {
  downloadsTable: 'table.woocommerce-table--order-downloads',
  titleCell: 'td.download-product',
  fileCell: 'td.download-file',
  fileLink: 'a.woocommerce-MyAccount-downloads-file',
  accountMarker: '.woocommerce-MyAccount-content, body.woocommerce-account',
};

export const defaults: Config = {
  site: {
    baseUrl: 'https://www.dancarlin.com',
    loginPath: '/wp-login.php',
    downloadsPath: '/my-account/downloads/',
    accountPathMarker: 'my-account',
    selectors: DEFAULT_SELECTORS,
  },
  download: {
    outputDir: DEFAULT_OUTPUT_DIR,
    maxConcurrent: DEFAULT_MAX_CONCURRENT,
    fallbackPrefix: 'dan_carlin_episode_',
    extension: '.mp3',
  },
  notifications: {
    consoleMinLevel: NotificationLevel.INFO,
  },
  logLevel: 'INFO',
};

/**
 * Default configuration values (a fresh copy; callers may mutate it)
 */
export function getDefaults(): Config {
  return structuredClone(defaults);
}
