import * as cheerio from 'cheerio';
import type { AnyNode } from 'domhandler';
import type { Selectors } from '../config/config-schema.js';
import { errorMessage, ScrapeError } from '../errors/custom-errors.js';
import type { Session } from '../http/session.js';
import { NotificationLevel, type Notifier } from '../notifications/notifier.js';
import type { CatalogEntry, CatalogScrapeResult } from '../types/catalog.types.js';

/**
 * Absolute form of `href`, or undefined when it does not parse
 */
function resolveHref(href: string, pageUrl: string): string | undefined {
  try {
    return new URL(href, pageUrl).toString();
  } catch {
    return undefined;
  }
}

/**
 * One table row as an entry, or undefined when a piece is missing
 */
function parseRow(
  row: AnyNode,
  $: cheerio.CheerioAPI,
  selectors: Selectors,
  pageUrl: string | undefined,
): CatalogEntry | undefined {
  const $row = $(row);
  if ($row.find('th').length > 0) return undefined;

  const titleCell = $row.find(selectors.titleCell).first();
  const fileCell = $row.find(selectors.fileCell).first();
  if (titleCell.length === 0 || fileCell.length === 0) return undefined;

  const href = fileCell.find(selectors.fileLink).first().attr('href');
  if (!href) return undefined;

  const url = pageUrl === undefined ? href : resolveHref(href, pageUrl);
  if (!url) return undefined;

  return { title: titleCell.text().trim(), url };
}

/**
 * Parse the WooCommerce downloads table
 *
 * Header rows (any `th`) are skipped, as are rows missing the title cell,
 * the file cell, the anchor or its href. With `pageUrl`, hrefs are resolved
 * against it and rows whose href does not parse are skipped too. Entries
 * keep table order.
 */
export function parseCatalog(html: string, selectors: Selectors, pageUrl?: string): CatalogScrapeResult {
  const $ = cheerio.load(html);
  const table = $(selectors.downloadsTable).first();

  if (table.length === 0) {
    return $(selectors.accountMarker).length > 0 ? { kind: 'empty' } : { kind: 'signed-out' };
  }

  const entries: CatalogEntry[] = [];
  table.find('tr').each((_, row) => {
    const entry = parseRow(row, $, selectors, pageUrl);
    if (entry) entries.push(entry);
  });

  return entries.length > 0 ? { kind: 'ok', entries } : { kind: 'empty' };
}

/**
 * Reads the catalog of purchased downloads from the account page
 */
export class CatalogScraper {
  constructor(
    private readonly session: Session,
    private readonly notifier: Notifier,
    private readonly downloadsPath: string,
    private readonly selectors: Selectors,
  ) {}

  /**
   * Fetch and parse the downloads page
   *
   * Relative hrefs are resolved against the page URL.
   *
   * @throws ScrapeError when the page cannot be fetched
   */
  async scrape(): Promise<CatalogScrapeResult> {
    this.notifier.notify(NotificationLevel.INFO, 'Fetching download links...');

    const pageUrl = this.session.resolve(this.downloadsPath);
    let html: string;
    try {
      html = await this.session.getHtml(pageUrl);
    } catch (error) {
      throw new ScrapeError(`Could not load downloads page: ${errorMessage(error)}`, pageUrl);
    }
    const result = parseCatalog(html, this.selectors, pageUrl);

    if (result.kind !== 'ok') {
      return result;
    }

    const { entries } = result;
    for (const entry of entries) {
      this.notifier.notify(NotificationLevel.INFO, `Found: ${entry.title}`);
    }
    this.notifier.notify(NotificationLevel.INFO, `Found ${entries.length} episodes`);

    return result;
  }

  /**
   * Catalog entries; empty when signed out or nothing was purchased
   */
  async getDownloadLinks(): Promise<CatalogEntry[]> {
    const result = await this.scrape();
    return result.kind === 'ok' ? result.entries : [];
  }
}
