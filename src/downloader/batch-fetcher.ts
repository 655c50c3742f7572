import { DEFAULT_MAX_CONCURRENT } from '../config/config-defaults.js';
import type { Notifier } from '../notifications/notifier.js';
import { NotificationLevel } from '../notifications/notifier.js';
import { BoundedQueue } from '../queue/bounded-queue.js';
import type { CatalogScraper } from '../scraper/catalog-scraper.js';
import type { CatalogEntry } from '../types/catalog.types.js';
import type { ItemDownloader } from './item-downloader.js';
import type { BatchReport, ItemResult } from './types.js';

/**
 * Count results by status
 */
export function buildReport(results: ItemResult[]): BatchReport {
  const report: BatchReport = { total: results.length, downloaded: 0, skipped: 0, failed: 0, results };
  for (const result of results) {
    report[result.status]++;
  }
  return report;
}

export function summarizeReport(report: BatchReport): string {
  return `Downloaded ${report.downloaded}, skipped ${report.skipped}, failed ${report.failed} of ${report.total}`;
}

/**
 * Scrapes the catalog and downloads every entry with bounded parallelism
 */
export class BatchFetcher {
  constructor(
    private readonly scraper: Pick<CatalogScraper, 'scrape'>,
    private readonly downloader: Pick<ItemDownloader, 'downloadEpisode'>,
    private readonly notifier: Notifier,
  ) {}

  async downloadAll(maxConcurrent: number = DEFAULT_MAX_CONCURRENT): Promise<BatchReport> {
    const catalog = await this.scraper.scrape();

    if (catalog.kind === 'signed-out') {
      this.notifier.notify(NotificationLevel.WARNING, 'Could not find downloads table. Are you logged in?');
      return buildReport([]);
    }
    if (catalog.kind === 'empty') {
      this.notifier.notify(NotificationLevel.WARNING, 'No downloads found on the account page');
      return buildReport([]);
    }

    const { entries } = catalog;
    this.notifier.notify(NotificationLevel.INFO, `Starting download of ${entries.length} episodes...`);

    const queue = new BoundedQueue<CatalogEntry, ItemResult>(
      async (entry) => {
        this.notifier.notify(NotificationLevel.INFO, `Starting download: ${entry.title}`);
        return this.downloader.downloadEpisode(entry);
      },
      { concurrency: maxConcurrent },
    );
    queue.addAll(entries);

    const settled = await queue.drain();
    const results = settled.map((outcome, index): ItemResult => {
      if (outcome.status === 'fulfilled') return outcome.value;
      // downloadEpisode resolves on failure; this only covers a broken downloader
      const entry = entries[index] ?? { title: 'unknown', url: '' };
      return { status: 'failed', entry, reason: String(outcome.reason) };
    });

    return buildReport(results);
  }
}
