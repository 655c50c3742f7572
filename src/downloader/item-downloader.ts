import * as fs from 'node:fs';
import * as fsPromises from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { errorMessage } from '../errors/custom-errors.js';
import { Session } from '../http/session.js';
import type { Notifier } from '../notifications/notifier.js';
import { NotificationLevel } from '../notifications/notifier.js';
import type { CatalogEntry } from '../types/catalog.types.js';
import { formatProgress, formatSize } from '../utils/format.js';
import { DEFAULT_RESOLVERS, type FilenameResolver, resolveFilename } from './filename-resolvers.js';
import type { ItemResult } from './types.js';

export type ItemDownloaderOptions = {
  outputDir: string;
  /** Prefix for names built from the download_file parameter */
  fallbackPrefix: string;
  extension: string;
  resolvers?: readonly FilenameResolver[];
  /** Clock used for throughput, in milliseconds */
  now?: () => number;
};

/**
 * Streams one catalog entry to disk
 */
export class ItemDownloader {
  private readonly session: Session;
  private readonly notifier: Notifier;
  private readonly outputDir: string;
  private readonly fallbackPrefix: string;
  private readonly extension: string;
  private readonly resolvers: readonly FilenameResolver[];
  private readonly now: () => number;

  constructor(session: Session, notifier: Notifier, options: ItemDownloaderOptions) {
    this.session = session;
    this.notifier = notifier;
    this.outputDir = resolve(options.outputDir);
    this.fallbackPrefix = options.fallbackPrefix;
    this.extension = options.extension;
    this.resolvers = options.resolvers ?? DEFAULT_RESOLVERS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Download an entry unless its file already exists
   *
   * Never rejects: failures come back as `{ status: 'failed' }`.
   */
  async downloadEpisode(entry: CatalogEntry): Promise<ItemResult> {
    try {
      const response = await this.session.get(entry.url);
      await Session.ensureOk(response);

      const { filename, source } = resolveFilename(
        { requestUrl: entry.url, finalUrl: response.url || entry.url, headers: response.headers, entry },
        { fallbackPrefix: this.fallbackPrefix, extension: this.extension },
        this.resolvers,
      );
      const path = join(this.outputDir, filename);
      this.notifier.notify(NotificationLevel.DEBUG, `Named ${filename} from ${source}`);

      if (fs.existsSync(path)) {
        await response.body?.cancel();
        this.notifier.notify(NotificationLevel.INFO, `Skipping ${filename} - already exists`);
        return { status: 'skipped', entry, filename, path };
      }

      this.notifier.notify(NotificationLevel.INFO, `Downloading: ${filename}`);
      const bytes = await this.writeBody(response, path, filename);
      this.notifier.notify(NotificationLevel.SUCCESS, `Completed: ${filename}`);
      this.notifier.notify(NotificationLevel.DEBUG, `Wrote ${formatSize(bytes)} to ${path}`);

      return { status: 'downloaded', entry, filename, path, bytes };
    } catch (error) {
      const reason = errorMessage(error);
      this.notifier.notify(NotificationLevel.ERROR, `Error downloading ${entry.title}: ${reason}`);
      return { status: 'failed', entry, reason };
    }
  }

  /**
   * Write the body chunk by chunk; a partial file is removed on failure
   */
  private async writeBody(response: Response, path: string, filename: string): Promise<number> {
    const total = Number(response.headers.get('content-length') ?? 0);
    const showProgress = Number.isFinite(total) && total > 0;
    const startedAt = this.now();
    let downloaded = 0;

    let handle: fsPromises.FileHandle;
    try {
      handle = await fsPromises.open(path, 'w');
    } catch (error) {
      // Nothing has read the body yet; release the connection
      await response.body?.cancel();
      throw error;
    }

    try {
      if (response.body) {
        const reader = response.body.getReader();
        for (;;) {
          const { done, value } = await reader.read();
          if (done) break;
          if (!value || value.byteLength === 0) continue;

          await handle.write(value);
          downloaded += value.byteLength;

          if (showProgress) {
            this.notifier.progress(formatProgress(filename, downloaded, total, this.now() - startedAt));
          }
        }
      }
    } catch (error) {
      await handle.close();
      await fsPromises.rm(path, { force: true });
      throw error;
    } finally {
      if (showProgress) {
        this.notifier.endProgress();
      }
    }

    await handle.close();
    return downloaded;
  }
}
