import type { CatalogEntry } from '../types/catalog.types.js';

/**
 * Outcome of a single catalog entry
 */
export type ItemResult =
  | {
      status: 'downloaded';
      entry: CatalogEntry;
      filename: string;
      /** Absolute path of the written file */
      path: string;
      bytes: number;
    }
  | {
      status: 'skipped';
      entry: CatalogEntry;
      filename: string;
      path: string;
    }
  | {
      status: 'failed';
      entry: CatalogEntry;
      reason: string;
    };

/**
 * Aggregate of a batch run; `results` follow catalog order
 */
export type BatchReport = {
  total: number;
  downloaded: number;
  skipped: number;
  failed: number;
  results: ItemResult[];
};
