/**
 * One purchased download listed on the account page
 */
export type CatalogEntry = {
  readonly title: string;
  readonly url: string;
};

/**
 * What the downloads page told us
 *
 * - `ok`: the table had at least one well-formed row
 * - `empty`: signed in, but nothing to download
 * - `signed-out`: neither the table nor any account-area marker was present
 */
export type CatalogScrapeResult =
  | { kind: 'ok'; entries: CatalogEntry[] }
  | { kind: 'empty' }
  | { kind: 'signed-out' };
