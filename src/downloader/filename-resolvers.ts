import type { CatalogEntry } from '../types/catalog.types.js';
import { ensureExtension, sanitizeFilename } from '../utils/filename-sanitizer.js';
import { getQueryParam, urlBasename } from '../utils/url-utils.js';

/**
 * Everything a resolver may look at; no I/O happens past this point
 */
export type FilenameContext = {
  /** URL we asked for (the catalog link) */
  requestUrl: string;
  /** URL after redirects */
  finalUrl: string;
  headers: Headers;
  entry?: CatalogEntry;
};

export type FilenameOptions = {
  /** Prefix for names synthesized from the download_file parameter */
  fallbackPrefix: string;
  extension: string;
};

/**
 * One way to derive a file name; `undefined` passes to the next resolver
 */
export type FilenameResolver = {
  name: string;
  resolve(context: FilenameContext, options: FilenameOptions): string | undefined;
};

export type ResolvedFilename = {
  filename: string;
  /** Resolver that produced the name, or "default" */
  source: string;
};

const FILENAME_TOKEN = /filename=\s*("[^"]*"|'[^']*'|[^;]*)/i;

export const DEFAULT_FILENAME_STEM = 'episode';

/**
 * `filename=` token of a Content-Disposition header, quotes stripped
 */
export function parseContentDispositionFilename(header: string | null): string | undefined {
  if (!header) return undefined;
  const match = FILENAME_TOKEN.exec(header);
  const raw = match?.[1]?.trim();
  if (!raw) return undefined;
  return raw.replace(/^["']+|["']+$/g, '') || undefined;
}

export const contentDispositionResolver: FilenameResolver = {
  name: 'content-disposition',
  resolve: ({ headers }) => parseContentDispositionFilename(headers.get('content-disposition')),
};

export const urlBasenameResolver: FilenameResolver = {
  name: 'url-basename',
  resolve: ({ finalUrl }) => {
    const base = urlBasename(finalUrl);
    return base && base !== 'download' ? base : undefined;
  },
};

export const downloadFileParamResolver: FilenameResolver = {
  name: 'download-file-param',
  resolve: ({ requestUrl, finalUrl }, { fallbackPrefix, extension }) => {
    const id = getQueryParam(requestUrl, 'download_file') ?? getQueryParam(finalUrl, 'download_file');
    return id ? `${fallbackPrefix}${id}${extension}` : undefined;
  },
};

export const catalogTitleResolver: FilenameResolver = {
  name: 'catalog-title',
  resolve: ({ entry }) => entry?.title || undefined,
};

/**
 * Resolvers in priority order
 */
export const DEFAULT_RESOLVERS: readonly FilenameResolver[] = [
  contentDispositionResolver,
  urlBasenameResolver,
  downloadFileParamResolver,
  catalogTitleResolver,
];

/**
 * First resolver whose candidate survives sanitizing wins; the extension is
 * then forced on.
 */
export function resolveFilename(
  context: FilenameContext,
  options: FilenameOptions,
  resolvers: readonly FilenameResolver[] = DEFAULT_RESOLVERS,
): ResolvedFilename {
  for (const resolver of resolvers) {
    const candidate = resolver.resolve(context, options);
    const sanitized = candidate ? sanitizeFilename(candidate) : '';
    if (sanitized) {
      return { filename: ensureExtension(sanitized, options.extension), source: resolver.name };
    }
  }

  return { filename: ensureExtension(DEFAULT_FILENAME_STEM, options.extension), source: 'default' };
}
