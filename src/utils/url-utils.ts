import { posix } from 'node:path';

/**
 * Resolve a path (or absolute URL) against a base URL
 */
export function resolveUrl(base: string, pathOrUrl: string): string {
  return new URL(pathOrUrl, base).toString();
}

/**
 * Last path segment of a URL, percent-decoded; empty for "/" or a bad URL
 */
export function urlBasename(url: string): string {
  try {
    const { pathname } = new URL(url);
    if (pathname.endsWith('/')) return '';
    const name = posix.basename(pathname);
    try {
      return decodeURIComponent(name);
    } catch {
      return name;
    }
  } catch {
    return '';
  }
}

/**
 * Read a query parameter; undefined when absent, empty or the URL is invalid
 */
export function getQueryParam(url: string, name: string): string | undefined {
  try {
    const value = new URL(url).searchParams.get(name);
    return value ? value : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Whether the URL's path (not host or query) contains a segment string
 */
export function pathContains(url: string, segment: string): boolean {
  try {
    return new URL(url).pathname.includes(segment);
  } catch {
    return false;
  }
}
