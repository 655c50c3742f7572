import fetchCookie from 'fetch-cookie';
import { CookieJar } from 'tough-cookie';
import { HttpError } from '../errors/custom-errors.js';
import { resolveUrl } from '../utils/url-utils.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type FormFields = Iterable<readonly [string, string]>;

export type SessionOptions = {
  /** Origin every relative path is resolved against */
  baseUrl: string;
  userAgent?: string;
  /** Underlying fetch; defaults to the global one */
  fetch?: FetchLike;
  jar?: CookieJar;
};

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

/**
 * Cookie-persisting HTTP session
 *
 * One instance per process. Cookies set by any response, redirects included,
 * land in the jar and go out with every later request to the same site.
 */
export class Session {
  readonly baseUrl: string;
  readonly jar: CookieJar;
  private readonly fetchWithCookies: FetchLike;
  private readonly defaultHeaders: Record<string, string>;

  constructor(options: SessionOptions) {
    this.baseUrl = options.baseUrl;
    this.jar = options.jar ?? new CookieJar();

    const baseFetch: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));
    this.fetchWithCookies = fetchCookie(baseFetch, this.jar);

    this.defaultHeaders = {
      'user-agent': options.userAgent ?? DEFAULT_USER_AGENT,
      accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'accept-language': 'en-US,en;q=0.9',
    };
  }

  /**
   * Resolve a site path against the base URL
   */
  resolve(pathOrUrl: string): string {
    return resolveUrl(this.baseUrl, pathOrUrl);
  }

  /**
   * Issue a request following redirects; `Response.url` is the final URL
   */
  async request(url: string, init: RequestInit = {}): Promise<Response> {
    const headers = { ...this.defaultHeaders, ...headersToRecord(init.headers) };
    return this.fetchWithCookies(this.resolve(url), { ...init, headers, redirect: 'follow' });
  }

  /**
   * GET without touching the body, so the caller can stream or cancel it
   */
  async get(url: string): Promise<Response> {
    return this.request(url, { method: 'GET' });
  }

  /**
   * GET a page and return its text
   *
   * @throws HttpError on a non-2xx status
   */
  async getHtml(url: string): Promise<string> {
    const response = await this.get(url);
    await Session.ensureOk(response);
    return response.text();
  }

  /**
   * Form-encoded POST, following redirects
   */
  async postForm(url: string, fields: FormFields): Promise<Response> {
    const body = new URLSearchParams();
    for (const [name, value] of fields) {
      body.append(name, value);
    }

    return this.request(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: body.toString(),
    });
  }

  /**
   * Cookie header the jar would send to `url`
   */
  async getCookieString(url: string): Promise<string> {
    return this.jar.getCookieString(this.resolve(url));
  }

  /**
   * Throw HttpError for a non-2xx response, releasing its body first
   */
  static async ensureOk(response: Response): Promise<void> {
    if (response.ok) return;
    await response.body?.cancel();
    throw new HttpError(response.status, response.statusText, response.url);
  }
}

function headersToRecord(headers: RequestInit['headers']): Record<string, string> {
  if (!headers) return {};
  return Object.fromEntries(new Headers(headers).entries());
}
