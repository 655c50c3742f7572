import { describe, expect, it } from 'vitest';
import { HttpError } from '../errors/custom-errors.js';
import { Session } from './session.js';
import { createFakeFetch, fakeResponse } from './testing.js';

const BASE = 'https://shop.example.com';

describe('Session', () => {
  it('should resolve relative paths against the base URL', async () => {
    const { fetch, requests } = createFakeFetch((req) => fakeResponse('ok', { url: req.url }));
    const session = new Session({ baseUrl: BASE, fetch });

    await session.get('/my-account/downloads/');

    expect(requests[0]?.url).toBe('https://shop.example.com/my-account/downloads/');
    expect(session.resolve('/wp-login.php')).toBe('https://shop.example.com/wp-login.php');
  });

  it('should send browser-like headers', async () => {
    const { fetch, requests } = createFakeFetch((req) => fakeResponse('ok', { url: req.url }));
    const session = new Session({ baseUrl: BASE, fetch, userAgent: 'hh-test/1.0' });

    await session.get('/');

    expect(requests[0]?.headers.get('user-agent')).toBe('hh-test/1.0');
    expect(requests[0]?.headers.get('accept-language')).toBe('en-US,en;q=0.9');
  });

  it('should send cookies held in the jar', async () => {
    const { fetch, requests } = createFakeFetch((req) => fakeResponse('ok', { url: req.url }));
    const session = new Session({ baseUrl: BASE, fetch });
    await session.jar.setCookie('wordpress_logged_in=abc; Path=/', `${BASE}/`);

    await session.get('/my-account/downloads/');

    expect(requests[0]?.headers.get('cookie')).toBe('wordpress_logged_in=abc');
  });

  it('should store cookies set by a response', async () => {
    const { fetch } = createFakeFetch((req) =>
      fakeResponse('ok', { url: req.url, headers: { 'set-cookie': 'wordpress_test_cookie=WP; Path=/' } }),
    );
    const session = new Session({ baseUrl: BASE, fetch });

    await session.get('/wp-login.php');

    expect(await session.getCookieString('/my-account/')).toBe('wordpress_test_cookie=WP');
  });

  it('should follow redirects and expose the final URL', async () => {
    const { fetch, requests } = createFakeFetch((req) =>
      req.url.endsWith('/old')
        ? fakeResponse(null, { url: req.url, status: 302, headers: { location: `${BASE}/new` } })
        : fakeResponse('moved here', { url: req.url }),
    );
    const session = new Session({ baseUrl: BASE, fetch });

    const response = await session.get('/old');

    expect(response.url).toBe(`${BASE}/new`);
    expect(await response.text()).toBe('moved here');
    expect(requests.map((r) => r.url)).toEqual([`${BASE}/old`, `${BASE}/new`]);
  });

  it('should form-encode POST bodies in field order', async () => {
    const { fetch, requests } = createFakeFetch((req) => fakeResponse('ok', { url: req.url }));
    const session = new Session({ baseUrl: BASE, fetch });

    await session.postForm('/wp-login.php', [
      ['log', 'listener'],
      ['wp-submit', 'Log In'],
      ['redirect_to', `${BASE}/my-account/downloads/`],
    ]);

    expect(requests[0]?.method).toBe('POST');
    expect(requests[0]?.headers.get('content-type')).toBe('application/x-www-form-urlencoded');
    expect(requests[0]?.body).toBe(
      'log=listener&wp-submit=Log+In&redirect_to=https%3A%2F%2Fshop.example.com%2Fmy-account%2Fdownloads%2F',
    );
  });

  describe('getHtml', () => {
    it('should return the page text', async () => {
      const { fetch } = createFakeFetch((req) => fakeResponse('<html><body>Content</body></html>', { url: req.url }));
      const session = new Session({ baseUrl: BASE, fetch });

      expect(await session.getHtml('/')).toBe('<html><body>Content</body></html>');
    });

    it('should throw HttpError on 404', async () => {
      const { fetch } = createFakeFetch((req) => fakeResponse('Not Found', { url: req.url, status: 404 }));
      const session = new Session({ baseUrl: BASE, fetch });

      await expect(session.getHtml('/missing')).rejects.toBeInstanceOf(HttpError);
      await expect(session.getHtml('/missing')).rejects.toThrow('HTTP 404');
    });
  });
});
