import * as cheerio from 'cheerio';
import type { Credentials } from '../config/config-schema.js';
import type { Session } from '../http/session.js';
import { NotificationLevel, type Notifier } from '../notifications/notifier.js';
import { pathContains } from '../utils/url-utils.js';

export type HiddenField = readonly [name: string, value: string];

export type AuthenticatorOptions = {
  loginPath: string;
  /** Where WordPress should send us after login; also the account page we scrape */
  downloadsPath: string;
  /** Path segment that only appears once signed in */
  accountPathMarker: string;
};

/**
 * Every named `<input type="hidden">` on the page, in document order
 */
export function parseHiddenFields(html: string): HiddenField[] {
  const $ = cheerio.load(html);
  const fields: HiddenField[] = [];

  $('input[type="hidden"]').each((_, element) => {
    const name = $(element).attr('name');
    if (!name) return;
    fields.push([name, $(element).attr('value') ?? '']);
  });

  return fields;
}

/**
 * WordPress login form payload
 *
 * Fixed fields first, then hidden fields; on a name clash the later value wins
 * but the key keeps its first position.
 */
export function buildLoginPayload(
  credentials: Credentials,
  hiddenFields: readonly HiddenField[],
  redirectTo: string,
): Map<string, string> {
  const payload = new Map<string, string>([
    ['log', credentials.username],
    ['pwd', credentials.password],
    ['wp-submit', 'Log In'],
    ['redirect_to', redirectTo],
    ['testcookie', '1'],
  ]);

  for (const [name, value] of hiddenFields) {
    payload.set(name, value);
  }

  return payload;
}

/**
 * Signs the session in through the WordPress login form
 */
export class Authenticator {
  constructor(
    private readonly session: Session,
    private readonly notifier: Notifier,
    private readonly options: AuthenticatorOptions,
  ) {}

  /**
   * Submit the login form; success iff we land inside the account area
   *
   * Never throws: wrong credentials, a network error and a changed page all
   * come back as `false`.
   */
  async login(credentials: Credentials): Promise<boolean> {
    this.notifier.notify(NotificationLevel.INFO, 'Logging in...');

    try {
      // The login page sets the test cookie and may carry nonces
      const loginPage = await this.session.getHtml(this.options.loginPath);
      const payload = buildLoginPayload(
        credentials,
        parseHiddenFields(loginPage),
        this.session.resolve(this.options.downloadsPath),
      );

      const response = await this.session.postForm(this.options.loginPath, payload);
      await response.body?.cancel();

      if (pathContains(response.url, this.options.accountPathMarker)) {
        this.notifier.notify(NotificationLevel.SUCCESS, 'Login successful!');
        return true;
      }

      this.notifier.notify(NotificationLevel.WARNING, 'Login failed. Please check your credentials.');
      return false;
    } catch (error) {
      this.notifier.notify(
        NotificationLevel.WARNING,
        `Login failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }
}
