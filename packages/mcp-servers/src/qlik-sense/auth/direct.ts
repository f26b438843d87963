/**
 * Session acquisition over plain HTTP.
 *
 * Walks the /hub redirect chain by hand, keeping cookies in a tough-cookie
 * jar. Header-authenticated and JWT virtual proxies hand out the session
 * cookie on the first hop; the forms proxy redirects to its login page, where
 * the credentials are posted.
 */

import { CookieJar } from 'tough-cookie';
import { fetch as undiciFetch, type Dispatcher, type Response } from 'undici';
import type { Logger } from '../../shared/logger.js';
import type { QlikConfig } from '../config.js';
import { AuthenticationError } from '../errors.js';
import { formatQlikUser, type HttpFetch } from '../http.js';
import { createSession, type Session, type SessionAcquirer } from '../session.js';

const MAX_HOPS = 10;
const FORMS_LOGIN_PATH = '/internal_forms_authentication';

export type DirectAuthConfig = Pick<
  QlikConfig,
  'serverUrl' | 'username' | 'credentials' | 'sessionCookieName' | 'requestTimeoutMs'
>;

export interface DirectSessionAcquirerOptions {
  config: DirectAuthConfig;
  logger: Logger;
  dispatcher?: Dispatcher;
  fetch?: HttpFetch;
}

interface Hop {
  url: string;
  method: 'GET' | 'POST';
  body?: string;
}

function isFormsLogin(url: string): boolean {
  return new URL(url).pathname.toLowerCase().startsWith(FORMS_LOGIN_PATH);
}

export class DirectSessionAcquirer implements SessionAcquirer {
  readonly strategy = 'direct';
  private readonly config: DirectAuthConfig;
  private readonly logger: Logger;
  private readonly dispatcher?: Dispatcher;
  private readonly fetchImpl: HttpFetch;

  constructor(options: DirectSessionAcquirerOptions) {
    this.config = options.config;
    this.logger = options.logger;
    this.dispatcher = options.dispatcher;
    this.fetchImpl = options.fetch ?? undiciFetch;
  }

  async acquire(): Promise<Session> {
    const { serverUrl, username, credentials } = this.config;
    const jar = new CookieJar();
    let hop: Hop = { url: `${serverUrl}/hub/`, method: 'GET' };
    let credentialsPosted = false;

    for (let count = 0; count < MAX_HOPS; count++) {
      const response = await this.send(hop, jar);
      await this.storeCookies(response, hop.url, jar);

      const token = await this.findSessionToken(jar);
      if (token) {
        return createSession({
          serverUrl,
          username,
          token,
          cookieName: this.config.sessionCookieName,
        });
      }

      if (response.status === 401 || response.status === 403) {
        throw new AuthenticationError(
          `Authentication rejected for user ${username} (HTTP ${response.status})`,
        );
      }

      const location = response.headers.get('location');
      const next = location && response.status >= 300 && response.status < 400
        ? new URL(location, hop.url).href
        : null;

      if (next && !isFormsLogin(next)) {
        hop = { url: next, method: 'GET' };
        continue;
      }

      // Forms login page: reached by redirect, or served directly
      const loginUrl = next ?? (isFormsLogin(hop.url) && response.ok ? hop.url : null);
      if (loginUrl && credentials.kind === 'password' && !credentialsPosted) {
        credentialsPosted = true;
        this.logger.debug('Submitting credentials to forms login', { url: loginUrl });
        hop = {
          url: loginUrl,
          method: 'POST',
          body: new URLSearchParams({ username, pwd: credentials.password }).toString(),
        };
        continue;
      }

      if (loginUrl && credentialsPosted) {
        throw new AuthenticationError(`Invalid credentials for user ${username}`);
      }

      if (loginUrl) {
        throw new AuthenticationError('Server requires forms login, which needs QLIK_PASSWORD');
      }

      break;
    }

    throw new AuthenticationError(
      `No ${this.config.sessionCookieName} cookie issued by ${serverUrl} for user ${username}`,
    );
  }

  private async send(hop: Hop, jar: CookieJar): Promise<Response> {
    const { credentials, username, requestTimeoutMs } = this.config;
    const headers: Record<string, string> = {
      Accept: 'text/html,application/json',
      'X-Qlik-User': formatQlikUser(username),
    };

    const cookie = await jar.getCookieString(hop.url);
    if (cookie) {headers.Cookie = cookie;}
    if (credentials.kind === 'apiKey') {headers.Authorization = `Bearer ${credentials.apiKey}`;}
    if (hop.body !== undefined) {headers['Content-Type'] = 'application/x-www-form-urlencoded';}

    try {
      const response = await this.fetchImpl(hop.url, {
        method: hop.method,
        headers,
        body: hop.body,
        redirect: 'manual',
        dispatcher: this.dispatcher,
        signal: AbortSignal.timeout(requestTimeoutMs),
      });
      // Only status, headers and cookies matter; release the connection
      await response.arrayBuffer();
      return response;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new AuthenticationError(`Login request to ${hop.url} failed: ${message}`, { cause: err });
    }
  }

  private async storeCookies(response: Response, url: string, jar: CookieJar): Promise<void> {
    for (const header of response.headers.getSetCookie()) {
      try {
        await jar.setCookie(header, url);
      } catch (err) {
        this.logger.warn('Ignoring malformed Set-Cookie header', { url, error: err });
      }
    }
  }

  private async findSessionToken(jar: CookieJar): Promise<string | null> {
    const cookies = await jar.getCookies(this.config.serverUrl);
    const session = cookies.find((cookie) => cookie.key === this.config.sessionCookieName);
    return session?.value ? session.value : null;
  }
}
