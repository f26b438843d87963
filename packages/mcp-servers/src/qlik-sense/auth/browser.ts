/**
 * Session acquisition through a headless Chromium driven by playwright-core.
 *
 * Covers proxies plain HTTP cannot get through (NTLM/Kerberos challenges,
 * JavaScript login pages). The browser lives only for one login: it is
 * launched, used to read the session cookie, and closed again.
 *
 * playwright-core ships no browsers; point QLIK_BROWSER_EXECUTABLE at a
 * Chromium/Chrome binary or install one with `npx playwright install chromium`.
 */

import type { Browser, BrowserType, Page } from 'playwright-core';
import type { Logger } from '../../shared/logger.js';
import type { QlikConfig } from '../config.js';
import { AuthenticationError } from '../errors.js';
import { createSession, type Session, type SessionAcquirer } from '../session.js';

const USERNAME_SELECTOR = 'input[name="username"], input#username, input[type="text"]';
const PASSWORD_SELECTOR = 'input[name="pwd"], input[name="password"], input#password, input[type="password"]';
const SUBMIT_SELECTOR = 'button[type="submit"], input[type="submit"], button:has-text("Log in"), button:has-text("Sign in")';
const ERROR_SELECTOR = '.error, .alert-danger, .login-error, [class*="error"], [class*="invalid"]';

export type BrowserAuthConfig = Pick<
  QlikConfig,
  'serverUrl' | 'username' | 'sessionCookieName' | 'sslVerify' | 'browser'
> & { password: string };

export interface BrowserSessionAcquirerOptions {
  config: BrowserAuthConfig;
  logger: Logger;
  /** Resolves the browser type to launch; defaults to playwright-core's chromium. */
  loadBrowserType?: () => Promise<BrowserType>;
}

async function loadChromium(): Promise<BrowserType> {
  const { chromium } = await import('playwright-core');
  return chromium;
}

export class BrowserSessionAcquirer implements SessionAcquirer {
  readonly strategy = 'browser';
  private readonly config: BrowserAuthConfig;
  private readonly logger: Logger;
  private readonly loadBrowserType: () => Promise<BrowserType>;

  constructor(options: BrowserSessionAcquirerOptions) {
    this.config = options.config;
    this.logger = options.logger;
    this.loadBrowserType = options.loadBrowserType ?? loadChromium;
  }

  async acquire(): Promise<Session> {
    const { serverUrl, username, password, sessionCookieName, sslVerify, browser: browserConfig } = this.config;
    let browser: Browser | undefined;

    try {
      const browserType = await this.loadBrowserType();
      browser = await browserType.launch({
        headless: browserConfig.headless,
        slowMo: browserConfig.slowMo,
        executablePath: browserConfig.executablePath,
        timeout: browserConfig.timeoutMs,
      });

      const context = await browser.newContext({
        httpCredentials: { username, password },
        ignoreHTTPSErrors: !sslVerify,
      });
      context.setDefaultTimeout(browserConfig.timeoutMs);

      const page = await context.newPage();
      await page.goto(`${serverUrl}/hub/`, { waitUntil: 'domcontentloaded' });
      await page.waitForLoadState('networkidle');

      const usernameField = page.locator(USERNAME_SELECTOR).first();
      if (await usernameField.isVisible()) {
        this.logger.debug('Login form shown; submitting credentials');
        await usernameField.fill(username);
        await page.locator(PASSWORD_SELECTOR).first().fill(password);
        await page.locator(SUBMIT_SELECTOR).first().click();

        try {
          await page.waitForURL('**/hub/**', { timeout: browserConfig.timeoutMs });
        } catch (err) {
          const reason = await this.readLoginError(page);
          throw new AuthenticationError(`Login failed for user ${username}: ${reason}`, { cause: err });
        }
      }

      const cookies = await context.cookies(serverUrl);
      const sessionCookie = cookies.find((cookie) => cookie.name === sessionCookieName);
      if (!sessionCookie?.value) {
        throw new AuthenticationError(`No ${sessionCookieName} cookie after browser login for user ${username}`);
      }

      return createSession({ serverUrl, username, token: sessionCookie.value, cookieName: sessionCookieName });
    } catch (err) {
      if (err instanceof AuthenticationError) {throw err;}
      const message = err instanceof Error ? err.message : String(err);
      throw new AuthenticationError(`Browser login failed: ${message}`, { cause: err });
    } finally {
      if (browser) {
        await this.teardown(browser);
      }
    }
  }

  private async readLoginError(page: Page): Promise<string> {
    const errorElement = page.locator(ERROR_SELECTOR).first();
    if (await errorElement.count() === 0) {
      return 'login page did not redirect to the hub';
    }
    const text = await errorElement.textContent();
    return text?.trim() || 'login page did not redirect to the hub';
  }

  private async teardown(browser: Browser): Promise<void> {
    try {
      await browser.close();
    } catch (err) {
      this.logger.warn('Browser teardown failed', { error: err });
    }
  }
}
