import { TIMEOUTS } from '../config/defaults.js';
import type { Pacing } from '../config/defaults.js';
import { AuthenticationFailure, errorMessage } from '../errors.js';
import type {
  AuthenticatedSession,
  Credentials,
  LocatorSet,
  SessionCookie,
  StorageScope,
  StorageSnapshot,
} from '../schema/index.js';
import * as log from '../utils/logger.js';
import { captureScreenshot } from './driver.js';
import type { PortalElement, PortalPage } from './driver.js';
import { humanType, pause } from './humanize.js';
import type { RandomSource } from './humanize.js';
import { ElementResolver } from './resolver.js';

// ── Public types ─────────────────────────────────────────────

export type LoginState =
  | 'start'
  | 'awaiting_credentials_form'
  | 'credentials_submitted'
  | 'authenticated'
  | 'failed';

export interface CredentialSessionOptions {
  loginUrl: string;
  locators: LocatorSet;
  pacing: Pacing;
  screenshotDir?: string | undefined;
  indicatorTimeout?: number | undefined;
  random?: RandomSource | undefined;
}

const TOKEN_KEYS = ['xtoken', 'token', 'access_token', 'accessToken'] as const;
const SESSION_KEYS = ['sessionId', 'session_id', 'sid'] as const;

// ── Login state machine ──────────────────────────────────────

/**
 * Drives the portal login form:
 *
 *   start → awaiting_credentials_form → credentials_submitted
 *         → authenticated | failed
 *
 * A missing email or password field ends the run; there is no second
 * login attempt within the same run.
 */
export class CredentialSession {
  private current: LoginState = 'start';
  private readonly resolver: ElementResolver;

  constructor(
    private readonly page: PortalPage,
    private readonly options: CredentialSessionOptions,
  ) {
    this.resolver = new ElementResolver(page, {
      afterHover: options.pacing.afterHover,
      random: options.random,
    });
  }

  get state(): LoginState {
    return this.current;
  }

  /**
   * Log in and return the session artifacts.
   * Throws AuthenticationFailure when any required step fails.
   */
  async login(credentials: Credentials): Promise<AuthenticatedSession> {
    if (this.current !== 'start') {
      throw new AuthenticationFailure(`Login already attempted (state: ${this.current})`);
    }

    try {
      await this.openLoginPage();
      this.transition('awaiting_credentials_form');

      const emailField = await this.findEmailField();
      if (emailField === null) {
        return await this.fail('Could not find email field', 'error-no-email-field');
      }
      log.login('Entering email');
      await this.type(emailField, credentials.email);
      await pause(this.page, this.options.pacing.betweenFields, this.options.random);

      const password = await this.resolver.resolve('password input', this.options.locators.passwordInput, {
        timeout: TIMEOUTS.LOGIN_ENTRY_ATTEMPT,
      });
      if (!password.found) {
        return await this.fail('Could not find password field', 'error-no-password-field');
      }
      log.login('Entering password');
      await this.type(password.element, credentials.password);
      await pause(this.page, this.options.pacing.betweenFields, this.options.random);

      await this.submit(password.element);
      this.transition('credentials_submitted');
      await pause(this.page, this.options.pacing.afterSubmit, this.options.random);
      await this.screenshot('after-login');

      const indicator = await this.resolver.resolve(
        'login indicator',
        this.options.locators.loginIndicator,
        { timeout: this.options.indicatorTimeout ?? TIMEOUTS.LOGIN_INDICATOR },
      );
      if (!indicator.found) {
        return await this.fail('Login appears to have failed: no logged-in indicator found', 'error-login');
      }

      this.transition('authenticated');
      return await this.extractSessionArtifacts();
    } catch (err) {
      if (err instanceof AuthenticationFailure) throw err;
      this.current = 'failed';
      await this.screenshot('login-error');
      throw new AuthenticationFailure(`Login error: ${errorMessage(err)}`, err);
    }
  }

  /**
   * Collect cookies and token-like values from both storage scopes.
   * Every part is optional; unreadable parts are left empty.
   */
  async extractSessionArtifacts(): Promise<AuthenticatedSession> {
    const [cookies, localStorage, sessionStorage] = await Promise.all([
      this.readCookies(),
      this.readStorage('local'),
      this.readStorage('session'),
    ]);

    let token: string | undefined;
    let sessionId: string | undefined;

    for (const storage of [localStorage, sessionStorage]) {
      token = firstKey(storage, TOKEN_KEYS) ?? token;
      sessionId = firstKey(storage, SESSION_KEYS) ?? sessionId;
    }

    for (const cookie of cookies) {
      const name = cookie.name.toLowerCase();
      if (name.includes('token')) {
        token = cookie.value;
      } else if (name.includes('session')) {
        sessionId = cookie.value;
      }
    }

    log.login(
      `Session artifacts: ${String(cookies.length)} cookies, token=${String(token !== undefined)}, session=${String(sessionId !== undefined)}`,
    );

    return {
      cookies,
      localStorage,
      sessionStorage,
      ...(token !== undefined ? { token } : {}),
      ...(sessionId !== undefined ? { sessionId } : {}),
    };
  }

  // ── Steps ──────────────────────────────────────────────────

  private async openLoginPage(): Promise<void> {
    const { loginUrl, pacing, random } = this.options;
    log.login(`Navigating to ${loginUrl}`);
    await this.page.goto(loginUrl, { timeout: TIMEOUTS.NAVIGATION_TIMEOUT });
    await pause(this.page, pacing.afterNavigation, random);
    await this.screenshot('initial-page');

    if (this.page.url().toLowerCase().includes('logout')) {
      log.login('Landed on logout page, navigating to login again');
      await this.page.goto(loginUrl, { timeout: TIMEOUTS.NAVIGATION_TIMEOUT });
      await pause(this.page, pacing.afterNavigation, random);
    }
  }

  private async findEmailField(): Promise<PortalElement | null> {
    const { locators, pacing, random } = this.options;

    const first = await this.resolver.resolve('email input', locators.emailInput);
    if (first.found) return first.element;

    log.login('Email field not found, looking for a login button');
    const entry = await this.resolver.resolveAndClick('login entry', locators.loginEntry, {
      timeout: TIMEOUTS.LOGIN_ENTRY_ATTEMPT,
    });
    if (entry.found) {
      log.login('Clicked login button');
      await pause(this.page, pacing.afterNavigation, random);
    }

    const retry = await this.resolver.resolve('email input', locators.emailInput, {
      timeout: TIMEOUTS.LOGIN_ENTRY_ATTEMPT,
    });
    return retry.found ? retry.element : null;
  }

  private async type(element: PortalElement, text: string): Promise<void> {
    await humanType(this.page, element, text, this.options.pacing, this.options.random);
  }

  private async submit(passwordField: PortalElement): Promise<void> {
    const clicked = await this.resolver.resolveAndClick('submit button', this.options.locators.submitButton, {
      timeout: TIMEOUTS.LOGIN_ENTRY_ATTEMPT,
    });
    if (clicked.found) {
      log.login('Clicked submit button');
      return;
    }
    log.login('No submit button found, pressing Enter');
    await passwordField.press('Enter', { timeout: TIMEOUTS.ACTION_TIMEOUT });
  }

  private async fail(reason: string, screenshotName: string): Promise<never> {
    this.current = 'failed';
    log.error(reason);
    await this.screenshot(screenshotName);
    throw new AuthenticationFailure(reason);
  }

  private transition(next: LoginState): void {
    log.detail(`login: ${this.current} → ${next}`);
    this.current = next;
  }

  // ── Best-effort reads ──────────────────────────────────────

  private async readCookies(): Promise<SessionCookie[]> {
    try {
      return await this.page.cookies();
    } catch (err) {
      log.warn(`Could not read cookies: ${errorMessage(err)}`);
      return [];
    }
  }

  private async readStorage(scope: StorageScope): Promise<StorageSnapshot> {
    try {
      return await this.page.readStorage(scope);
    } catch (err) {
      log.warn(`Could not read ${scope}Storage: ${errorMessage(err)}`);
      return {};
    }
  }

  private async screenshot(name: string): Promise<void> {
    await captureScreenshot(this.page, this.options.screenshotDir, name);
  }
}

function firstKey(storage: StorageSnapshot, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = storage[key];
    if (value !== undefined) return value;
  }
  return undefined;
}
