import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { DriverAdapter, DriverLauncher, ViewportSize } from '../browser/driver.js';
import { launchPlaywrightDriver } from '../browser/playwright.js';
import { classifySelector, describeLocator, toEngineSelector } from '../browser/selectors.js';
import { parseSessionConfig } from '../config/loader.js';
import { cookieSchema, parseCookieJSON } from '../schema/index.js';
import type { Cookie, LogEntry, LogType, SessionConfig, SessionOptions } from '../schema/index.js';
import * as log from '../utils/logger.js';
import { isMissingFile } from '../utils/fs.js';
import { isPlainObject } from '../utils/values.js';
import { Alert } from './alert.js';
import { Element } from './element.js';
import { ConfigurationError } from './errors.js';
import { Expect } from './expect.js';
import { locateMany, locateOne } from './locate.js';
import { holds, waitUntil } from './wait.js';
import type { PollSettings, WaitOptions } from './wait.js';

export type CookieFileOutcome = 'loaded' | 'saved';

/**
 * One browser, driven through short calls with a default explicit wait.
 *
 *   const session = await Session.launch({ browser: 'firefox', timeout: 5_000 });
 *   await session.get('https://example.com');
 *   await (await session.element('input[name="q"]')).sendKeys('hello', Keys.ENTER);
 *   await session.expect.titleToContain('hello');
 *   await session.quit();
 *
 * Meant for one owner awaiting one call at a time.
 */
export class Session {
  /** Expectation helpers bound to this session's wait settings. */
  readonly expect: Expect;

  private defaultTimeout: number;
  private closed = false;

  private constructor(
    /** The wrapped driver, for anything this class does not expose. */
    readonly driver: DriverAdapter,
    private readonly config: SessionConfig,
  ) {
    this.defaultTimeout = config.timeout;
    this.expect = new Expect(this);
  }

  // ── Lifecycle ──────────────────────────────────────────────

  /**
   * Validate `options` and start a browser.
   * Bad options and launch failures both raise `ConfigurationError`.
   */
  static async launch(
    options: SessionOptions = {},
    launcher: DriverLauncher = launchPlaywrightDriver,
  ): Promise<Session> {
    const config = parseSessionConfig(options);

    if (config.verbose) {
      log.browser(
        `Launching ${config.browser}${config.headless ? ' (headless)' : ''}`,
      );
    }

    let driver: DriverAdapter;
    try {
      driver = await launcher(config);
    } catch (err) {
      if (err instanceof ConfigurationError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConfigurationError(`Could not start ${config.browser}: ${reason}`, {
        cause: err,
      });
    }

    return new Session(driver, config);
  }

  /** Wrap a driver that is already running. */
  static attach(driver: DriverAdapter, options: SessionOptions = {}): Session {
    return new Session(driver, parseSessionConfig(options));
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Close every window and the browser. Safe to call more than once. */
  async quit(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.driver.quit();

    if (this.config.verbose) {
      log.browser(`Closed ${this.driver.browserName}`);
    }
  }

  // ── Wait settings ──────────────────────────────────────────

  /** Default wait for lookups and expectations, in milliseconds. */
  get timeout(): number {
    return this.defaultTimeout;
  }

  set timeout(ms: number) {
    this.defaultTimeout = checkTimeout(ms);
  }

  /** Run `fn` with a different default wait, restoring the old one afterwards. */
  async withTimeout<T>(ms: number, fn: () => Promise<T>): Promise<T> {
    const previous = this.defaultTimeout;
    this.timeout = ms;
    try {
      return await fn();
    } finally {
      this.defaultTimeout = previous;
    }
  }

  pollSettings(options: WaitOptions = {}): PollSettings {
    return {
      timeout: checkTimeout(options.timeout ?? this.defaultTimeout),
      interval: this.config.pollInterval,
    };
  }

  // ── Lookup ─────────────────────────────────────────────────

  /**
   * First element matching `selector` (`/…` is XPath, anything else CSS),
   * waiting for it to be present. `NotFoundError` after the wait.
   */
  async element(selector: string, options?: WaitOptions): Promise<Element> {
    const { locator, found } = await locateOne(
      this.driver,
      selector,
      this.pollSettings(options),
    );
    return new Element(this, found, locator);
  }

  /**
   * Every element matching `selector`, in DOM order, once at least one is
   * present. Resolves `[]` when nothing matches within the wait.
   */
  async elements(selector: string, options?: WaitOptions): Promise<Element[]> {
    const { locator, found } = await locateMany(
      this.driver,
      selector,
      this.pollSettings(options),
    );
    return found.map((ref) => new Element(this, ref, locator));
  }

  // ── Navigation ─────────────────────────────────────────────

  get(url: string): Promise<void> {
    return this.driver.goto(url);
  }

  refresh(): Promise<void> {
    return this.driver.reload();
  }

  back(): Promise<void> {
    return this.driver.back();
  }

  forward(): Promise<void> {
    return this.driver.forward();
  }

  /** Open `url` with HTTP basic-auth credentials embedded in it. */
  async basicAuth(url: string, username: string, password: string): Promise<void> {
    const target = new URL(url);
    target.username = username;
    target.password = password;
    await this.get(target.toString());
  }

  setPageLoadTimeout(ms: number): void {
    this.driver.setNavigationTimeout(ms);
  }

  // ── Page info ──────────────────────────────────────────────

  title(): Promise<string> {
    return this.driver.title();
  }

  url(): string {
    return this.driver.url();
  }

  pageSource(): Promise<string> {
    return this.driver.content();
  }

  get browserName(): string {
    return this.driver.browserName;
  }

  async userAgent(): Promise<string> {
    const agent = await this.executeScript('return navigator.userAgent;');
    return String(agent);
  }

  // ── Scripts ────────────────────────────────────────────────

  /**
   * Run a function body in the current frame; `arguments[i]` holds the
   * i-th extra argument, with `Element`s passed as DOM nodes, also inside
   * arrays and plain objects.
   * A returned DOM node comes back as an `Element`.
   */
  async executeScript(script: string, ...args: unknown[]): Promise<unknown> {
    const result = await this.driver.evaluate(script, args.map(toDriverArgument));
    return result.kind === 'element' ? new Element(this, result.element) : result.value;
  }

  // ── Cookies ────────────────────────────────────────────────

  getAllCookies(): Promise<Cookie[]> {
    return this.driver.cookies();
  }

  /** Without `url` or `domain`, the cookie is set for the current page. */
  async addCookie(cookie: Cookie): Promise<void> {
    await this.driver.addCookies([cookieSchema.parse(cookie)]);
  }

  deleteCookie(name: string): Promise<void> {
    return this.driver.deleteCookie(name);
  }

  deleteAllCookies(): Promise<void> {
    return this.driver.deleteAllCookies();
  }

  /**
   * Keep a login across runs. When `file` exists its cookies are added and
   * the page reloaded; otherwise the current cookies are written to it.
   */
  async persistCookies(file = 'cookies.json'): Promise<CookieFileOutcome> {
    const target = path.resolve(file);

    let raw: string;
    try {
      raw = await readFile(target, 'utf-8');
    } catch (err) {
      if (!isMissingFile(err)) throw err;
      const cookies = await this.driver.cookies();
      await writeFile(target, JSON.stringify(cookies, null, 4), 'utf-8');
      return 'saved';
    }

    await this.driver.addCookies(parseCookieJSON(raw));
    await this.driver.reload();
    return 'loaded';
  }

  // ── Windows ────────────────────────────────────────────────

  get currentWindowHandle(): string {
    return this.driver.currentWindowHandle();
  }

  get allWindowHandles(): string[] {
    return this.driver.windowHandles();
  }

  /** Open a window and switch to it. */
  newWindow(): Promise<string> {
    return this.driver.newWindow();
  }

  /** Same as `newWindow`: Playwright pages have no tab/window distinction. */
  newTab(): Promise<string> {
    return this.driver.newWindow();
  }

  /** Switch by handle, or by position in `allWindowHandles`. */
  async switchWindow(target: string | number): Promise<void> {
    const handle =
      typeof target === 'number' ? this.allWindowHandles[target] : target;
    if (handle === undefined) {
      throw new RangeError(`No window at index ${String(target)}`);
    }
    await this.driver.switchToWindow(handle);
  }

  /** Close the current window. */
  closeWindow(): Promise<void> {
    return this.driver.closeWindow();
  }

  getWindowSize(): ViewportSize | null {
    return this.driver.viewportSize();
  }

  setWindowSize(width: number, height: number): Promise<void> {
    return this.driver.setViewportSize({ width, height });
  }

  // ── Frames ─────────────────────────────────────────────────

  /** Wait for the frame element to load, then direct later lookups into it. */
  async switchFrame(target: string | Element, options?: WaitOptions): Promise<true> {
    const settings = this.pollSettings(options);

    if (target instanceof Element) {
      return waitUntil(
        async () => holds(await this.driver.switchToFrame(target.ref)),
        settings,
        'Frame is not available',
      );
    }

    const locator = classifySelector(target);
    const engineSelector = toEngineSelector(locator);
    return waitUntil(
      async () => {
        const [frame] = await this.driver.query(engineSelector);
        return frame === undefined
          ? undefined
          : holds(await this.driver.switchToFrame(frame));
      },
      settings,
      `Frame with ${describeLocator(locator)} is not available`,
    );
  }

  parentFrame(): void {
    this.driver.parentFrame();
  }

  /** Back to the top-level document. */
  leaveFrame(): void {
    this.driver.defaultContent();
  }

  // ── Dialogs ────────────────────────────────────────────────

  /** Wait for an open alert, confirm or prompt. */
  async alert(options?: WaitOptions): Promise<Alert> {
    const dialog = await waitUntil(
      async () => this.driver.pendingDialog(),
      this.pollSettings(options),
      'No alerts are present',
    );
    return new Alert(dialog);
  }

  // ── Scrolling and screenshots ──────────────────────────────

  /** Negative values scroll left and up. */
  scrollAmount(x: number, y: number): Promise<void> {
    return this.driver.scrollBy(x, y);
  }

  async scrollToPageBottom(): Promise<void> {
    await this.executeScript('window.scrollTo(0, document.body.scrollHeight);');
  }

  screenshot(file = 'screenshot.png'): Promise<void> {
    return this.driver.screenshot(file);
  }

  // ── Logs ───────────────────────────────────────────────────

  get logTypes(): readonly LogType[] {
    return this.driver.logTypes();
  }

  /** Entries of `type` collected since the last call, oldest first. */
  getLog(type: LogType): LogEntry[] {
    return this.driver.drainLog(type);
  }
}

function checkTimeout(ms: number): number {
  if (!Number.isFinite(ms) || ms < 0) {
    throw new RangeError(`Wait timeout must be a non-negative number, got ${String(ms)}`);
  }
  return ms;
}

function toDriverArgument(arg: unknown): unknown {
  if (arg instanceof Element) return arg.ref;
  if (Array.isArray(arg)) return arg.map(toDriverArgument);
  if (isPlainObject(arg)) {
    return Object.fromEntries(
      Object.entries(arg).map(([key, value]) => [key, toDriverArgument(value)]),
    );
  }
  return arg;
}
