import { chromium, firefox, webkit } from 'playwright-core';
import type {
  Browser,
  BrowserContext,
  BrowserType,
  Dialog,
  ElementHandle,
  Frame,
  Page,
} from 'playwright-core';

import type { BrowserName, Cookie, LogEntry, LogType, SessionConfig } from '../schema/index.js';
import { LOG_TYPES } from '../schema/index.js';
import { isPlainObject } from '../utils/values.js';
import { attachCapture } from './capture.js';
import type { CaptureCollector } from './capture.js';
import { DialogGate } from './dialogs.js';
import { duringNavigation } from './navigation.js';
import type {
  DialogRef,
  DialogType,
  DriverAdapter,
  ElementRef,
  OptionChoice,
  ScriptResult,
  ViewportSize,
} from './driver.js';

// ── Launcher ─────────────────────────────────────────────────

interface Engine {
  type: BrowserType;
  channel?: string;
}

function resolveEngine(name: BrowserName): Engine {
  switch (name) {
    case 'chromium':
      return { type: chromium };
    case 'chrome':
      return { type: chromium, channel: 'chrome' };
    case 'edge':
      return { type: chromium, channel: 'msedge' };
    case 'firefox':
      return { type: firefox };
    case 'webkit':
      return { type: webkit };
  }
}

/**
 * Start a browser with one context and one window.
 * Launch errors are thrown as Playwright raised them.
 */
export async function launchPlaywrightDriver(
  config: SessionConfig,
): Promise<DriverAdapter> {
  const engine = resolveEngine(config.browser);
  const browser = await engine.type.launch({
    headless: config.headless,
    args: config.args,
    ...(engine.channel !== undefined ? { channel: engine.channel } : {}),
  });

  try {
    const context = await browser.newContext(
      config.userAgent !== undefined ? { userAgent: config.userAgent } : {},
    );
    const driver = new PlaywrightDriver(browser, context, config.browser);
    await driver.newWindow();
    return driver;
  } catch (err) {
    await browser.close();
    throw err;
  }
}

// ── Elements ─────────────────────────────────────────────────

class PlaywrightElement implements ElementRef {
  constructor(
    readonly handle: ElementHandle,
    private readonly window: WindowState,
  ) {}

  async query(selector: string): Promise<ElementRef[]> {
    const handles = await duringNavigation(
      () => this.handle.$$(selector),
      async () => [],
    );
    return handles.map((handle) => new PlaywrightElement(handle, this.window));
  }

  // Input that may open a dialog goes through the gate.

  async click(): Promise<void> {
    await this.window.gate.run(this.handle.click());
  }

  async doubleClick(): Promise<void> {
    await this.window.gate.run(this.handle.dblclick());
  }

  async rightClick(): Promise<void> {
    await this.window.gate.run(this.handle.click({ button: 'right' }));
  }

  async hover(): Promise<void> {
    await this.handle.hover();
  }

  async type(text: string): Promise<void> {
    await this.handle.focus();
    await this.window.gate.run(this.window.page.keyboard.type(text));
  }

  async press(key: string): Promise<void> {
    await this.handle.focus();
    await this.window.gate.run(this.window.page.keyboard.press(key));
  }

  async clear(): Promise<void> {
    await this.handle.fill('');
  }

  async submit(): Promise<void> {
    const submitting = this.handle.evaluate((node) => {
      const form =
        node instanceof HTMLFormElement
          ? node
          : node instanceof Element
            ? node.closest('form')
            : null;
      if (!form) return false;
      form.requestSubmit();
      return true;
    });
    await this.window.gate.run(
      submitting.then((submitted) => {
        if (!submitted) throw new Error('Element is not inside a form');
      }),
    );
  }

  async scrollIntoView(): Promise<void> {
    await this.handle.scrollIntoViewIfNeeded();
  }

  async dragTo(target: ElementRef): Promise<void> {
    const destination = unwrapElement(target);
    await this.handle.hover();
    await this.window.page.mouse.down();
    await destination.hover();
    await this.window.page.mouse.up();
  }

  async selectOption(choice: OptionChoice): Promise<void> {
    await this.handle.selectOption(choice);
  }

  async screenshot(path: string): Promise<void> {
    await this.handle.screenshot({ path });
  }

  text(): Promise<string> {
    return this.handle.innerText();
  }

  attribute(name: string): Promise<string | null> {
    return this.handle.getAttribute(name);
  }

  async property(name: string): Promise<unknown> {
    const property = await this.handle.getProperty(name);
    const value: unknown = await property.jsonValue();
    await property.dispose();
    return value;
  }

  isVisible(): Promise<boolean> {
    return this.handle.isVisible();
  }

  isEnabled(): Promise<boolean> {
    return this.handle.isEnabled();
  }

  isSelected(): Promise<boolean> {
    return this.handle.evaluate((node) => {
      if (node instanceof HTMLInputElement) return node.checked;
      if (node instanceof HTMLOptionElement) return node.selected;
      return false;
    });
  }

  async isAttached(): Promise<boolean> {
    try {
      return await this.handle.evaluate((node) => node.isConnected);
    } catch {
      // The handle's execution context was destroyed by a navigation.
      return false;
    }
  }
}

function unwrapElement(element: ElementRef): ElementHandle {
  if (element instanceof PlaywrightElement) {
    return element.handle;
  }
  throw new TypeError('Element was not created by this driver');
}

function unwrapArgument(arg: unknown): unknown {
  if (arg instanceof PlaywrightElement) return arg.handle;
  if (Array.isArray(arg)) return arg.map(unwrapArgument);
  if (isPlainObject(arg)) {
    return Object.fromEntries(
      Object.entries(arg).map(([key, value]) => [key, unwrapArgument(value)]),
    );
  }
  return arg;
}

// ── Dialogs ──────────────────────────────────────────────────

class PlaywrightDialog implements DialogRef {
  private promptText: string | undefined;

  constructor(
    private readonly dialog: Dialog,
    private readonly window: WindowState,
  ) {}

  get type(): DialogType {
    switch (this.dialog.type()) {
      case 'confirm':
        return 'confirm';
      case 'prompt':
        return 'prompt';
      case 'beforeunload':
        return 'beforeunload';
      default:
        return 'alert';
    }
  }

  get message(): string {
    return this.dialog.message();
  }

  setPromptText(text: string): void {
    this.promptText = text;
  }

  async accept(): Promise<void> {
    this.settle();
    await this.dialog.accept(this.promptText);
    await this.resumeInput();
  }

  async dismiss(): Promise<void> {
    this.settle();
    await this.dialog.dismiss();
    await this.resumeInput();
  }

  private settle(): void {
    this.window.dialogs = this.window.dialogs.filter((d) => d !== this);
  }

  // The action that opened the dialog finishes once the page is unfrozen.
  private async resumeInput(): Promise<void> {
    if (this.window.dialogs.length === 0) {
      await this.window.gate.resume();
    }
  }
}

// ── Script evaluation ────────────────────────────────────────
// Serialized and executed inside the browser.
// It must NOT reference any outer-scope variables.

function runScriptBody(input: { body: string; params: unknown[] }): unknown {
  return new Function(input.body).apply(null, input.params);
}

// ── Driver ───────────────────────────────────────────────────

interface WindowState {
  readonly page: Page;
  readonly capture: CaptureCollector;
  readonly gate: DialogGate;
  dialogs: PlaywrightDialog[];
  frame: Frame;
}

class PlaywrightDriver implements DriverAdapter {
  private readonly windows = new Map<string, WindowState>();
  private current: string | undefined;
  private nextHandle = 1;
  private closed = false;

  constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    readonly browserName: string,
  ) {
    // Popups and `window.open` pages become windows too.
    context.on('page', (page) => {
      this.register(page);
    });
  }

  // ── Current window ─────────────────────────────────────────

  private get state(): WindowState {
    const state =
      this.current !== undefined ? this.windows.get(this.current) : undefined;
    if (!state) {
      throw new Error('No current window; switch to an open window first');
    }
    return state;
  }

  private register(page: Page): string {
    for (const [handle, window] of this.windows) {
      if (window.page === page) return handle;
    }

    const handle = `window-${String(this.nextHandle++)}`;
    const window: WindowState = {
      page,
      capture: attachCapture(page),
      gate: new DialogGate(page),
      dialogs: [],
      frame: page.mainFrame(),
    };

    page.on('dialog', (dialog) => {
      window.dialogs.push(new PlaywrightDialog(dialog, window));
    });
    page.on('close', () => {
      this.forget(handle);
    });

    this.windows.set(handle, window);
    return handle;
  }

  private forget(handle: string): void {
    this.windows.delete(handle);
    if (this.current === handle) {
      this.current = this.windows.keys().next().value;
    }
  }

  // ── Navigation ─────────────────────────────────────────────

  async goto(url: string): Promise<void> {
    const state = this.state;
    state.frame = state.page.mainFrame();
    await state.page.goto(url);
  }

  async reload(): Promise<void> {
    const state = this.state;
    state.frame = state.page.mainFrame();
    await state.page.reload();
  }

  async back(): Promise<void> {
    const state = this.state;
    state.frame = state.page.mainFrame();
    await state.page.goBack();
  }

  async forward(): Promise<void> {
    const state = this.state;
    state.frame = state.page.mainFrame();
    await state.page.goForward();
  }

  setNavigationTimeout(ms: number): void {
    this.context.setDefaultNavigationTimeout(ms);
  }

  // ── Page info ──────────────────────────────────────────────

  /** During a navigation, waits for the new document before reading its title. */
  title(): Promise<string> {
    const { page } = this.state;
    return duringNavigation(
      () => page.title(),
      async () => {
        await page.waitForLoadState('domcontentloaded');
        return page.title();
      },
    );
  }

  url(): string {
    return this.state.page.url();
  }

  content(): Promise<string> {
    return this.state.frame.content();
  }

  // ── Elements and scripts ───────────────────────────────────

  /** Nothing matches while the document is being replaced by a navigation. */
  async query(selector: string): Promise<ElementRef[]> {
    const window = this.state;
    const handles = await duringNavigation(
      () => window.frame.$$(selector),
      async () => [],
    );
    return handles.map((handle) => new PlaywrightElement(handle, window));
  }

  async evaluate(
    script: string,
    args: readonly unknown[],
  ): Promise<ScriptResult> {
    const window = this.state;
    const result = await window.frame.evaluateHandle(runScriptBody, {
      body: script,
      params: args.map(unwrapArgument),
    });

    const element = result.asElement();
    if (element) {
      return { kind: 'element', element: new PlaywrightElement(element, window) };
    }

    const value: unknown = await result.jsonValue();
    await result.dispose();
    return { kind: 'value', value };
  }

  // ── Cookies ────────────────────────────────────────────────

  cookies(): Promise<Cookie[]> {
    return this.context.cookies();
  }

  async addCookies(cookies: readonly Cookie[]): Promise<void> {
    const pageUrl = this.state.page.url();
    await this.context.addCookies(
      cookies.map((cookie) => withLocation(cookie, pageUrl)),
    );
  }

  async deleteCookie(name: string): Promise<void> {
    await this.context.clearCookies({ name });
  }

  async deleteAllCookies(): Promise<void> {
    await this.context.clearCookies();
  }

  // ── Windows ────────────────────────────────────────────────

  windowHandles(): string[] {
    return [...this.windows.keys()];
  }

  currentWindowHandle(): string {
    if (this.current === undefined || !this.windows.has(this.current)) {
      throw new Error('No current window; switch to an open window first');
    }
    return this.current;
  }

  async newWindow(): Promise<string> {
    const page = await this.context.newPage();
    const handle = this.register(page);
    this.current = handle;
    return handle;
  }

  async switchToWindow(handle: string): Promise<void> {
    const window = this.windows.get(handle);
    if (!window) {
      throw new Error(`No window with handle "${handle}"`);
    }
    this.current = handle;
    await window.page.bringToFront();
  }

  async closeWindow(): Promise<void> {
    const handle = this.currentWindowHandle();
    await this.state.page.close();
    this.forget(handle);
  }

  viewportSize(): ViewportSize | null {
    return this.state.page.viewportSize();
  }

  async setViewportSize(size: ViewportSize): Promise<void> {
    await this.state.page.setViewportSize(size);
  }

  // ── Frames ─────────────────────────────────────────────────

  async switchToFrame(element: ElementRef): Promise<boolean> {
    const frame = await unwrapElement(element).contentFrame();
    if (!frame) return false;
    this.state.frame = frame;
    return true;
  }

  parentFrame(): void {
    const state = this.state;
    state.frame = state.frame.parentFrame() ?? state.frame;
  }

  defaultContent(): void {
    const state = this.state;
    state.frame = state.page.mainFrame();
  }

  // ── Dialogs, scrolling, screenshots, logs ──────────────────

  pendingDialog(): DialogRef | undefined {
    return this.state.dialogs[0];
  }

  async scrollBy(x: number, y: number): Promise<void> {
    await this.state.page.mouse.wheel(x, y);
  }

  async screenshot(path: string): Promise<void> {
    await this.state.page.screenshot({ path });
  }

  logTypes(): readonly LogType[] {
    return LOG_TYPES;
  }

  drainLog(type: LogType): LogEntry[] {
    return this.state.capture.drain(type);
  }

  // ── Lifecycle ──────────────────────────────────────────────

  async quit(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.windows.clear();
    this.current = undefined;
    await this.browser.close();
  }
}

// Playwright needs either a url, or a domain together with a path.
function withLocation(cookie: Cookie, pageUrl: string): Cookie {
  if (cookie.url !== undefined) return cookie;
  if (cookie.domain === undefined) return { ...cookie, url: pageUrl };
  if (cookie.path === undefined) return { ...cookie, path: '/' };
  return cookie;
}
