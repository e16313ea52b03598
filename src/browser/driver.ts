import type { SessionConfig } from '../schema/config.js';
import type { Cookie } from '../schema/cookie.js';
import type { LogEntry, LogType } from '../schema/capture.js';

// ── Element handle ───────────────────────────────────────────

/** `<option>` to pick in a `<select>`. */
export type OptionChoice =
  | { readonly index: number }
  | { readonly value: string }
  | { readonly label: string };

export interface Queryable {
  /** All elements matching an engine selector (`css=…`/`xpath=…`), in DOM order. No waiting. */
  query(selector: string): Promise<ElementRef[]>;
}

/**
 * Opaque reference to one DOM element, owned by the automation library.
 * The wrapper never manages its lifecycle.
 */
export interface ElementRef extends Queryable {
  click(): Promise<void>;
  doubleClick(): Promise<void>;
  rightClick(): Promise<void>;
  hover(): Promise<void>;
  type(text: string): Promise<void>;
  press(key: string): Promise<void>;
  clear(): Promise<void>;
  submit(): Promise<void>;
  scrollIntoView(): Promise<void>;
  dragTo(target: ElementRef): Promise<void>;
  selectOption(choice: OptionChoice): Promise<void>;
  screenshot(path: string): Promise<void>;

  text(): Promise<string>;
  attribute(name: string): Promise<string | null>;
  property(name: string): Promise<unknown>;
  isVisible(): Promise<boolean>;
  isEnabled(): Promise<boolean>;
  /** Checked checkbox/radio or selected `<option>`. */
  isSelected(): Promise<boolean>;
  /** False once the element has left the document. */
  isAttached(): Promise<boolean>;
}

// ── Dialogs ──────────────────────────────────────────────────

export type DialogType = 'alert' | 'confirm' | 'prompt' | 'beforeunload';

/** An open JavaScript dialog; stays open until accepted or dismissed. */
export interface DialogRef {
  readonly type: DialogType;
  readonly message: string;
  setPromptText(text: string): void;
  accept(): Promise<void>;
  dismiss(): Promise<void>;
}

// ── Script results ───────────────────────────────────────────

export type ScriptResult =
  | { readonly kind: 'element'; readonly element: ElementRef }
  | { readonly kind: 'value'; readonly value: unknown };

export interface ViewportSize {
  width: number;
  height: number;
}

// ── Driver ───────────────────────────────────────────────────

/**
 * Everything the session facade needs from the automation library.
 * Queries and script evaluation run in the current frame of the current window.
 */
export interface DriverAdapter extends Queryable {
  readonly browserName: string;

  goto(url: string): Promise<void>;
  reload(): Promise<void>;
  back(): Promise<void>;
  forward(): Promise<void>;
  setNavigationTimeout(ms: number): void;

  title(): Promise<string>;
  url(): string;
  content(): Promise<string>;

  evaluate(script: string, args: readonly unknown[]): Promise<ScriptResult>;

  cookies(): Promise<Cookie[]>;
  addCookies(cookies: readonly Cookie[]): Promise<void>;
  deleteCookie(name: string): Promise<void>;
  deleteAllCookies(): Promise<void>;

  windowHandles(): string[];
  currentWindowHandle(): string;
  /** Opens a window, makes it current, returns its handle. */
  newWindow(): Promise<string>;
  switchToWindow(handle: string): Promise<void>;
  closeWindow(): Promise<void>;
  viewportSize(): ViewportSize | null;
  setViewportSize(size: ViewportSize): Promise<void>;

  /** Resolves false when the element is not (yet) a loaded frame. */
  switchToFrame(element: ElementRef): Promise<boolean>;
  parentFrame(): void;
  defaultContent(): void;

  /** Oldest dialog still open in the current window, if any. */
  pendingDialog(): DialogRef | undefined;

  scrollBy(x: number, y: number): Promise<void>;
  screenshot(path: string): Promise<void>;

  logTypes(): readonly LogType[];
  /** Returns and forgets buffered entries of one type for the current window. */
  drainLog(type: LogType): LogEntry[];

  /** Closes the browser. Calling it again is a no-op. */
  quit(): Promise<void>;
}

export type DriverLauncher = (config: SessionConfig) => Promise<DriverAdapter>;
