import type { ElementRef } from '../browser/driver.js';
import { classifySelector, describeLocator, toEngineSelector } from '../browser/selectors.js';
import { Element } from './element.js';
import type { Session } from './session.js';
import { holds, waitUntil } from './wait.js';
import type { Condition, TimeoutMessage, WaitOptions } from './wait.js';

/** A selector, or an element that was already located. */
export type ElementMark = Element | string;

/**
 * Named polling conditions. Each one waits up to the session's default
 * timeout (or `options.timeout`), resolves `true` once the condition holds
 * and throws `TimeoutError` otherwise.
 *
 * Selectors are re-queried on every poll, so elements that are replaced
 * while waiting are picked up.
 */
export class Expect {
  constructor(private readonly session: Session) {}

  // ── Presence and visibility ────────────────────────────────

  async elementToBePresent(selector: string, options?: WaitOptions): Promise<true> {
    return this.until(
      async () => holds((await this.find(selector)).length > 0),
      `${this.describe(selector)} is not present on the DOM`,
      options,
    );
  }

  async elementToBeVisible(selector: string, options?: WaitOptions): Promise<true> {
    return this.until(
      async () => {
        const [first] = await this.find(selector);
        return holds(first !== undefined && (await first.isVisible()));
      },
      `${this.describe(selector)} is not visible`,
      options,
    );
  }

  /** Holds once at least one element matches and every match is visible. */
  async elementsToBeVisible(selector: string, options?: WaitOptions): Promise<true> {
    return this.until(
      async () => {
        const matches = await this.find(selector);
        if (matches.length === 0) return undefined;
        const visible = await Promise.all(matches.map((ref) => ref.isVisible()));
        return holds(visible.every(Boolean));
      },
      `Not all elements matching ${this.describe(selector)} are visible`,
      options,
    );
  }

  /** An element that is missing from the DOM counts as invisible. */
  async elementToBeInvisible(mark: ElementMark, options?: WaitOptions): Promise<true> {
    return this.until(
      async () => {
        const ref = await this.resolve(mark);
        return holds(ref === undefined || !(await ref.isVisible()));
      },
      `${this.describe(mark)} is not invisible`,
      options,
    );
  }

  async elementsToBeInvisible(selector: string, options?: WaitOptions): Promise<true> {
    return this.until(
      async () => {
        const matches = await this.find(selector);
        const visible = await Promise.all(matches.map((ref) => ref.isVisible()));
        return holds(!visible.some(Boolean));
      },
      `Elements matching ${this.describe(selector)} are not invisible`,
      options,
    );
  }

  /** Visible and enabled. */
  async elementToBeClickable(mark: ElementMark, options?: WaitOptions): Promise<true> {
    return this.until(
      async () => {
        const ref = await this.resolve(mark);
        return holds(
          ref !== undefined && (await ref.isVisible()) && (await ref.isEnabled()),
        );
      },
      `${this.describe(mark)} is not clickable`,
      options,
    );
  }

  /** Holds once the element has been removed from the document. */
  async elementToBeStale(element: Element, options?: WaitOptions): Promise<true> {
    return this.until(
      async () => holds(!(await element.ref.isAttached())),
      `${this.describe(element)} did not go stale`,
      options,
    );
  }

  // ── Text and attributes ────────────────────────────────────

  async elementToHaveText(selector: string, options?: WaitOptions): Promise<true> {
    return this.untilText(
      selector,
      (text) => text.length > 0,
      `No text in ${this.describe(selector)}`,
      options,
    );
  }

  async elementTextToContain(
    selector: string,
    text: string,
    options?: WaitOptions,
  ): Promise<true> {
    return this.untilText(
      selector,
      (actual) => actual.includes(text),
      `Text of ${this.describe(selector)} does not contain "${text}"`,
      options,
    );
  }

  async elementTextToBe(
    selector: string,
    text: string,
    options?: WaitOptions,
  ): Promise<true> {
    return this.untilText(
      selector,
      (actual) => actual === text,
      `Text of ${this.describe(selector)} is not "${text}"`,
      options,
    );
  }

  async elementAttributeToContain(
    selector: string,
    attribute: string,
    text: string,
    options?: WaitOptions,
  ): Promise<true> {
    return this.until(
      async () => {
        const [first] = await this.find(selector);
        if (first === undefined) return undefined;
        const value = await first.attribute(attribute);
        return holds(value !== null && value.includes(text));
      },
      `Attribute "${attribute}" of ${this.describe(selector)} does not contain "${text}"`,
      options,
    );
  }

  // ── Selection state ────────────────────────────────────────

  async elementToBeChecked(selector: string, options?: WaitOptions): Promise<true> {
    return this.untilSelection(selector, true, options);
  }

  async elementToNotBeChecked(selector: string, options?: WaitOptions): Promise<true> {
    return this.untilSelection(selector, false, options);
  }

  // ── Page ───────────────────────────────────────────────────

  async urlToBe(url: string, options?: WaitOptions): Promise<true> {
    const driver = this.session.driver;
    return this.until(
      async () => holds(driver.url() === url),
      () => `"${driver.url()}" is not "${url}"`,
      options,
    );
  }

  async urlToContain(fragment: string, options?: WaitOptions): Promise<true> {
    const driver = this.session.driver;
    return this.until(
      async () => holds(driver.url().includes(fragment)),
      () => `"${driver.url()}" does not contain "${fragment}"`,
      options,
    );
  }

  async urlToMatch(pattern: RegExp, options?: WaitOptions): Promise<true> {
    const driver = this.session.driver;
    return this.until(
      async () => holds(driver.url().search(pattern) !== -1),
      () => `"${driver.url()}" does not match ${String(pattern)}`,
      options,
    );
  }

  async titleToBe(title: string, options?: WaitOptions): Promise<true> {
    const driver = this.session.driver;
    return this.until(
      async () => holds((await driver.title()) === title),
      async () => `"${await driver.title()}" is not "${title}"`,
      options,
    );
  }

  async titleToContain(fragment: string, options?: WaitOptions): Promise<true> {
    const driver = this.session.driver;
    return this.until(
      async () => holds((await driver.title()).includes(fragment)),
      async () => `"${await driver.title()}" does not contain "${fragment}"`,
      options,
    );
  }

  async numberOfWindowsToBe(count: number, options?: WaitOptions): Promise<true> {
    const driver = this.session.driver;
    return this.until(
      async () => holds(driver.windowHandles().length === count),
      () =>
        `Expected ${String(count)} windows, found ${String(driver.windowHandles().length)}`,
      options,
    );
  }

  // ── Internals ──────────────────────────────────────────────

  private until(
    condition: Condition<true>,
    message: TimeoutMessage,
    options: WaitOptions | undefined,
  ): Promise<true> {
    return waitUntil(condition, this.session.pollSettings(options), message);
  }

  private untilText(
    selector: string,
    predicate: (text: string) => boolean,
    message: string,
    options: WaitOptions | undefined,
  ): Promise<true> {
    return this.until(
      async () => {
        const [first] = await this.find(selector);
        return first === undefined ? undefined : holds(predicate(await first.text()));
      },
      message,
      options,
    );
  }

  private untilSelection(
    selector: string,
    selected: boolean,
    options: WaitOptions | undefined,
  ): Promise<true> {
    return this.until(
      async () => {
        const [first] = await this.find(selector);
        return first === undefined
          ? undefined
          : holds((await first.isSelected()) === selected);
      },
      `${this.describe(selector)} is ${selected ? 'not checked' : 'checked'}`,
      options,
    );
  }

  private find(selector: string): Promise<ElementRef[]> {
    return this.session.driver.query(toEngineSelector(classifySelector(selector)));
  }

  private async resolve(mark: ElementMark): Promise<ElementRef | undefined> {
    if (mark instanceof Element) return mark.ref;
    const [first] = await this.find(mark);
    return first;
  }

  private describe(mark: ElementMark): string {
    if (typeof mark === 'string') {
      return `Element with ${describeLocator(classifySelector(mark))}`;
    }
    return mark.locator
      ? `Element with ${describeLocator(mark.locator)}`
      : 'Element';
  }
}
