import type { ElementRef } from '../browser/driver.js';
import { parseKeySequence } from '../browser/keys.js';
import type { Locator } from '../browser/selectors.js';
import { locateMany, locateOne } from './locate.js';
import type { Session } from './session.js';
import type { WaitOptions } from './wait.js';

/**
 * A located DOM element.
 *
 * Actions resolve to the element itself so they can be chained:
 *
 *   const box = await session.element('#q');
 *   await box.clear();
 *   await box.sendKeys('husky', Keys.ENTER);
 */
export class Element {
  constructor(
    private readonly session: Session,
    /** Underlying driver handle, for calls this class does not cover. */
    readonly ref: ElementRef,
    /** How the element was found; absent for elements returned by scripts. */
    readonly locator?: Locator,
  ) {}

  // ── Nested lookup ──────────────────────────────────────────

  /** First descendant matching `selector`, waiting like `Session.element`. */
  async element(selector: string, options?: WaitOptions): Promise<Element> {
    const { locator, found } = await locateOne(
      this.ref,
      selector,
      this.session.pollSettings(options),
    );
    return new Element(this.session, found, locator);
  }

  /** Descendants matching `selector` in DOM order; `[]` when none appear. */
  async elements(selector: string, options?: WaitOptions): Promise<Element[]> {
    const { locator, found } = await locateMany(
      this.ref,
      selector,
      this.session.pollSettings(options),
    );
    return found.map((ref) => new Element(this.session, ref, locator));
  }

  // ── State ──────────────────────────────────────────────────

  /** Rendered text, as the user sees it. */
  text(): Promise<string> {
    return this.ref.text();
  }

  getAttribute(name: string): Promise<string | null> {
    return this.ref.attribute(name);
  }

  getProperty(name: string): Promise<unknown> {
    return this.ref.property(name);
  }

  isDisplayed(): Promise<boolean> {
    return this.ref.isVisible();
  }

  isEnabled(): Promise<boolean> {
    return this.ref.isEnabled();
  }

  isSelected(): Promise<boolean> {
    return this.ref.isSelected();
  }

  // ── Actions ────────────────────────────────────────────────

  async click(): Promise<this> {
    await this.ref.click();
    return this;
  }

  /**
   * Type into the element. Values are joined; `Keys` members inside them
   * are pressed as keys.
   */
  async sendKeys(...values: string[]): Promise<this> {
    for (const segment of parseKeySequence(values.join(''))) {
      if (segment.kind === 'text') {
        await this.ref.type(segment.text);
      } else {
        await this.ref.press(segment.key);
      }
    }
    return this;
  }

  async clear(): Promise<this> {
    await this.ref.clear();
    return this;
  }

  /** Submit the form this element belongs to. */
  async submit(): Promise<this> {
    await this.ref.submit();
    return this;
  }

  async hover(): Promise<this> {
    await this.ref.hover();
    return this;
  }

  async doubleClick(): Promise<this> {
    await this.ref.doubleClick();
    return this;
  }

  async rightClick(): Promise<this> {
    await this.ref.rightClick();
    return this;
  }

  async scrollTo(): Promise<this> {
    await this.ref.scrollIntoView();
    return this;
  }

  /** Press on this element, move onto `target`, release. */
  async dragTo(target: Element): Promise<this> {
    await this.ref.dragTo(target.ref);
    return this;
  }

  // ── <select> ───────────────────────────────────────────────

  async selectByIndex(index: number): Promise<this> {
    await this.ref.selectOption({ index });
    return this;
  }

  async selectByValue(value: string): Promise<this> {
    await this.ref.selectOption({ value });
    return this;
  }

  async selectByVisibleText(text: string): Promise<this> {
    await this.ref.selectOption({ label: text });
    return this;
  }

  // ── Capture ────────────────────────────────────────────────

  /** Save a PNG of just this element. */
  async screenshot(path = 'screenshot.png'): Promise<void> {
    await this.ref.screenshot(path);
  }
}
