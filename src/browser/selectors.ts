// ── Error ─────────────────────────────────────────────────────

export class SelectorError extends Error {
  readonly selector: string;

  constructor(selector: string, reason: string) {
    super(`Invalid selector ${JSON.stringify(selector)}: ${reason}`);
    this.name = 'SelectorError';
    this.selector = selector;
  }
}

// ── Locator ───────────────────────────────────────────────────

export type LocatorKind = 'css' | 'xpath';

export type Locator =
  | { readonly kind: 'css'; readonly value: string }
  | { readonly kind: 'xpath'; readonly value: string };

// ── Classifier ────────────────────────────────────────────────

/**
 * Decides how a selector string is located.
 *
 *   "/html/body", "//div[@id]"  → xpath
 *   anything else               → css
 *
 * Pure string rule: nothing is evaluated in the page, so the result
 * does not depend on which frame or document is current.
 */
export function classifySelector(selector: string): Locator {
  if (selector.trim().length === 0) {
    throw new SelectorError(selector, 'selector is empty');
  }

  return selector.startsWith('/')
    ? { kind: 'xpath', value: selector }
    : { kind: 'css', value: selector };
}

/** Playwright selector-engine form, e.g. `xpath=//h1`. */
export function toEngineSelector(locator: Locator): string {
  return `${locator.kind}=${locator.value}`;
}

// ── Description helper ────────────────────────────────────────

/** Human-readable one-liner describing the locator for errors and logs. */
export function describeLocator(locator: Locator): string {
  switch (locator.kind) {
    case 'css':
      return `css selector "${locator.value}"`;
    case 'xpath':
      return `xpath "${locator.value}"`;
  }
}
