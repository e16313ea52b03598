import { classifySelector, describeLocator, toEngineSelector } from '../browser/selectors.js';
import type { Locator } from '../browser/selectors.js';
import type { ElementRef, Queryable } from '../browser/driver.js';
import { NotFoundError, TimeoutError } from './errors.js';
import { waitUntil } from './wait.js';
import type { PollSettings } from './wait.js';

export interface Located<T> {
  locator: Locator;
  found: T;
}

/** Wait for the first match inside `scope`; `NotFoundError` when none appears. */
export async function locateOne(
  scope: Queryable,
  selector: string,
  settings: PollSettings,
): Promise<Located<ElementRef>> {
  const locator = classifySelector(selector);
  const engineSelector = toEngineSelector(locator);

  try {
    const found = await waitUntil(
      async () => (await scope.query(engineSelector))[0],
      settings,
      `Could not find element with ${describeLocator(locator)}`,
    );
    return { locator, found };
  } catch (err) {
    if (err instanceof TimeoutError) {
      throw new NotFoundError(locator, settings.timeout);
    }
    throw err;
  }
}

/**
 * Wait until at least one element matches inside `scope`, then return every
 * match in DOM order. Nothing matching within the window yields `[]`.
 */
export async function locateMany(
  scope: Queryable,
  selector: string,
  settings: PollSettings,
): Promise<Located<ElementRef[]>> {
  const locator = classifySelector(selector);
  const engineSelector = toEngineSelector(locator);

  try {
    const found = await waitUntil(
      async () => {
        const matches = await scope.query(engineSelector);
        return matches.length > 0 ? matches : undefined;
      },
      settings,
      `Could not find elements with ${describeLocator(locator)}`,
    );
    return { locator, found };
  } catch (err) {
    if (err instanceof TimeoutError) {
      return { locator, found: [] };
    }
    throw err;
  }
}
