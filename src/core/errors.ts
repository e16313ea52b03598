import type { Locator } from '../browser/selectors.js';
import { describeLocator } from '../browser/selectors.js';

// ── Configuration ─────────────────────────────────────────────

/**
 * Invalid session settings, or a browser that could not be started.
 * Fatal: surfaced from `Session.launch` and never retried.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

// ── Waiting ───────────────────────────────────────────────────

export class TimeoutError extends Error {
  readonly timeout: number;

  constructor(message: string, timeout: number) {
    super(message);
    this.name = 'TimeoutError';
    this.timeout = timeout;
  }
}

/** Locate-one gave up: nothing matched within the wait window. */
export class NotFoundError extends TimeoutError {
  readonly locator: Locator;

  constructor(locator: Locator, timeout: number) {
    super(
      `Could not find element with ${describeLocator(locator)} within ${String(timeout)}ms`,
      timeout,
    );
    this.name = 'NotFoundError';
    this.locator = locator;
  }
}
