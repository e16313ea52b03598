import { setTimeout as sleep } from 'node:timers/promises';

import { TimeoutError } from './errors.js';

// ── Types ─────────────────────────────────────────────────────

/** Per-call override of the session's default wait. */
export interface WaitOptions {
  /** Milliseconds. */
  timeout?: number;
}

export interface PollSettings {
  timeout: number;
  interval: number;
}

export type TimeoutMessage = string | (() => string | Promise<string>);

/** Resolves `undefined` while the condition does not hold yet. */
export type Condition<T> = () => Promise<T | undefined>;

// ── Poller ────────────────────────────────────────────────────

/**
 * Poll `condition` until it yields a value, or fail with `TimeoutError`
 * once `settings.timeout` has elapsed.
 *
 * The condition always runs at least once, also with a zero timeout.
 * Errors thrown by the condition are not retried.
 */
export async function waitUntil<T>(
  condition: Condition<T>,
  settings: PollSettings,
  message: TimeoutMessage,
): Promise<T> {
  const deadline = Date.now() + settings.timeout;

  for (;;) {
    const value = await condition();
    if (value !== undefined) return value;

    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      const text = typeof message === 'string' ? message : await message();
      throw new TimeoutError(text, settings.timeout);
    }

    await sleep(Math.min(settings.interval, remaining));
  }
}

/** `true` when the predicate holds, `undefined` otherwise. */
export function holds(value: boolean): true | undefined {
  return value ? true : undefined;
}
