import type { Page } from 'playwright-core';

import type { ConsoleLevel, LogEntry, LogType } from '../schema/index.js';
import { LIMITS } from '../config/defaults.js';

// ── Public interface ─────────────────────────────────────────

export interface CaptureCollector {
  /** Return accumulated entries of one type and drop them from the buffer. */
  drain(type: LogType): LogEntry[];
}

// ── Factory ──────────────────────────────────────────────────

/**
 * Attach log listeners to a Playwright page.
 * Call once at page creation. Listeners persist for the page's life.
 * The buffer keeps the newest `LIMITS.MAX_LOG_ENTRIES` entries.
 */
export function attachCapture(page: Page): CaptureCollector {
  let entries: LogEntry[] = [];

  const push = (entry: LogEntry): void => {
    entries.push(entry);
    if (entries.length > LIMITS.MAX_LOG_ENTRIES) {
      entries.shift();
    }
  };

  page.on('console', (msg) => {
    push({
      type: 'console',
      timestamp: Date.now(),
      level: consoleLevel(msg.type()),
      text: msg.text(),
    });
  });

  page.on('response', (response) => {
    if (response.status() < 400) return;

    push({
      type: 'network',
      timestamp: Date.now(),
      url: response.url(),
      status: response.status(),
      statusText: response.statusText(),
      method: response.request().method(),
    });
  });

  page.on('pageerror', (error) => {
    push({ type: 'pageerror', timestamp: Date.now(), message: error.message });
  });

  return {
    drain(type: LogType): LogEntry[] {
      const drained = entries.filter((entry) => entry.type === type);
      entries = entries.filter((entry) => entry.type !== type);
      return drained;
    },
  };
}

function consoleLevel(type: string): ConsoleLevel {
  if (type === 'error') return 'error';
  if (type === 'warning') return 'warn';
  return 'info';
}
