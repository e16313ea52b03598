/**
 * Default configuration values.
 * All values are overridable per session, and waits per call.
 */

export const TIMEOUTS = {
  DEFAULT_WAIT: 10_000,
  POLL_INTERVAL: 500,
} as const;

export const LIMITS = {
  MAX_LOG_ENTRIES: 500,
} as const;

export const ENV_KEYS = {
  BROWSER: 'WRIGHTLY_BROWSER',
  HEADLESS: 'WRIGHTLY_HEADLESS',
  TIMEOUT: 'WRIGHTLY_TIMEOUT',
  POLL_INTERVAL: 'WRIGHTLY_POLL_INTERVAL',
} as const;

export const DEFAULT_CONFIG_PATH = '.wrightly.yaml';
