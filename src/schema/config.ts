import { z } from 'zod';

import { TIMEOUTS } from '../config/defaults.js';

// ── Browser choice ──────────────────────────────────────────

export const browserNameSchema = z.enum([
  'chromium',
  'chrome',
  'edge',
  'firefox',
  'webkit',
]);

export type BrowserName = z.infer<typeof browserNameSchema>;

// ── Session config ──────────────────────────────────────────

const sessionConfigShape = {
  browser: z.string().trim().toLowerCase().pipe(browserNameSchema),
  headless: z.boolean(),
  timeout: z.number().nonnegative(),
  pollInterval: z.number().positive(),
  userAgent: z.string().min(1).optional(),
  args: z.array(z.string()),
  verbose: z.boolean(),
};

export const sessionConfigSchema = z.object({
  ...sessionConfigShape,
  browser: sessionConfigShape.browser.default('chromium'),
  headless: sessionConfigShape.headless.default(true),
  timeout: sessionConfigShape.timeout.default(TIMEOUTS.DEFAULT_WAIT),
  pollInterval: sessionConfigShape.pollInterval.default(TIMEOUTS.POLL_INTERVAL),
  args: sessionConfigShape.args.default([]),
  verbose: sessionConfigShape.verbose.default(false),
});

/** Fully resolved session settings. */
export type SessionConfig = z.infer<typeof sessionConfigSchema>;

/** What callers pass in; everything is optional. */
export type SessionOptions = z.input<typeof sessionConfigSchema>;

// ── Config file ─────────────────────────────────────────────

export const fileConfigSchema = z.object(sessionConfigShape).partial().strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;
