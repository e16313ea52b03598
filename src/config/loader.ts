import type { ZodError } from 'zod';

import { fileConfigSchema, sessionConfigSchema } from '../schema/config.js';
import type { FileConfig, SessionConfig } from '../schema/config.js';
import { ConfigurationError } from '../core/errors.js';
import { isMissingFile, readStructuredFile } from '../utils/fs.js';
import { ENV_KEYS } from './defaults.js';

/** One source of settings; later layers override earlier ones. */
export type ConfigLayer = Readonly<Record<string, unknown>>;

// ── Validation ──────────────────────────────────────────────

export function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    })
    .join('; ');
}

/** Validate session settings, filling in defaults. */
export function parseSessionConfig(input: unknown): SessionConfig {
  const result = sessionConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid session config: ${formatIssues(result.error)}`,
    );
  }
  return result.data;
}

/**
 * Merge layers left to right and validate the result.
 * `undefined` values never override an earlier layer.
 */
export function resolveSessionConfig(...layers: ConfigLayer[]): SessionConfig {
  const merged: Record<string, unknown> = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) merged[key] = value;
    }
  }
  return parseSessionConfig(merged);
}

// ── Config file ─────────────────────────────────────────────

/**
 * Load and validate a `.wrightly.yaml` (or JSON) config file.
 * With `optional`, a missing file yields an empty layer.
 */
export async function loadConfigFile(
  configPath: string,
  options: { optional?: boolean } = {},
): Promise<FileConfig> {
  let parsed: unknown;
  try {
    parsed = await readStructuredFile(configPath);
  } catch (err) {
    if (options.optional === true && isMissingFile(err)) return {};
    throw new ConfigurationError(`Could not load config file ${configPath}`, {
      cause: err,
    });
  }

  const result = fileConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid config file ${configPath}: ${formatIssues(result.error)}`,
    );
  }
  return result.data;
}

// ── Environment ─────────────────────────────────────────────

function parseFlag(raw: string): boolean | string {
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes'].includes(normalized)) return true;
  if (['0', 'false', 'no'].includes(normalized)) return false;
  // Left as-is so validation reports it.
  return raw;
}

/** Session settings from `WRIGHTLY_*` variables. Unset variables are omitted. */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigLayer {
  const layer: Record<string, unknown> = {};

  const browser = env[ENV_KEYS.BROWSER];
  if (browser) layer['browser'] = browser;

  const headless = env[ENV_KEYS.HEADLESS];
  if (headless) layer['headless'] = parseFlag(headless);

  const timeout = env[ENV_KEYS.TIMEOUT];
  if (timeout) layer['timeout'] = Number(timeout);

  const pollInterval = env[ENV_KEYS.POLL_INTERVAL];
  if (pollInterval) layer['pollInterval'] = Number(pollInterval);

  return layer;
}
