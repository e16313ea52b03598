/**
 * Configuration module.
 * Resolves session settings from defaults, env, config files and call options.
 * Zod-validated; invalid settings raise ConfigurationError.
 */

export { TIMEOUTS, LIMITS, ENV_KEYS, DEFAULT_CONFIG_PATH } from './defaults.js';
export {
  loadConfigFile,
  loadEnvConfig,
  parseSessionConfig,
  resolveSessionConfig,
  formatIssues,
} from './loader.js';
export type { ConfigLayer } from './loader.js';
