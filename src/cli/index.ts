/**
 * CLI module: thin wrapper over core.
 * Parses arguments, delegates to core, handles exit codes.
 * No business logic lives here.
 */

export {
  registerRunCommand,
  registerClassifyCommand,
  buildSessionConfig,
  formatClassification,
  EXIT_CODES,
} from './run.js';
export type { RunCommandOptions } from './run.js';
