/**
 * wrightly: a terse Playwright wrapper.
 *
 *   import { Session, Keys } from 'wrightly';
 *
 *   const session = await Session.launch();
 *   await session.get('https://example.com');
 *   const box = await session.element('input[name="q"]');
 *   await box.sendKeys('Hello World!', Keys.ENTER);
 *   await session.quit();
 */

export * from './core/index.js';
export * from './browser/index.js';
export {
  loadConfigFile,
  loadEnvConfig,
  parseSessionConfig,
  resolveSessionConfig,
  TIMEOUTS,
} from './config/index.js';
export type {
  BrowserName,
  Cookie,
  LogEntry,
  LogType,
  Script,
  SessionConfig,
  SessionOptions,
  Step,
  StepResult,
} from './schema/index.js';
