/**
 * Core module: the session facade.
 * Short calls with default explicit waits.
 * All browser work is delegated to the driver.
 */

export { Session } from './session.js';
export type { CookieFileOutcome } from './session.js';
export { Element } from './element.js';
export { Expect } from './expect.js';
export type { ElementMark } from './expect.js';
export { Alert } from './alert.js';
export { ConfigurationError, NotFoundError, TimeoutError } from './errors.js';
export { waitUntil } from './wait.js';
export type { WaitOptions, PollSettings, Condition } from './wait.js';
export { runScript, describeStep } from './runner.js';
export type { RunOptions, ScriptRunResult } from './runner.js';
