/**
 * Browser module.
 * The driver port and its Playwright implementation, plus selectors and keys.
 * No waiting happens here; the core module owns the wait policy.
 */

export {
  classifySelector,
  toEngineSelector,
  describeLocator,
  SelectorError,
} from './selectors.js';
export type { Locator, LocatorKind } from './selectors.js';
export { Keys, parseKeySequence, isKeyName } from './keys.js';
export type { KeyName, KeySegment } from './keys.js';
export { launchPlaywrightDriver } from './playwright.js';
export { attachCapture } from './capture.js';
export type { CaptureCollector } from './capture.js';
export type {
  DriverAdapter,
  DriverLauncher,
  ElementRef,
  DialogRef,
  DialogType,
  OptionChoice,
  Queryable,
  ScriptResult,
  ViewportSize,
} from './driver.js';
