import { Keys } from '../browser/keys.js';
import type { Script, Step, StepResult } from '../schema/index.js';
import * as log from '../utils/logger.js';
import type { Session } from './session.js';
import type { WaitOptions } from './wait.js';

// ── Public types ─────────────────────────────────────────────

export interface RunOptions {
  /** Suppress per-step progress on stderr. */
  quiet?: boolean;
}

export interface ScriptRunResult {
  name: string | undefined;
  passed: boolean;
  durationMs: number;
  steps: StepResult[];
}

// ── Runner ───────────────────────────────────────────────────

/**
 * Execute script steps in order against an open session.
 * Stops at the first failing step; the rest are reported as skipped.
 */
export async function runScript(
  session: Session,
  script: Script,
  options: RunOptions = {},
): Promise<ScriptRunResult> {
  const started = Date.now();
  const total = script.steps.length;
  const results: StepResult[] = [];
  let failed = false;

  for (const [index, step] of script.steps.entries()) {
    const description = describeStep(step);

    if (failed) {
      results.push({ index, description, status: 'skipped', durationMs: 0 });
      continue;
    }

    if (options.quiet !== true) log.step(index, total, description);

    const stepStarted = Date.now();
    try {
      await performStep(session, step);
      results.push({
        index,
        description,
        status: 'passed',
        durationMs: Date.now() - stepStarted,
      });
    } catch (err) {
      failed = true;
      const message = err instanceof Error ? err.message : String(err);
      results.push({
        index,
        description,
        status: 'failed',
        durationMs: Date.now() - stepStarted,
        error: message,
      });
      if (options.quiet !== true) {
        log.stepResult(index, total, false, description);
        log.detail(message);
      }
      continue;
    }

    if (options.quiet !== true) {
      log.stepResult(index, total, true, description);
    }
  }

  const skipped = results.filter((r) => r.status === 'skipped').length;
  if (skipped > 0 && options.quiet !== true) {
    log.warn(`Skipped ${String(skipped)} remaining step${skipped === 1 ? '' : 's'}`);
  }

  return {
    name: script.name,
    passed: !failed,
    durationMs: Date.now() - started,
    steps: results,
  };
}

// ── Step dispatch ────────────────────────────────────────────

async function performStep(session: Session, step: Step): Promise<void> {
  const wait: WaitOptions =
    step.timeout !== undefined ? { timeout: step.timeout } : {};

  switch (step.type) {
    case 'goto':
      await session.get(step.value);
      break;

    case 'click': {
      const element = await session.element(step.selector, wait);
      await element.click();
      break;
    }

    case 'type': {
      const element = await session.element(step.selector, wait);
      await element.sendKeys(step.value);
      break;
    }

    case 'press_key': {
      const element = await session.element(step.selector, wait);
      await element.sendKeys(Keys[step.value]);
      break;
    }

    case 'select': {
      const element = await session.element(step.selector, wait);
      await element.selectByValue(step.value);
      break;
    }

    case 'wait':
      await session.element(step.selector, wait);
      break;

    case 'expect_title':
      await session.expect.titleToContain(step.value, wait);
      break;

    case 'expect_url':
      await session.expect.urlToContain(step.value, wait);
      break;

    case 'expect_text':
      await session.expect.elementTextToContain(step.selector, step.value, wait);
      break;

    case 'screenshot':
      await session.screenshot(step.value);
      break;

    case 'accept_alert': {
      const alert = await session.alert(wait);
      if (step.value !== undefined) alert.sendKeys(step.value);
      await alert.accept();
      break;
    }

    case 'dismiss_alert':
      await (await session.alert(wait)).dismiss();
      break;
  }
}

// ── Description helper ───────────────────────────────────────

/** Human-readable one-liner for progress output and reports. */
export function describeStep(step: Step): string {
  if (step.description !== undefined) return step.description;

  switch (step.type) {
    case 'goto':
      return `Go to ${step.value}`;
    case 'click':
      return `Click ${step.selector}`;
    case 'type':
      return `Type "${step.value}" into ${step.selector}`;
    case 'press_key':
      return `Press ${step.value} in ${step.selector}`;
    case 'select':
      return `Select "${step.value}" in ${step.selector}`;
    case 'wait':
      return `Wait for ${step.selector}`;
    case 'expect_title':
      return `Expect title to contain "${step.value}"`;
    case 'expect_url':
      return `Expect URL to contain "${step.value}"`;
    case 'expect_text':
      return `Expect text of ${step.selector} to contain "${step.value}"`;
    case 'screenshot':
      return `Save screenshot to ${step.value}`;
    case 'accept_alert':
      return step.value !== undefined
        ? `Answer "${step.value}" to the dialog`
        : 'Accept the dialog';
    case 'dismiss_alert':
      return 'Dismiss the dialog';
  }
}
