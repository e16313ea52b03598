import { z } from 'zod';

import { isKeyName } from '../browser/keys.js';

// ── Step type discriminator ───────────────────────────────────

export const stepTypeSchema = z.enum([
  'goto',
  'click',
  'type',
  'press_key',
  'select',
  'wait',
  'expect_title',
  'expect_url',
  'expect_text',
  'screenshot',
  'accept_alert',
  'dismiss_alert',
]);

export type StepType = z.infer<typeof stepTypeSchema>;

// ── Individual step schemas ───────────────────────────────────

const baseFields = {
  description: z.string().min(1).optional(),
  /** Overrides the session's default wait for this step, in ms. */
  timeout: z.number().int().nonnegative().optional(),
};

const selector = z.string().trim().min(1);

export const gotoStepSchema = z.object({
  ...baseFields,
  type: z.literal('goto'),
  value: z.string().min(1),
});

export const clickStepSchema = z.object({
  ...baseFields,
  type: z.literal('click'),
  selector,
});

export const typeStepSchema = z.object({
  ...baseFields,
  type: z.literal('type'),
  selector,
  value: z.string(),
});

export const pressKeyStepSchema = z.object({
  ...baseFields,
  type: z.literal('press_key'),
  selector,
  value: z.string().refine(isKeyName, {
    message: 'Unknown key name (expected e.g. ENTER, TAB, ESCAPE)',
  }),
});

export const selectStepSchema = z.object({
  ...baseFields,
  type: z.literal('select'),
  selector,
  value: z.string(),
});

export const waitStepSchema = z.object({
  ...baseFields,
  type: z.literal('wait'),
  selector,
});

export const expectTitleStepSchema = z.object({
  ...baseFields,
  type: z.literal('expect_title'),
  value: z.string().min(1),
});

export const expectUrlStepSchema = z.object({
  ...baseFields,
  type: z.literal('expect_url'),
  value: z.string().min(1),
});

export const expectTextStepSchema = z.object({
  ...baseFields,
  type: z.literal('expect_text'),
  selector,
  value: z.string().min(1),
});

export const screenshotStepSchema = z.object({
  ...baseFields,
  type: z.literal('screenshot'),
  value: z.string().min(1).default('screenshot.png'),
});

/** `value` is typed into a prompt before accepting. */
export const acceptAlertStepSchema = z.object({
  ...baseFields,
  type: z.literal('accept_alert'),
  value: z.string().optional(),
});

export const dismissAlertStepSchema = z.object({
  ...baseFields,
  type: z.literal('dismiss_alert'),
});

// ── Union schema ──────────────────────────────────────────────

export const stepSchema = z.discriminatedUnion('type', [
  gotoStepSchema,
  clickStepSchema,
  typeStepSchema,
  pressKeyStepSchema,
  selectStepSchema,
  waitStepSchema,
  expectTitleStepSchema,
  expectUrlStepSchema,
  expectTextStepSchema,
  screenshotStepSchema,
  acceptAlertStepSchema,
  dismissAlertStepSchema,
]);

export type Step = z.infer<typeof stepSchema>;

// ── Script ────────────────────────────────────────────────────

export const scriptSchema = z.object({
  name: z.string().min(1).optional(),
  steps: z.array(stepSchema).min(1),
});

export type Script = z.infer<typeof scriptSchema>;

// ── Results ───────────────────────────────────────────────────

export const stepStatusSchema = z.enum(['passed', 'failed', 'skipped']);

export type StepStatus = z.infer<typeof stepStatusSchema>;

export const stepResultSchema = z.object({
  index: z.number().int().nonnegative(),
  description: z.string(),
  status: stepStatusSchema,
  durationMs: z.number().nonnegative(),
  error: z.string().optional(),
});

export type StepResult = z.infer<typeof stepResultSchema>;

// ── Parser ────────────────────────────────────────────────────

export function parseScript(data: unknown): Script {
  return scriptSchema.parse(data);
}
