import { z } from 'zod';

// ── Log types ────────────────────────────────────────────────

export const logTypeSchema = z.enum(['console', 'network', 'pageerror']);

export type LogType = z.infer<typeof logTypeSchema>;

export const LOG_TYPES: readonly LogType[] = logTypeSchema.options;

// ── Console entry ────────────────────────────────────────────

export const consoleLevelSchema = z.enum(['error', 'warn', 'info']);

export type ConsoleLevel = z.infer<typeof consoleLevelSchema>;

export const consoleEntrySchema = z.object({
  type: z.literal('console'),
  timestamp: z.number().int(),
  level: consoleLevelSchema,
  text: z.string(),
});

export type ConsoleEntry = z.infer<typeof consoleEntrySchema>;

// ── Network failure ──────────────────────────────────────────

export const networkFailureSchema = z.object({
  type: z.literal('network'),
  timestamp: z.number().int(),
  url: z.string(),
  status: z.number().int(),
  statusText: z.string(),
  method: z.string(),
});

export type NetworkFailure = z.infer<typeof networkFailureSchema>;

// ── Page error ───────────────────────────────────────────────

export const pageErrorEntrySchema = z.object({
  type: z.literal('pageerror'),
  timestamp: z.number().int(),
  message: z.string(),
});

export type PageErrorEntry = z.infer<typeof pageErrorEntrySchema>;

// ── Any entry ────────────────────────────────────────────────

export const logEntrySchema = z.discriminatedUnion('type', [
  consoleEntrySchema,
  networkFailureSchema,
  pageErrorEntrySchema,
]);

export type LogEntry = z.infer<typeof logEntrySchema>;
