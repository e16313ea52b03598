import { z } from 'zod';

export const sameSiteSchema = z.enum(['Strict', 'Lax', 'None']);

/**
 * A cookie as read from or written to the browser context.
 * Either `url`, or `domain` plus `path`, locates it when adding.
 */
export const cookieSchema = z.object({
  name: z.string().min(1),
  value: z.string(),
  url: z.string().url().optional(),
  domain: z.string().optional(),
  path: z.string().optional(),
  expires: z.number().optional(),
  httpOnly: z.boolean().optional(),
  secure: z.boolean().optional(),
  sameSite: sameSiteSchema.optional(),
});

export type Cookie = z.infer<typeof cookieSchema>;

export const cookieListSchema = z.array(cookieSchema);

export function parseCookieJSON(raw: string): Cookie[] {
  const parsed: unknown = JSON.parse(raw);
  return cookieListSchema.parse(parsed);
}
