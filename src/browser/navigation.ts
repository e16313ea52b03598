// Playwright messages for work cut off because the document it ran in
// was replaced. The new document is usually a poll away.
const NAVIGATION_RACES = [
  'Execution context was destroyed',
  'Cannot find context with specified id',
] as const;

export function isNavigationRace(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  return NAVIGATION_RACES.some((text) => err.message.includes(text));
}

/**
 * Run `read`; when a navigation cuts it off, answer with `onRace` instead.
 * Other errors are rethrown.
 */
export async function duringNavigation<T>(
  read: () => Promise<T>,
  onRace: () => Promise<T>,
): Promise<T> {
  try {
    return await read();
  } catch (err) {
    if (!isNavigationRace(err)) throw err;
    return onRace();
  }
}
