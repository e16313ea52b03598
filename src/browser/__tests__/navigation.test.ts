import { duringNavigation, isNavigationRace } from '../navigation.js';

describe('isNavigationRace', () => {
  it.each([
    'elementHandle.$$: Execution context was destroyed, most likely because of a navigation',
    'page.title: Cannot find context with specified id',
  ])('recognises %s', (message) => {
    expect(isNavigationRace(new Error(message))).toBe(true);
  });

  it('ignores other errors and non-errors', () => {
    expect(isNavigationRace(new Error('Target page, context or browser has been closed'))).toBe(
      false,
    );
    expect(isNavigationRace('Execution context was destroyed')).toBe(false);
    expect(isNavigationRace(undefined)).toBe(false);
  });
});

describe('duringNavigation', () => {
  it('returns what read returns', async () => {
    const fallback = jest.fn(async () => 'fallback');
    await expect(duringNavigation(async () => 'read', fallback)).resolves.toBe('read');
    expect(fallback).not.toHaveBeenCalled();
  });

  it('falls back when a navigation cuts the read off', async () => {
    const read = async (): Promise<string[]> => {
      throw new Error('frame.$$: Execution context was destroyed, most likely because of a navigation');
    };
    await expect(duringNavigation(read, async () => [])).resolves.toEqual([]);
  });

  it('rethrows anything else', async () => {
    const read = async (): Promise<string[]> => {
      throw new Error('Target closed');
    };
    await expect(duringNavigation(read, async () => [])).rejects.toThrow('Target closed');
  });
});
