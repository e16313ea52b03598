/**
 * Special keys for `sendKeys`.
 *
 * Values are the WebDriver private-use code points, so a key can be
 * concatenated into ordinary text: `sendKeys('husky' + Keys.ENTER)`.
 */
export const Keys = {
  BACKSPACE: '\uE003',
  TAB: '\uE004',
  RETURN: '\uE006',
  ENTER: '\uE007',
  SHIFT: '\uE008',
  CONTROL: '\uE009',
  ALT: '\uE00A',
  ESCAPE: '\uE00C',
  SPACE: '\uE00D',
  PAGE_UP: '\uE00E',
  PAGE_DOWN: '\uE00F',
  END: '\uE010',
  HOME: '\uE011',
  ARROW_LEFT: '\uE012',
  ARROW_UP: '\uE013',
  ARROW_RIGHT: '\uE014',
  ARROW_DOWN: '\uE015',
  INSERT: '\uE016',
  DELETE: '\uE017',
  F1: '\uE031',
  F2: '\uE032',
  F3: '\uE033',
  F4: '\uE034',
  F5: '\uE035',
  F6: '\uE036',
  F7: '\uE037',
  F8: '\uE038',
  F9: '\uE039',
  F10: '\uE03A',
  F11: '\uE03B',
  F12: '\uE03C',
  META: '\uE03D',
} as const;

export type KeyName = keyof typeof Keys;

// Playwright `keyboard.press` names, by code point.
const PRESS_NAMES: ReadonlyMap<string, string> = new Map([
  [Keys.BACKSPACE, 'Backspace'],
  [Keys.TAB, 'Tab'],
  [Keys.RETURN, 'Enter'],
  [Keys.ENTER, 'Enter'],
  [Keys.SHIFT, 'Shift'],
  [Keys.CONTROL, 'Control'],
  [Keys.ALT, 'Alt'],
  [Keys.ESCAPE, 'Escape'],
  [Keys.SPACE, 'Space'],
  [Keys.PAGE_UP, 'PageUp'],
  [Keys.PAGE_DOWN, 'PageDown'],
  [Keys.END, 'End'],
  [Keys.HOME, 'Home'],
  [Keys.ARROW_LEFT, 'ArrowLeft'],
  [Keys.ARROW_UP, 'ArrowUp'],
  [Keys.ARROW_RIGHT, 'ArrowRight'],
  [Keys.ARROW_DOWN, 'ArrowDown'],
  [Keys.INSERT, 'Insert'],
  [Keys.DELETE, 'Delete'],
  [Keys.F1, 'F1'],
  [Keys.F2, 'F2'],
  [Keys.F3, 'F3'],
  [Keys.F4, 'F4'],
  [Keys.F5, 'F5'],
  [Keys.F6, 'F6'],
  [Keys.F7, 'F7'],
  [Keys.F8, 'F8'],
  [Keys.F9, 'F9'],
  [Keys.F10, 'F10'],
  [Keys.F11, 'F11'],
  [Keys.F12, 'F12'],
  [Keys.META, 'Meta'],
]);

export type KeySegment =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'key'; readonly key: string };

export function isKeyName(name: string): name is KeyName {
  return Object.hasOwn(Keys, name);
}

/**
 * Split input into literal text runs and key presses.
 * Modifiers are pressed and released, not held for the following text.
 */
export function parseKeySequence(input: string): KeySegment[] {
  const segments: KeySegment[] = [];
  let text = '';

  for (const char of input) {
    const key = PRESS_NAMES.get(char);
    if (key === undefined) {
      text += char;
      continue;
    }
    if (text.length > 0) {
      segments.push({ kind: 'text', text });
      text = '';
    }
    segments.push({ kind: 'key', key });
  }

  if (text.length > 0) {
    segments.push({ kind: 'text', text });
  }

  return segments;
}
