import { isKeyName, Keys, parseKeySequence } from '../keys.js';

describe('Keys', () => {
  it('uses WebDriver code points', () => {
    expect(Keys.ENTER).toBe('\uE007');
    expect(Keys.TAB).toBe('\uE004');
    expect(Keys.F12).toBe('\uE03C');
  });

  it('can be concatenated into text', () => {
    expect('husky' + Keys.ENTER).toHaveLength(6);
  });
});

describe('isKeyName', () => {
  it('accepts member names only', () => {
    expect(isKeyName('ENTER')).toBe(true);
    expect(isKeyName('ARROW_DOWN')).toBe(true);
    expect(isKeyName('enter')).toBe(false);
    expect(isKeyName('toString')).toBe(false);
  });
});

describe('parseKeySequence', () => {
  it('returns plain text as one run', () => {
    expect(parseKeySequence('Hello World!')).toEqual([
      { kind: 'text', text: 'Hello World!' },
    ]);
  });

  it('splits text and key presses in order', () => {
    expect(parseKeySequence(`husky${Keys.ENTER}`)).toEqual([
      { kind: 'text', text: 'husky' },
      { kind: 'key', key: 'Enter' },
    ]);
  });

  it('handles keys at the start and back to back', () => {
    expect(parseKeySequence(`${Keys.TAB}${Keys.SHIFT}ab${Keys.ARROW_LEFT}`)).toEqual([
      { kind: 'key', key: 'Tab' },
      { kind: 'key', key: 'Shift' },
      { kind: 'text', text: 'ab' },
      { kind: 'key', key: 'ArrowLeft' },
    ]);
  });

  it('maps RETURN to Enter', () => {
    expect(parseKeySequence(Keys.RETURN)).toEqual([{ kind: 'key', key: 'Enter' }]);
  });

  it('returns nothing for empty input', () => {
    expect(parseKeySequence('')).toEqual([]);
  });
});
