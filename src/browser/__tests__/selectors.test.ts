import {
  classifySelector,
  describeLocator,
  SelectorError,
  toEngineSelector,
} from '../selectors.js';

describe('classifySelector', () => {
  it.each([
    ['/html/body/div', 'xpath'],
    ['//input[@name="q"]', 'xpath'],
    ['#search', 'css'],
    ['input[name="q"]', 'css'],
    ['div > a.result', 'css'],
    ['.//span', 'css'],
    ['(//a)[2]', 'css'],
  ])('classifies %s as %s', (selector, kind) => {
    expect(classifySelector(selector)).toEqual({ kind, value: selector });
  });

  it('keeps surrounding whitespace in the value', () => {
    expect(classifySelector(' #q')).toEqual({ kind: 'css', value: ' #q' });
  });

  it('rejects empty selectors', () => {
    expect(() => classifySelector('')).toThrow(SelectorError);
    expect(() => classifySelector('   ')).toThrow('Invalid selector "   ": selector is empty');
  });

  it('records the offending selector on the error', () => {
    try {
      classifySelector('');
      throw new Error('expected a SelectorError');
    } catch (err) {
      expect(err).toBeInstanceOf(SelectorError);
      if (err instanceof SelectorError) expect(err.selector).toBe('');
    }
  });
});

describe('toEngineSelector', () => {
  it('prefixes the engine name', () => {
    expect(toEngineSelector(classifySelector('//h1'))).toBe('xpath=//h1');
    expect(toEngineSelector(classifySelector('h1.title'))).toBe('css=h1.title');
  });
});

describe('describeLocator', () => {
  it('names the strategy and quotes the value', () => {
    expect(describeLocator({ kind: 'css', value: '#q' })).toBe('css selector "#q"');
    expect(describeLocator({ kind: 'xpath', value: '//h1' })).toBe('xpath "//h1"');
  });
});
