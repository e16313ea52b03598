import { parseScript } from '../../schema/index.js';
import { describeStep, runScript } from '../runner.js';
import { Session } from '../session.js';
import { FakeDriver, FakeElement } from './fake-driver.js';

function open(): { driver: FakeDriver; session: Session } {
  const driver = new FakeDriver();
  return { driver, session: Session.attach(driver, { timeout: 50, pollInterval: 10 }) };
}

describe('runScript', () => {
  it('runs every step in order', async () => {
    const { driver, session } = open();
    const box = new FakeElement('q');
    const country = new FakeElement('country');
    driver.dom.set('css=input[name="q"]', [box]);
    driver.dom.set('css=select#country', [country]);
    driver.dom.set('xpath=//h1', [new FakeElement('h1', { text: 'Results for husky' })]);
    driver.pageTitle = 'husky - Search';

    const script = parseScript({
      name: 'search',
      steps: [
        { type: 'goto', value: 'https://example.test/search' },
        { type: 'type', selector: 'input[name="q"]', value: 'husky' },
        { type: 'press_key', selector: 'input[name="q"]', value: 'ENTER' },
        { type: 'select', selector: 'select#country', value: 'nl' },
        { type: 'wait', selector: '//h1' },
        { type: 'expect_title', value: 'husky' },
        { type: 'expect_url', value: '/search' },
        { type: 'expect_text', selector: '//h1', value: 'Results' },
        { type: 'click', selector: 'input[name="q"]' },
        { type: 'screenshot', value: 'results.png' },
      ],
    });

    const result = await runScript(session, script, { quiet: true });

    expect(result.name).toBe('search');
    expect(result.passed).toBe(true);
    expect(result.steps.map((step) => step.status)).toEqual(Array(10).fill('passed'));
    expect(box.actions).toEqual(['type:husky', 'press:Enter', 'click']);
    expect(country.actions).toEqual(['select:{"value":"nl"}']);
    expect(driver.history).toEqual(['goto:https://example.test/search']);
    expect(driver.screenshots).toEqual(['results.png']);
  });

  it('stops at the first failure and skips the rest', async () => {
    const { session } = open();
    const script = parseScript({
      steps: [
        { type: 'goto', value: 'https://example.test' },
        { type: 'click', selector: '#missing', timeout: 0 },
        { type: 'expect_title', value: 'never' },
      ],
    });

    const result = await runScript(session, script, { quiet: true });

    expect(result.passed).toBe(false);
    expect(result.steps.map((step) => step.status)).toEqual(['passed', 'failed', 'skipped']);
    expect(result.steps[1]?.error).toBe(
      'Could not find element with css selector "#missing" within 0ms',
    );
    expect(result.steps[2]).toEqual({
      index: 2,
      description: 'Expect title to contain "never"',
      status: 'skipped',
      durationMs: 0,
    });
  });
});

describe('runScript dialog steps', () => {
  it('answers a prompt and accepts it', async () => {
    const { driver, session } = open();
    const prompt = driver.openDialog('prompt', 'Your name?');

    const result = await runScript(
      session,
      parseScript({ steps: [{ type: 'accept_alert', value: 'Ada' }] }),
      { quiet: true },
    );

    expect(result.passed).toBe(true);
    expect(prompt.promptText).toBe('Ada');
    expect(prompt.outcome).toBe('accepted');
    expect(driver.dialogs).toEqual([]);
  });

  it('dismisses a confirm', async () => {
    const { driver, session } = open();
    const confirm = driver.openDialog('confirm', 'Leave page?');

    const result = await runScript(
      session,
      parseScript({ steps: [{ type: 'dismiss_alert' }] }),
      { quiet: true },
    );

    expect(result.passed).toBe(true);
    expect(confirm.promptText).toBeUndefined();
    expect(confirm.outcome).toBe('dismissed');
  });

  it('fails when no dialog opens', async () => {
    const { session } = open();

    const result = await runScript(
      session,
      parseScript({ steps: [{ type: 'accept_alert', timeout: 20 }] }),
      { quiet: true },
    );

    expect(result.passed).toBe(false);
    expect(result.steps[0]?.error).toBe('No alerts are present');
  });
});

describe('describeStep', () => {
  it('prefers an explicit description', () => {
    expect(describeStep({ type: 'click', selector: '#go', description: 'Submit form' })).toBe(
      'Submit form',
    );
  });

  it.each([
    [{ type: 'goto', value: 'https://example.test' }, 'Go to https://example.test'],
    [{ type: 'type', selector: '#q', value: 'husky' }, 'Type "husky" into #q'],
    [{ type: 'press_key', selector: '#q', value: 'TAB' }, 'Press TAB in #q'],
    [{ type: 'select', selector: '#c', value: 'nl' }, 'Select "nl" in #c'],
    [{ type: 'wait', selector: '//h1' }, 'Wait for //h1'],
    [{ type: 'expect_url', value: '/done' }, 'Expect URL to contain "/done"'],
    [{ type: 'expect_text', selector: 'h1', value: 'Hi' }, 'Expect text of h1 to contain "Hi"'],
    [{ type: 'screenshot' }, 'Save screenshot to screenshot.png'],
    [{ type: 'accept_alert', value: 'Ada' }, 'Answer "Ada" to the dialog'],
    [{ type: 'accept_alert' }, 'Accept the dialog'],
    [{ type: 'dismiss_alert' }, 'Dismiss the dialog'],
  ])('describes %j', (raw, expected) => {
    const [step] = parseScript({ steps: [raw] }).steps;
    expect(step && describeStep(step)).toBe(expected);
  });
});
