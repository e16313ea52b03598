import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { Keys } from '../browser/keys.js';
import { Session } from '../core/session.js';

// Drives a real browser: `npm run test:e2e`, after
// `npx playwright-core install chromium`.

const fixture = pathToFileURL(path.join(__dirname, 'fixtures', 'search.html')).toString();

describe('Session against chromium', () => {
  let session: Session;

  beforeAll(async () => {
    session = await Session.launch({ browser: 'chromium', timeout: 5_000, pollInterval: 50 });
  }, 30_000);

  afterAll(async () => {
    await session.quit();
  });

  beforeEach(async () => {
    await session.get(fixture);
  });

  it('types, presses Enter and waits for results', async () => {
    const box = await session.element('input[name="q"]');
    await box.sendKeys('husky', Keys.ENTER);

    await expect(session.expect.titleToContain('husky')).resolves.toBe(true);
    const items = await session.elements('//ul[@id="results"]/li');
    expect(await Promise.all(items.map((item) => item.text()))).toEqual([
      'husky 1',
      'husky 2',
      'husky 3',
    ]);
  });

  it('selects options and checks boxes', async () => {
    await (await session.element('#country')).selectByVisibleText('Netherlands');
    expect(await (await session.element('#country')).getProperty('value')).toBe('nl');

    await (await session.element('#terms')).click();
    await session.expect.elementToBeChecked('#terms');
  });

  it('answers a prompt opened by a click', async () => {
    // The click returns while the prompt is still open.
    await (await session.element('#ask')).click();
    await (await session.alert()).sendKeys('Ada').accept();

    await session.expect.elementAttributeToContain('body', 'data-answer', 'Ada');
  });

  it('returns an empty list when nothing matches', async () => {
    expect(await session.elements('.absent', { timeout: 200 })).toEqual([]);
  });
});
