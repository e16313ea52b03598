import { TimeoutError } from '../errors.js';
import { holds, waitUntil } from '../wait.js';

describe('waitUntil', () => {
  const settings = { timeout: 100, interval: 20 };

  it('resolves with the first defined value', async () => {
    let calls = 0;
    const value = await waitUntil(
      async () => (++calls >= 3 ? 'ready' : undefined),
      settings,
      'never',
    );
    expect(value).toBe('ready');
    expect(calls).toBe(3);
  });

  it('treats falsy values other than undefined as results', async () => {
    await expect(waitUntil(async () => 0, settings, 'never')).resolves.toBe(0);
    await expect(waitUntil(async () => false, settings, 'never')).resolves.toBe(false);
  });

  it('throws TimeoutError after the full timeout', async () => {
    const started = Date.now();
    const error = await waitUntil(async () => undefined, settings, 'still waiting').catch(
      (err: unknown) => err,
    );

    const elapsed = Date.now() - started;
    expect(elapsed).toBeGreaterThanOrEqual(100);
    // One interval of overshoot plus scheduling slack.
    expect(elapsed).toBeLessThan(100 + 20 + 100);
    expect(error).toBeInstanceOf(TimeoutError);
    if (error instanceof TimeoutError) {
      expect(error.message).toBe('still waiting');
      expect(error.timeout).toBe(100);
    }
  });

  it('builds the message lazily', async () => {
    let state = 'initial';
    const pending = waitUntil(
      async () => {
        state = 'final';
        return undefined;
      },
      { timeout: 0, interval: 10 },
      async () => `state was ${state}`,
    );
    await expect(pending).rejects.toThrow('state was final');
  });

  it('checks the condition once with a zero timeout', async () => {
    let calls = 0;
    await expect(
      waitUntil(
        async () => {
          calls += 1;
          return undefined;
        },
        { timeout: 0, interval: 10 },
        'gone',
      ),
    ).rejects.toThrow(TimeoutError);
    expect(calls).toBe(1);
  });

  it('propagates errors thrown by the condition without retrying', async () => {
    let calls = 0;
    await expect(
      waitUntil(
        async () => {
          calls += 1;
          throw new Error('boom');
        },
        settings,
        'never',
      ),
    ).rejects.toThrow('boom');
    expect(calls).toBe(1);
  });
});

describe('holds', () => {
  it('maps booleans to true or undefined', () => {
    expect(holds(true)).toBe(true);
    expect(holds(false)).toBeUndefined();
  });
});
