import { EventEmitter } from 'node:events';

import { DialogGate } from '../dialogs.js';

interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
  reject: (err: Error) => void;
}

function deferred(): Deferred {
  let resolve: () => void = () => undefined;
  let reject: (err: Error) => void = () => undefined;
  const promise = new Promise<void>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('DialogGate.run', () => {
  it('settles with the action when no dialog opens', async () => {
    const page = new EventEmitter();
    const gate = new DialogGate(page);
    const click = deferred();

    const pending = gate.run(click.promise);
    expect(page.listenerCount('dialog')).toBe(1);
    click.resolve();

    await expect(pending).resolves.toBeUndefined();
    expect(page.listenerCount('dialog')).toBe(0);
    expect(gate.isInterrupted).toBe(false);
  });

  it('rejects with the action', async () => {
    const page = new EventEmitter();
    const gate = new DialogGate(page);

    await expect(gate.run(Promise.reject(new Error('element detached')))).rejects.toThrow(
      'element detached',
    );
    expect(page.listenerCount('dialog')).toBe(0);
  });

  it('resolves as soon as a dialog opens', async () => {
    const page = new EventEmitter();
    const gate = new DialogGate(page);
    const click = deferred();

    const pending = gate.run(click.promise);
    page.emit('dialog');

    await expect(pending).resolves.toBeUndefined();
    expect(gate.isInterrupted).toBe(true);
    expect(page.listenerCount('dialog')).toBe(0);
  });
});

describe('DialogGate.resume', () => {
  it('does nothing when no action was interrupted', async () => {
    const gate = new DialogGate(new EventEmitter());
    await expect(gate.resume()).resolves.toBeUndefined();
  });

  it('waits for the interrupted action to finish', async () => {
    const page = new EventEmitter();
    const gate = new DialogGate(page);
    const click = deferred();
    const pending = gate.run(click.promise);
    page.emit('dialog');
    await pending;

    const resumed = gate.resume();
    expect(gate.isInterrupted).toBe(false);
    click.resolve();

    await expect(resumed).resolves.toBeUndefined();
    expect(page.listenerCount('dialog')).toBe(0);
  });

  it('surfaces a failure of the interrupted action', async () => {
    const page = new EventEmitter();
    const gate = new DialogGate(page);
    const click = deferred();
    const pending = gate.run(click.promise);
    page.emit('dialog');
    await pending;

    click.reject(new Error('target closed'));

    await expect(gate.resume()).rejects.toThrow('target closed');
  });

  it('stops again at a second dialog', async () => {
    const page = new EventEmitter();
    const gate = new DialogGate(page);
    const click = deferred();
    const pending = gate.run(click.promise);
    page.emit('dialog');
    await pending;

    const resumed = gate.resume();
    page.emit('dialog');

    await expect(resumed).resolves.toBeUndefined();
    expect(gate.isInterrupted).toBe(true);

    click.resolve();
    await expect(gate.resume()).resolves.toBeUndefined();
    expect(gate.isInterrupted).toBe(false);
  });
});
