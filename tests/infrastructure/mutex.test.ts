import { Mutex } from '../../src/infrastructure/connection/index.js';

describe('Mutex', () => {
  it('runs critical sections one at a time in arrival order', async () => {
    const mutex = new Mutex();
    const order: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = mutex.runExclusive(async () => {
      order.push('first:start');
      await gate;
      order.push('first:end');
    });
    const second = mutex.runExclusive(async () => {
      order.push('second');
    });

    expect(order).toEqual(['first:start']);
    release();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
    await expect(mutex.runExclusive(async () => 'free')).resolves.toBe('free');
  });

  it('releases the lock when the section throws', async () => {
    const mutex = new Mutex();

    await expect(
      mutex.runExclusive(async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    await expect(mutex.runExclusive(async () => 42)).resolves.toBe(42);
  });
});
