import { KeyedMutex } from './keyed-mutex';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('KeyedMutex', () => {
  let mutex: KeyedMutex;

  beforeEach(() => {
    mutex = new KeyedMutex();
  });

  it('should run tasks on the same key one at a time in arrival order', async () => {
    const events: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = mutex.runExclusive('sbx', async () => {
      events.push('first:start');
      await firstGate;
      events.push('first:end');
      return 1;
    });
    const second = mutex.runExclusive('sbx', async () => {
      events.push('second:start');
      return 2;
    });

    await tick();
    expect(events).toEqual(['first:start']);

    releaseFirst();
    await expect(first).resolves.toBe(1);
    await expect(second).resolves.toBe(2);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
    await expect(mutex.runExclusive('sbx', async () => 'free')).resolves.toBe('free');
  });

  it('should not block other keys', async () => {
    let releaseA: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      releaseA = resolve;
    });

    const a = mutex.runExclusive('a', () => gate.then(() => 'a'));
    await expect(mutex.runExclusive('b', async () => 'b')).resolves.toBe('b');

    releaseA();
    await expect(a).resolves.toBe('a');
  });

  it('should release the lock when a task throws', async () => {
    await expect(
      mutex.runExclusive('sbx', async () => {
        throw new Error('failed');
      }),
    ).rejects.toThrow('failed');

    await expect(mutex.runExclusive('sbx', async () => 'next')).resolves.toBe('next');
  });
});
