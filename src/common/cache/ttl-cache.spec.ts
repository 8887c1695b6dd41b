import { TtlCache } from './ttl-cache';
import { FakeClock } from '../../testing/fakes';

describe('TtlCache', () => {
  let clock: FakeClock;
  let cache: TtlCache<string, number>;

  beforeEach(() => {
    clock = new FakeClock(new Date(2026, 0, 5, 9, 0, 0));
    cache = new TtlCache<string, number>(60_000, clock);
  });

  it('should return a value until its ttl elapses', () => {
    cache.set('AAPL', 190);
    clock.advanceSeconds(59);
    expect(cache.get('AAPL')).toBe(190);

    clock.advanceSeconds(1);
    expect(cache.get('AAPL')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('should sweep expired entries on write', () => {
    cache.set('2026-01-05', 1);
    cache.set('2026-01-06', 2);
    clock.advanceSeconds(60);

    cache.set('2026-01-07', 3);

    expect(cache.size).toBe(1);
    expect(cache.get('2026-01-07')).toBe(3);
  });

  it('should keep live entries when sweeping', () => {
    cache.set('a', 1);
    clock.advanceSeconds(30);
    cache.set('b', 2);
    clock.advanceSeconds(30);

    cache.set('c', 3);

    expect(cache.size).toBe(2);
    expect(cache.get('a')).toBeUndefined();
    expect(cache.get('b')).toBe(2);
  });

  it('should load once and then serve from cache', async () => {
    const load = jest.fn().mockResolvedValue(42);

    await expect(cache.getOrLoad('k', load)).resolves.toBe(42);
    await expect(cache.getOrLoad('k', load)).resolves.toBe(42);

    expect(load).toHaveBeenCalledTimes(1);
  });

  it('should not store a value whose load rejects', async () => {
    await expect(cache.getOrLoad('k', () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(cache.get('k')).toBeUndefined();
  });

  it('should drop entries on invalidate and clear', () => {
    cache.set('a', 1);
    cache.set('b', 2);

    cache.invalidate('a');
    expect(cache.get('a')).toBeUndefined();
    expect(cache.get('b')).toBe(2);

    cache.clear();
    expect(cache.size).toBe(0);
  });
});
