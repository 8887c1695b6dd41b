import { TimeoutError, withTimeout } from './timeout.util';

describe('withTimeout', () => {
  it('should resolve with the wrapped value', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 50)).resolves.toBe('ok');
  });

  it('should reject with TimeoutError when the promise never settles', async () => {
    const never = new Promise<string>(() => undefined);

    await expect(withTimeout(never, 20, 'quote MSFT')).rejects.toThrow(TimeoutError);
    await expect(withTimeout(never, 20, 'quote MSFT')).rejects.toThrow('quote MSFT timed out after 20ms');
  });

  it('should pass through the wrapped rejection', async () => {
    await expect(withTimeout(Promise.reject(new Error('upstream')), 50)).rejects.toThrow('upstream');
  });
});
