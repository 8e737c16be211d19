import { describe, it, expect } from 'vitest';
import { withSignal } from '../withSignal.js';

describe('withSignal', () => {
  it('should pass the promise through without a signal', async () => {
    await expect(withSignal(Promise.resolve(7))).resolves.toBe(7);
  });

  it('should resolve when the promise settles first', async () => {
    const controller = new AbortController();

    await expect(withSignal(Promise.resolve('done'), controller.signal)).resolves.toBe('done');
  });

  it('should forward the promise rejection', async () => {
    const controller = new AbortController();

    await expect(
      withSignal(Promise.reject(new Error('query failed')), controller.signal)
    ).rejects.toThrow('query failed');
  });

  it('should reject with the abort reason when aborted mid-flight', async () => {
    const controller = new AbortController();
    const pending = withSignal(new Promise<never>(() => {}), controller.signal);

    controller.abort(new Error('call cancelled'));

    await expect(pending).rejects.toThrow('call cancelled');
  });

  it('should reject immediately for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort(new Error('deadline exceeded'));

    await expect(withSignal(new Promise<never>(() => {}), controller.signal)).rejects.toThrow(
      'deadline exceeded'
    );
  });
});
