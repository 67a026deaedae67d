import { describe, it, expect } from 'vitest';
import { WriteLock } from '../src/governance/writeLock.js';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1));

describe('WriteLock', () => {
  it('runs queued work one at a time in arrival order', async () => {
    const lock = new WriteLock();
    const trace: string[] = [];

    const slow = lock.run(async () => {
      trace.push('a:start');
      await tick();
      trace.push('a:end');
      return 'a';
    });
    const fast = lock.run(() => {
      trace.push('b');
      return 'b';
    });

    expect(await Promise.all([slow, fast])).toEqual(['a', 'b']);
    expect(trace).toEqual(['a:start', 'a:end', 'b']);
  });

  it('keeps running after a failed piece of work', async () => {
    const lock = new WriteLock();
    const failed = lock.run(async () => {
      throw new Error('boom');
    });
    const next = lock.run(async () => 'next');

    await expect(failed).rejects.toThrow('boom');
    expect(await next).toBe('next');
    await lock.idle();
  });
});
