import { describe, expect, it } from 'vitest';
import { LearnerLock } from '../lib/learner-lock.js';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('LearnerLock', () => {
  it('runs work for one learner strictly in order', async () => {
    const lock = new LearnerLock();
    const started = deferred();
    const gate = deferred();
    const order: string[] = [];

    const first = lock.run('learner-1', async () => {
      order.push('first:start');
      started.resolve();
      await gate.promise;
      order.push('first:end');
    });
    const second = lock.run('learner-1', async () => {
      order.push('second');
    });

    await started.promise;
    expect(order).toEqual(['first:start']);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(lock.activeCount).toBe(0);
  });

  it('does not block other learners', async () => {
    const lock = new LearnerLock();
    const gate = deferred();

    const held = lock.run('learner-1', () => gate.promise);
    const other = await lock.run('learner-2', async () => 'done');

    expect(other).toBe('done');
    gate.resolve();
    await held;
  });

  it('releases the lock when the work throws', async () => {
    const lock = new LearnerLock();
    await expect(lock.run('learner-1', async () => {
      throw new Error('write failed');
    })).rejects.toThrow('write failed');

    await expect(lock.run('learner-1', async () => 'next')).resolves.toBe('next');
  });

  it('gives up waiting after maxWaitMs without running the work', async () => {
    const lock = new LearnerLock(10);
    const gate = deferred();
    const held = lock.run('learner-1', () => gate.promise);
    let ran = false;

    await expect(lock.run('learner-1', async () => {
      ran = true;
    })).rejects.toThrow('Timed out waiting for lock on learner learner-1 after 10ms');
    expect(ran).toBe(false);

    gate.resolve();
    await held;
  });
});
