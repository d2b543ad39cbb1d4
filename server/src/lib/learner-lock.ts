import logger from './logger.js';

const DEFAULT_MAX_WAIT_MS = 30_000;

/**
 * In-process exclusive lock keyed by learner id.
 *
 * Each learner has a tail promise; a caller chains onto it and becomes the new
 * tail, so read-modify-write cycles for one learner run strictly one after
 * another while different learners never wait on each other.
 */
export class LearnerLock {
  private tails = new Map<string, Promise<void>>();

  constructor(private readonly maxWaitMs = DEFAULT_MAX_WAIT_MS) {}

  /**
   * Executes fn() while holding the learner's lock.
   * Throws if the lock cannot be acquired within maxWaitMs; fn is then never run.
   */
  async run<T>(learnerId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(learnerId) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(learnerId, tail);

    try {
      await this.waitFor(learnerId, previous);
      return await fn();
    } finally {
      release();
      if (this.tails.get(learnerId) === tail) {
        this.tails.delete(learnerId);
      }
    }
  }

  /** Number of learners with a held or queued lock. */
  get activeCount(): number {
    return this.tails.size;
  }

  private async waitFor(learnerId: string, previous: Promise<void>): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new Error(`[learner-lock] Timed out waiting for lock on learner ${learnerId} after ${this.maxWaitMs}ms`));
      }, this.maxWaitMs);
      timer.unref?.();
    });
    try {
      await Promise.race([previous, timeout]);
    } catch (err) {
      logger.error({ learnerId, error: err instanceof Error ? err.message : err }, 'Learner lock wait failed');
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }
}
