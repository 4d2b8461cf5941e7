import logger from 'jet-logger';

/**
 * Serializes async work per key (one customer at a time), while different
 * keys run in parallel. Tails are dropped once a key goes idle.
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const pending = this.tails.get(key);
    const previous = pending ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    if (pending) {
      logger.info(`[KeyedMutex] Waiting for lock on ${key}`);
    }

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
