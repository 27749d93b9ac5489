import { ConflictError } from '../errors.js';

/**
 * In-memory per-session lock. A second turn for a session that already has one
 * in flight is rejected rather than queued.
 */
export class TurnLock {
  private readonly active = new Set<string>();

  /** Returns the release function; throws ConflictError when key is held. */
  acquire(key: string): () => void {
    if (this.active.has(key)) {
      throw new ConflictError('A turn is already in progress for this session', key);
    }
    this.active.add(key);
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.active.delete(key);
    };
  }

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const release = this.acquire(key);
    try {
      return await task();
    } finally {
      release();
    }
  }
}

export default TurnLock;
