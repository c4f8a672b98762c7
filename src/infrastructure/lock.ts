interface Slot {
  /** Resumes queued callers; the slot stays held across each handoff. */
  waiters: Array<() => void>;
}

/**
 * Mutual exclusion per string key. Callers on the same key run one at a
 * time in arrival order; different keys never wait on each other. A key's
 * slot exists only while someone holds it.
 */
export class KeyedLock {
  private slots = new Map<string, Slot>();

  isLocked(key: string): boolean {
    return this.slots.has(key);
  }

  /** Callers queued behind the current holder of `key`. */
  waiting(key: string): number {
    return this.slots.get(key)?.waiters.length ?? 0;
  }

  /** Number of keys currently held. */
  get size(): number {
    return this.slots.size;
  }

  async run<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    await this.enter(key);
    try {
      return await fn();
    } finally {
      this.leave(key);
    }
  }

  private enter(key: string): Promise<void> {
    const slot = this.slots.get(key);
    if (!slot) {
      this.slots.set(key, { waiters: [] });
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      slot.waiters.push(resolve);
    });
  }

  private leave(key: string): void {
    const slot = this.slots.get(key);
    const next = slot?.waiters.shift();
    if (next) {
      next();
    } else {
      this.slots.delete(key);
    }
  }
}
