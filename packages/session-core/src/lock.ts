/**
 * Async mutex. Callers queue in FIFO order; `run` releases even when `fn` throws.
 */
export class AsyncLock {
  private queue: Array<() => void> = [];
  private locked = false;

  public get busy(): boolean {
    return this.locked;
  }

  public async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }
    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  public release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }

  public async run<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

/**
 * One AsyncLock per key. Idle locks are dropped so the map only holds keys
 * with work queued or running.
 */
export class KeyedLock {
  private readonly locks = new Map<string, { lock: AsyncLock; holders: number }>();

  public async run<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    let slot = this.locks.get(key);
    if (!slot) {
      slot = { lock: new AsyncLock(), holders: 0 };
      this.locks.set(key, slot);
    }
    slot.holders++;
    try {
      return await slot.lock.run(fn);
    } finally {
      slot.holders--;
      if (slot.holders === 0) this.locks.delete(key);
    }
  }

  public isHeld(key: string): boolean {
    return this.locks.get(key)?.lock.busy ?? false;
  }
}
