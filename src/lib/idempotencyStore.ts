// In-memory set of accepted idempotency keys (can swap with Redis)

export interface IdempotencyStoreOptions {
  /** Forget keys older than this. 0 or unset keeps them for the process lifetime. */
  ttlMs?: number;
  /** Evict the oldest keys beyond this count. 0 or unset means unbounded. */
  maxKeys?: number;
  now?: () => number;
}

export class IdempotencyStore {
  private readonly processed = new Map<string, number>();
  private readonly locks = new Map<string, Promise<void>>();
  private readonly ttlMs: number;
  private readonly maxKeys: number;
  private readonly now: () => number;

  constructor(opts: IdempotencyStoreOptions = {}) {
    this.ttlMs = opts.ttlMs ?? 0;
    this.maxKeys = opts.maxKeys ?? 0;
    this.now = opts.now ?? Date.now;
  }

  isProcessed(key: string): boolean {
    const acceptedAt = this.processed.get(key);
    if (acceptedAt === undefined) return false;
    if (this.isExpired(acceptedAt)) {
      this.processed.delete(key);
      return false;
    }
    return true;
  }

  markProcessed(key: string): void {
    if (this.isProcessed(key)) return;
    this.processed.set(key, this.now());
    if (this.maxKeys > 0) {
      // Map iterates in insertion order, so the first key is the oldest
      for (const oldest of this.processed.keys()) {
        if (this.processed.size <= this.maxKeys) break;
        this.processed.delete(oldest);
      }
    }
  }

  /**
   * Runs `operation` once every earlier holder of the same key has settled.
   * Different keys never wait on each other.
   */
  async withKeyLock<T>(key: string, operation: () => Promise<T> | T): Promise<T> {
    const previous = this.locks.get(key) ?? Promise.resolve();
    const run = previous.then(operation);
    const tail = run.then(() => undefined, () => undefined);
    this.locks.set(key, tail);
    try {
      return await run;
    } finally {
      if (this.locks.get(key) === tail) this.locks.delete(key);
    }
  }

  purgeExpired(): number {
    let removed = 0;
    for (const [k, acceptedAt] of this.processed) {
      if (this.isExpired(acceptedAt)) {
        this.processed.delete(k);
        removed += 1;
      }
    }
    return removed;
  }

  /** Schedules purgeExpired. Returns undefined when keys never expire. */
  startSweeper(intervalMs = this.ttlMs): NodeJS.Timeout | undefined {
    if (this.ttlMs <= 0) return undefined;
    return setInterval(() => this.purgeExpired(), intervalMs).unref();
  }

  get size(): number {
    return this.processed.size;
  }

  private isExpired(acceptedAt: number): boolean {
    return this.ttlMs > 0 && this.now() - acceptedAt > this.ttlMs;
  }
}
