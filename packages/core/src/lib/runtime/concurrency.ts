import { createAbortError } from "./abort.js";

export async function mapWithConcurrency<TItem, TResult>(params: {
  items: readonly TItem[];
  concurrency: number;
  fn: (item: TItem, index: number) => Promise<TResult>;
}): Promise<TResult[]> {
  const items = params.items;
  const max = Math.max(1, Math.floor(params.concurrency || 1));
  const out: TResult[] = new Array<TResult>(items.length);

  const pending = items.map((item, index) => ({ item, index }));
  let cursor = 0;
  const workers = Array.from({ length: Math.min(max, items.length) }, async () => {
    while (true) {
      const next = pending[cursor];
      cursor += 1;
      if (!next) return;
      out[next.index] = await params.fn(next.item, next.index);
    }
  });

  await Promise.all(workers);
  return out;
}

export type ReleaseFn = () => void;

type Waiter = {
  resolve: (release: ReleaseFn) => void;
  reject: (error: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
};

/**
 * Single-holder lock with FIFO hand-off.
 */
export class Mutex {
  private locked = false;
  private readonly waiters: Waiter[] = [];

  isLocked(): boolean {
    return this.locked;
  }

  get pending(): number {
    return this.waiters.length;
  }

  async acquire(opts?: { signal?: AbortSignal }): Promise<ReleaseFn> {
    if (!this.locked) {
      this.locked = true;
      return this.releaser();
    }

    const signal = opts?.signal;
    if (signal?.aborted) throw createAbortError("lock acquire aborted");

    return await new Promise<ReleaseFn>((resolve, reject) => {
      const entry: Waiter = { resolve, reject, signal };
      if (signal) {
        entry.onAbort = () => {
          const idx = this.waiters.indexOf(entry);
          if (idx >= 0) this.waiters.splice(idx, 1);
          reject(createAbortError("lock acquire aborted"));
        };
        signal.addEventListener("abort", entry.onAbort, { once: true });
      }
      this.waiters.push(entry);
    });
  }

  async runExclusive<T>(fn: () => Promise<T>, opts?: { signal?: AbortSignal }): Promise<T> {
    const release = await this.acquire(opts);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private releaser(): ReleaseFn {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.handOff();
    };
  }

  private handOff(): void {
    while (this.waiters.length > 0) {
      const next = this.waiters.shift();
      if (!next) break;
      if (next.signal && next.onAbort) next.signal.removeEventListener("abort", next.onAbort);
      if (next.signal?.aborted) {
        next.reject(createAbortError("lock acquire aborted"));
        continue;
      }
      next.resolve(this.releaser());
      return;
    }
    this.locked = false;
  }
}

/**
 * One Mutex per key, created on demand and dropped once idle.
 */
export class KeyedMutex {
  private readonly locks = new Map<string, Mutex>();

  isLocked(key: string): boolean {
    return this.locks.get(key)?.isLocked() ?? false;
  }

  async runExclusive<T>(key: string, fn: () => Promise<T>, opts?: { signal?: AbortSignal }): Promise<T> {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = new Mutex();
      this.locks.set(key, lock);
    }
    try {
      return await lock.runExclusive(fn, opts);
    } finally {
      if (!lock.isLocked() && lock.pending === 0 && this.locks.get(key) === lock) {
        this.locks.delete(key);
      }
    }
  }
}
