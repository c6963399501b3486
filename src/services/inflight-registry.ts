/**
 * In-flight request registry
 * Lets concurrent misses for the same key share one pending operation. The
 * shared operation is aborted only once every caller waiting on it has
 * aborted.
 */

interface InflightEntry<T> {
  promise: Promise<T>;
  controller: AbortController;
  waiters: number;
}

export class InflightRegistry<T> {
  private pending = new Map<string, InflightEntry<T>>();

  /**
   * Join the operation already running for `key`, or start one.
   * `leader` is true for the caller that started it.
   */
  run(
    key: string,
    operation: (signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal
  ): { promise: Promise<T>; leader: boolean } {
    const existing = this.pending.get(key);
    if (existing) {
      this.attach(key, existing, signal);
      return { promise: existing.promise, leader: false };
    }

    const controller = new AbortController();
    const entry: InflightEntry<T> = {
      controller,
      waiters: 0,
      promise: operation(controller.signal).finally(() => {
        if (this.pending.get(key) === entry) {
          this.pending.delete(key);
        }
      }),
    };
    this.pending.set(key, entry);
    this.attach(key, entry, signal);
    return { promise: entry.promise, leader: true };
  }

  size(): number {
    return this.pending.size;
  }

  private attach(key: string, entry: InflightEntry<T>, signal?: AbortSignal): void {
    entry.waiters += 1;
    if (!signal) return;

    const release = (): void => {
      entry.waiters -= 1;
      if (entry.waiters === 0) {
        // Later callers for this key start a fresh operation
        if (this.pending.get(key) === entry) {
          this.pending.delete(key);
        }
        entry.controller.abort();
      }
    };

    if (signal.aborted) {
      release();
    } else {
      signal.addEventListener('abort', release, { once: true });
    }
  }
}
