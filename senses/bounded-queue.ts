/**
 * Bounded single-consumer queue between a capture driver and its consumer.
 *
 * The producer never waits: when the queue is full the oldest item is
 * dropped, so a slow consumer sees recent data rather than a growing
 * backlog. The consumer waits with a timeout so it can re-check its
 * running flag between items.
 */

// ============================================================================
// INTERFACES
// ============================================================================

export interface BoundedQueue<T> {
  /** Enqueue, dropping the oldest item when full. Ignored once closed. */
  push(item: T): void;
  /**
   * Take the next item.
   * @returns The item, or null on timeout or when closed and empty
   */
  next(timeoutMs: number): Promise<T | null>;
  size(): number;
  /** Items dropped on overflow so far */
  dropped(): number;
  /** Wake a waiting consumer and refuse further pushes */
  close(): void;
  isClosed(): boolean;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a bounded drop-oldest queue.
 *
 * @param capacity - Maximum items held (at least 1)
 */
export function createBoundedQueue<T>(capacity: number): BoundedQueue<T> {
  const limit = Math.max(1, Math.floor(capacity));
  const items: T[] = [];
  let droppedCount = 0;
  let closed = false;
  let waiter: ((item: T | null) => void) | null = null;

  function push(item: T): void {
    if (closed) return;

    if (waiter) {
      const resolve = waiter;
      waiter = null;
      resolve(item);
      return;
    }

    if (items.length >= limit) {
      items.shift();
      droppedCount++;
    }
    items.push(item);
  }

  function next(timeoutMs: number): Promise<T | null> {
    const head = items.shift();
    if (head !== undefined) return Promise.resolve(head);
    if (closed) return Promise.resolve(null);
    if (waiter) return Promise.reject(new Error("BoundedQueue supports a single consumer"));

    return new Promise<T | null>((resolve) => {
      const timer = setTimeout(() => {
        if (waiter === settle) waiter = null;
        resolve(null);
      }, timeoutMs);

      const settle = (item: T | null) => {
        clearTimeout(timer);
        resolve(item);
      };
      waiter = settle;
    });
  }

  function close(): void {
    closed = true;
    if (waiter) {
      const resolve = waiter;
      waiter = null;
      resolve(null);
    }
  }

  return {
    push,
    next,
    size: () => items.length,
    dropped: () => droppedCount,
    close,
    isClosed: () => closed,
  };
}
