/**
 * Priority queue of signals awaiting the decision loop.
 *
 * Higher priority first; signals of equal priority leave in arrival order.
 * Any number of producers, one consumer.
 */

import type { Signal } from "../senses/types.js";

// ============================================================================
// INTERFACES
// ============================================================================

export interface SignalQueue {
  /** Insert in priority order. Ignored once closed. */
  push(signal: Signal): void;
  /**
   * Take the most urgent signal, waiting up to timeoutMs when empty.
   * @returns The signal, or null on timeout or when closed and empty
   */
  pop(timeoutMs: number): Promise<Signal | null>;
  /** Remove and return everything queued, most urgent first */
  drain(): Signal[];
  size(): number;
  /** Wake the waiting consumer and refuse further pushes */
  close(): void;
  isClosed(): boolean;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

export function createSignalQueue(): SignalQueue {
  const items: Signal[] = [];
  let closed = false;
  let waiter: ((signal: Signal | null) => void) | null = null;

  function push(signal: Signal): void {
    if (closed) return;

    if (waiter) {
      const resolve = waiter;
      waiter = null;
      resolve(signal);
      return;
    }

    const index = items.findIndex((queued) => queued.priority < signal.priority);
    if (index === -1) items.push(signal);
    else items.splice(index, 0, signal);
  }

  function pop(timeoutMs: number): Promise<Signal | null> {
    const head = items.shift();
    if (head !== undefined) return Promise.resolve(head);
    if (closed || timeoutMs <= 0) return Promise.resolve(null);
    if (waiter) return Promise.reject(new Error("SignalQueue supports a single consumer"));

    return new Promise<Signal | null>((resolve) => {
      const timer = setTimeout(() => {
        if (waiter === settle) waiter = null;
        resolve(null);
      }, timeoutMs);

      const settle = (signal: Signal | null) => {
        clearTimeout(timer);
        resolve(signal);
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
    pop,
    drain: () => items.splice(0),
    size: () => items.length,
    close,
    isClosed: () => closed,
  };
}
