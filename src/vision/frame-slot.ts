/**
 * Single-slot "latest frame" buffer between the capture loop and the
 * classifier. Writers never wait: a new frame replaces any unread one.
 * Readers either peek (non-destructive) or take (clears the slot).
 *
 * All slot access runs on the event loop, so each put/take is a single
 * uninterrupted swap.
 */

import { logger } from '../logger.js';

interface Waiter<T> {
  resolve: (value: T | null) => void;
  timer: ReturnType<typeof setTimeout>;
  onAbort: () => void;
  signal?: AbortSignal;
}

export class LatestFrameSlot<T> {
  private current: T | null = null;
  private waiters: Waiter<T>[] = [];
  private _dropped = 0;

  /** Frames overwritten before anyone read them. */
  get dropped(): number { return this._dropped; }

  hasFrame(): boolean {
    return this.current !== null;
  }

  /**
   * Store a frame, discarding the stale one if present.
   * Returns true when a stale frame was discarded.
   */
  put(frame: T): boolean {
    const waiter = this.waiters.shift();
    if (waiter) {
      this.settle(waiter, frame);
      return false;
    }
    const replaced = this.current !== null;
    if (replaced) {
      this._dropped++;
      logger.debug('LatestFrameSlot: dropping stale frame');
    }
    this.current = frame;
    return replaced;
  }

  /** Current frame without clearing it. */
  peek(): T | null {
    return this.current;
  }

  /** Current frame, clearing the slot. */
  take(): T | null {
    const frame = this.current;
    this.current = null;
    return frame;
  }

  /**
   * Take the current frame, or wait up to `timeoutMs` for the next one.
   * Resolves null on timeout or abort.
   */
  waitForFrame(timeoutMs: number, signal?: AbortSignal): Promise<T | null> {
    const ready = this.take();
    if (ready !== null || timeoutMs <= 0 || signal?.aborted) {
      return Promise.resolve(ready);
    }

    return new Promise<T | null>((resolve) => {
      const waiter: Waiter<T> = {
        resolve,
        signal,
        timer: setTimeout(() => this.settle(waiter, null), timeoutMs),
        onAbort: () => this.settle(waiter, null),
      };
      signal?.addEventListener('abort', waiter.onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  private settle(waiter: Waiter<T>, frame: T | null): void {
    clearTimeout(waiter.timer);
    waiter.signal?.removeEventListener('abort', waiter.onAbort);
    this.waiters = this.waiters.filter(w => w !== waiter);
    waiter.resolve(frame);
  }
}
