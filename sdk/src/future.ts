/**
 * AdminFuture - a single-assignment result handle.
 *
 * Written once by whoever owns the underlying operation (complete or
 * completeExceptionally), read any number of times through continuations
 * or `get()`. There is no cancellation.
 */

import { TimeoutError, toError } from './errors.js';

export type Settlement<T> =
  | { readonly status: 'fulfilled'; readonly value: T }
  | { readonly status: 'rejected'; readonly reason: Error };

export type SettlementListener<T> = (settlement: Settlement<T>) => void;

export class AdminFuture<T> {
  private settlement: Settlement<T> | undefined;
  private listeners: SettlementListener<T>[] = [];

  static completed<T>(value: T): AdminFuture<T> {
    const future = new AdminFuture<T>();
    future.complete(value);
    return future;
  }

  static failed<T>(error: Error): AdminFuture<T> {
    const future = new AdminFuture<T>();
    future.completeExceptionally(error);
    return future;
  }

  /**
   * Returns false when the future was already settled; the first value wins.
   */
  complete(value: T): boolean {
    return this.settle({ status: 'fulfilled', value });
  }

  completeExceptionally(error: Error): boolean {
    return this.settle({ status: 'rejected', reason: error });
  }

  isDone(): boolean {
    return this.settlement !== undefined;
  }

  isCompletedExceptionally(): boolean {
    return this.settlement?.status === 'rejected';
  }

  peek(): Settlement<T> | undefined {
    return this.settlement;
  }

  /**
   * Value if fulfilled, `valueIfAbsent` while pending. Throws the failure if rejected.
   */
  getNow(valueIfAbsent: T): T {
    if (this.settlement === undefined) {
      return valueIfAbsent;
    }
    if (this.settlement.status === 'rejected') {
      throw this.settlement.reason;
    }
    return this.settlement.value;
  }

  /**
   * Runs the listener once the future settles, or right away if it already has.
   * Listeners run in registration order. A listener that throws does not stop
   * the others; the first error is rethrown to the caller that settled the future.
   * Returns a function that removes the listener if it has not run yet.
   */
  onSettled(listener: SettlementListener<T>): () => void {
    if (this.settlement !== undefined) {
      listener(this.settlement);
      return () => {};
    }
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((registered) => registered !== listener);
    };
  }

  /** Number of listeners waiting for this future to settle. */
  listenerCount(): number {
    return this.listeners.length;
  }

  thenApply<R>(fn: (value: T) => R): AdminFuture<R> {
    const next = new AdminFuture<R>();
    this.onSettled((settlement) => {
      if (settlement.status === 'rejected') {
        next.completeExceptionally(settlement.reason);
        return;
      }
      let result: R;
      try {
        result = fn(settlement.value);
      } catch (err) {
        next.completeExceptionally(toError(err));
        return;
      }
      next.complete(result);
    });
    return next;
  }

  /**
   * Returns a future with this one's outcome, observed by `action` first.
   * If `action` throws, the returned future fails with that error instead.
   */
  whenComplete(action: (value: T | undefined, error: Error | undefined) => void): AdminFuture<T> {
    const next = new AdminFuture<T>();
    this.onSettled((settlement) => {
      try {
        if (settlement.status === 'fulfilled') {
          action(settlement.value, undefined);
        } else {
          action(undefined, settlement.reason);
        }
      } catch (err) {
        next.completeExceptionally(toError(err));
        return;
      }
      next.settle(settlement);
    });
    return next;
  }

  /**
   * Waits for the value. With a timeout, rejects with TimeoutError when the
   * future is still pending after `timeoutMs`; the future itself is untouched
   * and keeps no listener for the abandoned wait.
   */
  get(timeoutMs?: number): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;
      const unsubscribe = this.onSettled((settlement) => {
        if (timer !== undefined) {
          clearTimeout(timer);
        }
        if (settlement.status === 'fulfilled') {
          resolve(settlement.value);
        } else {
          reject(settlement.reason);
        }
      });
      if (timeoutMs !== undefined && this.settlement === undefined) {
        timer = setTimeout(() => {
          unsubscribe();
          reject(new TimeoutError(`Timed out after ${timeoutMs}ms waiting for the result`));
        }, timeoutMs);
      }
    });
  }

  private settle(settlement: Settlement<T>): boolean {
    if (this.settlement !== undefined) {
      return false;
    }
    this.settlement = settlement;
    const listeners = this.listeners;
    this.listeners = [];
    let thrown: Error | undefined;
    for (const listener of listeners) {
      try {
        listener(settlement);
      } catch (err) {
        thrown ??= toError(err);
      }
    }
    if (thrown !== undefined) {
      throw thrown;
    }
    return true;
  }
}
