/**
 * Join primitives: wait for N things, then fire once.
 */

import { AdminFuture, type Settlement } from './future.js';

/** Anything a join can wait on: an AdminFuture of any value type. */
export interface Settleable {
  onSettled(listener: (settlement: Settlement<unknown>) => void): void;
}

export class CountdownLatch {
  private count: number;
  private fired = false;

  constructor(count: number, private readonly onZero: () => void) {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`Latch count must be a non-negative integer, got ${count}`);
    }
    this.count = count;
    if (count === 0) {
      this.fire();
    }
  }

  countDown(): void {
    if (this.fired) {
      return;
    }
    this.count -= 1;
    if (this.count === 0) {
      this.fire();
    }
  }

  remaining(): number {
    return this.count;
  }

  private fire(): void {
    this.fired = true;
    this.onZero();
  }
}

/**
 * Settles after every input has settled, never before.
 * Fails with the failure of the first failed input in argument order,
 * otherwise succeeds with no value.
 */
export function allOf(futures: readonly Settleable[]): AdminFuture<void> {
  const joined = new AdminFuture<void>();
  const failures: (Error | undefined)[] = new Array<Error | undefined>(futures.length).fill(undefined);

  const latch = new CountdownLatch(futures.length, () => {
    const firstFailure = failures.find((failure): failure is Error => failure !== undefined);
    if (firstFailure !== undefined) {
      joined.completeExceptionally(firstFailure);
    } else {
      joined.complete(undefined);
    }
  });

  futures.forEach((future, index) => {
    future.onSettled((settlement) => {
      if (settlement.status === 'rejected') {
        failures[index] = settlement.reason;
      }
      latch.countDown();
    });
  });

  return joined;
}
