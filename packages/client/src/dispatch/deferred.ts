/**
 * Deferred result handle
 *
 * A single-assignment container for the outcome of a call running on the
 * worker pool. The handle is returned to the caller at once; the pool
 * completes it exactly once with either a value or an error. Later
 * completions are ignored.
 *
 * Failures are stored, not thrown: nothing rejects until a caller asks with
 * {@link DeferredResult.get}.
 */

export type Outcome<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: Error };

export interface DeferredCompleter<T> {
  readonly handle: DeferredResult<T>;
  complete(outcome: Outcome<T>): void;
}

export class DeferredResult<T> {
  private outcome: Outcome<T> | null = null;
  private readonly waiters: Array<() => void> = [];

  private constructor() {}

  /**
   * Create a handle together with the function that completes it
   */
  static create<T>(): DeferredCompleter<T> {
    const handle = new DeferredResult<T>();
    return {
      handle,
      complete: (outcome) => handle.settleWith(outcome),
    };
  }

  /**
   * Handle already completed with a value
   */
  static resolved<T>(value: T): DeferredResult<T> {
    const { handle, complete } = DeferredResult.create<T>();
    complete({ ok: true, value });
    return handle;
  }

  isDone(): boolean {
    return this.outcome !== null;
  }

  /**
   * Outcome if completed, `null` while the call is still in flight
   */
  poll(): Outcome<T> | null {
    return this.outcome;
  }

  /**
   * Wait for completion; rejects with the stored error on failure
   */
  async get(): Promise<T> {
    const outcome = await this.settle();
    if (outcome.ok) {
      return outcome.value;
    }
    throw outcome.error;
  }

  /**
   * Wait for completion without rejecting
   */
  settle(): Promise<Outcome<T>> {
    const current = this.outcome;
    if (current !== null) {
      return Promise.resolve(current);
    }

    return new Promise<Outcome<T>>((resolve) => {
      this.waiters.push(() => {
        if (this.outcome !== null) {
          resolve(this.outcome);
        }
      });
    });
  }

  private settleWith(outcome: Outcome<T>): void {
    if (this.outcome !== null) {
      return;
    }

    this.outcome = outcome;
    const waiters = this.waiters.splice(0);
    for (const wake of waiters) {
      wake();
    }
  }
}
