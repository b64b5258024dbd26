/**
 * Async call driver
 *
 * Issues one call in the background so the test can check that it is
 * still blocked and later join on its result.
 */

import {
  AssertionFailure,
  DEFAULT_PENDING_CHECK_MS,
  type Logger,
  createSilentLogger,
  invariant
} from '@relaytest/core';
import { delay } from './timing.js';

type Outcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

export type WaiterOptions = {
  label?: string;
  logger?: Logger;
};

export class Waiter<T> {
  private outcome?: Outcome<T>;
  private consumed = false;
  private readonly task: Promise<void>;
  private readonly label: string;
  private readonly logger: Logger;

  private constructor(call: () => Promise<T>, options: WaiterOptions) {
    this.label = options.label ?? 'call';
    this.logger = (options.logger ?? createSilentLogger()).child({ waiter: this.label });
    this.task = Promise.resolve()
      .then(call)
      .then(
        (value) => {
          this.outcome = { ok: true, value };
        },
        (error: unknown) => {
          this.outcome = { ok: false, error };
        }
      );
  }

  /**
   * Start exactly one call in the background
   */
  static issue<T>(call: () => Promise<T>, options: WaiterOptions = {}): Waiter<T> {
    return new Waiter(call, options);
  }

  get settled(): boolean {
    return this.outcome !== undefined;
  }

  /**
   * Yield for a moment and fail if the call has already returned
   */
  async assertStillPending(graceMs: number = DEFAULT_PENDING_CHECK_MS): Promise<void> {
    await delay(graceMs);
    if (this.settled) {
      this.logger.error({ graceMs }, 'Call returned although it should still block');
      throw new AssertionFailure(`${this.label} returned within ${graceMs}ms but should still be blocked`);
    }
  }

  /**
   * Join on the call; re-raises the error it failed with
   */
  async wait(): Promise<T> {
    invariant(!this.consumed, `${this.label} waiter was already consumed`);
    this.consumed = true;

    await this.task;
    const outcome = this.outcome;
    invariant(outcome, `${this.label} finished without an outcome`);
    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.value;
  }
}
