/**
 * Long-poll notification backend
 *
 * Holds one state string and serves "waitforchange" calls that block until
 * the state is updated or waiting is disabled. The state and the enabled
 * flag are the only values shared between the test's tasks, and every
 * access goes through one mutex paired with a broadcast condition.
 */

import { type Logger, createSilentLogger, invariant } from '@relaytest/core';
import { createCondition, createMutex } from './mutex.js';

export type NotificationPhase = 'DISABLED' | 'ENABLED_IDLE' | 'ENABLED_WAITING';

/** Known-state value that asks for a blocking wait */
export const ALWAYS_BLOCK = '';

export type NotificationBackendOptions = {
  initialState?: string;
  logger?: Logger;
};

export class NotificationBackend {
  private readonly mutex = createMutex();
  private readonly changed = createCondition();
  private state: string;
  private enabled = false;
  private readonly logger: Logger;

  constructor(options: NotificationBackendOptions = {}) {
    this.state = options.initialState ?? '';
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'notifications' });
  }

  get phase(): NotificationPhase {
    if (!this.enabled) return 'DISABLED';
    return this.changed.waiting > 0 ? 'ENABLED_WAITING' : 'ENABLED_IDLE';
  }

  get currentState(): string {
    return this.state;
  }

  /**
   * Number of callers currently parked in waitForChange
   */
  get waiting(): number {
    return this.changed.waiting;
  }

  async enable(): Promise<void> {
    await this.mutex.runExclusive(() => {
      invariant(!this.enabled, 'notification backend is already enabled');
      this.enabled = true;
      this.changed.notifyAll();
    });
  }

  /**
   * Stop blocking; every parked caller returns the current state
   */
  async disable(): Promise<void> {
    await this.mutex.runExclusive(() => {
      this.enabled = false;
      const woken = this.changed.notifyAll();
      this.logger.debug({ woken }, 'Waiting disabled');
    });
  }

  async update(newState: string): Promise<void> {
    await this.mutex.runExclusive(() => {
      this.state = newState;
      const woken = this.changed.notifyAll();
      this.logger.trace({ state: newState, woken }, 'State updated');
    });
  }

  /**
   * Block until the next update or disable, then return the state
   *
   * Returns at once while disabled. The relay always asks with the
   * always-block value; any other known state is a caller bug.
   */
  async waitForChange(known: string): Promise<string> {
    invariant(known === ALWAYS_BLOCK, `unexpected known state ${JSON.stringify(known)}`);

    let release = await this.mutex.acquire();
    try {
      if (this.enabled) {
        release = await this.changed.wait(this.mutex, release);
      }
      return this.state;
    } finally {
      release();
    }
  }

  /**
   * Run a callback with waiting enabled, disabling it on every exit path
   * so that no caller stays parked past the scope
   */
  async withEnabled<T>(callback: (backend: this) => Promise<T>): Promise<T> {
    await this.enable();
    try {
      return await callback(this);
    } finally {
      await this.disable();
    }
  }
}
