/**
 * Load agents ("spammers")
 *
 * Background loops that keep traffic flowing through the relay while a
 * test disrupts the transport. Each iteration runs under the agent's lock
 * together with the stop-flag check; the pause between iterations is taken
 * outside the lock so that stop() gets the lock promptly.
 */

import {
  DEFAULT_SPAM_INTERVAL_MS,
  type Logger,
  createSilentLogger,
  invariant,
  isTransportNoise,
  toErrorInfo
} from '@relaytest/core';
import { createMutex } from './mutex.js';
import type { NotificationBackend } from './notification-backend.js';
import { delay } from './timing.js';

export type Spammer = {
  readonly name: string;
  /** Iterations completed so far */
  readonly count: number;
  /**
   * Stop the loop and join it; resolves with the iteration count.
   * Must be called exactly once.
   */
  stop(): Promise<number>;
};

export type SpammerOptions = {
  name: string;
  iterate: (iteration: number) => Promise<void>;
  intervalMs?: number;
  logger?: Logger;
};

type LoopResult = { ok: true } | { ok: false; error: unknown };

/**
 * Start a generic load loop right away
 */
export function startSpammer(options: SpammerOptions): Spammer {
  const lock = createMutex();
  const intervalMs = options.intervalMs ?? DEFAULT_SPAM_INTERVAL_MS;
  const logger = (options.logger ?? createSilentLogger()).child({ spammer: options.name });
  let shouldStop = false;
  let stopCalled = false;
  let count = 0;

  const runOnce = (): Promise<boolean> =>
    lock.runExclusive(async () => {
      if (shouldStop) return false;
      await options.iterate(count);
      count += 1;
      return true;
    });

  const run = async (): Promise<void> => {
    while (await runOnce()) {
      await delay(intervalMs);
    }
  };

  const loop: Promise<LoopResult> = run().then(
    () => ({ ok: true }),
    (error: unknown) => {
      logger.error({ error: toErrorInfo(error), count }, 'Spammer loop failed');
      return { ok: false, error };
    }
  );

  return {
    name: options.name,
    get count() {
      return count;
    },
    async stop() {
      invariant(!stopCalled, `spammer ${options.name} was already stopped`);
      stopCalled = true;

      await lock.runExclusive(() => {
        shouldStop = true;
      });
      const result = await loop;
      if (!result.ok) {
        throw result.error;
      }

      logger.info({ count }, `Spammed ${count} iterations`);
      return count;
    }
  };
}

/**
 * Keep pushing state updates into the notification backend
 */
export function startUpdateSpammer(
  backend: Pick<NotificationBackend, 'update'>,
  options: { intervalMs?: number; logger?: Logger } = {}
): Spammer {
  return startSpammer({
    name: 'UpdateSpammer',
    intervalMs: options.intervalMs,
    logger: options.logger,
    iterate: (iteration) => backend.update(`ignored ${iteration}`)
  });
}

/**
 * The slice of an RPC client the echo spammer calls
 */
export type EchoCaller = {
  call(method: string, ...params: unknown[]): Promise<unknown>;
};

/**
 * Keep sending echo calls and check every answer
 *
 * Remote errors and transport failures are expected while the transport
 * is down and only logged; anything else ends the loop and fails stop().
 */
export function startRpcSpammer(
  createRpc: () => EchoCaller,
  assertEqual: (actual: unknown, expected: unknown) => void,
  options: { intervalMs?: number; logger?: Logger; method?: string } = {}
): Spammer {
  const rpc = createRpc();
  const method = options.method ?? 'echo';
  const logger = (options.logger ?? createSilentLogger()).child({ spammer: 'RpcSpammer' });

  return startSpammer({
    name: 'RpcSpammer',
    intervalMs: options.intervalMs,
    logger: options.logger,
    iterate: async (iteration) => {
      const current = `iteration ${iteration}`;
      try {
        assertEqual(await rpc.call(method, current), current);
      } catch (error) {
        if (!isTransportNoise(error)) throw error;
        logger.debug({ error: toErrorInfo(error), iteration }, 'Tolerated transport noise');
      }
    }
  });
}

/**
 * Run a callback while load agents are active; every agent is stopped on
 * every exit path
 */
export async function withSpammers<T>(
  start: () => Spammer[],
  callback: (spammers: readonly Spammer[]) => Promise<T>
): Promise<T> {
  const spammers = start();
  // Every agent is joined before the first failure is reported
  const stopAll = () => Promise.allSettled(spammers.map((spammer) => spammer.stop()));
  let result: T;

  try {
    result = await callback(spammers);
  } catch (error) {
    await stopAll();
    throw error;
  }

  const failed = (await stopAll()).find(
    (outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected'
  );
  if (failed) {
    throw failed.reason;
  }
  return result;
}
