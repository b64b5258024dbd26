/**
 * Behaviour across a restart of the transport server
 *
 * The restart itself happens in the disrupt hook, while an update spammer
 * and an RPC spammer keep traffic flowing through the relay.
 */

import { ConfigError } from '@relaytest/core';
import { defineMethods, notificationMethods } from '@relaytest/rpc';
import {
  NotificationBackend,
  Waiter,
  delay,
  startRpcSpammer,
  startUpdateSpammer,
  withSpammers
} from '@relaytest/runtime';
import { type Fixture, type RelayClient, withFixture } from '@relaytest/test-utils';
import { echo } from './backends.js';
import type { ScenarioOptions } from './types.js';

const SETTLE_MS = 100;

/**
 * Check that the relay is up: one plain call and one waitforchange update
 */
async function roundTrip(
  t: Fixture,
  backend: NotificationBackend,
  c: RelayClient,
  nonce: string
): Promise<void> {
  const waiterRpc = c.createRpc();
  const w = Waiter.issue(() => waiterRpc.call('waitforchange', ''), {
    label: 'waitforchange',
    logger: t.log
  });

  t.assertEqual(await c.rpc.call('echo', nonce), nonce);

  await w.assertStillPending();
  await backend.update(nonce);
  t.assertEqual(await w.wait(), nonce);
}

export async function transportRestart(options: ScenarioOptions): Promise<void> {
  const { disrupt, spamIntervalMs } = options;
  if (!disrupt) {
    throw new ConfigError('transport-restart needs a disrupt hook');
  }

  await withFixture({ ...options, methods: ['echo'], waitForChange: true }, (t) => {
    const backend = new NotificationBackend({ logger: t.log });
    const methods = defineMethods({ ...notificationMethods(backend), echo });

    return backend.withEnabled(() =>
      t.runClient({}, (c) =>
        t.runServer(methods, {}, async () => {
          t.main.info('Initial relay test...');
          await roundTrip(t, backend, c, 'foo');

          await withSpammers(
            () => [
              startUpdateSpammer(backend, { intervalMs: spamIntervalMs, logger: t.log }),
              startRpcSpammer(
                () => c.createRpc(),
                (actual, expected) => t.assertEqual(actual, expected),
                { intervalMs: spamIntervalMs, logger: t.log }
              )
            ],
            () => disrupt()
          );

          // Let the dust settle after stopping the spammers
          await delay(SETTLE_MS);

          t.main.info('Testing relay after the restart...');
          await roundTrip(t, backend, c, 'bar');
        })
      )
    );
  });
}
