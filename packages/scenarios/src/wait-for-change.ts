/**
 * Relaying of waitforchange notifications
 */

import { type RpcClient, notificationMethods } from '@relaytest/rpc';
import { NotificationBackend, Waiter } from '@relaytest/runtime';
import { type Fixture, withFixture } from '@relaytest/test-utils';
import type { ScenarioOptions } from './types.js';

function waitForChange(t: Fixture, rpc: RpcClient, known: string): Waiter<unknown> {
  return Waiter.issue(() => rpc.call('waitforchange', known), {
    label: `waitforchange(${JSON.stringify(known)})`,
    logger: t.log
  });
}

export async function waitForChangeScenario(options: ScenarioOptions): Promise<void> {
  await withFixture({ ...options, methods: [], waitForChange: true }, (t) => {
    const backend = new NotificationBackend({ logger: t.log });
    const methods = notificationMethods(backend);

    return backend.withEnabled(() =>
      t.runClient({}, async (c) => {
        await t.runServer(methods, {}, async () => {
          t.main.info('Testing waitforchange update...');

          let w = waitForChange(t, c.rpc, '');
          // The first call is what makes the client select a server
          await t.settle();
          await w.assertStillPending();
          await backend.update('first');
          t.assertEqual(await w.wait(), 'first');

          w = waitForChange(t, c.rpc, 'other');
          t.assertEqual(await w.wait(), 'first');

          w = waitForChange(t, c.rpc, '');
          await w.assertStillPending();
          await backend.update('second');
          t.assertEqual(await w.wait(), 'second');
        });

        t.main.info('Testing server reselection...');
        await t.runServer(methods, {}, async () => {
          const w = waitForChange(t, c.rpc, '');
          await t.settle();

          await w.assertStillPending();
          await backend.update('third');
          t.assertEqual(await w.wait(), 'third');
        });
      })
    );
  });
}
