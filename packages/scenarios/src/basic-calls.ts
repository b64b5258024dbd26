/**
 * Basic (non-blocking) calls through the relay
 */

import { defineMethods } from '@relaytest/rpc';
import { withFixture } from '@relaytest/test-utils';
import { doNotCall, echo, fail } from './backends.js';
import type { ScenarioOptions } from './types.js';

const backend = defineMethods({ echo, error: fail, doNotCall });

export async function basicCalls(options: ScenarioOptions): Promise<void> {
  await withFixture({ ...options, methods: ['echo', 'error'] }, (t) =>
    t.runClient({}, async (c) => {
      await t.runServer(backend, {}, async () => {
        t.main.info('Testing successful call forwarding...');
        t.assertEqual(await c.rpc.call('echo', 'bla'), 'bla');
        await t.expectRpcError(/.*my error.*/, () => c.rpc.call('error', 'my error'));

        t.main.info('Invalid method call...');
        await t.expectRpcError(/.*METHOD_NOT_FOUND.*/, () => c.rpc.call('doNotCall'));
      });

      t.main.info('Testing server reselection...');
      await t.runServer(backend, {}, async () => {
        t.assertEqual(await c.rpc.call('echo', 'success'), 'success');
      });
    })
  );
}
