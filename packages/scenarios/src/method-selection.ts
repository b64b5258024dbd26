/**
 * Method allow and deny lists of the relay binaries
 *
 * Each round must leave "echo" working and "doNotCall" unavailable.
 */

import { defineMethods } from '@relaytest/rpc';
import { type Fixture, withFixture } from '@relaytest/test-utils';
import { doNotCall, echo } from './backends.js';
import type { ScenarioOptions } from './types.js';

const backend = defineMethods({ echo, doNotCall });

async function round(t: Fixture, methods: readonly string[], extraArgs: readonly string[]): Promise<void> {
  await t.runClient({ methods, extraArgs }, (c) =>
    t.runServer(backend, { methods, extraArgs }, async () => {
      t.log.info('Testing successful call forwarding...');
      t.assertEqual(await c.rpc.call('echo', 'bla'), 'bla');

      t.log.info('Unsupported method...');
      await t.expectRpcError(/.*METHOD_NOT_FOUND.*/, () => c.rpc.call('doNotCall'));
    })
  );
}

export async function methodSelection(options: ScenarioOptions): Promise<void> {
  await withFixture({ ...options, methods: [] }, async (t) => {
    t.main.info('Just --methods...');
    await round(t, ['echo'], []);

    t.main.info('With --methods and --methods_exclude...');
    await round(t, ['echo', 'doNotCall'], ['--methods_exclude', 'doNotCall']);
  });
}
