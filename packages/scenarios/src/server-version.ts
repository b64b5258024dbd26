/**
 * Selection of the right server when two backend versions are online
 */

import { defineMethods, method } from '@relaytest/rpc';
import { withFixture } from '@relaytest/test-utils';
import { z } from 'zod';
import type { ScenarioOptions } from './types.js';

function versionedBackend(value: string) {
  return defineMethods({ test: method(z.tuple([]), () => value) });
}

const version = (name: string) => ['--backend_version', name];

export async function serverVersion(options: ScenarioOptions): Promise<void> {
  await withFixture({ ...options, methods: ['test'] }, (t) =>
    t.runServer(versionedBackend('right'), { extraArgs: version('right') }, () =>
      t.runServer(versionedBackend('left'), { extraArgs: version('left') }, () =>
        t.runClient({ extraArgs: version('right') }, (right) =>
          t.runClient({ extraArgs: version('left') }, async (left) => {
            t.assertEqual(await right.rpc.call('test'), 'right');
            t.assertEqual(await left.rpc.call('test'), 'left');
          })
        )
      )
    )
  );
}
