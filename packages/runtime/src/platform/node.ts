/**
 * Node.js platform implementation
 *
 * Spawns real processes, binds real sockets through @hono/node-server and
 * uses the global fetch.
 */

import { spawn } from 'node:child_process';
import { serve } from '@hono/node-server';
import type { FetchFn, HarnessPlatform, ServeHttp, SpawnProcess } from './types.js';

const spawnNode: SpawnProcess = (command, args, options) =>
  spawn(command, [...args], {
    env: options.env,
    cwd: options.cwd,
    stdio: ['ignore', 'inherit', 'inherit']
  });

const serveNode: ServeHttp = (options, onListening) =>
  serve(
    {
      fetch: options.fetch,
      hostname: options.hostname,
      port: options.port
    },
    () => onListening()
  );

const fetchNode: FetchFn = (url, init) => fetch(url, init);

export const nodePlatform: HarnessPlatform = {
  name: 'node',
  spawn: spawnNode,
  serve: serveNode,
  fetch: fetchNode
};
