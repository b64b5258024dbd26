export { Fixture, withFixture } from './fixture.js';
export { assertEqual, expectRpcError } from './assertions.js';
export { createPortAllocator, randomBasePort } from './port-utils.js';
export type { PortAllocator } from './port-utils.js';
export { relayClientArgs, relayServerArgs } from './relay-args.js';
export type { RelayArgsOptions } from './relay-args.js';
export { createTempDir, cleanupTempDir } from './temp-utils.js';
export type { FixtureOptions, RelayClient, RelayRunOptions } from './types.js';
