export { FakeRelayNetwork, FakeRelayProcess } from './fake-relay.js';
export type { FakeRelayRole } from './fake-relay.js';
export { parseRelayFlags } from './relay-flags.js';
export type { RelayFlags } from './relay-flags.js';
