import type { FixtureTimingInput, LogLevel } from '@relaytest/core';
import type { RpcClient } from '@relaytest/rpc';
import type { HarnessPlatform } from '@relaytest/runtime';

export type FixtureOptions = {
  /** Methods both relays are configured with unless a run overrides them */
  methods: readonly string[];
  /** Start relay-client with waitforchange support */
  waitForChange?: boolean;
  /** Environment the configuration is resolved from; process.env by default */
  env?: NodeJS.ProcessEnv;
  platform?: HarnessPlatform;
  timing?: FixtureTimingInput;
  logLevel?: LogLevel;
};

export type RelayRunOptions = {
  methods?: readonly string[];
  extraArgs?: readonly string[];
};

export type RelayClient = {
  readonly port: number;
  readonly url: string;
  /** Shared client for the main test sequence */
  readonly rpc: RpcClient;
  /** Fresh client, for concurrent callers */
  createRpc(): RpcClient;
};
