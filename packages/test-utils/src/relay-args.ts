/**
 * Command lines of the relay binaries
 *
 * The first account is the server role, the second the client role.
 */

import { type FixtureConfig, accountJid } from '@relaytest/core';

export type RelayArgsOptions = {
  config: FixtureConfig;
  /** Absolute CA certificate path */
  caFile: string;
  methods: readonly string[];
  extraArgs?: readonly string[];
};

export function relayClientArgs(
  options: RelayArgsOptions & { port: number; waitForChange?: boolean }
): string[] {
  const { config } = options;
  const args = [
    '--port',
    String(options.port),
    '--client_jid',
    accountJid(config, 1),
    '--server_jid',
    accountJid(config, 0),
    '--password',
    config.accounts[1].password,
    '--cafile',
    options.caFile,
    '--methods',
    options.methods.join(',')
  ];
  if (options.waitForChange) args.push('--waitforchange');

  return [...args, ...(options.extraArgs ?? [])];
}

export function relayServerArgs(options: RelayArgsOptions & { backendRpcUrl: string }): string[] {
  const { config } = options;
  return [
    '--backend_rpc_url',
    options.backendRpcUrl,
    '--server_jid',
    accountJid(config, 0),
    '--password',
    config.accounts[0].password,
    '--pubsub_service',
    config.pubsubService,
    '--cafile',
    options.caFile,
    '--methods',
    options.methods.join(','),
    ...(options.extraArgs ?? [])
  ];
}
