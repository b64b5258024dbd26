/**
 * Scenario runs against the in-process relay network
 */

import { ConfigError } from '@relaytest/core';
import { FakeRelayNetwork } from '@relaytest/test-fixtures';
import { describe, expect, it } from 'vitest';
import { basicCalls } from './basic-calls.js';
import { methodSelection } from './method-selection.js';
import { SCENARIOS, findScenario } from './registry.js';
import { serverVersion } from './server-version.js';
import { transportRestart } from './transport-restart.js';
import type { ScenarioOptions } from './types.js';
import { waitForChangeScenario } from './wait-for-change.js';

function scenarioOptions(network: FakeRelayNetwork): ScenarioOptions {
  return {
    env: { RELAYTEST_BUILD_DIR: '/opt/relay/bin', RELAYTEST_DATA_DIR: '/opt/relay/data' },
    platform: network.platform,
    timing: { startupGraceMs: 0, basePort: 21_000 },
    logLevel: 'silent',
    spamIntervalMs: 1
  };
}

describe('scenarios', () => {
  it('should pass basic-calls and use a second server for reselection', async () => {
    const network = new FakeRelayNetwork();
    await basicCalls(scenarioOptions(network));

    expect(network.processes.map((p) => p.role)).toEqual(['client', 'server', 'server']);
    expect(network.running()).toEqual([]);
  });

  it('should pass method-selection with both flag combinations', async () => {
    const network = new FakeRelayNetwork();
    await methodSelection(scenarioOptions(network));

    const [, , , excludeServer] = network.processes;
    expect(network.processes).toHaveLength(4);
    expect(excludeServer?.args.slice(-4)).toEqual([
      '--methods',
      'echo,doNotCall',
      '--methods_exclude',
      'doNotCall'
    ]);
  });

  it('should pass server-version', async () => {
    const network = new FakeRelayNetwork();
    await serverVersion(scenarioOptions(network));

    expect(network.processes.map((p) => p.flags.backendVersion)).toEqual(['right', 'left', 'right', 'left']);
  });

  it('should pass wait-for-change', async () => {
    const network = new FakeRelayNetwork();
    await waitForChangeScenario(scenarioOptions(network));

    const [client] = network.processes;
    expect(client?.flags.waitForChange).toBe(true);
  });

  it('should pass transport-restart across a simulated outage', async () => {
    const network = new FakeRelayNetwork();
    let outages = 0;

    await transportRestart({
      ...scenarioOptions(network),
      disrupt: async () => {
        outages += 1;
        await network.disrupt(50);
      }
    });

    expect(outages).toBe(1);
    expect(network.outage).toBe(false);
  });

  it('should refuse transport-restart without a disrupt hook', async () => {
    const network = new FakeRelayNetwork();

    await expect(transportRestart(scenarioOptions(network))).rejects.toBeInstanceOf(ConfigError);
    expect(network.processes).toEqual([]);
  });
});

describe('registry', () => {
  it('should list every scenario once', () => {
    expect(SCENARIOS.map((s) => s.name)).toEqual([
      'basic-calls',
      'method-selection',
      'server-version',
      'wait-for-change',
      'transport-restart'
    ]);
  });

  it('should mark only transport-restart as interactive', () => {
    expect(SCENARIOS.filter((s) => s.interactive).map((s) => s.name)).toEqual(['transport-restart']);
  });

  it('should look scenarios up by name', () => {
    expect(findScenario('server-version')?.run).toBe(serverVersion);
    expect(findScenario('nope')).toBeUndefined();
  });
});
