import { basicCalls } from './basic-calls.js';
import { methodSelection } from './method-selection.js';
import { serverVersion } from './server-version.js';
import { transportRestart } from './transport-restart.js';
import type { Scenario } from './types.js';
import { waitForChangeScenario } from './wait-for-change.js';

export const SCENARIOS: readonly Scenario[] = [
  {
    name: 'basic-calls',
    description: 'Forwarding of plain calls and errors, then server reselection',
    interactive: false,
    run: basicCalls
  },
  {
    name: 'method-selection',
    description: 'The --methods and --methods_exclude lists',
    interactive: false,
    run: methodSelection
  },
  {
    name: 'server-version',
    description: 'Clients pick the server with their --backend_version',
    interactive: false,
    run: serverVersion
  },
  {
    name: 'wait-for-change',
    description: 'Relaying of waitforchange updates and reselection',
    interactive: false,
    run: waitForChangeScenario
  },
  {
    name: 'transport-restart',
    description: 'Recovery from a transport server restart under load',
    interactive: true,
    run: transportRestart
  }
];

export function findScenario(name: string): Scenario | undefined {
  return SCENARIOS.find((scenario) => scenario.name === name);
}
