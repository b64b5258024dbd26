/**
 * @relaytest/scenarios - End-to-end checks of the relay binaries
 */

export { basicCalls } from './basic-calls.js';
export { methodSelection } from './method-selection.js';
export { serverVersion } from './server-version.js';
export { transportRestart } from './transport-restart.js';
export { waitForChangeScenario } from './wait-for-change.js';
export { SCENARIOS, findScenario } from './registry.js';
export type { Scenario, ScenarioOptions } from './types.js';
