/**
 * @relaytest/runtime - Concurrency and process primitives of the harness
 *
 * Dependency direction: core → runtime → rpc → test-utils → scenarios → cli
 */

export { createCondition, createMutex } from './mutex.js';
export type { Condition, Mutex, Release } from './mutex.js';
export { TIMED_OUT, delay, raceTimeout } from './timing.js';
export { nodePlatform } from './platform/index.js';
export type {
  FetchFn,
  FetchHandler,
  HarnessPlatform,
  HttpRequestInit,
  ListeningServer,
  ServeHttp,
  ServeOptions,
  SpawnOptions,
  SpawnProcess,
  SupervisedChild
} from './platform/index.js';
export { ProcessSupervisor, redactArgs, withProcess } from './process-supervisor.js';
export type {
  ProcessHandle,
  ProcessSpec,
  ProcessStatus,
  ProcessSupervisorOptions,
  StopStrategy
} from './process-supervisor.js';
export { ALWAYS_BLOCK, NotificationBackend } from './notification-backend.js';
export type { NotificationBackendOptions, NotificationPhase } from './notification-backend.js';
export { Waiter } from './waiter.js';
export type { WaiterOptions } from './waiter.js';
export {
  startRpcSpammer,
  startSpammer,
  startUpdateSpammer,
  withSpammers
} from './spammer.js';
export type { EchoCaller, Spammer, SpammerOptions } from './spammer.js';
