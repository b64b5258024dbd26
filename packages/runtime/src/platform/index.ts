/**
 * Platform abstraction layer
 *
 * The platform is passed explicitly to every component that needs it;
 * there is no process-wide instance.
 */

export { nodePlatform } from './node.js';
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
} from './types.js';
