/**
 * Platform abstraction types
 *
 * Everything the harness does outside its own process goes through these
 * hooks: spawning binaries, binding the backend listener and issuing HTTP
 * requests. Tests swap them for in-process stand-ins.
 */

/**
 * The part of a child process the supervisor relies on
 */
export type SupervisedChild = {
  readonly pid?: number | undefined;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
};

/**
 * Process spawn options
 */
export type SpawnOptions = {
  env: NodeJS.ProcessEnv;
  cwd?: string;
};

export type SpawnProcess = (
  command: string,
  args: readonly string[],
  options: SpawnOptions
) => SupervisedChild;

/**
 * Listener returned by ServeHttp; shaped after node's http.Server
 */
export type ListeningServer = {
  close(callback?: (error?: Error) => void): unknown;
  closeIdleConnections?(): void;
  closeAllConnections?(): void;
  on(event: 'error', listener: (error: Error) => void): unknown;
};

export type FetchHandler = (request: Request) => Response | Promise<Response>;

export type ServeOptions = {
  fetch: FetchHandler;
  hostname: string;
  port: number;
};

export type ServeHttp = (options: ServeOptions, onListening: () => void) => ListeningServer;

export type HttpRequestInit = {
  method: string;
  headers: Record<string, string>;
  body: string;
  signal?: AbortSignal;
};

export type FetchFn = (url: string, init: HttpRequestInit) => Promise<Response>;

export type HarnessPlatform = {
  name: string;
  spawn: SpawnProcess;
  serve: ServeHttp;
  fetch: FetchFn;
};
