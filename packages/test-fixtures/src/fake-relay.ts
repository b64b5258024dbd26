/**
 * In-process stand-in for the relay binaries
 *
 * Spawning relay-client or relay-server through this platform yields a fake
 * process that reads the same flags as the real binaries. A client answers
 * JSON-RPC on its --port and relays each call to the most recently started
 * server with the same --backend_version; that server calls into the
 * backend listener the harness bound through serve(). No socket is opened
 * and no binary is run.
 */

import { EventEmitter } from 'node:events';
import { basename } from 'node:path';
import { CLIENT_STOP_METHOD, RELAY_CLIENT_BINARY, RELAY_SERVER_BINARY } from '@relaytest/core';
import {
  JSONRPC_VERSION,
  RPC_ERROR_CODE,
  type RpcErrorObject,
  type RpcParams,
  RpcRequestSchema,
  RpcResponseSchema
} from '@relaytest/rpc';
import {
  type FetchFn,
  type FetchHandler,
  type HarnessPlatform,
  type ListeningServer,
  type ServeHttp,
  type SpawnProcess,
  type SupervisedChild,
  delay
} from '@relaytest/runtime';
import { Hono } from 'hono';
import { type RelayFlags, parseRelayFlags } from './relay-flags.js';

export type FakeRelayRole = 'client' | 'server';

type RelayOutcome = { result: unknown } | { error: RpcErrorObject };

const WAIT_FOR_CHANGE = 'waitforchange';

let nextPid = 40_000;

function failure(code: number, message: string): RelayOutcome {
  return { error: { code, message } };
}

function portOf(url: string): number {
  return Number(new URL(url).port);
}

export class FakeRelayProcess extends EventEmitter implements SupervisedChild {
  readonly pid = nextPid++;
  readonly signals: NodeJS.Signals[] = [];
  /** Ignore SIGTERM and the stop notification, as a wedged binary would */
  hang = false;
  private running = true;

  constructor(
    readonly role: FakeRelayRole,
    readonly binary: string,
    readonly args: readonly string[],
    readonly env: NodeJS.ProcessEnv,
    readonly flags: RelayFlags,
    private readonly onExit: (process: FakeRelayProcess) => void
  ) {
    super();
  }

  get alive(): boolean {
    return this.running;
  }

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    if (!this.running) return false;
    this.signals.push(signal);
    if (signal === 'SIGKILL' || !this.hang) {
      this.exit(null, signal);
    }
    return true;
  }

  exit(code: number | null, signal: NodeJS.Signals | null): void {
    if (!this.running) return;
    this.running = false;
    this.onExit(this);
    setImmediate(() => this.emit('exit', code, signal));
  }
}

/**
 * Spawn result for a binary that does not exist
 */
class MissingBinary extends EventEmitter implements SupervisedChild {
  readonly pid = undefined;

  constructor(command: string) {
    super();
    const error = Object.assign(new Error(`spawn ${command} ENOENT`), { code: 'ENOENT' });
    setImmediate(() => this.emit('error', error));
  }

  kill(): boolean {
    return false;
  }
}

class FakeBackendListener extends EventEmitter implements ListeningServer {
  private active = 0;
  private onClosed?: (error?: Error) => void;

  constructor(
    readonly port: number,
    private readonly handler: FetchHandler,
    private readonly unbind: (listener: FakeBackendListener) => void
  ) {
    super();
  }

  async dispatch(request: Request): Promise<Response> {
    this.active += 1;
    try {
      return await this.handler(request);
    } finally {
      this.active = Math.max(0, this.active - 1);
      this.settle();
    }
  }

  close(callback?: (error?: Error) => void): this {
    this.unbind(this);
    this.onClosed = callback ?? (() => undefined);
    this.settle();
    return this;
  }

  closeAllConnections(): void {
    this.active = 0;
    this.settle();
  }

  private settle(): void {
    const callback = this.onClosed;
    if (callback && this.active === 0) {
      this.onClosed = undefined;
      setImmediate(() => callback());
    }
  }
}

type FakeRelayClient = {
  relay: FakeRelayProcess;
  app: Hono;
  /** Last state the client saw from waitforchange */
  lastState?: string;
};

export class FakeRelayNetwork {
  readonly processes: FakeRelayProcess[] = [];
  readonly platform: HarnessPlatform;
  private readonly clients = new Map<number, FakeRelayClient>();
  private readonly listeners = new Map<number, FakeBackendListener>();
  private down = false;

  constructor() {
    const spawn: SpawnProcess = (command, args, options) => this.spawn(command, args, options.env);
    const serve: ServeHttp = (options, onListening) => this.serve(options.port, options.fetch, onListening);
    const fetch: FetchFn = (url, init) => this.fetch(url, init);
    this.platform = { name: 'fake-relay', spawn, serve, fetch };
  }

  get outage(): boolean {
    return this.down;
  }

  /**
   * Simulate losing the transport server; calls time out while it is down
   */
  setOutage(down: boolean): void {
    this.down = down;
  }

  /**
   * Take the transport down for a while, then bring it back
   */
  async disrupt(durationMs: number): Promise<void> {
    this.setOutage(true);
    await delay(durationMs);
    this.setOutage(false);
  }

  running(role?: FakeRelayRole): FakeRelayProcess[] {
    return this.processes.filter((p) => p.alive && (role === undefined || p.role === role));
  }

  get backendPorts(): number[] {
    return [...this.listeners.keys()];
  }

  private spawn(command: string, args: readonly string[], env: NodeJS.ProcessEnv): SupervisedChild {
    const name = basename(command);
    const role: FakeRelayRole | undefined =
      name === RELAY_CLIENT_BINARY ? 'client' : name === RELAY_SERVER_BINARY ? 'server' : undefined;
    if (!role) return new MissingBinary(command);

    const flags = parseRelayFlags(args);
    const relay = new FakeRelayProcess(role, command, args, env, flags, (p) => this.onExit(p));
    this.processes.push(relay);

    if (role === 'server') {
      // relay-server refuses to start without a backend
      if (!flags.backendRpcUrl) relay.exit(1, null);
      return relay;
    }

    if (flags.port === undefined || this.clients.has(flags.port)) {
      relay.exit(1, null);
      return relay;
    }
    this.clients.set(flags.port, { relay, app: this.createClientApp(relay) });
    return relay;
  }

  private onExit(relay: FakeRelayProcess): void {
    const port = relay.flags.port;
    if (relay.role === 'client' && port !== undefined && this.clients.get(port)?.relay === relay) {
      this.clients.delete(port);
    }
  }

  private serve(port: number, handler: FetchHandler, onListening: () => void): ListeningServer {
    const listener = new FakeBackendListener(port, handler, (closed) => {
      if (this.listeners.get(closed.port) === closed) this.listeners.delete(closed.port);
    });

    if (this.listeners.has(port)) {
      const error = Object.assign(new Error(`listen EADDRINUSE: address already in use :::${port}`), {
        code: 'EADDRINUSE'
      });
      setImmediate(() => listener.emit('error', error));
      return listener;
    }

    this.listeners.set(port, listener);
    setImmediate(onListening);
    return listener;
  }

  private async fetch(url: string, init: Parameters<FetchFn>[1]): Promise<Response> {
    const client = this.clients.get(portOf(url));
    if (!client) {
      throw new TypeError('fetch failed', { cause: new Error(`connect ECONNREFUSED ${url}`) });
    }
    return client.app.request(url, init);
  }

  private createClientApp(relay: FakeRelayProcess): Hono {
    const app = new Hono();

    app.post('/', async (c) => {
      const request = RpcRequestSchema.safeParse(await c.req.json());
      if (!request.success) {
        return c.json({
          jsonrpc: JSONRPC_VERSION,
          id: null,
          error: { code: RPC_ERROR_CODE.INVALID_REQUEST, message: 'Invalid Request' }
        });
      }

      const { id, method, params = [] } = request.data;
      if (id === undefined) {
        if (method === CLIENT_STOP_METHOD && !relay.hang) {
          relay.exit(0, null);
        }
        return c.body(null, 204);
      }

      const outcome = await this.relayCall(relay, method, params);
      return c.json({ jsonrpc: JSONRPC_VERSION, id, ...outcome });
    });

    return app;
  }

  private async relayCall(relay: FakeRelayProcess, method: string, params: RpcParams): Promise<RelayOutcome> {
    if (this.down) {
      return failure(RPC_ERROR_CODE.SERVER_ERROR, 'timeout waiting for the server response');
    }

    if (method === WAIT_FOR_CHANGE && relay.flags.waitForChange) {
      return this.relayWaitForChange(relay, params);
    }
    if (!relay.flags.methods.has(method)) {
      return failure(RPC_ERROR_CODE.METHOD_NOT_FOUND, `METHOD_NOT_FOUND: ${method}`);
    }
    return this.forward(relay.flags.backendVersion, method, params);
  }

  // A known state that differs from the last one seen is answered locally;
  // anything else waits on the backend
  private async relayWaitForChange(relay: FakeRelayProcess, params: RpcParams): Promise<RelayOutcome> {
    const client = relay.flags.port === undefined ? undefined : this.clients.get(relay.flags.port);
    const known = Array.isArray(params) ? params[0] : undefined;
    const last = client?.lastState;
    if (typeof known === 'string' && known !== '' && last !== undefined && known !== last) {
      return { result: last };
    }

    const outcome = await this.forward(relay.flags.backendVersion, WAIT_FOR_CHANGE, ['']);
    if (client && 'result' in outcome && typeof outcome.result === 'string') {
      client.lastState = outcome.result;
    }
    return outcome;
  }

  private selectServer(version: string, method: string): FakeRelayProcess | undefined {
    return this.running('server')
      .filter((server) => server.flags.backendVersion === version)
      .filter((server) => method === WAIT_FOR_CHANGE || server.flags.methods.has(method))
      .at(-1);
  }

  private async forward(version: string, method: string, params: RpcParams): Promise<RelayOutcome> {
    const server = this.selectServer(version, method);
    const backendUrl = server?.flags.backendRpcUrl;
    if (!backendUrl) {
      return failure(RPC_ERROR_CODE.SERVER_ERROR, 'timeout waiting for a server');
    }

    const listener = this.listeners.get(portOf(backendUrl));
    if (!listener) {
      return failure(RPC_ERROR_CODE.SERVER_ERROR, `backend at ${backendUrl} is unreachable`);
    }

    const response = await listener.dispatch(
      new Request(backendUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ jsonrpc: JSONRPC_VERSION, id: 1, method, params })
      })
    );
    const parsed = RpcResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      return failure(RPC_ERROR_CODE.INTERNAL_ERROR, 'invalid response from the backend');
    }
    return 'error' in parsed.data ? { error: parsed.data.error } : { result: parsed.data.result ?? null };
  }
}
