/**
 * JSON-RPC endpoint the relay-server forwards calls to
 *
 * Served by a hono app on POST /. Requests are dispatched concurrently, so
 * a long-poll call parked in one handler never holds up another.
 */

import {
  DEFAULT_SHUTDOWN_GRACE_MS,
  type Logger,
  RpcError,
  SHUTDOWN_POLL_INTERVAL_MS,
  createSilentLogger,
  invariant,
  toErrorInfo
} from '@relaytest/core';
import {
  type HarnessPlatform,
  type ListeningServer,
  delay,
  nodePlatform
} from '@relaytest/runtime';
import { type Context, Hono } from 'hono';
import type { MethodTable, RpcHandler } from './methods.js';
import {
  JSONRPC_VERSION,
  RPC_ERROR_CODE,
  type RpcErrorObject,
  type RpcId,
  type RpcParams,
  RpcRequestSchema
} from './types.js';

export type EndpointAddress = {
  host: string;
  port: number;
};

export type RpcEndpointOptions = {
  logger?: Logger;
  platform?: Pick<HarnessPlatform, 'serve'>;
  /** How long stop() lets open connections drain before closing them */
  shutdownGraceMs?: number;
};

type DispatchOutcome = { ok: true; result: unknown } | { ok: false; error: RpcErrorObject };

function errorBody(id: RpcId, error: RpcErrorObject) {
  return { jsonrpc: JSONRPC_VERSION, id, error };
}

// Best effort id recovery for an invalid request
function idOf(body: unknown): RpcId {
  if (typeof body !== 'object' || body === null || !('id' in body)) return null;
  const { id } = body;
  return typeof id === 'string' || typeof id === 'number' ? id : null;
}

export class RpcEndpoint {
  readonly app = new Hono();
  private readonly registry: ReadonlyMap<string, RpcHandler>;
  private readonly logger: Logger;
  private readonly platform: Pick<HarnessPlatform, 'serve'>;
  private readonly shutdownGraceMs: number;
  private server?: ListeningServer;

  constructor(methods: MethodTable, options: RpcEndpointOptions = {}) {
    this.registry = new Map(Object.entries(methods));
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'rpc-endpoint' });
    this.platform = options.platform ?? nodePlatform;
    this.shutdownGraceMs = options.shutdownGraceMs ?? DEFAULT_SHUTDOWN_GRACE_MS;

    this.app.post('/', (c) => this.handle(c));
  }

  get methodNames(): string[] {
    return [...this.registry.keys()];
  }

  get listening(): boolean {
    return this.server !== undefined;
  }

  /**
   * Bind the listener; the endpoint is reachable once this resolves
   */
  async start(address: EndpointAddress): Promise<void> {
    invariant(!this.server, 'RPC endpoint is already started');

    let markListening: () => void = () => undefined;
    const listening = new Promise<void>((resolve) => {
      markListening = resolve;
    });
    const server = this.platform.serve(
      { fetch: this.app.fetch, hostname: address.host, port: address.port },
      () => markListening()
    );
    let started = false;
    let markFailed: (error: Error) => void = () => undefined;
    const failed = new Promise<never>((_, reject) => {
      markFailed = reject;
    });
    server.on('error', (error) => {
      if (!started) {
        markFailed(error);
        return;
      }
      this.logger.error({ error: toErrorInfo(error) }, 'RPC endpoint listener error');
    });

    await Promise.race([listening, failed]);
    started = true;
    this.server = server;

    this.logger.info(
      { host: address.host, port: address.port, methods: this.methodNames },
      `RPC endpoint listening on http://${address.host}:${address.port}`
    );
  }

  /**
   * Close the listener and wait for it to drain
   *
   * Idle connections are dropped at once. Connections still busy after the
   * grace period, such as parked long-poll calls, are closed by force.
   */
  async stop(): Promise<void> {
    const server = this.server;
    invariant(server, 'RPC endpoint is not running');
    this.server = undefined;

    let closed = false;
    server.close((error) => {
      if (error) {
        this.logger.warn({ error: toErrorInfo(error) }, 'RPC endpoint close reported an error');
      }
      closed = true;
    });
    server.closeIdleConnections?.();

    const deadline = Date.now() + this.shutdownGraceMs;
    let forced = false;
    while (!closed) {
      if (!forced && Date.now() >= deadline) {
        forced = true;
        this.logger.warn({ graceMs: this.shutdownGraceMs }, 'Forcing close of remaining connections');
        server.closeAllConnections?.();
      }
      await delay(SHUTDOWN_POLL_INTERVAL_MS);
    }

    this.logger.info('RPC endpoint stopped');
  }

  private async handle(c: Context): Promise<Response> {
    let body: unknown;
    try {
      body = JSON.parse(await c.req.text());
    } catch (error) {
      this.logger.debug({ error: toErrorInfo(error) }, 'Unparseable request body');
      return c.json(errorBody(null, { code: RPC_ERROR_CODE.PARSE_ERROR, message: 'Parse error' }));
    }

    const request = RpcRequestSchema.safeParse(body);
    if (!request.success) {
      return c.json(
        errorBody(idOf(body), {
          code: RPC_ERROR_CODE.INVALID_REQUEST,
          message: 'Invalid Request',
          data: request.error.issues.map((issue) => issue.message)
        })
      );
    }

    const { id, method, params = [] } = request.data;
    this.logger.trace({ method, id }, 'RPC request');
    const outcome = await this.dispatch(method, params);

    if (id === undefined) {
      return c.body(null, 204);
    }
    if (!outcome.ok) {
      return c.json(errorBody(id, outcome.error));
    }
    return c.json({ jsonrpc: JSONRPC_VERSION, id, result: outcome.result ?? null });
  }

  private async dispatch(name: string, params: RpcParams): Promise<DispatchOutcome> {
    const handler = this.registry.get(name);
    if (!handler) {
      this.logger.debug({ method: name }, 'Unknown method');
      return {
        ok: false,
        error: { code: RPC_ERROR_CODE.METHOD_NOT_FOUND, message: `METHOD_NOT_FOUND: ${name}` }
      };
    }

    try {
      return { ok: true, result: await handler(params) };
    } catch (error) {
      if (error instanceof RpcError) {
        return { ok: false, error: { code: error.rpcCode, message: error.message, data: error.data } };
      }
      this.logger.debug({ method: name, error: toErrorInfo(error) }, 'Method raised');
      return {
        ok: false,
        error: {
          code: RPC_ERROR_CODE.SERVER_ERROR,
          message: error instanceof Error ? error.message : String(error)
        }
      };
    }
  }
}

/**
 * Run a callback while an endpoint serves the given methods
 */
export async function withEndpoint<T>(
  methods: MethodTable,
  address: EndpointAddress,
  options: RpcEndpointOptions,
  callback: (endpoint: RpcEndpoint) => Promise<T>
): Promise<T> {
  const endpoint = new RpcEndpoint(methods, options);
  await endpoint.start(address);

  try {
    return await callback(endpoint);
  } finally {
    await endpoint.stop();
  }
}
