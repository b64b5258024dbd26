/**
 * JSON-RPC client used against relay-client
 */

import { type Logger, RpcError, TransportError, createSilentLogger } from '@relaytest/core';
import { type FetchFn, nodePlatform } from '@relaytest/runtime';
import { JSONRPC_VERSION, type RpcParams, RpcResponseSchema } from './types.js';

export type RpcClientOptions = {
  url: string;
  fetch?: FetchFn;
  /** Off by default: long-poll calls may block for as long as the test wants */
  timeoutMs?: number;
  logger?: Logger;
};

export class RpcClient {
  private nextId = 1;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;

  constructor(private readonly options: RpcClientOptions) {
    this.fetchFn = options.fetch ?? nodePlatform.fetch;
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'rpc-client' });
  }

  get url(): string {
    return this.options.url;
  }

  /**
   * Call a method with positional params
   */
  async call(method: string, ...params: unknown[]): Promise<unknown> {
    return this.request(method, params);
  }

  /**
   * Call a method with keyword params
   */
  async callNamed(method: string, params: Record<string, unknown>): Promise<unknown> {
    return this.request(method, params);
  }

  /**
   * Send a notification; no result is expected
   */
  async notify(method: string, ...params: unknown[]): Promise<void> {
    const response = await this.post({ jsonrpc: JSONRPC_VERSION, method, params });
    if (!response.ok) {
      throw new TransportError(`${method} notification failed with HTTP ${response.status}`);
    }
  }

  private async request(method: string, params: RpcParams): Promise<unknown> {
    const id = this.nextId++;
    this.logger.trace({ method, id }, 'RPC call');

    const response = await this.post({ jsonrpc: JSONRPC_VERSION, id, method, params });
    if (!response.ok) {
      throw new TransportError(`${method} failed with HTTP ${response.status}`);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new TransportError(`${method} returned a non-JSON body`, { cause: error });
    }

    const parsed = RpcResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new TransportError(`${method} returned an invalid JSON-RPC response`, {
        cause: parsed.error
      });
    }

    if ('error' in parsed.data) {
      const { code, message, data } = parsed.data.error;
      throw new RpcError(code, message, data);
    }
    return parsed.data.result;
  }

  private async post(body: Record<string, unknown>): Promise<Response> {
    const { timeoutMs } = this.options;
    try {
      return await this.fetchFn(this.options.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: timeoutMs === undefined ? undefined : AbortSignal.timeout(timeoutMs)
      });
    } catch (error) {
      throw new TransportError(
        `Request to ${this.options.url} failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }
}
