/**
 * Tests for the JSON-RPC endpoint
 */

import { EventEmitter } from 'node:events';
import { createLogger } from '@relaytest/core';
import { NotificationBackend, type ListeningServer, type ServeHttp, Waiter } from '@relaytest/runtime';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { RpcEndpoint, withEndpoint } from './endpoint.js';
import { defineMethods, method, notificationMethods } from './methods.js';

class FakeListener extends EventEmitter implements ListeningServer {
  busy = 0;
  forced = false;
  private onClosed?: (error?: Error) => void;

  close(callback?: (error?: Error) => void): this {
    this.onClosed = callback;
    this.settle();
    return this;
  }

  closeIdleConnections(): void {}

  closeAllConnections(): void {
    this.forced = true;
    this.busy = 0;
    this.settle();
  }

  private settle(): void {
    const callback = this.onClosed;
    if (this.busy === 0 && callback) {
      this.onClosed = undefined;
      setImmediate(() => callback());
    }
  }
}

function createFakeServe() {
  const listeners: FakeListener[] = [];
  const serve = vi.fn<ServeHttp>((_options, onListening) => {
    const listener = new FakeListener();
    listeners.push(listener);
    setImmediate(onListening);
    return listener;
  });
  return { serve, listeners };
}

const notify = vi.fn();

const methods = defineMethods({
  echo: method(z.tuple([z.unknown()]), ([value]) => value),
  error: method(z.tuple([z.string()]), ([message]) => {
    throw new Error(message);
  }),
  add: method(z.object({ a: z.number(), b: z.number() }), ({ a, b }) => a + b),
  nothing: () => undefined,
  notify: (params) => notify(params)
});

async function post(endpoint: RpcEndpoint, body: string): Promise<Response> {
  return endpoint.app.request('/', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body
  });
}

describe('RpcEndpoint', () => {
  afterEach(() => {
    notify.mockReset();
  });

  describe('dispatch', () => {
    const endpoint = new RpcEndpoint(methods);

    it('should answer positional calls with the handler value', async () => {
      const response = await post(endpoint, '{"jsonrpc":"2.0","id":1,"method":"echo","params":["bla"]}');

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ jsonrpc: '2.0', id: 1, result: 'bla' });
    });

    it('should answer keyword calls', async () => {
      const response = await post(
        endpoint,
        '{"jsonrpc":"2.0","id":"k","method":"add","params":{"a":2,"b":3}}'
      );
      expect(await response.json()).toEqual({ jsonrpc: '2.0', id: 'k', result: 5 });
    });

    it('should send null for a handler without a value', async () => {
      const response = await post(endpoint, '{"jsonrpc":"2.0","id":2,"method":"nothing"}');
      expect(await response.json()).toEqual({ jsonrpc: '2.0', id: 2, result: null });
    });

    it('should keep the message of a handler error', async () => {
      const response = await post(
        endpoint,
        '{"jsonrpc":"2.0","id":3,"method":"error","params":["my error"]}'
      );
      expect(await response.json()).toEqual({
        jsonrpc: '2.0',
        id: 3,
        error: { code: -32000, message: 'my error' }
      });
    });

    it('should report unknown methods as METHOD_NOT_FOUND', async () => {
      const response = await post(endpoint, '{"jsonrpc":"2.0","id":4,"method":"doNotCall","params":[]}');
      expect(await response.json()).toEqual({
        jsonrpc: '2.0',
        id: 4,
        error: { code: -32601, message: 'METHOD_NOT_FOUND: doNotCall' }
      });
    });

    it('should reject params the schema refuses', async () => {
      const response = await post(endpoint, '{"jsonrpc":"2.0","id":5,"method":"echo","params":[]}');
      const body = await response.json();

      expect(body).toMatchObject({ jsonrpc: '2.0', id: 5, error: { code: -32602 } });
    });

    it('should answer a parse error for malformed JSON', async () => {
      const response = await post(endpoint, '{not json');
      expect(await response.json()).toEqual({
        jsonrpc: '2.0',
        id: null,
        error: { code: -32700, message: 'Parse error' }
      });
    });

    it('should answer an invalid request and keep its id', async () => {
      const response = await post(endpoint, '{"id":7,"method":"echo"}');
      expect(await response.json()).toMatchObject({
        jsonrpc: '2.0',
        id: 7,
        error: { code: -32600, message: 'Invalid Request' }
      });
    });

    it('should run notifications and answer 204', async () => {
      const response = await post(endpoint, '{"jsonrpc":"2.0","method":"notify","params":["ping"]}');

      expect(response.status).toBe(204);
      expect(notify).toHaveBeenCalledWith(['ping']);
    });

    it('should not answer GET', async () => {
      const response = await endpoint.app.request('/', { method: 'GET' });
      expect(response.status).toBe(404);
    });
  });

  describe('concurrency', () => {
    it('should serve other methods while a long-poll call is parked', async () => {
      const backend = new NotificationBackend();
      const endpoint = new RpcEndpoint({ ...methods, ...notificationMethods(backend) });
      await backend.enable();

      const parked = Waiter.issue(() =>
        post(endpoint, '{"jsonrpc":"2.0","id":1,"method":"waitforchange","params":[""]}')
      );
      await parked.assertStillPending(20);

      const echo = await post(endpoint, '{"jsonrpc":"2.0","id":2,"method":"echo","params":["free"]}');
      expect(await echo.json()).toEqual({ jsonrpc: '2.0', id: 2, result: 'free' });

      await backend.update('first');
      const released = await parked.wait();
      expect(await released.json()).toEqual({ jsonrpc: '2.0', id: 1, result: 'first' });
    });
  });

  describe('lifecycle', () => {
    it('should bind through the platform serve hook', async () => {
      const { serve } = createFakeServe();
      const endpoint = new RpcEndpoint(methods, { platform: { serve } });

      await endpoint.start({ host: '127.0.0.1', port: 4242 });

      expect(endpoint.listening).toBe(true);
      expect(serve).toHaveBeenCalledWith(
        expect.objectContaining({ hostname: '127.0.0.1', port: 4242 }),
        expect.any(Function)
      );
      await endpoint.stop();
      expect(endpoint.listening).toBe(false);
    });

    it('should fail start when the listener errors', async () => {
      const serve: ServeHttp = () => {
        const listener = new FakeListener();
        setImmediate(() => listener.emit('error', new Error('EADDRINUSE')));
        return listener;
      };
      const endpoint = new RpcEndpoint(methods, { platform: { serve } });

      await expect(endpoint.start({ host: '127.0.0.1', port: 4242 })).rejects.toThrow('EADDRINUSE');
      expect(endpoint.listening).toBe(false);
    });

    it('should log listener errors raised after start', async () => {
      const { serve, listeners } = createFakeServe();
      const lines: string[] = [];
      const logger = createLogger({
        level: 'error',
        destination: {
          write: (msg: string) => {
            lines.push(msg);
          }
        }
      });
      const endpoint = new RpcEndpoint(methods, { platform: { serve }, logger });
      await endpoint.start({ host: '127.0.0.1', port: 4242 });

      listeners[0]?.emit('error', new Error('ECONNRESET'));

      expect(lines).toHaveLength(1);
      const record = JSON.parse(lines[0] ?? '{}') as { msg?: string; error?: { message?: string } };
      expect(record.msg).toBe('RPC endpoint listener error');
      expect(record.error?.message).toBe('ECONNRESET');
      expect(endpoint.listening).toBe(true);
      await endpoint.stop();
    });

    it('should refuse a second start', async () => {
      const { serve } = createFakeServe();
      const endpoint = new RpcEndpoint(methods, { platform: { serve } });
      await endpoint.start({ host: '127.0.0.1', port: 4242 });

      await expect(endpoint.start({ host: '127.0.0.1', port: 4243 })).rejects.toThrow(
        'RPC endpoint is already started'
      );
      await endpoint.stop();
    });

    it('should force-close busy connections after the grace period', async () => {
      const { serve, listeners } = createFakeServe();
      const endpoint = new RpcEndpoint(methods, { platform: { serve }, shutdownGraceMs: 50 });
      await endpoint.start({ host: '127.0.0.1', port: 4242 });
      const listener = listeners[0];
      if (!listener) throw new Error('no listener created');
      listener.busy = 1;

      await endpoint.stop();

      expect(listener.forced).toBe(true);
    });

    it('should close without forcing when nothing is busy', async () => {
      const { serve, listeners } = createFakeServe();
      const endpoint = new RpcEndpoint(methods, { platform: { serve }, shutdownGraceMs: 50 });
      await endpoint.start({ host: '127.0.0.1', port: 4242 });

      await endpoint.stop();

      expect(listeners[0]?.forced).toBe(false);
    });

    it('should stop the endpoint when a scoped callback throws', async () => {
      const { serve } = createFakeServe();
      let scoped: RpcEndpoint | undefined;

      await expect(
        withEndpoint(methods, { host: '127.0.0.1', port: 4242 }, { platform: { serve } }, async (endpoint) => {
          scoped = endpoint;
          throw new Error('scope failed');
        })
      ).rejects.toThrow('scope failed');
      expect(scoped?.listening).toBe(false);
    });
  });
});
