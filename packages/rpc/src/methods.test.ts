import { RpcError } from '@relaytest/core';
import { NotificationBackend } from '@relaytest/runtime';
import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { defineMethods, method, notificationMethods } from './methods.js';

describe('method', () => {
  it('should hand validated params to the handler', () => {
    const handler = vi.fn(([text]: [string]) => text.toUpperCase());
    const echo = method(z.tuple([z.string()]), handler);

    expect(echo(['bla'])).toBe('BLA');
    expect(handler).toHaveBeenCalledWith(['bla']);
  });

  it('should raise INVALID_PARAMS on a mismatch', () => {
    const echo = method(z.tuple([z.string()]), ([text]) => text);

    let caught: unknown;
    try {
      echo([42]);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(RpcError);
    expect(caught).toMatchObject({
      rpcCode: -32602,
      message: 'Invalid params: 0: Expected string, received number'
    });
  });

  it('should accept keyword params with an object schema', () => {
    const add = method(z.object({ a: z.number(), b: z.number() }), ({ a, b }) => a + b);
    expect(add({ a: 2, b: 3 })).toBe(5);
  });
});

describe('defineMethods', () => {
  it('should freeze the table', () => {
    const table = defineMethods({ ping: () => 'pong' });
    expect(Object.isFrozen(table)).toBe(true);
    expect(Object.keys(table)).toEqual(['ping']);
  });
});

describe('notificationMethods', () => {
  it('should expose waitforchange only', () => {
    expect(Object.keys(notificationMethods(new NotificationBackend()))).toEqual(['waitforchange']);
  });

  it('should forward the known state to the backend', async () => {
    const waitForChange = vi.fn(async (known: string) => `after ${JSON.stringify(known)}`);
    const { waitforchange } = notificationMethods({ waitForChange });

    await expect(waitforchange([''])).resolves.toBe('after ""');
    expect(waitForChange).toHaveBeenCalledWith('');
  });
});
