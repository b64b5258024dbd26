/**
 * Method tables for the RPC endpoint
 *
 * A table maps remote method names to handlers. It is built explicitly and
 * handed to the endpoint once; nothing is discovered at run time.
 */

import { RpcError } from '@relaytest/core';
import type { NotificationBackend } from '@relaytest/runtime';
import { type ZodTypeAny, z } from 'zod';
import { RPC_ERROR_CODE, type RpcParams } from './types.js';

export type RpcHandler = (params: RpcParams) => unknown;

export type MethodTable = Readonly<Record<string, RpcHandler>>;

/**
 * Wrap a handler with zod validation of its params
 *
 * Positional params arrive as an array, so a tuple schema is the usual
 * choice. A validation failure answers with INVALID_PARAMS.
 */
export function method<S extends ZodTypeAny>(
  schema: S,
  handler: (params: z.output<S>) => unknown
): RpcHandler {
  return (params) => {
    const parsed = schema.safeParse(params);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(params)'}: ${issue.message}`)
        .join('; ');
      throw new RpcError(RPC_ERROR_CODE.INVALID_PARAMS, `Invalid params: ${detail}`, parsed.error.issues);
    }
    return handler(parsed.data);
  };
}

/**
 * Freeze a method table
 */
export function defineMethods<T extends Record<string, RpcHandler>>(table: T): Readonly<T> {
  return Object.freeze({ ...table });
}

/**
 * The remote methods a notification backend offers
 */
export function notificationMethods(backend: Pick<NotificationBackend, 'waitForChange'>) {
  return defineMethods({
    waitforchange: method(z.tuple([z.string()]), ([known]) => backend.waitForChange(known))
  });
}
