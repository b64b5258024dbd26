/**
 * Assertions that log the values involved before failing
 */

import { inspect, isDeepStrictEqual } from 'node:util';
import { AssertionFailure, type Logger, RpcError, createSilentLogger } from '@relaytest/core';

export function assertEqual(actual: unknown, expected: unknown, logger: Logger = createSilentLogger()): void {
  if (isDeepStrictEqual(actual, expected)) return;

  logger.error({ actual, expected }, 'Values are not equal');
  throw new AssertionFailure(`${inspect(actual)} != ${inspect(expected)}`);
}

/**
 * Run a call that must fail with an RPC error whose message matches
 *
 * Errors other than RpcError propagate unchanged.
 */
export async function expectRpcError(
  pattern: RegExp,
  call: () => Promise<unknown>,
  logger: Logger = createSilentLogger()
): Promise<RpcError> {
  try {
    await call();
  } catch (error) {
    if (!(error instanceof RpcError)) throw error;

    if (!pattern.test(error.message)) {
      logger.error({ message: error.message, pattern: String(pattern) }, 'Unexpected RPC error');
      throw new AssertionFailure(`RPC error "${error.message}" does not match ${String(pattern)}`, {
        cause: error
      });
    }
    logger.info({ code: error.rpcCode }, `Caught expected RPC error: ${error.message}`);
    return error;
  }

  logger.error({ pattern: String(pattern) }, 'Expected RPC error was not raised');
  throw new AssertionFailure('expected RPC error was not raised');
}
