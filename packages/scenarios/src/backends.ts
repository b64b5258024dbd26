/**
 * Backend methods shared by the scenarios
 */

import { AssertionFailure } from '@relaytest/core';
import { method } from '@relaytest/rpc';
import { z } from 'zod';

export const echo = method(z.tuple([z.unknown()]), ([value]) => value);

export const fail = method(z.tuple([z.string()]), ([message]): never => {
  throw new Error(message);
});

/** Registered on the backend, but the relays must never forward it */
export const doNotCall = method(z.tuple([]), (): never => {
  throw new AssertionFailure('invalid forwarded call');
});
