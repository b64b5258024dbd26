import { PORT_RANGE_MAX, PORT_RANGE_MIN, invariant } from '@relaytest/core';

const MAX_PORT = 65_535;

export type PortAllocator = {
  readonly base: number;
  /** Next port of the sequence; never repeats */
  next(): number;
};

/**
 * Pick a random starting port for one fixture
 */
export function randomBasePort(): number {
  return PORT_RANGE_MIN + Math.floor(Math.random() * (PORT_RANGE_MAX - PORT_RANGE_MIN));
}

/**
 * Create a strictly increasing port counter
 */
export function createPortAllocator(base: number = randomBasePort()): PortAllocator {
  let nextPort = base;

  return {
    base,
    next() {
      invariant(nextPort <= MAX_PORT, `port range exhausted after ${MAX_PORT}`);
      return nextPort++;
    }
  };
}
