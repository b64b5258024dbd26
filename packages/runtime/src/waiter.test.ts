/**
 * Tests for the async call driver
 */

import { AssertionFailure, InvariantError } from '@relaytest/core';
import { describe, expect, it } from 'vitest';
import { delay } from './timing.js';
import { Waiter } from './waiter.js';

describe('Waiter', () => {
  it('should return the call result', async () => {
    const waiter = Waiter.issue(async () => 'bla');
    await expect(waiter.wait()).resolves.toBe('bla');
  });

  it('should re-raise the call error', async () => {
    const waiter = Waiter.issue(async () => {
      throw new Error('my error');
    });
    await expect(waiter.wait()).rejects.toThrow('my error');
  });

  it('should capture synchronous throws of the call', async () => {
    const waiter = Waiter.issue((): Promise<string> => {
      throw new Error('thrown before any await');
    });
    await expect(waiter.wait()).rejects.toThrow('thrown before any await');
  });

  it('should pass assertStillPending while the call blocks', async () => {
    let unblock: (value: string) => void = () => undefined;
    const waiter = Waiter.issue(
      () =>
        new Promise<string>((resolve) => {
          unblock = resolve;
        })
    );

    await waiter.assertStillPending(20);
    expect(waiter.settled).toBe(false);

    unblock('released');
    await expect(waiter.wait()).resolves.toBe('released');
  });

  it('should fail assertStillPending when the call returned early', async () => {
    const waiter = Waiter.issue(async () => 'too early', { label: 'waitforchange' });

    await expect(waiter.assertStillPending(10)).rejects.toThrow(AssertionFailure);
    await expect(waiter.assertStillPending(10)).rejects.toThrow(
      'waitforchange returned within 10ms but should still be blocked'
    );
  });

  it('should be single-use', async () => {
    const waiter = Waiter.issue(async () => 1);
    await waiter.wait();
    await expect(waiter.wait()).rejects.toThrow(InvariantError);
  });

  it('should start the call right away', async () => {
    let started = false;
    Waiter.issue(async () => {
      started = true;
      await delay(5);
    });
    await delay(1);
    expect(started).toBe(true);
  });
});
