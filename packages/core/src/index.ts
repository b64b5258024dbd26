/**
 * @relaytest/core - Shared building blocks for the relay test harness
 *
 * Dependency direction: core → runtime → rpc → test-utils → scenarios → cli
 */

export * from './config.js';
export * from './constants.js';
export * from './errors.js';
export * from './logger.js';
export * from './schemas.js';
