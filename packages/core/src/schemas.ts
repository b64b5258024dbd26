/**
 * Configuration schemas for relaytest
 * Using Zod for runtime validation and type inference
 */

import { z } from 'zod';
import { LOG_LEVELS, isLogLevel, type LogLevel } from './logger.js';
import {
  DEFAULT_LOG_DIR_VARIABLE,
  DEFAULT_STARTUP_GRACE_MS,
  DEFAULT_STOP_TIMEOUT_MS,
  PORT_RANGE_MIN
} from './constants.js';

export const TestAccountSchema = z
  .object({
    name: z.string().min(1).describe('Account name, without domain'),
    password: z.string().min(1).describe('Account credential')
  })
  .strict();

/**
 * Transport server and accounts a fixture runs its relays against
 */
export const FixtureConfigSchema = z
  .object({
    serverDomain: z.string().min(1).describe('Domain of the transport server'),
    pubsubService: z.string().min(1).describe('Pubsub service the relay-server announces on'),
    caFile: z.string().min(1).describe('CA certificate file name inside the data directory'),
    accounts: z
      .tuple([TestAccountSchema, TestAccountSchema])
      .describe('Server-role account first, client-role account second')
  })
  .strict();

export const ProfileNameSchema = z.enum(['local', 'chat']);

const LogLevelSchema = z.custom<LogLevel>(
  (value) => typeof value === 'string' && isLogLevel(value),
  { message: `Expected one of: ${LOG_LEVELS.join(', ')}` }
);

/**
 * Environment variables understood by the harness
 */
export const HarnessEnvSchema = z.object({
  RELAYTEST_PROFILE: ProfileNameSchema.optional().default('local'),
  RELAYTEST_BUILD_DIR: z.string().min(1).optional(),
  RELAYTEST_DATA_DIR: z.string().min(1).optional(),
  RELAYTEST_LOG_LEVEL: LogLevelSchema.optional().default('info')
});

/**
 * Timing and process knobs of a fixture
 */
export const FixtureTimingSchema = z
  .object({
    startupGraceMs: z.number().int().min(0).optional().default(DEFAULT_STARTUP_GRACE_MS),
    stopTimeoutMs: z.number().int().positive().optional().default(DEFAULT_STOP_TIMEOUT_MS),
    basePort: z.number().int().min(PORT_RANGE_MIN).max(65_535).optional(),
    logDirVariable: z.string().min(1).optional().default(DEFAULT_LOG_DIR_VARIABLE)
  })
  .strict();

export type TestAccount = z.infer<typeof TestAccountSchema>;
export type FixtureConfig = z.infer<typeof FixtureConfigSchema>;
export type ProfileName = z.infer<typeof ProfileNameSchema>;
export type HarnessEnv = z.infer<typeof HarnessEnvSchema>;
export type FixtureTiming = z.infer<typeof FixtureTimingSchema>;
export type FixtureTimingInput = z.input<typeof FixtureTimingSchema>;
