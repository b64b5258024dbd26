/**
 * Environment-driven harness configuration
 *
 * A profile selects the transport server and test accounts; two directory
 * overrides locate the binaries under test and the shared data files.
 */

import { resolve } from 'node:path';
import type { ZodError } from 'zod';
import { ConfigError } from './errors.js';
import type { LogLevel } from './logger.js';
import {
  type FixtureConfig,
  FixtureConfigSchema,
  HarnessEnvSchema,
  type ProfileName
} from './schemas.js';

/**
 * Known profiles. "local" matches the containerised transport server used
 * in CI; "chat" is the shared public test deployment.
 */
export const PROFILES: Record<ProfileName, FixtureConfig> = {
  local: {
    serverDomain: 'localhost',
    pubsubService: 'pubsub.localhost',
    caFile: 'testenv.pem',
    accounts: [
      { name: 'relaytest1', password: 'password' },
      { name: 'relaytest2', password: 'password' }
    ]
  },
  chat: {
    serverDomain: 'chat.example.org',
    pubsubService: 'pubsub.chat.example.org',
    caFile: 'letsencrypt.pem',
    accounts: [
      { name: 'relaytest1', password: 'test-secret-1' },
      { name: 'relaytest2', password: 'test-secret-2' }
    ]
  }
};

export type HarnessSettings = {
  profile: ProfileName;
  config: FixtureConfig;
  /** Directory holding relay-client and relay-server */
  binDir: string;
  /** Directory holding CA certificates */
  dataDir: string;
  logLevel: LogLevel;
};

function formatIssues(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Resolve harness settings from environment variables
 */
export function resolveHarnessSettings(env: NodeJS.ProcessEnv = process.env): HarnessSettings {
  const parsed = HarnessEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid harness environment: ${formatIssues(parsed.error)}`, {
      cause: parsed.error
    });
  }

  const profile = parsed.data.RELAYTEST_PROFILE;
  const config = FixtureConfigSchema.safeParse(PROFILES[profile]);
  if (!config.success) {
    throw new ConfigError(`Invalid profile "${profile}": ${formatIssues(config.error)}`, {
      cause: config.error
    });
  }

  return {
    profile,
    config: config.data,
    binDir: resolve(parsed.data.RELAYTEST_BUILD_DIR ?? '../util'),
    dataDir: resolve(parsed.data.RELAYTEST_DATA_DIR ?? '../data'),
    logLevel: parsed.data.RELAYTEST_LOG_LEVEL
  };
}

/**
 * JID of a test account on the configured transport server
 */
export function accountJid(config: FixtureConfig, index: 0 | 1): string {
  return `${config.accounts[index].name}@${config.serverDomain}`;
}

/**
 * Absolute path of the configured CA certificate
 */
export function caFilePath(settings: Pick<HarnessSettings, 'config' | 'dataDir'>): string {
  return resolve(settings.dataDir, settings.config.caFile);
}
