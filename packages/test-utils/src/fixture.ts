/**
 * Test fixture for relay integration tests
 *
 * A fixture owns one temporary working directory, a pair of loggers writing
 * into it and a port counter. relay-client and relay-server processes are
 * run through scoped helpers that guarantee their teardown.
 */

import { join } from 'node:path';
import {
  CLIENT_STOP_METHOD,
  ConfigError,
  type FixtureTiming,
  FixtureTimingSchema,
  type HarnessSettings,
  type Logger,
  RELAY_CLIENT_BINARY,
  RELAY_SERVER_BINARY,
  type RpcError,
  caFilePath,
  createFixtureLoggers,
  resolveHarnessSettings,
  toErrorInfo
} from '@relaytest/core';
import { type MethodTable, RpcClient, withEndpoint } from '@relaytest/rpc';
import { type HarnessPlatform, delay, nodePlatform, withProcess } from '@relaytest/runtime';
import { assertEqual, expectRpcError } from './assertions.js';
import { type PortAllocator, createPortAllocator } from './port-utils.js';
import { relayClientArgs, relayServerArgs } from './relay-args.js';
import { cleanupTempDir, createTempDir } from './temp-utils.js';
import type { FixtureOptions, RelayClient, RelayRunOptions } from './types.js';

const BACKEND_HOST = 'localhost';

function parseTiming(options: FixtureOptions): FixtureTiming {
  const parsed = FixtureTimingSchema.safeParse(options.timing ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid fixture timing: ${detail.join('; ')}`, { cause: parsed.error });
  }
  return parsed.data;
}

export class Fixture {
  private closed = false;

  private constructor(
    readonly settings: HarnessSettings,
    readonly workDir: string,
    /** Detailed log, file only */
    readonly log: Logger,
    /** Progress log, stderr and file */
    readonly main: Logger,
    private readonly closeLoggers: () => void,
    private readonly ports: PortAllocator,
    private readonly timing: FixtureTiming,
    private readonly platform: HarnessPlatform,
    private readonly options: FixtureOptions
  ) {}

  static async create(options: FixtureOptions): Promise<Fixture> {
    const settings = resolveHarnessSettings(options.env ?? process.env);
    const timing = parseTiming(options);

    const workDir = await createTempDir();
    const loggers = createFixtureLoggers(join(workDir, 'test.log'), options.logLevel ?? settings.logLevel);
    loggers.main.info(`Base directory for integration test: ${workDir}`);

    const ports = createPortAllocator(timing.basePort);
    loggers.log.info({ profile: settings.profile }, `Using profile ${settings.profile}`);
    loggers.log.info(`Using ports starting from ${ports.base}`);
    loggers.log.info(`Using binaries from ${settings.binDir}`);

    return new Fixture(
      settings,
      workDir,
      loggers.log,
      loggers.main,
      loggers.close,
      ports,
      timing,
      options.platform ?? nodePlatform,
      options
    );
  }

  /**
   * Run relay-client while the callback runs
   *
   * The process is stopped through the out-of-band stop notification.
   */
  async runClient<T>(
    options: RelayRunOptions,
    callback: (client: RelayClient) => Promise<T>
  ): Promise<T> {
    const { config } = this.settings;
    const port = this.ports.next();
    const url = `http://${BACKEND_HOST}:${port}`;
    const createRpc = (): RpcClient =>
      new RpcClient({ url, fetch: this.platform.fetch, logger: this.log });
    const rpc = createRpc();

    const args = relayClientArgs({
      config,
      caFile: caFilePath(this.settings),
      port,
      methods: options.methods ?? this.options.methods,
      waitForChange: this.options.waitForChange,
      extraArgs: options.extraArgs
    });

    return withProcess(
      {
        binary: join(this.settings.binDir, RELAY_CLIENT_BINARY),
        args,
        env: this.processEnv(),
        secrets: [config.accounts[1].password]
      },
      {
        name: RELAY_CLIENT_BINARY,
        spawn: this.platform.spawn,
        stop: { kind: 'request', request: () => rpc.notify(CLIENT_STOP_METHOD) },
        startupGraceMs: this.timing.startupGraceMs,
        stopTimeoutMs: this.timing.stopTimeoutMs,
        logger: this.log
      },
      () => callback({ port, url, rpc, createRpc })
    );
  }

  /**
   * Run relay-server backed by a fresh RPC endpoint serving the given
   * methods
   *
   * The endpoint is listening before the server is spawned, and outlives
   * it on the way down.
   */
  async runServer<T>(
    methods: MethodTable,
    options: RelayRunOptions,
    callback: () => Promise<T>
  ): Promise<T> {
    const { config } = this.settings;
    const port = this.ports.next();
    const backendRpcUrl = `http://${BACKEND_HOST}:${port}`;

    const args = relayServerArgs({
      config,
      caFile: caFilePath(this.settings),
      backendRpcUrl,
      methods: options.methods ?? this.options.methods,
      extraArgs: options.extraArgs
    });

    return withEndpoint(
      methods,
      { host: BACKEND_HOST, port },
      { logger: this.log, platform: this.platform },
      () =>
        withProcess(
          {
            binary: join(this.settings.binDir, RELAY_SERVER_BINARY),
            args,
            env: this.processEnv(),
            secrets: [config.accounts[0].password]
          },
          {
            name: RELAY_SERVER_BINARY,
            spawn: this.platform.spawn,
            stop: { kind: 'signal', signal: 'SIGTERM' },
            startupGraceMs: this.timing.startupGraceMs,
            stopTimeoutMs: this.timing.stopTimeoutMs,
            logger: this.log
          },
          callback
        )
    );
  }

  /**
   * Give relay-client time to select a server after its first call. There
   * is no signal for this either, so it waits out the startup grace period.
   */
  async settle(): Promise<void> {
    await delay(this.timing.startupGraceMs);
  }

  assertEqual(actual: unknown, expected: unknown): void {
    assertEqual(actual, expected, this.log);
  }

  expectRpcError(pattern: RegExp, call: () => Promise<unknown>): Promise<RpcError> {
    return expectRpcError(pattern, call, this.log);
  }

  /**
   * Record a failed run and keep the working directory for postmortem
   */
  fail(error: unknown): void {
    if (this.closed) return;
    this.closed = true;

    this.main.error({ error: toErrorInfo(error) }, 'Test failed');
    this.log.info(`Not cleaning up base directory ${this.workDir}`);
    this.closeLoggers();
  }

  /**
   * Record a successful run and remove the working directory
   */
  async succeed(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    this.main.info('Test succeeded');
    this.closeLoggers();
    await cleanupTempDir(this.workDir);
  }

  private processEnv(): Record<string, string> {
    return { [this.timing.logDirVariable]: this.workDir };
  }
}

/**
 * Run a test body inside a fresh fixture
 */
export async function withFixture<T>(
  options: FixtureOptions,
  callback: (fixture: Fixture) => Promise<T>
): Promise<T> {
  const fixture = await Fixture.create(options);

  let result: T;
  try {
    result = await callback(fixture);
  } catch (error) {
    fixture.fail(error);
    throw error;
  }

  await fixture.succeed();
  return result;
}
