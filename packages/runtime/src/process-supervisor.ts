/**
 * Process supervisor for the relay binaries under test
 *
 * Owns exactly one external process: starts it once, stops it once and
 * guarantees that it is gone afterwards. A process that outlives its stop
 * timeout is killed and reported as a leak.
 */

import {
  DEFAULT_STARTUP_GRACE_MS,
  DEFAULT_STOP_TIMEOUT_MS,
  type Logger,
  ProcessLeakError,
  ProcessLifecycleError,
  createSilentLogger,
  toErrorInfo
} from '@relaytest/core';
import type { SpawnProcess, SupervisedChild } from './platform/types.js';
import { TIMED_OUT, delay, raceTimeout } from './timing.js';

export type ProcessStatus = 'idle' | 'running' | 'stopped';

export type ProcessSpec = {
  binary: string;
  args: readonly string[];
  /** Added on top of the parent's environment */
  env?: Record<string, string>;
  cwd?: string;
  /** Argument values that must not show up in logs */
  secrets?: readonly string[];
};

/**
 * How a running process is asked to terminate
 */
export type StopStrategy =
  | { kind: 'signal'; signal?: NodeJS.Signals }
  | { kind: 'request'; request: () => Promise<void> };

export type ProcessSupervisorOptions = {
  name: string;
  spawn: SpawnProcess;
  stop?: StopStrategy;
  startupGraceMs?: number;
  stopTimeoutMs?: number;
  logger?: Logger;
};

export type ProcessHandle = {
  readonly binary: string;
  readonly args: readonly string[];
  readonly env: Readonly<Record<string, string>>;
  readonly pid: number | undefined;
  readonly status: ProcessStatus;
};

type ExitResult = { code: number | null; signal: NodeJS.Signals | null };

/**
 * Replace secret values in an argument list for logging
 */
export function redactArgs(args: readonly string[], secrets: readonly string[] = []): string[] {
  return args.map((arg) => (secrets.includes(arg) ? '[Redacted]' : arg));
}

export class ProcessSupervisor {
  private child?: SupervisedChild;
  private exited?: Promise<ExitResult>;
  private exitResult?: ExitResult;
  private spawnError?: Error;
  private state: ProcessStatus = 'idle';
  private readonly logger: Logger;
  private readonly stopStrategy: StopStrategy;
  private readonly startupGraceMs: number;
  private readonly stopTimeoutMs: number;

  constructor(
    private readonly spec: ProcessSpec,
    private readonly options: ProcessSupervisorOptions
  ) {
    this.logger = (options.logger ?? createSilentLogger()).child({ process: options.name });
    this.stopStrategy = options.stop ?? { kind: 'signal' };
    this.startupGraceMs = options.startupGraceMs ?? DEFAULT_STARTUP_GRACE_MS;
    this.stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
  }

  get status(): ProcessStatus {
    return this.state;
  }

  get handle(): ProcessHandle {
    const supervisor = this;
    return {
      binary: this.spec.binary,
      args: this.spec.args,
      env: { ...this.spec.env },
      get pid() {
        return supervisor.child?.pid;
      },
      get status() {
        return supervisor.state;
      }
    };
  }

  /**
   * Spawn the process and wait out the startup grace period
   */
  async start(): Promise<ProcessHandle> {
    if (this.state !== 'idle') {
      throw new ProcessLifecycleError(`${this.options.name} cannot be started while ${this.state}`);
    }

    this.logger.info(
      { binary: this.spec.binary, args: redactArgs(this.spec.args, this.spec.secrets) },
      `Starting new ${this.options.name} process...`
    );

    const child = this.options.spawn(this.spec.binary, this.spec.args, {
      env: { ...process.env, ...this.spec.env },
      cwd: this.spec.cwd
    });
    this.child = child;
    this.state = 'running';

    this.exited = new Promise<ExitResult>((resolve) => {
      child.on('exit', (code, signal) => {
        this.exitResult = { code, signal };
        resolve(this.exitResult);
      });
      child.on('error', (error) => {
        // Spawn failures emit 'error' without a following 'exit'
        this.spawnError = error;
        if (child.pid === undefined) {
          this.exitResult = { code: null, signal: null };
          resolve(this.exitResult);
        }
      });
    });

    // No readiness signal exists for relay-server; the grace period is all we have
    await delay(this.startupGraceMs);

    if (this.exitResult) {
      this.state = 'stopped';
      throw new ProcessLifecycleError(
        `${this.options.name} exited during startup (code ${String(this.exitResult.code)}, signal ${String(this.exitResult.signal)})`,
        { cause: this.spawnError }
      );
    }

    this.logger.debug({ pid: child.pid }, `${this.options.name} is up`);
    return this.handle;
  }

  /**
   * Ask the process to terminate and block until it has exited
   */
  async stop(): Promise<number | null> {
    const child = this.child;
    const exited = this.exited;
    if (this.state !== 'running' || !child || !exited) {
      throw new ProcessLifecycleError(`${this.options.name} cannot be stopped while ${this.state}`);
    }
    this.state = 'stopped';

    this.logger.info(`Stopping ${this.options.name} process...`);
    // One deadline covers both the stop request and the exit wait
    const deadline = Date.now() + this.stopTimeoutMs;
    if (!this.exitResult) {
      const requested = await raceTimeout(this.requestStop(child), this.stopTimeoutMs);
      if (requested === TIMED_OUT) {
        this.logger.warn(
          { timeoutMs: this.stopTimeoutMs },
          `Stop request to ${this.options.name} did not complete in time`
        );
      }
    }

    const result = await raceTimeout(exited, Math.max(0, deadline - Date.now()));
    if (result === TIMED_OUT) {
      this.logger.error(
        { pid: child.pid, timeoutMs: this.stopTimeoutMs },
        `${this.options.name} did not exit in time, killing it`
      );
      child.kill('SIGKILL');
      await exited;
      throw new ProcessLeakError(
        `${this.options.name} (pid ${String(child.pid)}) did not exit within ${this.stopTimeoutMs}ms`,
        child.pid
      );
    }

    this.logger.debug({ code: result.code, signal: result.signal }, `${this.options.name} exited`);
    return result.code;
  }

  private async requestStop(child: SupervisedChild): Promise<void> {
    if (this.stopStrategy.kind === 'signal') {
      child.kill(this.stopStrategy.signal ?? 'SIGTERM');
      return;
    }

    try {
      await this.stopStrategy.request();
    } catch (error) {
      // The process may drop the connection while shutting down; the exit
      // wait below still decides whether the stop worked
      this.logger.warn({ error: toErrorInfo(error) }, `Stop request to ${this.options.name} failed`);
    }
  }
}

/**
 * Run a callback while a supervised process is up
 */
export async function withProcess<T>(
  spec: ProcessSpec,
  options: ProcessSupervisorOptions,
  callback: (handle: ProcessHandle) => Promise<T>
): Promise<T> {
  const supervisor = new ProcessSupervisor(spec, options);
  const handle = await supervisor.start();
  let result: T;

  try {
    result = await callback(handle);
  } catch (error) {
    try {
      await supervisor.stop();
    } catch (stopError) {
      throw new AggregateError(
        [error, stopError],
        `${options.name} failed and did not stop cleanly: ${toErrorInfo(error).message}`
      );
    }
    throw error;
  }

  await supervisor.stop();
  return result;
}
