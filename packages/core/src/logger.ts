/**
 * Logger factory using pino
 *
 * Every fixture builds its own loggers; nothing here installs a
 * process-wide logger, so concurrent test runs never share log state.
 */

import pino from 'pino';
import type { DestinationStream, Logger } from 'pino';

export type { Logger } from 'pino';

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = [
  'silent',
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace'
];

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export const REDACT_PATHS = [
  'password',
  '*.password',
  'accounts[*].password',
  'config.accounts[*].password'
];

export type LoggerOptions = {
  level?: LogLevel;
  component?: string;
  destination?: DestinationStream;
};

/**
 * Create a logger instance
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const baseOptions: pino.LoggerOptions = {
    level: options.level ?? 'info',
    base: { component: options.component ?? 'relaytest' },
    formatters: {
      level: (label) => ({ level: label })
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS }
  };

  return options.destination ? pino(baseOptions, options.destination) : pino(baseOptions);
}

/**
 * Logger used by components that were built without one
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

export type FixtureLoggers = {
  /** Detailed log, written to the fixture's log file only */
  log: Logger;
  /** Progress messages, written to stderr and to the log file */
  main: Logger;
  /** Flush and close the log file */
  close: () => void;
};

/**
 * Build the pair of loggers a fixture writes through
 */
export function createFixtureLoggers(logFile: string, level: LogLevel = 'info'): FixtureLoggers {
  const file = pino.destination({ dest: logFile, sync: true });
  // multistream has no 'silent' level; a silent logger never reaches it anyway
  const streamLevel: pino.Level = level === 'silent' ? 'fatal' : level;
  const streams = pino.multistream([
    { level: streamLevel, stream: process.stderr },
    { level: streamLevel, stream: file }
  ]);

  return {
    log: createLogger({ level, component: 'relaytest', destination: file }),
    main: createLogger({ level, component: 'main', destination: streams }),
    close: () => {
      file.flushSync();
      file.end();
    }
  };
}
