/**
 * Tests for the pino logger factory
 */

import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createFixtureLoggers, createLogger, createSilentLogger, isLogLevel } from './logger.js';

function captureStream() {
  const lines: string[] = [];
  return {
    lines,
    stream: {
      write: (msg: string) => {
        lines.push(msg);
      }
    }
  };
}

describe('createLogger', () => {
  it('should emit JSON records with a string level and component', () => {
    const { lines, stream } = captureStream();
    const logger = createLogger({ component: 'supervisor', destination: stream });

    logger.info({ port: 4000 }, 'starting');

    expect(lines).toHaveLength(1);
    const record = JSON.parse(lines[0] ?? '{}') as Record<string, unknown>;
    expect(record.level).toBe('info');
    expect(record.component).toBe('supervisor');
    expect(record.port).toBe(4000);
    expect(record.msg).toBe('starting');
    expect(typeof record.time).toBe('string');
  });

  it('should redact passwords', () => {
    const { lines, stream } = captureStream();
    const logger = createLogger({ destination: stream });

    logger.info({ password: 'test-secret', account: { name: 'a', password: 'test-secret' } }, 'account');

    const record = JSON.parse(lines[0] ?? '{}') as {
      password: string;
      account: { name: string; password: string };
    };
    expect(record.password).toBe('[Redacted]');
    expect(record.account).toEqual({ name: 'a', password: '[Redacted]' });
  });

  it('should respect the level', () => {
    const { lines, stream } = captureStream();
    const logger = createLogger({ level: 'warn', destination: stream });

    logger.info('hidden');
    logger.warn('shown');

    expect(lines).toHaveLength(1);
    expect((JSON.parse(lines[0] ?? '{}') as { msg: string }).msg).toBe('shown');
  });
});

describe('createSilentLogger', () => {
  it('should be silent', () => {
    expect(createSilentLogger().level).toBe('silent');
  });
});

describe('isLogLevel', () => {
  it('should recognise pino levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});

describe('createFixtureLoggers', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'relaytest-logger-'));
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('should write both loggers to the log file', async () => {
    const logFile = join(dir, 'test.log');
    const loggers = createFixtureLoggers(logFile);

    loggers.log.info('detail');
    loggers.main.info('progress');
    loggers.close();

    const records = (await readFile(logFile, 'utf8'))
      .trim()
      .split('\n')
      .map((line) => JSON.parse(line) as { component: string; msg: string });
    expect(records.map((r) => [r.component, r.msg])).toEqual([
      ['relaytest', 'detail'],
      ['main', 'progress']
    ]);
  });
});
