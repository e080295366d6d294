import { describe, it, expect, vi } from 'vitest';
import { createLogger, formatLogLine, silentLogger, type LoggerDeps } from '../src/logger.js';

/** Fixed date for deterministic tests. */
const FIXED_DATE = new Date('2026-02-23T14:30:00.000Z');
const FIXED_ISO = '2026-02-23T14:30:00.000Z';

/** Create test deps with captured stderr output. */
function makeDeps(overrides?: Partial<LoggerDeps>): LoggerDeps & { stderrOutput: string[] } {
  const stderrOutput: string[] = [];
  return {
    writeStderr: vi.fn((data: string) => {
      stderrOutput.push(data);
    }),
    now: vi.fn(() => FIXED_DATE),
    stderrOutput,
    ...overrides,
  };
}

describe('formatLogLine', () => {
  it('places the prefix between level and message', () => {
    expect(formatLogLine(FIXED_DATE, 'warn', 'Giving up on URL', { attempts: 3 }, 'shard-cache')).toBe(
      `[${FIXED_ISO}] [WARN] [shard-cache] Giving up on URL {"attempts":3}\n`,
    );
  });

  it('leaves out an empty prefix', () => {
    expect(formatLogLine(FIXED_DATE, 'info', 'ready', undefined, '')).toBe(`[${FIXED_ISO}] [INFO] ready\n`);
  });
});

describe('createLogger', () => {
  it('formats info messages as [timestamp] [INFO] message', () => {
    const deps = makeDeps();
    createLogger({}, deps).info('cache ready');

    expect(deps.stderrOutput).toEqual([`[${FIXED_ISO}] [INFO] cache ready\n`]);
  });

  it('formats warn and error levels', () => {
    const deps = makeDeps();
    const logger = createLogger({}, deps);

    logger.warn('cache over budget');
    logger.error('sweep failed');

    expect(deps.stderrOutput).toEqual([
      `[${FIXED_ISO}] [WARN] cache over budget\n`,
      `[${FIXED_ISO}] [ERROR] sweep failed\n`,
    ]);
  });

  it('tags every line with the prefix', () => {
    const deps = makeDeps();
    createLogger({ prefix: 'shard-cache' }, deps).info('Downloading', { url: 'http://host/a.tar', attempt: 2 });

    expect(deps.stderrOutput[0]).toBe(
      `[${FIXED_ISO}] [INFO] [shard-cache] Downloading {"url":"http://host/a.tar","attempt":2}\n`,
    );
  });

  it('omits an empty context object', () => {
    const deps = makeDeps();
    createLogger({}, deps).info('idle', {});

    expect(deps.stderrOutput[0]).toBe(`[${FIXED_ISO}] [INFO] idle\n`);
  });

  it('suppresses debug output unless verbose', () => {
    const quiet = makeDeps();
    createLogger({}, quiet).debug('Cache hit');
    expect(quiet.stderrOutput).toEqual([]);

    const verbose = makeDeps();
    createLogger({ verbose: true }, verbose).debug('Cache hit');
    expect(verbose.stderrOutput).toEqual([`[${FIXED_ISO}] [DEBUG] Cache hit\n`]);
  });
});

describe('silentLogger', () => {
  it('accepts every level without output', () => {
    expect(() => {
      silentLogger.info('a');
      silentLogger.warn('b');
      silentLogger.error('c');
      silentLogger.debug('d');
    }).not.toThrow();
  });
});
