import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { Logger, escapeRegExp } from './logger.js';

describe('Logger', () => {
  let stderrSpy: MockInstance<typeof process.stderr.write>;

  beforeEach(() => {
    stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    stderrSpy.mockRestore();
  });

  function output(): string {
    return stderrSpy.mock.calls.map((c) => String(c[0])).join('');
  }

  it('logs at or below the configured level', () => {
    const logger = new Logger('info');
    logger.error('error message');
    logger.warn('warn message');
    logger.info('info message');
    logger.debug('debug message');

    expect(output()).toBe(
      '[ERROR] error message\n[WARN]  warn message\n[INFO]  info message\n'
    );
  });

  it('suppresses all output at silent level', () => {
    const logger = new Logger('silent');
    logger.error('should not appear');
    expect(stderrSpy).not.toHaveBeenCalled();
  });

  it('redacts secrets matching patterns', () => {
    const logger = new Logger('info', ['token-[a-z0-9]+']);
    logger.info('using token-abc123 now');
    expect(output()).toBe('[INFO]  using [REDACTED] now\n');
  });

  it('redacts literal secrets added at runtime, including regex metacharacters', () => {
    const logger = new Logger('info');
    logger.addSecret('test-secret+1');
    logger.info('key=test-secret+1&q=x');
    expect(output()).toBe('[INFO]  key=[REDACTED]&q=x\n');
  });

  it('keeps redacting literal secrets after the patterns are replaced', () => {
    const logger = new Logger('info');
    logger.addSecret('test-secret');
    logger.setRedactPatterns(['token-[0-9]+']);
    logger.info('test-secret and token-42');
    expect(output()).toBe('[INFO]  [REDACTED] and [REDACTED]\n');
  });

  it('ignores an empty secret', () => {
    const logger = new Logger('info');
    logger.addSecret('');
    logger.info('unchanged');
    expect(output()).toBe('[INFO]  unchanged\n');
  });

  it('redacts in extra string args too', () => {
    const logger = new Logger('info', ['secret']);
    logger.info('metadata:', 'secret value');
    expect(output()).toBe('[INFO]  metadata: [REDACTED] value\n');
  });

  it('changes level at runtime', () => {
    const logger = new Logger('warn');
    logger.debug('hidden');
    logger.setLevel('debug');
    logger.debug('shown');
    expect(output()).toBe('[DEBUG] shown\n');
  });

  it('writes to stderr not stdout', () => {
    const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const logger = new Logger('info');
    logger.info('test');
    expect(stderrSpy).toHaveBeenCalled();
    expect(stdoutSpy).not.toHaveBeenCalled();
    stdoutSpy.mockRestore();
  });
});

describe('escapeRegExp', () => {
  it('escapes every metacharacter', () => {
    expect(escapeRegExp('a.b*c')).toBe('a\\.b\\*c');
    expect(new RegExp(escapeRegExp('(x)[y]')).test('(x)[y]')).toBe(true);
  });
});
