import { afterEach, describe, expect, it, vi } from 'vitest';
import { Logger, describeError, isLogLevel, scrubSensitiveText } from '../../src/utils/logger.js';
import { FIXED_STAMP, captureLogger } from '../harness/logger.js';

describe('scrubSensitiveText', () => {
  it('redacts key=value credentials but keeps the key', () => {
    expect(scrubSensitiveText('url?token=abc123&x=1')).toBe('url?token=[REDACTED]&x=1');
    expect(scrubSensitiveText('password: hunter2')).toBe('password: [REDACTED]');
  });

  it('redacts bearer tokens', () => {
    expect(scrubSensitiveText('Authorization header Bearer test-secret')).toBe(
      'Authorization header Bearer [REDACTED]',
    );
  });

  it('leaves ordinary text alone', () => {
    expect(scrubSensitiveText('Created: /watched/report.pdf')).toBe('Created: /watched/report.pdf');
  });
});

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes timestamp, level and message on one line', () => {
    const { logger, lines } = captureLogger();
    logger.info('Created: /watched/a.txt');
    expect(lines).toEqual([`${FIXED_STAMP} - INFO - Created: /watched/a.txt`]);
  });

  it('folds multi-line messages onto a single line', () => {
    const { logger, lines } = captureLogger();
    logger.error('first\nsecond');
    expect(lines).toEqual([`${FIXED_STAMP} - ERROR - first | second`]);
  });

  it('drops records below the configured level', () => {
    const { logger, lines } = captureLogger('warn');
    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');
    expect(lines).toEqual([`${FIXED_STAMP} - WARN - w`, `${FIXED_STAMP} - ERROR - e`]);
    expect(logger.isLevelEnabled('info')).toBe(false);
  });

  it('writes to stderr by default', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    new Logger({ now: () => new Date(2024, 4, 1, 12, 0, 0) }).warn('careful');
    expect(write).toHaveBeenCalledWith(`${FIXED_STAMP} - WARN - careful\n`);
  });
});

describe('isLogLevel / describeError', () => {
  it('recognises the four levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('error')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });

  it('describes errors and non-errors', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError(42)).toBe('42');
  });

  it('appends chained causes', () => {
    const inner = new Error('connect ECONNREFUSED 127.0.0.1:80');
    expect(describeError(new Error('fetch failed', { cause: inner }))).toBe(
      'fetch failed: connect ECONNREFUSED 127.0.0.1:80',
    );
    expect(describeError(new Error('outer', { cause: 'plain' }))).toBe('outer: plain');
  });
});
