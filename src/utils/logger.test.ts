import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger, LogLevel, parseLogLevel } from './logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('parses level names loosely', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('WARN')).toBe(LogLevel.WARN);
    expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
  });

  it('formats timestamp, level and arguments', () => {
    const logger = new Logger({ level: LogLevel.DEBUG, logDir: 'unused', toFile: false });
    const line = logger.formatMessage(LogLevel.INFO, 'Fetched page', 3, { page: 3 });

    expect(line).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO\] Fetched page 3 \{\n {2}"page": 3\n\}$/);
  });

  it('drops messages below the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new Logger({ level: LogLevel.WARN, logDir: 'unused', toFile: false });

    logger.info('hidden');
    logger.warn('shown');

    expect(log).toHaveBeenCalledTimes(1);
    expect(String(log.mock.calls[0][0])).toContain('[WARN] shown');
  });
});
