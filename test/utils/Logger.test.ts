import { isLogLevel, logger } from '../../src/utils/Logger';

const strip = (text: string): string => text.replace(/\u001b\[[0-9;]*m/g, '');

const lastLine = (method: (message?: unknown, ...rest: unknown[]) => void): string => {
  const calls = jest.mocked(method).mock.calls;
  return strip(String(calls[calls.length - 1]?.[0]));
};

describe('Logger', () => {
  afterEach(() => {
    logger.setLevel('info');
    jest.clearAllMocks();
  });

  it('should recognise the level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });

  it('should drop messages below the current level', () => {
    logger.setLevel('warn');

    logger.info('starting database');
    logger.success('database is healthy');

    expect(console.log).not.toHaveBeenCalled();
  });

  it('should send warnings and errors to stderr', () => {
    logger.warn('port 3000 busy');

    expect(console.error).toHaveBeenCalledTimes(1);
    expect(lastLine(console.error)).toMatch(/\[WARN\] port 3000 busy$/);
  });

  it('should tag messages of a child logger with its scope', () => {
    logger.child('probe').info('attempt 1/3 failed', 'ECONNREFUSED');

    expect(lastLine(console.log)).toMatch(/\[INFO\] \[probe\] attempt 1\/3 failed \(ECONNREFUSED\)$/);
  });
});
