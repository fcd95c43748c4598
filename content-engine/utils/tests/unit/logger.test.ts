import { createConsoleLogger, isLogLevel } from '../../logger.js';

describe('isLogLevel', () => {
  test('should accept the four levels', () => {
    expect(['debug', 'info', 'warn', 'error'].every(level => isLogLevel(level))).toBe(true);
  });

  test('should reject unknown and inherited names', () => {
    expect(isLogLevel(undefined)).toBe(false);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel('constructor')).toBe(false);
  });
});

describe('createConsoleLogger', () => {
  test('should drop messages below the minimum level', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => {});
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = createConsoleLogger('warn', 'test');
    logger('info', 'hidden');
    logger('warn', 'shown', { attempt: 1 });

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/ WARN \(test\) shown \{"attempt":1\}$/);

    log.mockRestore();
    warn.mockRestore();
  });
});
