import { isLogLevel, createConsoleLogger, withScope, Logger } from '../../utils/logger.js';

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
  const originalLevel = process.env.LOG_LEVEL;

  afterEach(() => {
    if (originalLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLevel;
    }
    jest.restoreAllMocks();
  });

  test('should fall back to info when LOG_LEVEL names an inherited property', () => {
    process.env.LOG_LEVEL = 'toString';
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    const logger = createConsoleLogger();
    logger('debug', 'hidden');
    logger('info', 'shown');

    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0][0]).toMatch(/ INFO shown$/);
  });

  test('should route warnings and errors to their console methods', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    const logger = createConsoleLogger('warn', 'jobs');
    logger('warn', 'slow', { jobId: 'job-1' });
    logger('error', 'failed');

    expect(warn.mock.calls[0][0]).toMatch(/ WARN \[jobs\] slow \{"jobId":"job-1"\}$/);
    expect(error.mock.calls[0][0]).toMatch(/ ERROR \[jobs\] failed$/);
  });
});

describe('withScope', () => {
  test('should prefix messages with the scope', () => {
    const messages: string[] = [];
    const logger: Logger = (_level, message) => messages.push(message);

    withScope(logger, 'walker')?.('info', 'started');

    expect(messages).toEqual(['[walker] started']);
    expect(withScope(undefined, 'walker')).toBeUndefined();
  });
});
