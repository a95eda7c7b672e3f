import { describe, it, expect, beforeEach } from '@jest/globals';
import winston from 'winston';
import { Logger, setGlobalLevelProvider } from '../../../src/logging/Logger.js';
import { LogLevel } from '../../../src/logging/LogLevel.js';
import { resetComponentLevels, setComponentLevel } from '../../../src/logging/ComponentLevels.js';

// Create a silent winston logger that captures calls
function createTestWinston() {
  const calls: Array<{ level: string; message: string; meta: Record<string, unknown> }> = [];
  const logger = winston.createLogger({
    levels: { error: 0, warn: 1, info: 2, debug: 3, trace: 4 },
    level: 'trace', // Accept all levels — filtering is done in Logger
    transports: [
      new winston.transports.Console({
        silent: true, // Don't actually output
      }),
    ],
  });

  // Intercept log calls
  const originalLog = logger.log.bind(logger);
  logger.log = ((level: string, message: string, ...rest: unknown[]) => {
    const meta = (rest[0] as Record<string, unknown>) ?? {};
    calls.push({ level, message, meta });
    return originalLog(level, message, ...rest);
  }) as typeof logger.log;

  return { logger, calls };
}

describe('Logger', () => {
  let globalLevel: LogLevel;

  beforeEach(() => {
    resetComponentLevels();
    globalLevel = LogLevel.INFO;
    setGlobalLevelProvider(() => globalLevel);
  });

  describe('basic logging', () => {
    it('should log info messages', () => {
      const { logger: winstonLogger, calls } = createTestWinston();
      const log = new Logger('test-component', winstonLogger);

      log.info('Hello world');

      expect(calls).toHaveLength(1);
      expect(calls[0]!.level).toBe('info');
      expect(calls[0]!.message).toBe('Hello world');
      expect(calls[0]!.meta['component']).toBe('test-component');
    });

    it('should log warn messages', () => {
      const { logger: winstonLogger, calls } = createTestWinston();
      const log = new Logger('test', winstonLogger);

      log.warn('Something concerning');

      expect(calls).toHaveLength(1);
      expect(calls[0]!.level).toBe('warn');
      expect(calls[0]!.message).toBe('Something concerning');
    });

    it('should log error messages', () => {
      const { logger: winstonLogger, calls } = createTestWinston();
      const log = new Logger('test', winstonLogger);

      log.error('Something broke');

      expect(calls).toHaveLength(1);
      expect(calls[0]!.level).toBe('error');
    });

    it('should log error with Error object', () => {
      const { logger: winstonLogger, calls } = createTestWinston();
      const log = new Logger('test', winstonLogger);
      const err = new Error('test error');

      log.error('Operation failed', err);

      expect(calls).toHaveLength(1);
      expect(calls[0]!.meta['errorStack']).toContain('test error');
    });

    it('should include metadata in log calls', () => {
      const { logger: winstonLogger, calls } = createTestWinston();
      const log = new Logger('test', winstonLogger);

      log.info('Processing', { filepath: 'in/a.csv', rows: 5 });

      expect(calls[0]!.meta['filepath']).toBe('in/a.csv');
      expect(calls[0]!.meta['rows']).toBe(5);
      expect(calls[0]!.meta['component']).toBe('test');
    });
  });

  describe('level filtering', () => {
    it('should not log DEBUG when global level is INFO', () => {
      globalLevel = LogLevel.INFO;
      const { logger: winstonLogger, calls } = createTestWinston();
      const log = new Logger('test', winstonLogger);

      log.debug('Debug message');

      expect(calls).toHaveLength(0);
    });

    it('should not log TRACE when global level is INFO', () => {
      globalLevel = LogLevel.INFO;
      const { logger: winstonLogger, calls } = createTestWinston();
      const log = new Logger('test', winstonLogger);

      log.trace('Trace message');

      expect(calls).toHaveLength(0);
    });

    it('should log DEBUG when global level is DEBUG', () => {
      globalLevel = LogLevel.DEBUG;
      const { logger: winstonLogger, calls } = createTestWinston();
      const log = new Logger('test', winstonLogger);

      log.debug('Debug message');

      expect(calls).toHaveLength(1);
    });

    it('should log TRACE when global level is TRACE', () => {
      globalLevel = LogLevel.TRACE;
      const { logger: winstonLogger, calls } = createTestWinston();
      const log = new Logger('test', winstonLogger);

      log.trace('Trace message');

      expect(calls).toHaveLength(1);
    });

    it('should only log ERROR when global level is ERROR', () => {
      globalLevel = LogLevel.ERROR;
      const { logger: winstonLogger, calls } = createTestWinston();
      const log = new Logger('test', winstonLogger);

      log.trace('nope');
      log.debug('nope');
      log.info('nope');
      log.warn('nope');
      log.error('yes');

      expect(calls).toHaveLength(1);
      expect(calls[0]!.level).toBe('error');
    });
  });

  describe('component-level overrides', () => {
    it('should allow DEBUG for component with DEBUG override even when global is INFO', () => {
      globalLevel = LogLevel.INFO;
      setComponentLevel('special', LogLevel.DEBUG);
      const { logger: winstonLogger, calls } = createTestWinston();
      const log = new Logger('special', winstonLogger);

      log.debug('Debug from overridden component');

      expect(calls).toHaveLength(1);
    });

    it('should still filter TRACE for component with DEBUG override', () => {
      globalLevel = LogLevel.INFO;
      setComponentLevel('special', LogLevel.DEBUG);
      const { logger: winstonLogger, calls } = createTestWinston();
      const log = new Logger('special', winstonLogger);

      log.trace('Should not appear');

      expect(calls).toHaveLength(0);
    });

    it('should restrict logging when component override is stricter than global', () => {
      globalLevel = LogLevel.DEBUG;
      setComponentLevel('noisy', LogLevel.ERROR);
      const { logger: winstonLogger, calls } = createTestWinston();
      const log = new Logger('noisy', winstonLogger);

      log.debug('filtered');
      log.info('filtered');
      log.warn('filtered');
      log.error('visible');

      expect(calls).toHaveLength(1);
    });
  });

  describe('isDebugEnabled', () => {
    it('should return false for isDebugEnabled when global is INFO', () => {
      globalLevel = LogLevel.INFO;
      const { logger: winstonLogger } = createTestWinston();
      const log = new Logger('test', winstonLogger);
      expect(log.isDebugEnabled()).toBe(false);
    });

    it('should return true for isDebugEnabled when global is DEBUG', () => {
      globalLevel = LogLevel.DEBUG;
      const { logger: winstonLogger } = createTestWinston();
      const log = new Logger('test', winstonLogger);
      expect(log.isDebugEnabled()).toBe(true);
    });

    it('should return true for isDebugEnabled with component override', () => {
      globalLevel = LogLevel.INFO;
      setComponentLevel('test', LogLevel.DEBUG);
      const { logger: winstonLogger } = createTestWinston();
      const log = new Logger('test', winstonLogger);
      expect(log.isDebugEnabled()).toBe(true);
    });
  });
});
