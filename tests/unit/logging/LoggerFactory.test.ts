import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as os from 'os';
import * as path from 'path';
import { Writable } from 'stream';
import winston from 'winston';
import {
  initializeLogging,
  getLogger,
  setGlobalLevel,
  getGlobalLevel,
  resetLogging,
} from '../../../src/logging/LoggerFactory.js';
import { resetLoggingConfig } from '../../../src/logging/config.js';
import { resetComponentLevels } from '../../../src/logging/ComponentLevels.js';
import { LogLevel } from '../../../src/logging/LogLevel.js';
import { Logger } from '../../../src/logging/Logger.js';
import type { LogTransport } from '../../../src/logging/transports.js';

/**
 * Collects formatted lines written by the root logger
 */
class CaptureTransport implements LogTransport {
  name = 'capture';
  readonly lines: string[] = [];

  createWinstonTransport(): winston.transport {
    const stream = new Writable({
      write: (chunk: Buffer | string, _encoding, callback) => {
        this.lines.push(String(chunk).trimEnd());
        callback();
      },
    });
    return new winston.transports.Stream({
      stream,
      format: winston.format.printf((info) => `${info.level} [${String(info['component'])}] ${String(info.message)}`),
    });
  }
}

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('LoggerFactory', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    delete process.env['LOG_LEVEL'];
    delete process.env['SFTP_DEBUG_COMPONENTS'];
    delete process.env['LOG_FILE'];
    resetLogging();
    resetLoggingConfig();
    resetComponentLevels();
  });

  afterEach(() => {
    resetLogging();
    resetLoggingConfig();
    resetComponentLevels();
    process.env = { ...originalEnv };
  });

  describe('initializeLogging', () => {
    it('should initialize without errors', () => {
      expect(() => initializeLogging()).not.toThrow();
    });

    it('should respect LOG_LEVEL env var', () => {
      process.env['LOG_LEVEL'] = 'DEBUG';
      resetLoggingConfig();
      initializeLogging();
      expect(getGlobalLevel()).toBe(LogLevel.DEBUG);
    });

    it('should re-initialize cleanly on repeated calls', () => {
      initializeLogging();
      initializeLogging();
      expect(getLogger('test')).toBeInstanceOf(Logger);
    });

    it('should write through additional transports', async () => {
      const capture = new CaptureTransport();
      initializeLogging([capture]);

      getLogger('sftp-discovery').warn('Found no files on specified SFTP server at "in"');
      getLogger('sftp-discovery').debug('filtered at INFO');
      await flush();

      expect(capture.lines).toEqual(['warn [sftp-discovery] Found no files on specified SFTP server at "in"']);
    });
  });

  describe('getLogger', () => {
    it('should cache Logger instances by component', () => {
      initializeLogging();
      expect(getLogger('sftp-connection')).toBe(getLogger('sftp-connection'));
    });

    it('should return different Loggers for different components', () => {
      initializeLogging();
      expect(getLogger('sftp-connection')).not.toBe(getLogger('gpg-decryptor'));
    });

    it('should hand out loggers before initialization and rewire them after', async () => {
      const capture = new CaptureTransport();
      const logger = getLogger('lazy-component');
      initializeLogging([capture]);

      getLogger('lazy-component').warn('after wiring');
      await flush();

      expect(logger).toBeInstanceOf(Logger);
      expect(capture.lines).toEqual(['warn [lazy-component] after wiring']);
    });

    it('should re-wire cached loggers after re-initialization', () => {
      initializeLogging();
      const loggerBefore = getLogger('rewire-test');

      initializeLogging();
      const loggerAfter = getLogger('rewire-test');

      expect(loggerAfter).not.toBe(loggerBefore);
    });
  });

  describe('setGlobalLevel / getGlobalLevel', () => {
    it('should default to INFO', () => {
      initializeLogging();
      expect(getGlobalLevel()).toBe(LogLevel.INFO);
    });

    it('should affect Logger level filtering', () => {
      initializeLogging();
      const logger = getLogger('runtime-level-test');

      setGlobalLevel(LogLevel.INFO);
      expect(logger.isDebugEnabled()).toBe(false);

      setGlobalLevel(LogLevel.DEBUG);
      expect(logger.isDebugEnabled()).toBe(true);
    });
  });

  describe('resetLogging', () => {
    it('should clear cached loggers', () => {
      initializeLogging();
      const before = getLogger('reset-test');
      resetLogging();
      expect(getLogger('reset-test')).not.toBe(before);
    });

    it('should reset global level to INFO', () => {
      initializeLogging();
      setGlobalLevel(LogLevel.TRACE);
      resetLogging();
      expect(getGlobalLevel()).toBe(LogLevel.INFO);
    });
  });

  describe('environment integration', () => {
    it('should initialize component levels from SFTP_DEBUG_COMPONENTS', () => {
      process.env['SFTP_DEBUG_COMPONENTS'] = 'gpg-decryptor';
      resetLoggingConfig();
      initializeLogging();

      expect(getLogger('gpg-decryptor').isDebugEnabled()).toBe(true);
      expect(getLogger('sftp-connection').isDebugEnabled()).toBe(false);
    });

    it('should add a file transport when LOG_FILE is set', () => {
      process.env['LOG_FILE'] = path.join(os.tmpdir(), 'sftp-extract-test.log');
      resetLoggingConfig();

      const root = initializeLogging();

      expect(root.transports.some((transport) => transport instanceof winston.transports.File)).toBe(true);
    });
  });
});
