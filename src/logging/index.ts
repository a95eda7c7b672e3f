export { LogLevel, parseLogLevel, isLevelEnabled } from './LogLevel.js';
export { Logger } from './Logger.js';
export {
  getLogger,
  initializeLogging,
  setGlobalLevel,
  getGlobalLevel,
  resetLogging,
} from './LoggerFactory.js';
export { getLoggingConfig, resetLoggingConfig } from './config.js';
export type { LoggingConfiguration, LogFormat } from './config.js';
export { setComponentLevel, clearComponentLevel, resetComponentLevels } from './ComponentLevels.js';
export { ConsoleTransport, FileTransport } from './transports.js';
export type { LogTransport } from './transports.js';
