export { Logger, parseLogLevel } from './logger.js';
export { LoggerFactory, type LoggingOptions } from './factory.js';
export { ConsoleTransport } from './transports/console-transport.js';
export { FileTransport } from './transports/file-transport.js';
export {
  LogLevel,
  LOG_LEVELS,
  LOG_FORMATS,
  isLogLevel,
  type LogLevelString,
  type LogFormat,
  type LogEntry,
  type LogTransport,
  type LoggerConfig,
  type FileTransportConfig,
  type ConsoleTransportConfig,
} from './types.js';
