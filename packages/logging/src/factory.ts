import { Logger } from './logger.js';
import { ConsoleTransport } from './transports/console-transport.js';
import { FileTransport } from './transports/file-transport.js';
import { LogFormat, LogLevel, LogLevelString, LogTransport } from './types.js';

/**
 * Logging section of the application configuration
 */
export interface LoggingOptions {
  level: LogLevel | LogLevelString;
  format?: LogFormat;
  file?: string;
  maxSize?: string;
  maxFiles?: number;
  colors?: boolean;
}

/**
 * Factory for creating loggers with common configurations
 */
export class LoggerFactory {
  /**
   * Create a logger from the logging configuration section
   */
  static fromConfig(component: string, options: LoggingOptions): Logger {
    const format = options.format ?? 'text';
    const transports: LogTransport[] = [
      new ConsoleTransport({ format, colors: options.colors ?? format === 'text' }),
    ];

    if (options.file) {
      transports.push(
        new FileTransport({
          filename: options.file,
          format,
          ...(options.maxSize && { maxSize: options.maxSize }),
          ...(options.maxFiles !== undefined && { maxFiles: options.maxFiles }),
        })
      );
    }

    return new Logger({ component, level: options.level, transports });
  }

  /**
   * Logger that discards everything, for library callers that pass none
   */
  static createSilentLogger(component: string = 'silent'): Logger {
    return new Logger({ component, level: LogLevel.ERROR, transports: [] });
  }
}
