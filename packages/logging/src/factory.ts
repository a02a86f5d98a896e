import { Logger } from './logger.js';
import { ConsoleTransport } from './transports/console-transport.js';
import { FileTransport } from './transports/file-transport.js';
import { LogLevel, type LogFormat, type LogTransport } from './types.js';

/**
 * Logging section of the tetherfs configuration file
 */
export interface LoggingOptions {
  level: string;
  format?: LogFormat;
  file?: string | undefined;
  maxSize?: string;
  maxFiles?: number;
}

/**
 * Factory for creating loggers with common configurations
 */
export class LoggerFactory {
  static createConsoleLogger(component: string, level: LogLevel | string = LogLevel.INFO): Logger {
    return new Logger({
      component,
      level: typeof level === 'string' ? Logger.parseLogLevel(level) : level,
      transports: [new ConsoleTransport({ format: 'text', colors: process.stderr.isTTY === true })],
    });
  }

  /**
   * Logger that drops every entry; the default for library code
   */
  static createSilentLogger(component: string): Logger {
    return new Logger({ component, level: LogLevel.SILENT, transports: [] });
  }

  static fromOptions(component: string, options: LoggingOptions): Logger {
    const format = options.format ?? 'text';
    const transports: LogTransport[] = [
      new ConsoleTransport({ format, colors: format === 'text' && process.stderr.isTTY === true }),
    ];

    if (options.file) {
      transports.push(
        new FileTransport({
          filename: options.file,
          format,
          ...(options.maxSize !== undefined && { maxSize: options.maxSize }),
          ...(options.maxFiles !== undefined && { maxFiles: options.maxFiles }),
        })
      );
    }

    return new Logger({
      component,
      level: Logger.parseLogLevel(options.level),
      transports,
    });
  }
}
