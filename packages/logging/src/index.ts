/**
 * Logging module
 *
 * Structured logging with JSON and text formats, console and rotating file
 * transports, and child loggers per component.
 */

export { Logger } from './logger.js';
export { LoggerFactory, type LoggingOptions } from './factory.js';

export { LogLevel, LOG_LEVELS, isLogLevel } from './types.js';

export type {
  LogEntry,
  LogTransport,
  LogFormat,
  LogLevelString,
  LoggerConfig,
  FileTransportConfig,
  ConsoleTransportConfig,
} from './types.js';

export { ConsoleTransport } from './transports/console-transport.js';
export { FileTransport, parseSize } from './transports/file-transport.js';
