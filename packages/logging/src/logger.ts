import { ConsoleTransport } from './transports/console-transport.js';
import { LogEntry, LogLevel, LogTransport, LoggerConfig } from './types.js';

/**
 * Structured logger with multiple transport support
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly component: string;
  private readonly transports: LogTransport[];

  constructor(config: LoggerConfig) {
    this.component = config.component;
    this.level = typeof config.level === 'string' ? Logger.parseLogLevel(config.level) : config.level;
    this.transports = config.transports ?? [new ConsoleTransport()];
  }

  /**
   * Create a child logger (`parent:child`) sharing level and transports
   */
  child(component: string): Logger {
    return new Logger({
      level: this.level,
      component: `${this.component}:${component}`,
      transports: this.transports,
    });
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, data, error instanceof Error ? error : undefined);
  }

  getLevel(): LogLevel {
    return this.level;
  }

  async close(): Promise<void> {
    await Promise.all(this.transports.map(t => t.close?.()));
  }

  static parseLogLevel(level: string): LogLevel {
    switch (level.toUpperCase()) {
      case 'DEBUG':
        return LogLevel.DEBUG;
      case 'INFO':
        return LogLevel.INFO;
      case 'WARN':
      case 'WARNING':
        return LogLevel.WARN;
      case 'ERROR':
        return LogLevel.ERROR;
      case 'SILENT':
        return LogLevel.SILENT;
      default:
        throw new Error(`Invalid log level: ${level}`);
    }
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>, error?: Error): void {
    if (level < this.level || this.level === LogLevel.SILENT) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      component: this.component,
      message,
      ...(data && { data }),
      ...(error && { error }),
    };

    this.transports.forEach(transport => {
      transport.log(entry).catch(err => {
        // eslint-disable-next-line no-console
        console.error(`Transport ${transport.name} failed:`, err);
      });
    });
  }
}
