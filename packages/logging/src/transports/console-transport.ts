import { formatJson, formatText } from '../format.js';
import { LogEntry, LogLevel, LogTransport, ConsoleTransportConfig } from '../types.js';

const COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '\x1b[36m', // Cyan
  [LogLevel.INFO]: '\x1b[32m', // Green
  [LogLevel.WARN]: '\x1b[33m', // Yellow
  [LogLevel.ERROR]: '\x1b[31m', // Red
  [LogLevel.SILENT]: '',
};
const RESET = '\x1b[0m';

/**
 * Console transport. Everything goes to stderr so that command output on
 * stdout stays clean.
 */
export class ConsoleTransport implements LogTransport {
  public readonly name = 'console';
  private readonly config: Required<ConsoleTransportConfig>;

  constructor(config: ConsoleTransportConfig = {}) {
    this.config = {
      format: 'text',
      colors: true,
      ...config,
    };
  }

  async log(entry: LogEntry): Promise<void> {
    const output =
      this.config.format === 'json'
        ? formatJson(entry)
        : formatText(entry, this.colorizeLevel(entry.level));

    // eslint-disable-next-line no-console
    console.error(output);
  }

  private colorizeLevel(level: LogLevel): string {
    if (!this.config.colors) {
      return LogLevel[level];
    }
    return `${COLORS[level]}${LogLevel[level]}${RESET}`;
  }
}
