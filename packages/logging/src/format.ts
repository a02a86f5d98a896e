import { LogEntry, LogLevel } from './types.js';

export function formatJson(entry: LogEntry): string {
  return JSON.stringify({
    timestamp: entry.timestamp.toISOString(),
    level: LogLevel[entry.level],
    component: entry.component,
    message: entry.message,
    ...(entry.data && Object.keys(entry.data).length > 0 && { data: entry.data }),
    ...(entry.error && {
      error: {
        name: entry.error.name,
        message: entry.error.message,
        stack: entry.error.stack,
      },
    }),
  });
}

export function formatText(entry: LogEntry, level: string = LogLevel[entry.level]): string {
  let message = `${entry.timestamp.toISOString()} ${level} [${entry.component}] ${entry.message}`;

  if (entry.data && Object.keys(entry.data).length > 0) {
    message += ` ${JSON.stringify(entry.data)}`;
  }

  if (entry.error) {
    message += `\n${entry.error.stack || entry.error.message}`;
  }

  return message;
}
