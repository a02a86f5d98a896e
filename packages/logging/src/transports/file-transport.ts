import { promises as fs } from 'fs';
import path from 'path';

import { formatJson, formatText } from '../format.js';
import { LogEntry, LogTransport, FileTransportConfig } from '../types.js';

const SIZE_UNITS: Record<string, number> = {
  B: 1,
  KB: 1024,
  MB: 1024 * 1024,
  GB: 1024 * 1024 * 1024,
};

export function parseSize(sizeStr: string): number {
  const match = sizeStr.match(/^(\d+(?:\.\d+)?)\s*([KMG]?B)$/i);
  if (!match?.[1] || !match[2]) {
    throw new Error(`Invalid size format: ${sizeStr}`);
  }

  return parseFloat(match[1]) * (SIZE_UNITS[match[2].toUpperCase()] ?? 1);
}

/**
 * File transport with size-based rotation (`app.log` -> `app.log.1` -> ...)
 */
export class FileTransport implements LogTransport {
  public readonly name = 'file';
  private readonly config: Required<FileTransportConfig>;
  private readonly maxSizeBytes: number;
  private ready: Promise<void> | undefined;

  constructor(config: FileTransportConfig) {
    this.config = {
      maxSize: '50MB',
      maxFiles: 5,
      format: 'text',
      ...config,
    };

    this.maxSizeBytes = parseSize(this.config.maxSize);
  }

  async log(entry: LogEntry): Promise<void> {
    this.ready ??= fs.mkdir(path.dirname(this.config.filename), { recursive: true }).then(() => {});
    await this.ready;

    if (await this.needsRotation()) {
      await this.rotateLogFile();
    }

    const logLine = this.config.format === 'json' ? formatJson(entry) : formatText(entry);
    await fs.appendFile(this.config.filename, `${logLine}\n`);
  }

  async close(): Promise<void> {
    // appendFile opens and closes the file on every entry
  }

  private async needsRotation(): Promise<boolean> {
    try {
      const stats = await fs.stat(this.config.filename);
      return stats.size >= this.maxSizeBytes;
    } catch {
      return false;
    }
  }

  private async rotateLogFile(): Promise<void> {
    const { filename, maxFiles } = this.config;

    await fs.rm(`${filename}.${maxFiles}`, { force: true });

    for (let i = maxFiles - 1; i >= 1; i--) {
      await renameIfPresent(`${filename}.${i}`, `${filename}.${i + 1}`);
    }

    await renameIfPresent(filename, `${filename}.1`);
  }
}

async function renameIfPresent(from: string, to: string): Promise<void> {
  try {
    await fs.rename(from, to);
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      throw error;
    }
  }
}
