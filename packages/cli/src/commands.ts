import { ErrorFactory } from '@tetherfs/errors';
import type { Logger } from '@tetherfs/logging';
import {
  InputStream,
  classify,
  copyFile,
  ensureDirectory,
  fileExists,
  segment,
  type BackendRegistry,
} from '@tetherfs/streams';
import { ddmmff, ddmmss } from '@tetherfs/units';

export type CoordinateFormat = 'ddmmff' | 'ddmmss';

export interface CoordOptions {
  longitude?: boolean;
  format?: CoordinateFormat;
}

/**
 * Where command output goes; stdout for the real CLI
 */
export interface CommandOutput {
  write(chunk: string | Uint8Array): void;
}

export interface CommandDependencies {
  registry: BackendRegistry;
  logger: Logger;
  output: CommandOutput;
}

/**
 * The tetherfs commands. Each resolves to the process exit code.
 */
export class CliCommands {
  constructor(private readonly deps: CommandDependencies) {}

  /**
   * Print the kind of a path and the directories `mkdir` would create
   */
  async classify(path: string): Promise<number> {
    const kind = classify(path);
    this.println(kind);
    for (const subDir of segment(path, kind)) {
      this.println(`  ${subDir}`);
    }
    return 0;
  }

  async mkdir(path: string): Promise<number> {
    await ensureDirectory(path, { registry: this.deps.registry, logger: this.deps.logger });
    this.deps.logger.info(`Directory ready: ${path}`);
    return 0;
  }

  async cat(path: string): Promise<number> {
    const stream = await InputStream.open(path, {
      registry: this.deps.registry,
      logger: this.deps.logger,
    });
    this.deps.output.write(stream.buffer);
    stream.close();
    return 0;
  }

  async cp(source: string, destination: string): Promise<number> {
    const bytes = await copyFile(source, destination, {
      registry: this.deps.registry,
      logger: this.deps.logger,
    });
    this.println(`Copied ${bytes} bytes from '${source}' to '${destination}'`);
    return 0;
  }

  /**
   * Exit code 1 when the file is absent
   */
  async exists(path: string): Promise<number> {
    const found = await fileExists(path, { registry: this.deps.registry });
    this.println(String(found));
    return found ? 0 : 1;
  }

  async coord(value: string, options: CoordOptions = {}): Promise<number> {
    const degrees = Number(value);
    if (value.trim() === '' || !Number.isFinite(degrees)) {
      throw ErrorFactory.validation(`Not a coordinate: '${value}'`);
    }

    const format = options.format ?? 'ddmmff';
    const isLongitude = options.longitude === true;
    this.println(format === 'ddmmss' ? ddmmss(degrees, isLongitude) : ddmmff(degrees, isLongitude));
    return 0;
  }

  private println(line: string): void {
    this.deps.output.write(`${line}\n`);
  }
}
