import { promises as fs } from 'fs';
import path from 'path';

import { ErrorFactory, platformErrorCode } from '@tetherfs/errors';
import { LoggerFactory, type Logger } from '@tetherfs/logging';

import { splitFilePath } from '../path-classifier.js';
import { WorkingDirectory } from '../working-directory.js';

import type { Backend } from './types.js';

export interface LocalBackendOptions {
  workingDirectory?: WorkingDirectory;
  logger?: Logger;
}

/**
 * Backslashes are separators in every path handed to tetherfs; on POSIX hosts
 * they become forward slashes before reaching the file system.
 */
export function toHostPath(target: string): string {
  return path.sep === '/' ? target.replace(/\\/g, '/') : target;
}

/**
 * Local file system, also used for UNC network paths
 */
export class LocalBackend implements Backend {
  public readonly name = 'local';
  public readonly workingDirectory: WorkingDirectory;
  private readonly logger: Logger;

  constructor(options: LocalBackendOptions = {}) {
    this.workingDirectory = options.workingDirectory ?? new WorkingDirectory();
    this.logger = options.logger ?? LoggerFactory.createSilentLogger('tetherfs:local');
  }

  /**
   * Reads from inside the file's folder; the working directory is restored
   * afterwards even when the read fails.
   */
  async read(target: string): Promise<Buffer> {
    const { dir, file } = splitFilePath(toHostPath(target));

    return this.workingDirectory.within(dir, async cwd => {
      try {
        const data = await fs.readFile(path.resolve(cwd, file));
        this.logger.debug('Read local file', { path: target, bytes: data.length });
        return data;
      } catch (error) {
        throw ErrorFactory.notFound(target, undefined, { cause: error });
      }
    });
  }

  async write(target: string, data: Buffer): Promise<void> {
    const resolved = await this.workingDirectory.resolve(toHostPath(target));
    try {
      await fs.writeFile(resolved, data);
      this.logger.debug('Wrote local file', { path: target, bytes: data.length });
    } catch (error) {
      const code = platformErrorCode(error) ?? 'unknown';
      throw ErrorFactory.ioFailure(target, `Cannot write file '${target}' (${code})`, {
        cause: error,
      });
    }
  }

  async exists(target: string): Promise<boolean> {
    const resolved = await this.workingDirectory.resolve(toHostPath(target));
    try {
      const handle = await fs.open(resolved, 'r');
      await handle.close();
      return true;
    } catch {
      return false;
    }
  }

  async createDirectory(target: string): Promise<void> {
    const resolved = await this.workingDirectory.resolve(toHostPath(target));
    try {
      await fs.mkdir(resolved);
      this.logger.debug('Created local directory', { path: target });
    } catch (error) {
      const code = platformErrorCode(error);
      if (code === 'EEXIST') {
        return;
      }
      throw ErrorFactory.ioFailure(
        target,
        `Cannot create directory '${target}' (${code ?? 'unknown'})`,
        { cause: error }
      );
    }
  }
}
