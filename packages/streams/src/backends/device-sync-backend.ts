import { ErrorCategory, ErrorFactory, type TetherError } from '@tetherfs/errors';
import {
  isDeviceSyncError,
  normalizeDevicePath,
  type DeviceSyncConnection,
  type DeviceSyncConnector,
} from '@tetherfs/device-sync';
import { LoggerFactory, type Logger } from '@tetherfs/logging';
import pLimit, { type LimitFunction } from 'p-limit';

import type { Backend } from './types.js';

export interface DeviceSyncBackendOptions {
  logger?: Logger;
}

/**
 * Forwards every operation, path and payload unchanged, to the device
 * connection. Operations on the same device path run one after another.
 */
export class DeviceSyncBackend implements Backend {
  public readonly name = 'device-sync';
  private readonly logger: Logger;
  private readonly pathLocks = new Map<string, LimitFunction>();

  constructor(
    private readonly connector: DeviceSyncConnector,
    options: DeviceSyncBackendOptions = {}
  ) {
    this.logger = options.logger ?? LoggerFactory.createSilentLogger('tetherfs:device-sync');
  }

  async read(target: string): Promise<Buffer> {
    return this.serialize(target, async connection => {
      try {
        const data = await connection.read(target);
        this.logger.debug('Read device file', { path: target, bytes: data.length });
        return data;
      } catch (error) {
        if (isDeviceSyncError(error, 'not-found')) {
          throw ErrorFactory.notFound(target, undefined, { cause: error });
        }
        throw this.transportFailure(target, 'read', error);
      }
    });
  }

  async write(target: string, data: Buffer): Promise<void> {
    return this.serialize(target, async connection => {
      try {
        await connection.write(target, data);
        this.logger.debug('Wrote device file', { path: target, bytes: data.length });
      } catch (error) {
        throw this.transportFailure(target, 'write', error);
      }
    });
  }

  async exists(target: string): Promise<boolean> {
    try {
      return await this.serialize(target, connection => connection.exists(target));
    } catch (error) {
      this.logger.debug('Device existence check failed', { path: target, error: String(error) });
      return false;
    }
  }

  async createDirectory(target: string): Promise<void> {
    return this.serialize(target, async connection => {
      try {
        await connection.createDirectory(target);
        this.logger.debug('Created device directory', { path: target });
      } catch (error) {
        if (isDeviceSyncError(error, 'already-exists')) {
          return;
        }
        throw this.transportFailure(target, 'create directory', error);
      }
    });
  }

  private async serialize<T>(
    target: string,
    operation: (connection: DeviceSyncConnection) => Promise<T>
  ): Promise<T> {
    const key = normalizeDevicePath(target).toLowerCase();
    let lock = this.pathLocks.get(key);
    if (!lock) {
      lock = pLimit(1);
      this.pathLocks.set(key, lock);
    }

    try {
      return await lock(async () => {
        let connection: DeviceSyncConnection;
        try {
          connection = await this.connector.connect();
        } catch (error) {
          throw this.transportFailure(target, 'connect for', error);
        }
        return operation(connection);
      });
    } finally {
      if (lock.activeCount === 0 && lock.pendingCount === 0) {
        this.pathLocks.delete(key);
      }
    }
  }

  private transportFailure(target: string, action: string, error: unknown): TetherError {
    const reason = isDeviceSyncError(error) ? error.reason : 'io';
    const detail = error instanceof Error ? error.message : String(error);
    return ErrorFactory.ioFailure(target, `Cannot ${action} '${target}' on device: ${detail}`, {
      cause: error,
      platformCode: reason,
      category: ErrorCategory.DEVICE,
    });
  }
}
