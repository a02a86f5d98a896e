import path from 'path';

import type { Logger } from '@tetherfs/logging';
import fs from 'fs-extra';

import {
  DeviceSyncError,
  devicePathParts,
  type DeviceSyncConnection,
  type DeviceSyncTransport,
} from '../types.js';

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;
}

/**
 * Device exposed by the host as a mounted directory. Device paths are
 * resolved beneath the mount point and never escape it.
 */
export class MountedDeviceTransport implements DeviceSyncTransport {
  public readonly name = 'mounted';

  constructor(
    private readonly mountPath: string,
    private readonly logger?: Logger
  ) {}

  async connect(): Promise<DeviceSyncConnection> {
    const root = path.resolve(this.mountPath);
    const stats = await fs.stat(root).catch(() => null);
    if (!stats?.isDirectory()) {
      throw new DeviceSyncError(`Device is not mounted at ${root}`, 'not-connected');
    }

    this.logger?.debug('Device mount attached', { mountPath: root });
    let connected = true;

    const hostPath = (devicePath: string): string => {
      if (!connected) {
        throw new DeviceSyncError('Device connection closed', 'not-connected', devicePath);
      }
      const parts = devicePathParts(devicePath);
      if (parts.includes('..')) {
        throw new DeviceSyncError(`Path escapes the device root: ${devicePath}`, 'io', devicePath);
      }
      return path.join(root, ...parts);
    };

    const failure = (devicePath: string, action: string, error: unknown): DeviceSyncError => {
      const code = errorCode(error);
      const reason =
        code === 'ENOENT' || code === 'EISDIR'
          ? 'not-found'
          : code === 'EEXIST'
            ? 'already-exists'
            : 'io';
      return new DeviceSyncError(
        `Cannot ${action} '${devicePath}' on device (${code ?? 'unknown error'})`,
        reason,
        devicePath,
        { cause: error }
      );
    };

    return {
      read: async devicePath => {
        const target = hostPath(devicePath);
        try {
          return await fs.readFile(target);
        } catch (error) {
          throw failure(devicePath, 'read', error);
        }
      },
      write: async (devicePath, data) => {
        const target = hostPath(devicePath);
        try {
          await fs.writeFile(target, data);
        } catch (error) {
          throw failure(devicePath, 'write', error);
        }
      },
      exists: async devicePath => {
        try {
          return await fs.pathExists(hostPath(devicePath));
        } catch {
          return false;
        }
      },
      createDirectory: async devicePath => {
        const target = hostPath(devicePath);
        try {
          await fs.mkdir(target);
        } catch (error) {
          throw failure(devicePath, 'create directory', error);
        }
      },
      disconnect: async () => {
        connected = false;
        this.logger?.debug('Device mount detached', { mountPath: root });
      },
    };
  }
}
