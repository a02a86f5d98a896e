import {
  DeviceSyncError,
  normalizeDevicePath,
  type DeviceSyncConnection,
  type DeviceSyncTransport,
} from '../types.js';

function parentOf(devicePath: string): string {
  const index = devicePath.lastIndexOf('\\');
  return index <= 0 ? '\\' : devicePath.slice(0, index);
}

/**
 * In-process device. Keeps files and directories in maps; a write needs its
 * parent directory, the way a real device file system does.
 */
export class MemoryDeviceTransport implements DeviceSyncTransport {
  public readonly name = 'memory';
  public connectCount = 0;

  private readonly files = new Map<string, Buffer>();
  private readonly directories = new Set<string>(['\\']);

  constructor(seed: { directories?: string[]; files?: Record<string, string | Buffer> } = {}) {
    for (const directory of seed.directories ?? []) {
      this.directories.add(normalizeDevicePath(directory));
    }
    for (const [file, content] of Object.entries(seed.files ?? {})) {
      this.files.set(normalizeDevicePath(file), Buffer.from(content));
    }
  }

  async connect(): Promise<DeviceSyncConnection> {
    this.connectCount++;
    let connected = true;

    const ensureConnected = (devicePath: string): string => {
      if (!connected) {
        throw new DeviceSyncError('Device connection closed', 'not-connected', devicePath);
      }
      return normalizeDevicePath(devicePath);
    };

    return {
      read: async devicePath => {
        const key = ensureConnected(devicePath);
        const content = this.files.get(key);
        if (!content) {
          throw new DeviceSyncError(`No such file on device: ${devicePath}`, 'not-found', devicePath);
        }
        return Buffer.from(content);
      },
      write: async (devicePath, data) => {
        const key = ensureConnected(devicePath);
        if (!this.directories.has(parentOf(key))) {
          throw new DeviceSyncError(
            `Parent directory does not exist on device: ${devicePath}`,
            'io',
            devicePath
          );
        }
        if (this.directories.has(key)) {
          throw new DeviceSyncError(`Path is a directory: ${devicePath}`, 'io', devicePath);
        }
        this.files.set(key, Buffer.from(data));
      },
      exists: async devicePath => {
        const key = ensureConnected(devicePath);
        return this.files.has(key) || this.directories.has(key);
      },
      createDirectory: async devicePath => {
        const key = ensureConnected(devicePath);
        if (this.directories.has(key)) {
          throw new DeviceSyncError(`Directory exists: ${devicePath}`, 'already-exists', devicePath);
        }
        if (this.files.has(key)) {
          throw new DeviceSyncError(`A file exists at ${devicePath}`, 'io', devicePath);
        }
        if (!this.directories.has(parentOf(key))) {
          throw new DeviceSyncError(
            `Parent directory does not exist on device: ${devicePath}`,
            'not-found',
            devicePath
          );
        }
        this.directories.add(key);
      },
      disconnect: async () => {
        connected = false;
      },
    };
  }

  /**
   * Directories currently on the device, sorted
   */
  listDirectories(): string[] {
    return [...this.directories].sort();
  }

  /**
   * Content of a file without going through a connection
   */
  peek(devicePath: string): Buffer | undefined {
    return this.files.get(normalizeDevicePath(devicePath));
  }
}
