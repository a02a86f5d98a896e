/**
 * Device-sync transport contract.
 *
 * Paths are passed through unmodified: backslash separated and rooted at the
 * device (`\My Documents\route.cup`).
 */

export interface DeviceSyncConnection {
  read(path: string): Promise<Buffer>;
  write(path: string, data: Buffer): Promise<void>;
  exists(path: string): Promise<boolean>;
  /** Rejects with reason `already-exists` when the directory is there */
  createDirectory(path: string): Promise<void>;
  disconnect(): Promise<void>;
}

export interface DeviceSyncTransport {
  readonly name: string;
  connect(): Promise<DeviceSyncConnection>;
}

export type DeviceSyncFailureReason = 'not-found' | 'not-connected' | 'already-exists' | 'io';

export class DeviceSyncError extends Error {
  constructor(
    message: string,
    public readonly reason: DeviceSyncFailureReason,
    public readonly path?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DeviceSyncError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function isDeviceSyncError(
  error: unknown,
  reason?: DeviceSyncFailureReason
): error is DeviceSyncError {
  return error instanceof DeviceSyncError && (reason === undefined || error.reason === reason);
}

/**
 * Split a device path into its components, dropping the root
 */
export function devicePathParts(devicePath: string): string[] {
  return devicePath.split(/[\\/]+/).filter(part => part.length > 0);
}

/**
 * Canonical form used as a lookup key: single backslashes, rooted, no
 * trailing separator
 */
export function normalizeDevicePath(devicePath: string): string {
  return `\\${devicePathParts(devicePath).join('\\')}`;
}
