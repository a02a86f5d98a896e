import { ErrorFactory } from '@tetherfs/errors';

/**
 * Storage a path belongs to
 */
export enum PathKind {
  /** Plain local filesystem path */
  LOCAL = 'local',
  /** UNC network path, `\\server\share\...` */
  NETWORK = 'network',
  /** Path on the tethered device, a single leading backslash: `\dir\...` */
  DEVICE_SYNC = 'device-sync',
}

/**
 * A path with its storage decided once, at the API boundary
 */
export type TaggedPath =
  | { readonly kind: PathKind.LOCAL; readonly path: string }
  | { readonly kind: PathKind.NETWORK; readonly path: string }
  | { readonly kind: PathKind.DEVICE_SYNC; readonly path: string };

/**
 * Anything the stream API accepts: a tagged path, or a legacy string whose
 * storage is derived from its leading characters
 */
export type PathInput = string | TaggedPath;

const UNC_PREFIX = /^[\\/]{2}[^\\/]+[\\/][^\\/]+/;

export function localPath(path: string): TaggedPath {
  if (path.length === 0) {
    throw ErrorFactory.validation('Local path must not be empty', { data: { path } });
  }
  return { kind: PathKind.LOCAL, path };
}

export function networkPath(path: string): TaggedPath {
  if (!UNC_PREFIX.test(path)) {
    throw ErrorFactory.validation(`Network path must name a server and a share: '${path}'`, {
      data: { path },
    });
  }
  return { kind: PathKind.NETWORK, path };
}

export function deviceSyncPath(path: string): TaggedPath {
  if (path.length === 0) {
    throw ErrorFactory.validation('Device path must not be empty', { data: { path } });
  }
  return { kind: PathKind.DEVICE_SYNC, path };
}
