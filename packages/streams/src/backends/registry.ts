import { ErrorFactory } from '@tetherfs/errors';
import { DeviceSyncConnector } from '@tetherfs/device-sync';
import type { Logger } from '@tetherfs/logging';

import { PathKind, type TaggedPath } from '../paths.js';
import type { WorkingDirectory } from '../working-directory.js';

import { DeviceSyncBackend } from './device-sync-backend.js';
import { LocalBackend } from './local-backend.js';
import type { Backend } from './types.js';

/**
 * Supplies a backend at lookup time; undefined while none is available
 */
export type BackendProvider = () => Backend | undefined;

/**
 * Which backend serves which kind of path
 */
export class BackendRegistry {
  private readonly backends = new Map<PathKind, Backend>();
  private readonly providers = new Map<PathKind, BackendProvider>();

  register(kind: PathKind, backend: Backend): this {
    this.providers.delete(kind);
    this.backends.set(kind, backend);
    return this;
  }

  /**
   * Register a backend that is looked up on every use
   */
  registerProvider(kind: PathKind, provider: BackendProvider): this {
    this.backends.delete(kind);
    this.providers.set(kind, provider);
    return this;
  }

  has(kind: PathKind): boolean {
    return this.lookup(kind) !== undefined;
  }

  /**
   * Backend for a path; UnknownBackendError when the kind has none
   */
  resolve(target: TaggedPath): Backend {
    const backend = this.lookup(target.kind);
    if (!backend) {
      throw ErrorFactory.unknownBackend(target.path, target.kind);
    }
    return backend;
  }

  private lookup(kind: PathKind): Backend | undefined {
    return this.backends.get(kind) ?? this.providers.get(kind)?.();
  }
}

export interface DefaultRegistryOptions {
  workingDirectory?: WorkingDirectory;
  /** Device connection; without one the process-wide connector is used once configured */
  connector?: DeviceSyncConnector;
  logger?: Logger;
}

/**
 * Device backend over whichever connector is currently shared, rebuilt when
 * the shared connector changes
 */
function sharedDeviceBackend(logger: Logger | undefined): BackendProvider {
  let current: { connector: DeviceSyncConnector; backend: DeviceSyncBackend } | undefined;

  return () => {
    const connector = DeviceSyncConnector.shared();
    if (!connector) {
      return undefined;
    }
    if (current?.connector !== connector) {
      current = {
        connector,
        backend: new DeviceSyncBackend(connector, {
          ...(logger && { logger: logger.child('device-sync') }),
        }),
      };
    }
    return current.backend;
  };
}

/**
 * LocalBackend for local and network paths. Device paths go to the given
 * connector, or to the process-wide one whenever it is configured.
 */
export function createDefaultRegistry(options: DefaultRegistryOptions = {}): BackendRegistry {
  const registry = new BackendRegistry();

  const local = new LocalBackend({
    ...(options.workingDirectory && { workingDirectory: options.workingDirectory }),
    ...(options.logger && { logger: options.logger.child('local') }),
  });
  registry.register(PathKind.LOCAL, local).register(PathKind.NETWORK, local);

  if (options.connector) {
    registry.register(
      PathKind.DEVICE_SYNC,
      new DeviceSyncBackend(options.connector, {
        ...(options.logger && { logger: options.logger.child('device-sync') }),
      })
    );
  } else {
    registry.registerProvider(PathKind.DEVICE_SYNC, sharedDeviceBackend(options.logger));
  }

  return registry;
}

let defaultRegistry: BackendRegistry | undefined;

/**
 * Registry used when an operation is not given one. Built on first use; its
 * local paths resolve against `process.cwd()` at the time of each call.
 */
export function getDefaultRegistry(): BackendRegistry {
  defaultRegistry ??= createDefaultRegistry();
  return defaultRegistry;
}

export function setDefaultRegistry(registry: BackendRegistry | undefined): void {
  defaultRegistry = registry;
}
