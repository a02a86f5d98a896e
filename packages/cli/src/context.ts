import { loadTetherConfig, type DeviceConfig, type TetherConfig } from '@tetherfs/configuration';
import {
  DeviceSyncConnector,
  MemoryDeviceTransport,
  MountedDeviceTransport,
  type DeviceSyncTransport,
} from '@tetherfs/device-sync';
import { LoggerFactory, type Logger } from '@tetherfs/logging';
import { WorkingDirectory, createDefaultRegistry, type BackendRegistry } from '@tetherfs/streams';

/**
 * Options every command accepts
 */
export interface GlobalOptions {
  config?: string;
  logLevel?: string;
  deviceMount?: string;
}

export interface CliContext {
  config: TetherConfig;
  logger: Logger;
  registry: BackendRegistry;
  connector: DeviceSyncConnector | undefined;
  close(): Promise<void>;
}

export function createTransport(device: DeviceConfig, logger: Logger): DeviceSyncTransport {
  switch (device.transport) {
    case 'mounted':
      return new MountedDeviceTransport(device.mount_path, logger.child('mounted'));
    case 'memory':
      return new MemoryDeviceTransport();
  }
}

/**
 * Load configuration and wire the logger, device connection and backends
 * for one command run
 */
export async function createCliContext(options: GlobalOptions): Promise<CliContext> {
  const config = await loadTetherConfig(options.config);

  const logger = LoggerFactory.fromOptions('tetherfs', {
    level: options.logLevel ?? config.logging.level,
    format: config.logging.format,
    file: config.logging.file,
    maxSize: config.logging.max_size,
    maxFiles: config.logging.backup_count,
  });

  const device: DeviceConfig | undefined =
    options.deviceMount !== undefined
      ? { transport: 'mounted', mount_path: options.deviceMount }
      : config.device;

  const connector = device
    ? new DeviceSyncConnector(createTransport(device, logger), { logger: logger.child('device') })
    : undefined;

  const registry = createDefaultRegistry({
    workingDirectory: new WorkingDirectory(config.local.base_directory ?? process.cwd()),
    ...(connector && { connector }),
    logger,
  });

  return {
    config,
    logger,
    registry,
    connector,
    close: async () => {
      await connector?.disconnect();
      await logger.close();
    },
  };
}
