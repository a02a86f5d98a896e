/**
 * Device-sync channel: the transport contract, the shared connection and the
 * available transports.
 */

export {
  DeviceSyncError,
  isDeviceSyncError,
  devicePathParts,
  normalizeDevicePath,
  type DeviceSyncConnection,
  type DeviceSyncTransport,
  type DeviceSyncFailureReason,
} from './types.js';

export { DeviceSyncConnector, type DeviceSyncConnectorOptions } from './connector.js';

export { MemoryDeviceTransport } from './transports/memory-transport.js';
export { MountedDeviceTransport } from './transports/mounted-transport.js';
