/**
 * Streams over local, UNC network and tethered device paths
 *
 * - Path classification and directory segmentation
 * - Backends: local file system and device-sync channel
 * - Recursive directory creation across backends
 * - Input streams read whole files; output streams commit on close
 */

export {
  PathKind,
  localPath,
  networkPath,
  deviceSyncPath,
  type TaggedPath,
  type PathInput,
} from './paths.js';

export {
  classify,
  segment,
  splitFilePath,
  isDeviceSyncPath,
  tagPath,
  type PathSegmentSequence,
} from './path-classifier.js';

export { WorkingDirectory } from './working-directory.js';

export type { Backend } from './backends/types.js';
export { LocalBackend, toHostPath, type LocalBackendOptions } from './backends/local-backend.js';
export { DeviceSyncBackend, type DeviceSyncBackendOptions } from './backends/device-sync-backend.js';
export {
  BackendRegistry,
  createDefaultRegistry,
  getDefaultRegistry,
  setDefaultRegistry,
  type BackendProvider,
  type DefaultRegistryOptions,
} from './backends/registry.js';

export { ensureDirectory, type EnsureDirectoryOptions } from './directory.js';

export {
  InputStream,
  OutputStream,
  StreamState,
  withOutputStream,
  type StreamOptions,
} from './stream.js';

export { readFile, writeFile, fileExists, copyFile } from './files.js';
