import { LoggerFactory, type Logger } from '@tetherfs/logging';

import { getDefaultRegistry, type BackendRegistry } from './backends/registry.js';
import { segment, tagPath } from './path-classifier.js';
import type { PathInput } from './paths.js';

export interface EnsureDirectoryOptions {
  registry?: BackendRegistry;
  logger?: Logger;
}

/**
 * Create a directory and every missing parent, one segment at a time.
 *
 * Existing directories are fine, so calling this twice is harmless. The first
 * other failure stops the walk; directories created before it are left in
 * place.
 */
export async function ensureDirectory(
  dirPath: PathInput,
  options: EnsureDirectoryOptions = {}
): Promise<void> {
  const target = tagPath(dirPath);
  if (target.path.length === 0) {
    return;
  }

  const registry = options.registry ?? getDefaultRegistry();
  const logger = options.logger ?? LoggerFactory.createSilentLogger('tetherfs:directory');
  const backend = registry.resolve(target);
  const segments = segment(target.path, target.kind);

  logger.debug('Ensuring directory', { path: target.path, kind: target.kind, segments });

  for (const subDir of segments) {
    await backend.createDirectory(subDir);
  }
}
