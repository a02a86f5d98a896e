/**
 * One-call helpers over the stream classes
 */

import { getDefaultRegistry, type BackendRegistry } from './backends/registry.js';
import { tagPath } from './path-classifier.js';
import type { PathInput } from './paths.js';
import { InputStream, withOutputStream, type StreamOptions } from './stream.js';

export async function readFile(path: PathInput, options: StreamOptions = {}): Promise<Buffer> {
  const stream = await InputStream.open(path, options);
  const data = stream.buffer;
  stream.close();
  return data;
}

export async function writeFile(
  path: PathInput,
  data: string | Uint8Array,
  options: StreamOptions = {}
): Promise<void> {
  await withOutputStream(path, stream => stream.write(data), options);
}

/**
 * False when the path is missing, unreadable or has no backend
 */
export async function fileExists(
  path: PathInput,
  options: { registry?: BackendRegistry } = {}
): Promise<boolean> {
  const target = tagPath(path);
  const registry = options.registry ?? getDefaultRegistry();
  if (!registry.has(target.kind)) {
    return false;
  }
  return registry.resolve(target).exists(target.path);
}

/**
 * Copy between any two paths, whichever backends they belong to. Returns the
 * number of bytes copied.
 */
export async function copyFile(
  source: PathInput,
  destination: PathInput,
  options: StreamOptions = {}
): Promise<number> {
  const data = await readFile(source, options);
  await writeFile(destination, data, options);
  return data.length;
}
