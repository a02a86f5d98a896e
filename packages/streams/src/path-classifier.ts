/**
 * Path classification and segmentation.
 *
 * Three syntaxes share one string type:
 *   `C:\maps\alps.dat`, `maps/alps.dat`  local
 *   `\\server\share\maps`                  UNC network path
 *   `\My Documents\maps`                   tethered device
 * Classification looks at the first two characters only.
 */

import { PathKind, type PathInput, type TaggedPath } from './paths.js';

export type PathSegmentSequence = readonly string[];

const SEPARATOR = /[\\/]/;

function findSeparator(path: string, from: number): number {
  for (let i = from; i < path.length; i++) {
    if (SEPARATOR.test(path.charAt(i))) {
      return i;
    }
  }
  return -1;
}

function findLastSeparator(path: string, before: number = path.length): number {
  for (let i = before - 1; i >= 0; i--) {
    if (SEPARATOR.test(path.charAt(i))) {
      return i;
    }
  }
  return -1;
}

export function classify(path: string): PathKind {
  if (path.length > 2 && path[0] === '\\' && path[1] !== '\\') {
    return PathKind.DEVICE_SYNC;
  }
  if (path.startsWith('\\\\')) {
    return PathKind.NETWORK;
  }
  return PathKind.LOCAL;
}

export function isDeviceSyncPath(path: string): boolean {
  return classify(path) === PathKind.DEVICE_SYNC;
}

/**
 * Compatibility shim for legacy string paths
 */
export function tagPath(input: PathInput): TaggedPath {
  if (typeof input !== 'string') {
    return input;
  }
  return { kind: classify(input), path: input };
}

/**
 * Cumulative prefixes of a directory path, one per directory to create.
 *
 * A leading separator on a network path starts `\\server\share`, which is
 * emitted as one prefix and never as `\\server` alone. Any other leading
 * separator is a root and the first segment runs to the next separator.
 * Empty components (doubled or trailing separators) produce no segment.
 *
 * @example segment('\\\\srv\\share\\a') // ['\\\\srv\\share', '\\\\srv\\share\\a']
 */
export function segment(path: string, kind: PathKind = classify(path)): PathSegmentSequence {
  const segments: string[] = [];
  let pos = 0;

  while (pos !== -1) {
    let end = findSeparator(path, pos);

    if (end === 0) {
      if (kind === PathKind.NETWORK) {
        const serverEnd = findSeparator(path, 2);
        if (serverEnd === -1) {
          break;
        }
        end = findSeparator(path, serverEnd + 1);
      } else {
        end = findSeparator(path, 1);
      }
    }

    const stop = end === -1 ? path.length : end;
    if (stop > findLastSeparator(path, stop) + 1) {
      segments.push(path.slice(0, stop));
    }

    pos = end === -1 ? -1 : end + 1;
  }

  return segments;
}

/**
 * Split a file path after its last separator. The directory keeps the
 * separator and is empty when there is none.
 */
export function splitFilePath(filePath: string): { dir: string; file: string } {
  const index = findLastSeparator(filePath);
  if (index === -1) {
    return { dir: '', file: filePath };
  }
  return { dir: filePath.slice(0, index + 1), file: filePath.slice(index + 1) };
}
