import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';

import { DeviceSyncConnector, MemoryDeviceTransport } from '@tetherfs/device-sync';
import { ErrorFactory, IOFailureError, UnknownBackendError } from '@tetherfs/errors';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import {
  BackendRegistry,
  PathKind,
  WorkingDirectory,
  createDefaultRegistry,
  ensureDirectory,
  localPath,
  type Backend,
} from '../index.js';

/**
 * Backend that records directory creation and fails on request
 */
class RecordingBackend implements Backend {
  public readonly name = 'recording';
  public readonly created: string[] = [];
  private readonly existing = new Set<string>();

  constructor(private readonly failOn?: string) {}

  async read(target: string): Promise<Buffer> {
    throw ErrorFactory.notFound(target);
  }

  async write(): Promise<void> {}

  async exists(target: string): Promise<boolean> {
    return this.existing.has(target);
  }

  async createDirectory(target: string): Promise<void> {
    if (target === this.failOn) {
      throw ErrorFactory.ioFailure(target, `Cannot create directory '${target}' (EACCES)`, {
        platformCode: 'EACCES',
      });
    }
    this.created.push(target);
    this.existing.add(target);
  }
}

describe('ensureDirectory', () => {
  it('should create UNC paths below the share only', async () => {
    const backend = new RecordingBackend();
    const registry = new BackendRegistry().register(PathKind.NETWORK, backend);

    await ensureDirectory('\\\\server\\share\\a\\b', { registry });

    expect(backend.created).toEqual([
      '\\\\server\\share',
      '\\\\server\\share\\a',
      '\\\\server\\share\\a\\b',
    ]);
  });

  it('should stop at the first failure without rolling back', async () => {
    const backend = new RecordingBackend('out\\b');
    const registry = new BackendRegistry().register(PathKind.LOCAL, backend);

    const error = await ensureDirectory('out\\b\\c', { registry }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(IOFailureError);
    expect(backend.created).toEqual(['out']);
  });

  it('should do nothing for an empty path', async () => {
    await expect(ensureDirectory('', { registry: new BackendRegistry() })).resolves.toBeUndefined();
  });

  it('should fail with UnknownBackendError when the kind has no backend', async () => {
    const registry = new BackendRegistry();

    await expect(ensureDirectory('\\Maps', { registry })).rejects.toBeInstanceOf(
      UnknownBackendError
    );
  });

  it('should create device directories through the transport', async () => {
    const transport = new MemoryDeviceTransport();
    const registry = createDefaultRegistry({ connector: new DeviceSyncConnector(transport) });

    await ensureDirectory('\\My Documents\\Condor\\Tasks', { registry });
    await ensureDirectory('\\My Documents\\Condor\\Tasks', { registry });

    expect(transport.listDirectories()).toEqual([
      '\\',
      '\\My Documents',
      '\\My Documents\\Condor',
      '\\My Documents\\Condor\\Tasks',
    ]);
  });

  describe('on the local file system', () => {
    let root: string;

    beforeEach(async () => {
      root = await fs.mkdtemp(path.join(os.tmpdir(), 'tetherfs-dirs-'));
    });

    afterEach(async () => {
      await fs.rm(root, { recursive: true, force: true });
    });

    it('should create every level and be idempotent', async () => {
      const registry = createDefaultRegistry({ workingDirectory: new WorkingDirectory(root) });

      await ensureDirectory('XCSoarData\\Condor\\Tasks', { registry });
      await ensureDirectory(localPath('XCSoarData\\Condor\\Tasks'), { registry });

      const stats = await fs.stat(path.join(root, 'XCSoarData', 'Condor', 'Tasks'));
      expect(stats.isDirectory()).toBe(true);
    });

    it('should accept absolute paths', async () => {
      const target = path.join(root, 'a', 'b');

      await ensureDirectory(target, { registry: createDefaultRegistry() });

      const stats = await fs.stat(target);
      expect(stats.isDirectory()).toBe(true);
    });
  });
});
