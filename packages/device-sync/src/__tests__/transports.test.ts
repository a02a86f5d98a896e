import { promises as fsp } from 'fs';
import os from 'os';
import path from 'path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import {
  MemoryDeviceTransport,
  MountedDeviceTransport,
  devicePathParts,
  isDeviceSyncError,
  normalizeDevicePath,
} from '../index.js';

describe('device paths', () => {
  it('should split and normalize', () => {
    expect(devicePathParts('\\My Documents\\Condor\\task.tsk')).toEqual([
      'My Documents',
      'Condor',
      'task.tsk',
    ]);
    expect(normalizeDevicePath('\\a//b\\')).toBe('\\a\\b');
    expect(normalizeDevicePath('\\')).toBe('\\');
  });
});

describe('MemoryDeviceTransport', () => {
  it('should require parent directories', async () => {
    const transport = new MemoryDeviceTransport();
    const connection = await transport.connect();

    await expect(connection.write('\\Maps\\a.dat', Buffer.from('1'))).rejects.toMatchObject({
      reason: 'io',
    });
    await expect(connection.createDirectory('\\Maps\\Alps')).rejects.toMatchObject({
      reason: 'not-found',
    });

    await connection.createDirectory('\\Maps');
    await connection.write('\\Maps\\a.dat', Buffer.from('1'));

    expect(transport.peek('\\Maps\\a.dat')?.toString()).toBe('1');
    expect(transport.listDirectories()).toEqual(['\\', '\\Maps']);
  });

  it('should report existing directories', async () => {
    const connection = await new MemoryDeviceTransport({ directories: ['\\Maps'] }).connect();

    const error = await connection.createDirectory('\\Maps').catch((e: unknown) => e);

    expect(isDeviceSyncError(error, 'already-exists')).toBe(true);
    await expect(connection.exists('\\Maps')).resolves.toBe(true);
    await expect(connection.exists('\\Other')).resolves.toBe(false);
  });

  it('should fail reads of missing files', async () => {
    const connection = await new MemoryDeviceTransport().connect();

    await expect(connection.read('\\none.txt')).rejects.toMatchObject({
      reason: 'not-found',
      path: '\\none.txt',
    });
  });
});

describe('MountedDeviceTransport', () => {
  let mount: string;

  beforeEach(async () => {
    mount = await fsp.mkdtemp(path.join(os.tmpdir(), 'tetherfs-mount-'));
  });

  afterEach(async () => {
    await fsp.rm(mount, { recursive: true, force: true });
  });

  it('should refuse to connect without a mount point', async () => {
    const transport = new MountedDeviceTransport(path.join(mount, 'absent'));

    await expect(transport.connect()).rejects.toMatchObject({ reason: 'not-connected' });
  });

  it('should map device paths beneath the mount', async () => {
    const connection = await new MountedDeviceTransport(mount).connect();

    await connection.createDirectory('\\My Documents');
    await connection.write('\\My Documents\\task.tsk', Buffer.from('waypoints'));

    const onHost = await fsp.readFile(path.join(mount, 'My Documents', 'task.tsk'), 'utf8');
    expect(onHost).toBe('waypoints');
    await expect(connection.read('\\My Documents\\task.tsk')).resolves.toEqual(
      Buffer.from('waypoints')
    );
    await expect(connection.exists('\\My Documents\\task.tsk')).resolves.toBe(true);
  });

  it('should translate platform errors into reasons', async () => {
    const connection = await new MountedDeviceTransport(mount).connect();
    await connection.createDirectory('\\Maps');

    await expect(connection.createDirectory('\\Maps')).rejects.toMatchObject({
      reason: 'already-exists',
    });
    await expect(connection.read('\\Maps\\none.dat')).rejects.toMatchObject({
      reason: 'not-found',
    });
    await expect(connection.read('\\..\\outside')).rejects.toMatchObject({ reason: 'io' });
    await expect(connection.exists('\\..\\outside')).resolves.toBe(false);
  });
});
