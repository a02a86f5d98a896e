import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';

import { DeviceSyncConnector, MemoryDeviceTransport } from '@tetherfs/device-sync';
import {
  ErrorFactory,
  IOFailureError,
  NotFoundError,
  UnknownBackendError,
  ValidationError,
} from '@tetherfs/errors';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import {
  BackendRegistry,
  InputStream,
  OutputStream,
  PathKind,
  StreamState,
  WorkingDirectory,
  createDefaultRegistry,
  deviceSyncPath,
  withOutputStream,
  type Backend,
} from '../index.js';

/**
 * Backend keeping files in a map and counting writes
 */
class CountingBackend implements Backend {
  public readonly name = 'counting';
  public readonly files = new Map<string, Buffer>();
  public writes = 0;
  public failWrites = false;

  async read(target: string): Promise<Buffer> {
    const data = this.files.get(target);
    if (!data) {
      throw ErrorFactory.notFound(target);
    }
    return data;
  }

  async write(target: string, data: Buffer): Promise<void> {
    this.writes++;
    if (this.failWrites) {
      throw ErrorFactory.ioFailure(target, `Cannot write file '${target}' (EROFS)`);
    }
    this.files.set(target, data);
  }

  async exists(target: string): Promise<boolean> {
    return this.files.has(target);
  }

  async createDirectory(): Promise<void> {}
}

function registryWith(backend: Backend): BackendRegistry {
  return new BackendRegistry()
    .register(PathKind.LOCAL, backend)
    .register(PathKind.NETWORK, backend)
    .register(PathKind.DEVICE_SYNC, backend);
}

describe('InputStream', () => {
  it('should read the whole file when opened', async () => {
    const backend = new CountingBackend();
    backend.files.set('\\Tasks\\default.tsk', Buffer.from('line 1\r\nline 2\n'));

    const stream = await InputStream.open('\\Tasks\\default.tsk', {
      registry: registryWith(backend),
    });

    expect(stream.kind).toBe(PathKind.DEVICE_SYNC);
    expect(stream.state).toBe(StreamState.OPEN);
    expect(stream.size).toBe(15);
    expect(stream.lines()).toEqual(['line 1', 'line 2']);
  });

  it('should reject without a stream when the file is missing', async () => {
    const registry = registryWith(new CountingBackend());

    await expect(InputStream.open('missing.txt', { registry })).rejects.toBeInstanceOf(
      NotFoundError
    );
  });

  it('should reject with UnknownBackendError when nothing serves the path', async () => {
    await expect(
      InputStream.open('\\Tasks\\default.tsk', { registry: new BackendRegistry() })
    ).rejects.toBeInstanceOf(UnknownBackendError);
  });

  it('should refuse reads after close', async () => {
    const backend = new CountingBackend();
    backend.files.set('a.txt', Buffer.from('abc'));
    const stream = await InputStream.open('a.txt', { registry: registryWith(backend) });

    stream.close();

    expect(stream.state).toBe(StreamState.CLOSED);
    expect(() => stream.text()).toThrow(ValidationError);
  });

  it('should return no lines for an empty file', async () => {
    const backend = new CountingBackend();
    backend.files.set('empty.txt', Buffer.alloc(0));
    const stream = await InputStream.open('empty.txt', { registry: registryWith(backend) });

    expect(stream.lines()).toEqual([]);
  });
});

describe('OutputStream', () => {
  it('should commit the buffered bytes exactly once', async () => {
    const backend = new CountingBackend();
    const stream = OutputStream.create('out.txt', { registry: registryWith(backend) });

    stream.write('hello ').write(Buffer.from('world'));
    expect(stream.size).toBe(11);

    const first = await stream.close();
    const second = await stream.close();

    expect(first.success).toBe(true);
    expect(second.success).toBe(true);
    expect(backend.writes).toBe(1);
    expect(backend.files.get('out.txt')?.toString()).toBe('hello world');
  });

  it('should report a failed commit as a result', async () => {
    const backend = new CountingBackend();
    backend.failWrites = true;
    const stream = OutputStream.create('out.txt', { registry: registryWith(backend) });
    stream.write('data');

    const result = await stream.close();

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(IOFailureError);
      expect(result.error.message).toBe("Cannot write file 'out.txt' (EROFS)");
    }
    expect(stream.state).toBe(StreamState.CLOSED);
  });

  it('should throw when writing to a closed stream', async () => {
    const stream = OutputStream.create('out.txt', {
      registry: registryWith(new CountingBackend()),
    });
    await stream.close();

    expect(() => stream.write('late')).toThrow("Cannot write to closed stream for 'out.txt'");
  });

  it('should not commit anything when aborted', async () => {
    const backend = new CountingBackend();
    const stream = OutputStream.create('out.txt', { registry: registryWith(backend) });
    stream.write('draft');

    stream.abort();
    await stream.close();

    expect(backend.writes).toBe(0);
  });

  it('should throw UnknownBackendError on creation when nothing serves the path', () => {
    expect(() =>
      OutputStream.create(deviceSyncPath('\\out.txt'), { registry: new BackendRegistry() })
    ).toThrow(UnknownBackendError);
  });
});

describe('withOutputStream', () => {
  it('should commit after the work resolves', async () => {
    const backend = new CountingBackend();

    const value = await withOutputStream(
      'out.txt',
      async stream => {
        stream.write('abc');
        return 42;
      },
      { registry: registryWith(backend) }
    );

    expect(value).toBe(42);
    expect(backend.files.get('out.txt')?.toString()).toBe('abc');
  });

  it('should commit nothing when the work throws', async () => {
    const backend = new CountingBackend();

    await expect(
      withOutputStream(
        'out.txt',
        () => {
          throw new Error('interrupted');
        },
        { registry: registryWith(backend) }
      )
    ).rejects.toThrow('interrupted');

    expect(backend.writes).toBe(0);
  });

  it('should reject with the commit error', async () => {
    const backend = new CountingBackend();
    backend.failWrites = true;

    await expect(
      withOutputStream('out.txt', stream => stream.write('x'), { registry: registryWith(backend) })
    ).rejects.toBeInstanceOf(IOFailureError);
  });
});

describe('streams over real backends', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'tetherfs-streams-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should write and read back a local file', async () => {
    const registry = createDefaultRegistry({ workingDirectory: new WorkingDirectory(root) });

    const stream = OutputStream.create('polar.plr', { registry });
    stream.write('LS-8\n');
    await stream.close();

    const input = await InputStream.open('polar.plr', { registry });
    expect(input.text()).toBe('LS-8\n');
    expect(await fs.readFile(path.join(root, 'polar.plr'), 'utf8')).toBe('LS-8\n');
  });

  it('should write to the device through the connector', async () => {
    const transport = new MemoryDeviceTransport({ directories: ['\\Tasks'] });
    const registry = createDefaultRegistry({ connector: new DeviceSyncConnector(transport) });

    await withOutputStream('\\Tasks\\today.tsk', stream => stream.write('task'), { registry });

    expect(transport.peek('\\Tasks\\today.tsk')?.toString()).toBe('task');
  });
});
