import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';

import { DeviceSyncConnector, MemoryDeviceTransport } from '@tetherfs/device-sync';
import { NotFoundError, ValidationError } from '@tetherfs/errors';
import { LoggerFactory } from '@tetherfs/logging';
import { WorkingDirectory, createDefaultRegistry } from '@tetherfs/streams';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { CliCommands, type CommandOutput } from '../index.js';

class BufferedOutput implements CommandOutput {
  private readonly chunks: Buffer[] = [];

  write(chunk: string | Uint8Array): void {
    this.chunks.push(Buffer.from(chunk));
  }

  get text(): string {
    return Buffer.concat(this.chunks).toString('utf8');
  }
}

describe('CliCommands', () => {
  let root: string;
  let transport: MemoryDeviceTransport;
  let output: BufferedOutput;
  let commands: CliCommands;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'tetherfs-cli-'));
    transport = new MemoryDeviceTransport({
      directories: ['\\Tasks'],
      files: { '\\Tasks\\default.tsk': 'TP1,TP2' },
    });
    output = new BufferedOutput();
    commands = new CliCommands({
      registry: createDefaultRegistry({
        workingDirectory: new WorkingDirectory(root),
        connector: new DeviceSyncConnector(transport),
      }),
      logger: LoggerFactory.createSilentLogger('test'),
      output,
    });
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should print the kind and segments of a path', async () => {
    const code = await commands.classify('\\\\srv\\share\\a');

    expect(code).toBe(0);
    expect(output.text).toBe('network\n  \\\\srv\\share\n  \\\\srv\\share\\a\n');
  });

  it('should print file contents from the device', async () => {
    await commands.cat('\\Tasks\\default.tsk');

    expect(output.text).toBe('TP1,TP2');
  });

  it('should copy from the device into a new local directory', async () => {
    await commands.mkdir('backup\\tasks');
    await commands.cp('\\Tasks\\default.tsk', 'backup\\tasks\\default.tsk');

    expect(output.text).toBe(
      "Copied 7 bytes from '\\Tasks\\default.tsk' to 'backup\\tasks\\default.tsk'\n"
    );
    expect(await fs.readFile(path.join(root, 'backup', 'tasks', 'default.tsk'), 'utf8')).toBe(
      'TP1,TP2'
    );
  });

  it('should exit with 1 when a file does not exist', async () => {
    expect(await commands.exists('\\Tasks\\default.tsk')).toBe(0);
    expect(await commands.exists('\\Tasks\\other.tsk')).toBe(1);
    expect(output.text).toBe('true\nfalse\n');
  });

  it('should reject a missing file for cat', async () => {
    await expect(commands.cat('missing.txt')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should format coordinates', async () => {
    await commands.coord('45.5');
    await commands.coord('-7.25', { longitude: true, format: 'ddmmss' });

    expect(output.text).toBe('45:30.000N\n007:15:00W\n');
  });

  it('should reject values that are not numbers', async () => {
    await expect(commands.coord('north')).rejects.toBeInstanceOf(ValidationError);
    await expect(commands.coord(' ')).rejects.toBeInstanceOf(ValidationError);
  });
});
