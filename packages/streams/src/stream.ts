import { ErrorFactory, safeAsync, success, type Result } from '@tetherfs/errors';
import { LoggerFactory, type Logger } from '@tetherfs/logging';

import { getDefaultRegistry, type BackendRegistry } from './backends/registry.js';
import type { Backend } from './backends/types.js';
import { tagPath } from './path-classifier.js';
import type { PathInput, PathKind, TaggedPath } from './paths.js';

export enum StreamState {
  OPEN = 'open',
  CLOSED = 'closed',
}

export interface StreamOptions {
  registry?: BackendRegistry;
  logger?: Logger;
}

/**
 * A stream is bound to one path and one backend for its whole life. Objects
 * only exist once construction has fully succeeded.
 */
abstract class Stream {
  protected currentState = StreamState.OPEN;

  protected constructor(
    public readonly target: TaggedPath,
    protected readonly backend: Backend,
    protected readonly logger: Logger
  ) {}

  get path(): string {
    return this.target.path;
  }

  get kind(): PathKind {
    return this.target.kind;
  }

  get state(): StreamState {
    return this.currentState;
  }

  protected assertOpen(action: string): void {
    if (this.currentState !== StreamState.OPEN) {
      throw ErrorFactory.validation(`Cannot ${action} closed stream for '${this.path}'`, {
        data: { path: this.path },
      });
    }
  }
}

function resolveTarget(path: PathInput, options: StreamOptions) {
  const target = tagPath(path);
  const registry = options.registry ?? getDefaultRegistry();
  const logger = options.logger ?? LoggerFactory.createSilentLogger('tetherfs:stream');
  return { target, backend: registry.resolve(target), logger };
}

/**
 * Stream whose content is fully read from its backend when it is opened
 */
export class InputStream extends Stream {
  private data: Buffer;

  private constructor(target: TaggedPath, backend: Backend, logger: Logger, data: Buffer) {
    super(target, backend, logger);
    this.data = data;
  }

  /**
   * Rejects with UnknownBackendError, NotFoundError or IOFailureError; no
   * stream is created in that case.
   */
  static async open(path: PathInput, options: StreamOptions = {}): Promise<InputStream> {
    const { target, backend, logger } = resolveTarget(path, options);
    const data = await backend.read(target.path);
    logger.debug('Opened input stream', { path: target.path, kind: target.kind, bytes: data.length });
    return new InputStream(target, backend, logger, data);
  }

  get buffer(): Buffer {
    this.assertOpen('read from');
    return this.data;
  }

  get size(): number {
    return this.buffer.length;
  }

  text(encoding: BufferEncoding = 'utf8'): string {
    return this.buffer.toString(encoding);
  }

  /**
   * Content split into lines, accepting CRLF and LF endings
   */
  lines(encoding: BufferEncoding = 'utf8'): string[] {
    const content = this.text(encoding);
    if (content.length === 0) {
      return [];
    }
    const lines = content.split(/\r?\n/);
    if (lines[lines.length - 1] === '') {
      lines.pop();
    }
    return lines;
  }

  close(): void {
    this.currentState = StreamState.CLOSED;
    this.data = Buffer.alloc(0);
  }
}

/**
 * Stream that buffers writes and commits them to its backend in one write
 * when it is closed
 */
export class OutputStream extends Stream {
  private chunks: Buffer[] = [];
  private byteCount = 0;

  private constructor(target: TaggedPath, backend: Backend, logger: Logger) {
    super(target, backend, logger);
  }

  /**
   * Throws UnknownBackendError when the path has no backend
   */
  static create(path: PathInput, options: StreamOptions = {}): OutputStream {
    const { target, backend, logger } = resolveTarget(path, options);
    return new OutputStream(target, backend, logger);
  }

  write(chunk: string | Uint8Array, encoding: BufferEncoding = 'utf8'): this {
    this.assertOpen('write to');
    const data = typeof chunk === 'string' ? Buffer.from(chunk, encoding) : Buffer.from(chunk);
    this.chunks.push(data);
    this.byteCount += data.length;
    return this;
  }

  get size(): number {
    return this.byteCount;
  }

  /**
   * Commit the buffered bytes. The backend write happens exactly once; closing
   * again is a successful no-op.
   */
  async close(): Promise<Result<void>> {
    if (this.currentState === StreamState.CLOSED) {
      return success(undefined);
    }

    this.currentState = StreamState.CLOSED;
    const data = Buffer.concat(this.chunks);
    this.chunks = [];

    const result = await safeAsync(() => this.backend.write(this.target.path, data));
    if (result.success) {
      this.logger.debug('Committed output stream', { path: this.path, bytes: data.length });
    } else {
      this.logger.error(`Failed to commit '${this.path}'`, result.error);
    }
    return result;
  }

  /**
   * Close without committing anything
   */
  abort(): void {
    this.currentState = StreamState.CLOSED;
    this.chunks = [];
  }
}

/**
 * Run `work` against a new output stream and commit it afterwards. Nothing is
 * committed when `work` throws; a failed commit rejects.
 */
export async function withOutputStream<T>(
  path: PathInput,
  work: (stream: OutputStream) => Promise<T> | T,
  options: StreamOptions = {}
): Promise<T> {
  const stream = OutputStream.create(path, options);

  let value: T;
  try {
    value = await work(stream);
  } catch (error) {
    stream.abort();
    throw error;
  }

  const result = await stream.close();
  if (!result.success) {
    throw result.error;
  }
  return value;
}
