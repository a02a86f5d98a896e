/**
 * Capabilities every storage backend provides
 */
export interface Backend {
  readonly name: string;

  /** Whole content of a file; rejects with NotFoundError */
  read(path: string): Promise<Buffer>;

  /** Create or overwrite; rejects with IOFailureError */
  write(path: string, data: Buffer): Promise<void>;

  /** Never rejects; false whenever existence cannot be confirmed */
  exists(path: string): Promise<boolean>;

  /** Idempotent; rejects with IOFailureError for anything but "already exists" */
  createDirectory(path: string): Promise<void>;
}
