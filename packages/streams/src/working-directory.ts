import path from 'path';

import pLimit from 'p-limit';

/**
 * Working directory owned by a backend instead of the process.
 *
 * Entering a directory is a scoped acquisition: the previous directory comes
 * back when the scope ends, whether the work inside succeeded or not. Scopes
 * run one at a time, so nested `within` calls on the same instance would wait
 * on themselves; backends enter at most one level.
 */
export class WorkingDirectory {
  /** Unset follows `process.cwd()` */
  private current: string | undefined;
  private readonly lock = pLimit(1);

  constructor(initial?: string) {
    this.current = initial === undefined ? undefined : path.resolve(initial);
  }

  get path(): string {
    return this.current ?? process.cwd();
  }

  /**
   * Absolute form of `target`, queued behind any open scope
   */
  resolve(target: string): Promise<string> {
    return this.lock(async () => path.resolve(this.path, target));
  }

  within<T>(dir: string, work: (cwd: string) => Promise<T>): Promise<T> {
    return this.lock(async () => {
      const previous = this.current;
      const entered = path.resolve(this.path, dir);
      this.current = entered;
      try {
        return await work(entered);
      } finally {
        this.current = previous;
      }
    });
  }
}
