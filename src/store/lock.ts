import { mkdir, open, stat, unlink } from "node:fs/promises";
import { dirname } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { isAlreadyExists, isNotFound } from "../utils/platform.js";

export interface LockOptions {
  /** Attempts before giving up on a contended lock file. */
  retries: number;
  /** Delay between attempts. */
  retryMs: number;
  /** Lock files older than this are considered abandoned and removed. */
  staleMs: number;
}

export const DEFAULT_LOCK_OPTIONS: LockOptions = {
  retries: 20,
  retryMs: 50,
  staleMs: 30_000,
};

/**
 * Per-key mutual exclusion. Within the process, callers on the same key
 * queue behind each other; across processes, an O_CREAT|O_EXCL lock file per
 * key provides the same guarantee. Different keys never contend.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  constructor(
    private readonly pathFor: (key: string) => string,
    private readonly options: LockOptions = DEFAULT_LOCK_OPTIONS,
  ) {}

  /** Run fn while holding every key. Keys are taken in sorted order to avoid deadlock. */
  async withLocks<T>(keys: string[], fn: () => Promise<T>): Promise<T> {
    const ordered = [...new Set(keys)].sort();
    const run = ordered.reduceRight<() => Promise<T>>(
      (inner, key) => () => this.withLock(key, inner),
      fn,
    );
    return run();
  }

  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      await this.acquireFile(key);
      try {
        return await fn();
      } finally {
        await this.releaseFile(key);
      }
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  private async acquireFile(key: string): Promise<void> {
    const lockFile = this.pathFor(key);
    await mkdir(dirname(lockFile), { recursive: true });

    for (let attempt = 0; attempt < this.options.retries; attempt++) {
      try {
        const handle = await open(lockFile, "wx");
        await handle.writeFile(String(process.pid), "utf-8");
        await handle.close();
        return;
      } catch (err) {
        if (!isAlreadyExists(err)) throw err;
      }

      if (await this.isStale(lockFile)) {
        console.warn(`[workgraph] Removing stale lock ${lockFile}`);
        await unlink(lockFile).catch((err: unknown) => {
          if (!isNotFound(err)) throw err;
        });
        continue;
      }
      await sleep(this.options.retryMs);
    }

    throw new Error(
      `Failed to acquire lock at ${lockFile} after ${this.options.retries} attempts`,
    );
  }

  private async releaseFile(key: string): Promise<void> {
    await unlink(this.pathFor(key)).catch((err: unknown) => {
      if (!isNotFound(err)) throw err;
    });
  }

  private async isStale(lockFile: string): Promise<boolean> {
    try {
      const info = await stat(lockFile);
      return Date.now() - info.mtimeMs > this.options.staleMs;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }
}
