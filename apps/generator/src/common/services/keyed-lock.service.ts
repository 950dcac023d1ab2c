import { Inject, Injectable, Logger, Optional } from '@nestjs/common';

/** Default lock timeout: 2 minutes. A hung store call cannot hold a key forever. */
const LOCK_TIMEOUT_MS = 2 * 60 * 1000;

/** Optional provider overriding the lock timeout */
export const LOCK_TIMEOUT = Symbol('LOCK_TIMEOUT');

interface LockEntry {
  promise: Promise<void>;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * Single-writer lock per key.
 * Used to serialize folder creation per company and status write-back
 * when rows are processed concurrently.
 */
@Injectable()
export class KeyedLockService {
  private readonly logger = new Logger(KeyedLockService.name);
  private readonly locks = new Map<string, LockEntry>();

  private readonly timeoutMs: number;

  constructor(@Optional() @Inject(LOCK_TIMEOUT) timeoutMs?: number) {
    this.timeoutMs = timeoutMs ?? LOCK_TIMEOUT_MS;
  }

  /**
   * Acquire the lock for a key. Returns an idempotent release function.
   * Waits while another holder has the key.
   */
  async acquire(key: string): Promise<() => void> {
    let current = this.locks.get(key);
    while (current) {
      this.logger.debug(`Waiting for lock "${key}"`);
      await current.promise;
      current = this.locks.get(key);
    }

    let resolve: () => void = () => undefined;
    const promise = new Promise<void>((r) => {
      resolve = r;
    });

    let released = false;
    const release = (): void => {
      if (released) return;
      released = true;
      const entry = this.locks.get(key);
      if (entry?.promise === promise) {
        clearTimeout(entry.timer);
        this.locks.delete(key);
      }
      resolve();
    };

    const timer = setTimeout(() => {
      this.logger.warn(`Lock "${key}" timed out after ${this.timeoutMs / 1000}s — force-releasing`);
      release();
    }, this.timeoutMs);
    timer.unref();

    this.locks.set(key, { promise, timer });
    return release;
  }

  /** Run fn while holding the key */
  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return this.locks.has(key);
  }
}
