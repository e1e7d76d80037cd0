/** Default lock acquisition timeout in milliseconds. */
export const DEFAULT_LOCK_TIMEOUT_MS = 30_000;

/** Error thrown when lock acquisition times out. */
export class LockTimeoutError extends Error {
  constructor(key: string, timeoutMs: number) {
    super(`Lock acquisition timed out after ${timeoutMs}ms for "${key}"`);
    this.name = "LockTimeoutError";
  }
}

/**
 * In-process mutex keyed by string.
 * Serialises collection materialisation within one process.
 * Next: call `acquire(...)` or `run(...)` around the critical section.
 */
export class KeyedLocker {
  private _locks = new Map<string, Promise<void>>();

  constructor(private readonly _defaultTimeoutMs: number = DEFAULT_LOCK_TIMEOUT_MS) {}

  /**
   * Acquire an exclusive lock on `key`, waiting up to `timeoutMs`.
   * @returns A release function - call it when done.
   * @throws LockTimeoutError if the lock cannot be acquired within the timeout.
   */
  async acquire(
    key: string,
    timeoutMs: number = this._defaultTimeoutMs,
  ): Promise<() => void> {
    const startTime = Date.now();

    let currentLock = this._locks.get(key);
    while (currentLock) {
      const elapsed = Date.now() - startTime;
      if (elapsed >= timeoutMs) {
        throw new LockTimeoutError(key, timeoutMs);
      }

      // Race between the lock releasing and the timeout
      let timer: ReturnType<typeof setTimeout> | undefined;
      const timeoutPromise = new Promise<"timeout">((resolve) => {
        timer = setTimeout(() => resolve("timeout"), timeoutMs - elapsed);
      });
      const result = await Promise.race([
        currentLock.then(() => "released" as const),
        timeoutPromise,
      ]);
      clearTimeout(timer);
      if (result === "timeout" && this._locks.has(key)) {
        throw new LockTimeoutError(key, timeoutMs);
      }
      currentLock = this._locks.get(key);
    }

    let releaseLocal!: () => void;
    const promise = new Promise<void>((resolve) => {
      releaseLocal = resolve;
    });
    this._locks.set(key, promise);

    return () => {
      if (this._locks.get(key) === promise) {
        this._locks.delete(key);
      }
      releaseLocal();
    };
  }

  /** Run `fn` while holding the lock on `key`. */
  async run<T>(key: string, fn: () => Promise<T>, timeoutMs?: number): Promise<T> {
    const release = await this.acquire(key, timeoutMs);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return this._locks.has(key);
  }
}
