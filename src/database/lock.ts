/**
 * Keyed in-memory mutex. Guards collections during writes and serialises
 * engine runs per case. Single-process only.
 */

const DEFAULT_TIMEOUT_MS = 5000;
const POLL_INTERVAL_MS = 50;

export class KeyedLock {
  private locks = new Map<string, { owner: string; acquired: number }>();
  private readonly label: string;

  constructor(label = "key") {
    this.label = label;
  }

  /** Acquire a lock for a key. Waits with polling until timeout. */
  async acquire(
    key: string,
    ownerId: string,
    timeoutMs = DEFAULT_TIMEOUT_MS,
  ): Promise<void> {
    const deadline = Date.now() + timeoutMs;

    while (true) {
      const existing = this.locks.get(key);
      if (!existing) {
        this.locks.set(key, { owner: ownerId, acquired: Date.now() });
        return;
      }

      // Same owner re-acquiring (reentrant)
      if (existing.owner === ownerId) return;

      if (Date.now() >= deadline) {
        throw new LockTimeoutError(this.label, key, existing.owner);
      }
      await sleep(POLL_INTERVAL_MS);
    }
  }

  /** Release a lock. Only the owner can release it. */
  release(key: string, ownerId: string): void {
    const existing = this.locks.get(key);
    if (!existing) return;

    if (existing.owner !== ownerId) {
      throw new Error(
        `Cannot release ${this.label} lock on "${key}": owned by ${existing.owner}, not ${ownerId}`,
      );
    }

    this.locks.delete(key);
  }

  /** Run `fn` while holding the lock for `key` */
  async withLock<T>(
    key: string,
    ownerId: string,
    fn: () => Promise<T>,
    timeoutMs = DEFAULT_TIMEOUT_MS,
  ): Promise<T> {
    await this.acquire(key, ownerId, timeoutMs);
    try {
      return await fn();
    } finally {
      this.release(key, ownerId);
    }
  }

  /** Check if a key is currently locked */
  isLocked(key: string): boolean {
    return this.locks.has(key);
  }
}

export class LockTimeoutError extends Error {
  readonly code = "lock_timeout";
  readonly key: string;

  constructor(label: string, key: string, holder: string) {
    super(`Lock timeout: ${label} "${key}" is busy (held by ${holder})`);
    this.name = "LockTimeoutError";
    this.key = key;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
