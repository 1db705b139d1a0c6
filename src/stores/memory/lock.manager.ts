import { LockTimeoutError } from '../../middlewares/errorHandler';
import { ledgerLockTimeoutsTotal, ledgerLockWait } from '../../observability/metrics';

interface Waiter {
  owner: symbol;
  startedAt: bigint;
  grant: () => void;
  timer: NodeJS.Timeout;
}

interface LockState {
  owner: symbol;
  waiters: Waiter[];
}

const secondsSince = (startedAt: bigint): number =>
  Number(process.hrtime.bigint() - startedAt) / 1e9;

/**
 * Exclusive, re-entrant, FIFO locks keyed by resource id.
 *
 * A waiter that is not granted the lock within timeoutMs is removed from the
 * queue and rejected with LockTimeoutError; it never holds the lock afterwards.
 */
export class LockManager {
  private readonly locks = new Map<string, LockState>();

  constructor(private readonly timeoutMs: number) {}

  acquire(key: string, owner: symbol): Promise<void> {
    const state = this.locks.get(key);

    if (!state) {
      this.locks.set(key, { owner, waiters: [] });
      ledgerLockWait.observe(0);
      return Promise.resolve();
    }

    if (state.owner === owner) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const startedAt = process.hrtime.bigint();
      const waiter: Waiter = {
        owner,
        startedAt,
        grant: () => {
          ledgerLockWait.observe(secondsSince(startedAt));
          resolve();
        },
        timer: setTimeout(() => {
          state.waiters = state.waiters.filter((w) => w !== waiter);
          ledgerLockTimeoutsTotal.inc();
          reject(new LockTimeoutError(key, this.timeoutMs));
        }, this.timeoutMs),
      };
      state.waiters.push(waiter);
    });
  }

  /**
   * Hand the lock to the next waiter, or free it. Releasing a lock the owner
   * does not hold is ignored.
   */
  release(key: string, owner: symbol): void {
    const state = this.locks.get(key);
    if (!state || state.owner !== owner) {
      return;
    }

    const next = state.waiters.shift();
    if (!next) {
      this.locks.delete(key);
      return;
    }

    clearTimeout(next.timer);
    state.owner = next.owner;
    next.grant();
  }

  isHeldBy(key: string, owner: symbol): boolean {
    return this.locks.get(key)?.owner === owner;
  }

  queueLength(key: string): number {
    return this.locks.get(key)?.waiters.length ?? 0;
  }
}
