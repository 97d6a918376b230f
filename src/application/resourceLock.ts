import { LockTimeoutError, OperationAbortedError } from '@makerspace/shared';

export interface LockOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type ReleaseLock = () => void;

interface Ticket {
  grant(): void;
}

/**
 * FIFO mutual exclusion keyed by resource id. Keys never contend with each
 * other. The head of each queue holds the lock; waiters that time out or are
 * aborted leave the queue without ever holding it.
 */
export class ResourceLockManager {
  private readonly queues = new Map<string, Ticket[]>();

  constructor(private readonly defaultTimeoutMs = 5000) {}

  async acquire(key: string, options: LockOptions = {}): Promise<ReleaseLock> {
    const { signal } = options;
    if (signal?.aborted) {
      throw new OperationAbortedError('Aborted before acquiring resource lock', { key });
    }

    const queue = this.queues.get(key);
    if (!queue) {
      const holder: Ticket = { grant: () => undefined };
      this.queues.set(key, [holder]);
      return this.releaserFor(key, holder);
    }

    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;

    return new Promise<ReleaseLock>((resolve, reject) => {
      const abandon = (error: Error) => {
        const position = queue.indexOf(ticket);
        if (position > 0) {
          queue.splice(position, 1);
        }
        cleanup();
        reject(error);
      };
      const onAbort = () =>
        abandon(new OperationAbortedError('Aborted while waiting for resource lock', { key }));
      const timer = setTimeout(
        () => abandon(new LockTimeoutError('Timed out waiting for resource lock', { key, timeoutMs })),
        timeoutMs
      );
      const cleanup = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };
      const ticket: Ticket = {
        grant: () => {
          cleanup();
          resolve(this.releaserFor(key, ticket));
        }
      };

      queue.push(ticket);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  async runExclusive<T>(key: string, work: () => Promise<T>, options: LockOptions = {}): Promise<T> {
    const release = await this.acquire(key, options);
    try {
      return await work();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return this.queues.has(key);
  }

  waiting(key: string): number {
    return Math.max((this.queues.get(key)?.length ?? 0) - 1, 0);
  }

  private releaserFor(key: string, ticket: Ticket): ReleaseLock {
    return () => {
      const queue = this.queues.get(key);
      if (!queue || queue[0] !== ticket) {
        return;
      }

      queue.shift();
      const next = queue[0];
      if (next) {
        next.grant();
      } else {
        this.queues.delete(key);
      }
    };
  }
}
