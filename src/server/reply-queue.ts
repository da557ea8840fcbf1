/**
 * Bounded reply dispatch queue.
 *
 * Runs up to `concurrency` reply jobs at once and holds at most
 * `maxPending` more. A job offered to a full queue is refused, so a burst
 * of probes cannot pile up unbounded outstanding sends behind intake.
 *
 * @module server/reply-queue
 */

import { describeError } from '../errors.js';
import { log } from '../log.js';

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_CONCURRENCY = 16;
const DEFAULT_MAX_PENDING = 256;

// ============================================================================
// Types
// ============================================================================

export type ReplyJob = () => Promise<void>;

export interface ReplyQueueConfig {
  readonly concurrency: number;
  readonly maxPending: number;
}

export interface ReplyQueueStats {
  readonly running: number;
  readonly pending: number;
  readonly completed: number;
  readonly rejected: number;
  readonly failed: number;
}

export interface ReplyQueue {
  /** False when the queue is full and the job was dropped. */
  enqueue(job: ReplyJob): boolean;
  /** Resolves once nothing is running or pending. */
  onIdle(): Promise<void>;
  getStats(): ReplyQueueStats;
}

// ============================================================================
// Default Configuration
// ============================================================================

function createDefaultConfig(): ReplyQueueConfig {
  return {
    concurrency: DEFAULT_CONCURRENCY,
    maxPending: DEFAULT_MAX_PENDING,
  };
}

// ============================================================================
// Reply Queue
// ============================================================================

export function createReplyQueue(
  configOverrides?: Partial<ReplyQueueConfig>
): ReplyQueue {
  const config: ReplyQueueConfig = {
    ...createDefaultConfig(),
    ...configOverrides,
  };

  if (config.concurrency < 1) {
    throw new RangeError(`concurrency must be at least 1, got ${config.concurrency}`);
  }
  if (config.maxPending < 0) {
    throw new RangeError(`maxPending must not be negative, got ${config.maxPending}`);
  }

  const pending: ReplyJob[] = [];
  const idleWaiters: Array<() => void> = [];
  let running = 0;
  let completed = 0;
  let rejected = 0;
  let failed = 0;

  function notifyIdle(): void {
    if (running > 0 || pending.length > 0) {
      return;
    }
    while (idleWaiters.length > 0) {
      const waiter = idleWaiters.shift();
      if (waiter !== undefined) {
        waiter();
      }
    }
  }

  function start(job: ReplyJob): void {
    running += 1;

    void Promise.resolve()
      .then(job)
      .catch((err: unknown) => {
        failed += 1;
        log.server('reply job failed: %s', describeError(err));
      })
      .finally(() => {
        running -= 1;
        completed += 1;
        drain();
      });
  }

  function drain(): void {
    while (running < config.concurrency && pending.length > 0) {
      const next = pending.shift();
      if (next !== undefined) {
        start(next);
      }
    }
    notifyIdle();
  }

  function enqueue(job: ReplyJob): boolean {
    if (running < config.concurrency) {
      start(job);
      return true;
    }

    if (pending.length >= config.maxPending) {
      rejected += 1;
      return false;
    }

    pending.push(job);
    return true;
  }

  function onIdle(): Promise<void> {
    if (running === 0 && pending.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      idleWaiters.push(resolve);
    });
  }

  function getStats(): ReplyQueueStats {
    return {
      running,
      pending: pending.length,
      completed,
      rejected,
      failed,
    };
  }

  return {
    enqueue,
    onIdle,
    getStats,
  };
}
