import type { TaskRecord } from "../../core/tasks/TaskRecord";
import { compareTimestamps, type Timestamp } from "../../core/time/timestamp";
import { computeBackoffMs } from "../../shared/retry/retry";

export type RetryPolicy = {
  baseDelayMs: number;
  maxDelayMs: number;
  /** Back-off stops doubling after this many failures. */
  capExponent: number;
  /** Attempts after which a timestamp is reported instead of re-queued. */
  maxAttempts: number;
  jitterRatio?: number;
  randomFn?: () => number;
};

export type RetryQueueEntry = {
  timestamp: Timestamp;
  attempts: number;
  nextEligibleAt: Date;
};

export type RebuildSummary = {
  queued: RetryQueueEntry[];
  givenUp: TaskRecord[];
};

const compareEntries = (a: RetryQueueEntry, b: RetryQueueEntry): number =>
  a.nextEligibleAt.getTime() - b.nextEligibleAt.getTime() || compareTimestamps(a.timestamp, b.timestamp);

/**
 * Failed timestamps waiting for their next attempt, kept sorted by
 * `nextEligibleAt` then oldest timestamp first.
 *
 * Derived state only: the state store holds the failure, and `rebuild` restores
 * the queue from it after a restart.
 */
export class RetryQueue {
  private readonly queue: RetryQueueEntry[] = [];

  constructor(private readonly policy: RetryPolicy) {}

  get size(): number {
    return this.queue.length;
  }

  backoffMs(attempts: number): number {
    return computeBackoffMs(Math.min(attempts, this.policy.capExponent), {
      minDelayMs: this.policy.baseDelayMs,
      maxDelayMs: this.policy.maxDelayMs,
      jitterRatio: this.policy.jitterRatio ?? 0,
      randomFn: this.policy.randomFn
    });
  }

  isGivenUp(attempts: number): boolean {
    return attempts >= this.policy.maxAttempts;
  }

  /**
   * Schedules the next attempt. Returns `undefined`, leaving the timestamp out
   * of the queue, once `attempts` reaches the give-up threshold.
   */
  push(timestamp: Timestamp, attempts: number, now: Date): RetryQueueEntry | undefined {
    this.remove(timestamp);
    if (this.isGivenUp(attempts)) return undefined;

    const entry: RetryQueueEntry = {
      timestamp,
      attempts,
      nextEligibleAt: new Date(now.getTime() + this.backoffMs(attempts))
    };
    this.insert(entry);
    return entry;
  }

  /** Removes and returns the earliest entry that is due at `now`. */
  popEligible(now: Date): Timestamp | undefined {
    const head = this.queue[0];
    if (!head || head.nextEligibleAt.getTime() > now.getTime()) return undefined;
    this.queue.shift();
    return head.timestamp;
  }

  peek(timestamp: Timestamp): RetryQueueEntry | undefined {
    const entry = this.queue.find((candidate) => candidate.timestamp === timestamp);
    return entry ? { ...entry } : undefined;
  }

  remove(timestamp: Timestamp): boolean {
    const index = this.queue.findIndex((entry) => entry.timestamp === timestamp);
    if (index === -1) return false;
    this.queue.splice(index, 1);
    return true;
  }

  entries(): RetryQueueEntry[] {
    return this.queue.map((entry) => ({ ...entry }));
  }

  /**
   * Queues a failed record read back from the state store. Back-off is
   * measured from its last attempt, so a restart neither resets it nor forgets
   * a failure. Returns `undefined` for records past the give-up threshold.
   */
  requeue(record: TaskRecord): RetryQueueEntry | undefined {
    this.remove(record.timestamp);
    if (record.status !== "failed" || this.isGivenUp(record.attempts)) return undefined;

    const entry: RetryQueueEntry = {
      timestamp: record.timestamp,
      attempts: record.attempts,
      nextEligibleAt: new Date(record.lastAttemptAt.getTime() + this.backoffMs(record.attempts))
    };
    this.insert(entry);
    return entry;
  }

  /** Replaces the queue with the incomplete records of the state store. */
  rebuild(records: TaskRecord[]): RebuildSummary {
    this.queue.length = 0;
    const givenUp: TaskRecord[] = [];

    for (const record of records) {
      if (record.status !== "failed") continue;
      if (!this.requeue(record)) givenUp.push(record);
    }

    return { queued: this.entries(), givenUp };
  }

  private insert(entry: RetryQueueEntry): void {
    let low = 0;
    let high = this.queue.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (compareEntries(this.queue[mid], entry) <= 0) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    this.queue.splice(low, 0, entry);
  }
}
