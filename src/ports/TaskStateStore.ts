import type { TaskRecord } from "../core/tasks/TaskRecord";
import type { Timestamp } from "../core/time/timestamp";

export type TaskErrorInput = {
  code?: string;
  message: string;
};

export type MarkRunningOptions = {
  now: Date;
  /** Re-run a timestamp that already succeeded. */
  force?: boolean;
};

export type ListIncompleteOptions = {
  now: Date;
  livenessTimeoutMs: number;
};

export type ReclassifyStaleOptions = ListIncompleteOptions & {
  /** Runs this process still owns; left alone even when past the timeout. */
  exclude?: ReadonlySet<Timestamp>;
};

/**
 * Durable per-timestamp outcome record; the only source of truth for task state.
 *
 * `markRunning` is the single mutual-exclusion point: implementations must make
 * the check-and-claim atomic, also across processes sharing the store, and must
 * make terminal writes durable before resolving.
 */
export interface TaskStateStore {
  get(timestamp: Timestamp): Promise<TaskRecord | undefined>;
  /** Throws `ConflictError` when the timestamp is running, or succeeded and not forced. */
  markRunning(timestamp: Timestamp, opts: MarkRunningOptions): Promise<TaskRecord>;
  markSucceeded(timestamp: Timestamp, opts: { now: Date }): Promise<TaskRecord>;
  markFailed(timestamp: Timestamp, error: TaskErrorInput, opts: { now: Date }): Promise<TaskRecord>;
  /**
   * Persists every `running` record older than the liveness timeout as failed
   * and returns the records it changed.
   */
  reclassifyStale(opts: ReclassifyStaleOptions): Promise<TaskRecord[]>;
  /** Failed records plus stale running ones, which are persisted as failed first. */
  listIncomplete(opts: ListIncompleteOptions): Promise<TaskRecord[]>;
  close(): Promise<void>;
}
