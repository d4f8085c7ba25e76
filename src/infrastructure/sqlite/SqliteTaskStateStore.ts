import { mkdirSync } from "fs";
import { dirname } from "path";
import Database from "better-sqlite3";
import { ConflictError } from "../../core/errors";
import { isTaskStatus, STALE_RUN_ERROR_CODE, type TaskRecord, type TaskStatus } from "../../core/tasks/TaskRecord";
import type { Timestamp } from "../../core/time/timestamp";
import type {
  ListIncompleteOptions,
  MarkRunningOptions,
  ReclassifyStaleOptions,
  TaskErrorInput,
  TaskStateStore
} from "../../ports/TaskStateStore";

type TaskRow = {
  timestamp: string;
  status: string;
  attempts: number;
  last_error_code: string | null;
  last_error_message: string | null;
  last_error_at: string | null;
  last_attempt_at: string;
  created_at: string;
  updated_at: string;
};

type StatusParams = {
  timestamp: string;
  status: TaskStatus;
  now: string;
};

type FailureParams = {
  timestamp: string;
  code: string | null;
  message: string;
  now: string;
};

const toRecord = (row: TaskRow): TaskRecord => {
  if (!isTaskStatus(row.status)) {
    throw new Error(`Unknown task status "${row.status}" stored for ${row.timestamp}`);
  }
  return {
    timestamp: row.timestamp,
    status: row.status,
    attempts: row.attempts,
    lastError:
      row.last_error_message !== null && row.last_error_at !== null
        ? {
            code: row.last_error_code ?? undefined,
            message: row.last_error_message,
            at: new Date(row.last_error_at)
          }
        : undefined,
    lastAttemptAt: new Date(row.last_attempt_at),
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at)
  };
};

/**
 * Embedded task state store. `markRunning` runs in a `BEGIN IMMEDIATE`
 * transaction, which takes the write lock up front, so two processes sharing
 * the database file cannot both claim a timestamp.
 */
export class SqliteTaskStateStore implements TaskStateStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = FULL");
    this.db.pragma("busy_timeout = 5000");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS tasks (
        timestamp TEXT PRIMARY KEY,
        status TEXT NOT NULL CHECK (status IN ('pending', 'running', 'succeeded', 'failed')),
        attempts INTEGER NOT NULL DEFAULT 0,
        last_error_code TEXT,
        last_error_message TEXT,
        last_error_at TEXT,
        last_attempt_at TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_tasks_status
        ON tasks(status, timestamp);
    `);
  }

  async get(timestamp: Timestamp): Promise<TaskRecord | undefined> {
    const row = this.selectRow(timestamp);
    return row ? toRecord(row) : undefined;
  }

  async markRunning(timestamp: Timestamp, opts: MarkRunningOptions): Promise<TaskRecord> {
    const claim = this.db.transaction((): TaskRow => {
      const existing = this.selectRow(timestamp);
      if (existing?.status === "running") {
        throw new ConflictError(timestamp, "running");
      }
      if (existing?.status === "succeeded" && !opts.force) {
        throw new ConflictError(timestamp, "succeeded");
      }

      const now = opts.now.toISOString();
      this.db
        .prepare<StatusParams>(
          `INSERT INTO tasks (timestamp, status, attempts, last_attempt_at, created_at, updated_at)
           VALUES (@timestamp, @status, 0, @now, @now, @now)
           ON CONFLICT(timestamp) DO UPDATE SET
             status = excluded.status,
             last_attempt_at = excluded.last_attempt_at,
             updated_at = excluded.updated_at`
        )
        .run({ timestamp, status: "running", now });
      return this.requireRow(timestamp);
    });
    return toRecord(claim.immediate());
  }

  async markSucceeded(timestamp: Timestamp, opts: { now: Date }): Promise<TaskRecord> {
    const now = opts.now.toISOString();
    this.db
      .prepare<StatusParams>(
        `INSERT INTO tasks (timestamp, status, attempts, last_attempt_at, created_at, updated_at)
         VALUES (@timestamp, @status, 0, @now, @now, @now)
         ON CONFLICT(timestamp) DO UPDATE SET
           status = excluded.status,
           updated_at = excluded.updated_at`
      )
      .run({ timestamp, status: "succeeded", now });
    return toRecord(this.requireRow(timestamp));
  }

  async markFailed(timestamp: Timestamp, error: TaskErrorInput, opts: { now: Date }): Promise<TaskRecord> {
    const now = opts.now.toISOString();
    this.db
      .prepare<FailureParams>(
        `INSERT INTO tasks (timestamp, status, attempts, last_error_code, last_error_message, last_error_at,
                            last_attempt_at, created_at, updated_at)
         VALUES (@timestamp, 'failed', 1, @code, @message, @now, @now, @now, @now)
         ON CONFLICT(timestamp) DO UPDATE SET
           status = 'failed',
           attempts = tasks.attempts + 1,
           last_error_code = excluded.last_error_code,
           last_error_message = excluded.last_error_message,
           last_error_at = excluded.last_error_at,
           updated_at = excluded.updated_at
         WHERE tasks.status <> 'succeeded'`
      )
      .run({ timestamp, code: error.code ?? null, message: error.message, now });
    return toRecord(this.requireRow(timestamp));
  }

  async reclassifyStale(opts: ReclassifyStaleOptions): Promise<TaskRecord[]> {
    const now = opts.now.toISOString();
    const staleBefore = new Date(opts.now.getTime() - opts.livenessTimeoutMs).toISOString();

    const reclassify = this.db.transaction((): TaskRecord[] => {
      const stale = this.db
        .prepare<[string], TaskRow>(
          `SELECT * FROM tasks WHERE status = 'running' AND last_attempt_at < ? ORDER BY timestamp ASC`
        )
        .all(staleBefore)
        .filter((row) => !opts.exclude?.has(row.timestamp));

      const markStale = this.db.prepare<FailureParams & { staleBefore: string }>(
        `UPDATE tasks SET
           status = 'failed',
           attempts = attempts + 1,
           last_error_code = @code,
           last_error_message = @message,
           last_error_at = @now,
           updated_at = @now
         WHERE timestamp = @timestamp AND status = 'running' AND last_attempt_at < @staleBefore`
      );
      const changed: TaskRecord[] = [];
      for (const row of stale) {
        const info = markStale.run({
          timestamp: row.timestamp,
          code: STALE_RUN_ERROR_CODE,
          message: `Run started at ${row.last_attempt_at} exceeded the liveness timeout`,
          now,
          staleBefore
        });
        if (info.changes === 1) changed.push(toRecord(this.requireRow(row.timestamp)));
      }
      return changed;
    });

    const changed = reclassify.immediate();
    for (const record of changed) {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "task.stale_reclassified",
        timestamp: record.timestamp,
        lastAttemptAt: record.lastAttemptAt.toISOString(),
        attempts: record.attempts
      }));
    }
    return changed;
  }

  async listIncomplete(opts: ListIncompleteOptions): Promise<TaskRecord[]> {
    await this.reclassifyStale(opts);
    return this.db
      .prepare<[], TaskRow>(`SELECT * FROM tasks WHERE status = 'failed' ORDER BY timestamp ASC`)
      .all()
      .map(toRecord);
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }

  private selectRow(timestamp: Timestamp): TaskRow | undefined {
    return this.db.prepare<[string], TaskRow>(`SELECT * FROM tasks WHERE timestamp = ?`).get(timestamp);
  }

  private requireRow(timestamp: Timestamp): TaskRow {
    const row = this.selectRow(timestamp);
    if (!row) {
      throw new Error(`Task record for ${timestamp} disappeared during update`);
    }
    return row;
  }
}
