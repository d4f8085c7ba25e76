import { MongoClient, MongoServerError, type Collection, type Filter, type WithId } from "mongodb";
import { ConflictError } from "../../core/errors";
import { STALE_RUN_ERROR_CODE, type TaskRecord, type TaskStatus } from "../../core/tasks/TaskRecord";
import type { Timestamp } from "../../core/time/timestamp";
import type {
  ListIncompleteOptions,
  MarkRunningOptions,
  ReclassifyStaleOptions,
  TaskErrorInput,
  TaskStateStore
} from "../../ports/TaskStateStore";
import { mongoIndexes } from "./mongo.indexes";

export type TaskDoc = {
  timestamp: string;
  status: TaskStatus;
  attempts: number;
  lastError?: { code?: string; message: string; at: Date };
  lastAttemptAt: Date;
  createdAt: Date;
  updatedAt: Date;
};

const DUPLICATE_KEY = 11000;
const durable = { writeConcern: { w: "majority" as const, j: true } };

const isDuplicateKeyError = (err: unknown): boolean =>
  err instanceof MongoServerError && err.code === DUPLICATE_KEY;

export const toTaskRecord = (doc: WithId<TaskDoc> | TaskDoc): TaskRecord => ({
  timestamp: doc.timestamp,
  status: doc.status,
  attempts: doc.attempts,
  lastError: doc.lastError
    ? { code: doc.lastError.code, message: doc.lastError.message, at: doc.lastError.at }
    : undefined,
  lastAttemptAt: doc.lastAttemptAt,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt
});

const toLastError = (error: TaskErrorInput, at: Date): NonNullable<TaskDoc["lastError"]> =>
  error.code ? { code: error.code, message: error.message, at } : { message: error.message, at };

/**
 * MongoDB task state store for deployments where several hosts share state.
 * Claims are conditional upserts: when the filter does not match an existing
 * document, the upsert collides with the unique `timestamp` index instead of
 * creating a second record.
 */
export class MongoTaskStateStore implements TaskStateStore {
  private client?: MongoClient;
  private collection?: Collection<TaskDoc>;

  constructor(
    private readonly mongoUri: string,
    private readonly dbName = "full_disk",
    private readonly collectionName = "tasks"
  ) {}

  private async getCollection(): Promise<Collection<TaskDoc>> {
    if (this.collection) return this.collection;

    this.client = new MongoClient(this.mongoUri);
    await this.client.connect();

    const col = this.client.db(this.dbName).collection<TaskDoc>(this.collectionName);
    for (const idx of mongoIndexes.taskCollection) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  async get(timestamp: Timestamp): Promise<TaskRecord | undefined> {
    const col = await this.getCollection();
    const doc = await col.findOne({ timestamp });
    return doc ? toTaskRecord(doc) : undefined;
  }

  async markRunning(timestamp: Timestamp, opts: MarkRunningOptions): Promise<TaskRecord> {
    const col = await this.getCollection();
    const blocking: TaskStatus[] = opts.force ? ["running"] : ["running", "succeeded"];

    try {
      const doc = await col.findOneAndUpdate(
        { timestamp, status: { $nin: blocking } },
        {
          $set: { status: "running", lastAttemptAt: opts.now, updatedAt: opts.now },
          $setOnInsert: { attempts: 0, createdAt: opts.now }
        },
        { upsert: true, returnDocument: "after", ...durable }
      );
      if (!doc) {
        throw new Error(`Claim of ${timestamp} returned no document`);
      }
      return toTaskRecord(doc);
    } catch (err) {
      if (!isDuplicateKeyError(err)) throw err;
      const existing = await col.findOne({ timestamp });
      throw new ConflictError(timestamp, existing?.status === "succeeded" ? "succeeded" : "running");
    }
  }

  async markSucceeded(timestamp: Timestamp, opts: { now: Date }): Promise<TaskRecord> {
    const col = await this.getCollection();
    const doc = await col.findOneAndUpdate(
      { timestamp },
      {
        $set: { status: "succeeded", updatedAt: opts.now },
        $setOnInsert: { attempts: 0, lastAttemptAt: opts.now, createdAt: opts.now }
      },
      { upsert: true, returnDocument: "after", ...durable }
    );
    if (!doc) {
      throw new Error(`Update of ${timestamp} returned no document`);
    }
    return toTaskRecord(doc);
  }

  async markFailed(timestamp: Timestamp, error: TaskErrorInput, opts: { now: Date }): Promise<TaskRecord> {
    const col = await this.getCollection();
    const filter: Filter<TaskDoc> = { timestamp, status: { $ne: "succeeded" } };

    try {
      const doc = await col.findOneAndUpdate(
        filter,
        {
          $set: { status: "failed", lastError: toLastError(error, opts.now), updatedAt: opts.now },
          $inc: { attempts: 1 },
          $setOnInsert: { lastAttemptAt: opts.now, createdAt: opts.now }
        },
        { upsert: true, returnDocument: "after", ...durable }
      );
      if (!doc) {
        throw new Error(`Update of ${timestamp} returned no document`);
      }
      return toTaskRecord(doc);
    } catch (err) {
      if (!isDuplicateKeyError(err)) throw err;
      // The record already succeeded; a late failure report leaves it alone.
      const existing = await col.findOne({ timestamp });
      if (!existing) throw err;
      return toTaskRecord(existing);
    }
  }

  async reclassifyStale(opts: ReclassifyStaleOptions): Promise<TaskRecord[]> {
    const col = await this.getCollection();
    const staleBefore = new Date(opts.now.getTime() - opts.livenessTimeoutMs);
    const staleFilter: Filter<TaskDoc> = { status: "running", lastAttemptAt: { $lt: staleBefore } };

    const stale = await col.find(staleFilter).sort({ timestamp: 1 }).toArray();
    const changed: TaskRecord[] = [];
    for (const doc of stale) {
      if (opts.exclude?.has(doc.timestamp)) continue;

      const lastError = {
        code: STALE_RUN_ERROR_CODE,
        message: `Run started at ${doc.lastAttemptAt.toISOString()} exceeded the liveness timeout`,
        at: opts.now
      };
      const res = await col.updateOne(
        { ...staleFilter, timestamp: doc.timestamp },
        { $set: { status: "failed", lastError, updatedAt: opts.now }, $inc: { attempts: 1 } },
        durable
      );
      // Another host may have reclassified or reclaimed it first.
      if (res.modifiedCount !== 1) continue;

      const record = toTaskRecord({ ...doc, status: "failed", attempts: doc.attempts + 1, lastError, updatedAt: opts.now });
      changed.push(record);
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
    const col = await this.getCollection();
    const failed = await col.find({ status: "failed" }).sort({ timestamp: 1 }).toArray();
    return failed.map(toTaskRecord);
  }

  async close(): Promise<void> {
    await this.client?.close();
    this.client = undefined;
    this.collection = undefined;
  }
}
