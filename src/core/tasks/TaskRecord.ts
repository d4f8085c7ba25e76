import type { Timestamp } from "../time/timestamp";

export type TaskStatus = "pending" | "running" | "succeeded" | "failed";

export const taskStatuses: readonly TaskStatus[] = ["pending", "running", "succeeded", "failed"];

export const isTaskStatus = (value: unknown): value is TaskStatus =>
  typeof value === "string" && taskStatuses.some((status) => status === value);

export type TaskError = {
  code?: string;
  message: string;
  at: Date;
};

/**
 * Outcome bookkeeping for one publication slot.
 * `attempts` counts failed attempts; a success leaves it untouched.
 */
export type TaskRecord = {
  timestamp: Timestamp;
  status: TaskStatus;
  attempts: number;
  lastError?: TaskError;
  lastAttemptAt: Date;
  createdAt: Date;
  updatedAt: Date;
};

export const STALE_RUN_ERROR_CODE = "stale_run";
