import { ConflictError, RunTimeoutError, type ConflictReason, type StepError } from "../../core/errors";
import type { TaskRecord } from "../../core/tasks/TaskRecord";
import type { TimestampResolver } from "../../core/time/TimestampResolver";
import type { Timestamp } from "../../core/time/timestamp";
import type { ArtifactPublisher } from "../../ports/ArtifactPublisher";
import type { Clock } from "../../ports/Clock";
import type { TaskStateStore } from "../../ports/TaskStateStore";
import { createLimiter, type Limiter } from "../../shared/concurrency/limiter";
import type { PipelineDefinition, PipelineRunResult, PipelineRunner } from "../pipeline/PipelineRunner";
import { classifyStepFailure, describeStepError } from "../pipeline/pipeline.error-handler";
import type { RebuildSummary, RetryQueue } from "./RetryQueue";
import type { SchedulerConfig } from "./scheduler.config";

export type SchedulerPhase = "idle" | "resolving" | "dispatching" | "awaiting";

export type DispatchResult =
  | { kind: "succeeded"; timestamp: Timestamp; artifactPath: string; record: TaskRecord }
  | {
      kind: "failed";
      timestamp: Timestamp;
      stepName: string;
      error: StepError;
      record: TaskRecord;
      givenUp: boolean;
      nextEligibleAt?: Date;
    }
  | { kind: "skipped"; timestamp: Timestamp; reason: ConflictReason | "shutting_down" }
  | { kind: "error"; timestamp: Timestamp; error: unknown };

export type TickReport = {
  latest: Timestamp;
  candidates: Timestamp[];
  results: DispatchResult[];
};

export type DispatchOptions = {
  force?: boolean;
};

export type SchedulerDeps = {
  store: TaskStateStore;
  queue: RetryQueue;
  runner: PipelineRunner;
  resolver: TimestampResolver;
  clock: Clock;
  pipeline: PipelineDefinition;
  config: SchedulerConfig;
  publisher?: ArtifactPublisher;
};

type RunFailure = Extract<PipelineRunResult, { ok: false }>;

/**
 * Control loop of the acquisition daemon.
 *
 * Each tick resolves the latest expected timestamp and any missing ones in the
 * lookback window, drains the due entries of the retry queue, and dispatches
 * every candidate through the pipeline with bounded concurrency. The state
 * store's `markRunning` is the only lock: a candidate that cannot be claimed is
 * skipped.
 */
export class Scheduler {
  private currentPhase: SchedulerPhase = "idle";
  private readonly limit: Limiter;
  private readonly shutdown = new AbortController();
  /** Timestamps this process has claimed and not yet recorded. */
  private readonly ownRuns = new Set<Timestamp>();

  constructor(private readonly deps: SchedulerDeps) {
    this.limit = createLimiter(deps.config.concurrency);
  }

  get phase(): SchedulerPhase {
    return this.currentPhase;
  }

  get stopping(): boolean {
    return this.shutdown.signal.aborted;
  }

  /** Stops dispatching new work; runs already in flight still record their outcome. */
  stop(): void {
    this.shutdown.abort();
  }

  async rebuildRetryQueue(): Promise<RebuildSummary> {
    const { store, queue, clock, config } = this.deps;
    const records = await store.listIncomplete({ now: clock.now(), livenessTimeoutMs: config.livenessTimeoutMs });
    const summary = queue.rebuild(records);

    summary.givenUp.forEach((record) => this.reportGivenUp(record));
    console.log(JSON.stringify({
      event: "retry_queue.rebuilt",
      queued: summary.queued.length,
      givenUp: summary.givenUp.length
    }));
    return summary;
  }

  /**
   * Fails runs whose owner stopped reporting (a crashed process, or another
   * host) and queues them. Runs claimed by this scheduler are left to their own
   * liveness timer.
   */
  async reclaimStaleRuns(now: Date): Promise<TaskRecord[]> {
    const { store, queue, config } = this.deps;
    const reclaimed = await store.reclassifyStale({
      now,
      livenessTimeoutMs: config.livenessTimeoutMs,
      exclude: this.ownRuns
    });
    for (const record of reclaimed) {
      if (!queue.requeue(record)) this.reportGivenUp(record);
    }
    return reclaimed;
  }

  async tick(): Promise<TickReport> {
    const { store, queue, resolver, clock, config } = this.deps;

    try {
      this.currentPhase = "resolving";
      const now = clock.now();
      await this.reclaimStaleRuns(now);
      const latest = resolver.latestExpected(now);
      const windowStart = resolver.shift(latest, -config.backfillLookback);

      const candidates: Timestamp[] = [];
      for (const timestamp of resolver.expectedTimestamps(windowStart, latest).reverse()) {
        const record = await store.get(timestamp);
        if (!record || record.status === "pending") candidates.push(timestamp);
      }
      for (let due = queue.popEligible(now); due !== undefined; due = queue.popEligible(now)) {
        if (!candidates.includes(due)) candidates.push(due);
      }

      this.currentPhase = "dispatching";
      const dispatches = candidates.map((timestamp) => this.trigger(timestamp));

      this.currentPhase = "awaiting";
      const results = await Promise.all(dispatches);

      console.log(JSON.stringify({
        event: "scheduler.tick",
        latest,
        candidates: candidates.length,
        succeeded: results.filter((r) => r.kind === "succeeded").length,
        failed: results.filter((r) => r.kind === "failed").length,
        skipped: results.filter((r) => r.kind === "skipped").length,
        errors: results.filter((r) => r.kind === "error").length,
        retryQueueSize: queue.size
      }));
      return { latest, candidates, results };
    } finally {
      this.currentPhase = "idle";
    }
  }

  /** Dispatches one timestamp outside the cadence, under the same claim and retry rules. */
  trigger(timestamp: Timestamp, options: DispatchOptions = {}): Promise<DispatchResult> {
    return this.limit(() => this.attempt(timestamp, options.force ?? false));
  }

  /**
   * Manual mode: keeps re-dispatching one timestamp after each back-off until it
   * succeeds, is given up, or the scheduler stops.
   */
  async processOne(timestamp: Timestamp, options: DispatchOptions = {}): Promise<DispatchResult> {
    const { queue, clock } = this.deps;
    let result = await this.trigger(timestamp, options);

    while (result.kind === "failed" && !result.givenUp && !this.stopping) {
      const entry = queue.peek(timestamp);
      if (!entry) break;

      const waitMs = entry.nextEligibleAt.getTime() - clock.now().getTime();
      if (waitMs > 0) await clock.sleep(waitMs, this.shutdown.signal);
      if (this.stopping) break;

      result = await this.trigger(timestamp);
    }
    return result;
  }

  /** Daemon mode: ticks on every tick boundary until `signal` aborts. */
  async run(signal: AbortSignal): Promise<void> {
    const onAbort = () => this.stop();
    signal.addEventListener("abort", onAbort, { once: true });
    if (signal.aborted) this.stop();

    try {
      const summary = await this.rebuildRetryQueue();
      console.log(JSON.stringify({
        event: "daemon.started",
        concurrency: this.deps.config.concurrency,
        tickIntervalMs: this.deps.config.tickIntervalMs,
        retryQueueSize: summary.queued.length
      }));

      while (!this.stopping) {
        try {
          await this.tick();
        } catch (err) {
          // eslint-disable-next-line no-console
          console.error(JSON.stringify({
            event: "scheduler.tick_failed",
            reason: err instanceof Error ? err.message : String(err)
          }));
        }
        if (this.stopping) break;
        await this.deps.clock.sleep(this.msUntilNextTick(), this.shutdown.signal);
      }
    } finally {
      signal.removeEventListener("abort", onAbort);
      console.log(JSON.stringify({ event: "daemon.stopped", retryQueueSize: this.deps.queue.size }));
    }
  }

  msUntilNextTick(): number {
    const interval = this.deps.config.tickIntervalMs;
    return interval - (this.deps.clock.now().getTime() % interval);
  }

  private async attempt(timestamp: Timestamp, force: boolean): Promise<DispatchResult> {
    if (this.stopping) {
      return { kind: "skipped", timestamp, reason: "shutting_down" };
    }

    const { store, queue, clock } = this.deps;
    let claimed: TaskRecord;
    try {
      claimed = await store.markRunning(timestamp, { now: clock.now(), force });
    } catch (err) {
      if (err instanceof ConflictError) {
        console.log(JSON.stringify({ event: "task.skipped", timestamp, reason: err.reason }));
        return { kind: "skipped", timestamp, reason: err.reason };
      }
      return this.dispatchFailed(timestamp, err);
    }

    queue.remove(timestamp);
    this.ownRuns.add(timestamp);
    console.log(JSON.stringify({ event: "task.dispatched", timestamp, attempt: claimed.attempts + 1, forced: force }));

    try {
      const result = await this.runWithLiveness(timestamp);
      return result.ok
        ? await this.recordSuccess(timestamp, result.artifactPath)
        : await this.recordFailure(timestamp, result);
    } catch (err) {
      return this.dispatchFailed(timestamp, err);
    } finally {
      this.ownRuns.delete(timestamp);
    }
  }

  private async runWithLiveness(timestamp: Timestamp): Promise<PipelineRunResult> {
    const { runner, pipeline, config } = this.deps;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const expired = new Promise<PipelineRunResult>((resolve) => {
      timer = setTimeout(() => {
        const error = new RunTimeoutError({ timeoutMs: config.livenessTimeoutMs, context: { timestamp } });
        controller.abort(error);
        resolve({ ok: false, stepIndex: -1, stepName: "liveness", error });
      }, config.livenessTimeoutMs);
    });

    const run = runner
      .run(timestamp, pipeline.steps, {
        workDir: pipeline.workDirFor(timestamp),
        keepFiles: pipeline.keepFiles,
        signal: controller.signal
      })
      .catch((err: unknown): PipelineRunResult => ({
        ok: false,
        stepIndex: -1,
        stepName: "pipeline",
        error: classifyStepFailure(err, { timestamp }, controller.signal)
      }));

    try {
      return await Promise.race([run, expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async recordSuccess(timestamp: Timestamp, artifactPath: string): Promise<DispatchResult> {
    const { store, clock, publisher } = this.deps;
    const record = await store.markSucceeded(timestamp, { now: clock.now() });

    if (publisher) {
      try {
        await publisher.publish(timestamp, artifactPath);
      } catch (err) {
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({
          event: "artifact.publish_failed",
          timestamp,
          reason: err instanceof Error ? err.message : String(err)
        }));
      }
    }

    console.log(JSON.stringify({ event: "task.succeeded", timestamp, artifactPath, attempts: record.attempts }));
    return { kind: "succeeded", timestamp, artifactPath, record };
  }

  private async recordFailure(timestamp: Timestamp, failure: RunFailure): Promise<DispatchResult> {
    const { store, queue, clock, config } = this.deps;
    const now = clock.now();
    const record = await store.markFailed(timestamp, describeStepError(failure.error), { now });
    if (record.status === "succeeded") {
      return { kind: "skipped", timestamp, reason: "succeeded" };
    }

    const entry = queue.push(timestamp, record.attempts, now);
    const details = {
      timestamp,
      step: failure.stepName,
      code: failure.error.code,
      severity: failure.error.severity,
      attempts: record.attempts,
      message: failure.error.message
    };

    if (!entry) {
      // eslint-disable-next-line no-console
      console.error(JSON.stringify({ event: "task.gave_up", ...details, maxAttempts: config.maxAttempts }));
      return { kind: "failed", timestamp, stepName: failure.stepName, error: failure.error, record, givenUp: true };
    }

    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({ event: "task.failed", ...details, nextEligibleAt: entry.nextEligibleAt.toISOString() }));
    return {
      kind: "failed",
      timestamp,
      stepName: failure.stepName,
      error: failure.error,
      record,
      givenUp: false,
      nextEligibleAt: entry.nextEligibleAt
    };
  }

  private reportGivenUp(record: TaskRecord): void {
    // eslint-disable-next-line no-console
    console.error(JSON.stringify({
      event: "task.gave_up",
      timestamp: record.timestamp,
      attempts: record.attempts,
      maxAttempts: this.deps.config.maxAttempts,
      code: record.lastError?.code ?? null,
      message: record.lastError?.message ?? null
    }));
  }

  private dispatchFailed(timestamp: Timestamp, err: unknown): DispatchResult {
    // eslint-disable-next-line no-console
    console.error(JSON.stringify({
      event: "scheduler.dispatch_failed",
      timestamp,
      reason: err instanceof Error ? err.message : String(err)
    }));
    return { kind: "error", timestamp, error: err };
  }
}
