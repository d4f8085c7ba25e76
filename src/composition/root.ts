import { PipelineRunner } from "../application/pipeline/PipelineRunner";
import {
  tilesRootFor,
  stateDbPathFor,
  validatePipelineConfig,
  workDirFor,
  type PipelineConfig
} from "../application/pipeline/pipeline.config";
import { RetryQueue } from "../application/scheduling/RetryQueue";
import { Scheduler, type DispatchResult } from "../application/scheduling/Scheduler";
import { retryPolicyFrom, validateSchedulerConfig } from "../application/scheduling/scheduler.config";
import { ConfigurationError } from "../core/errors";
import { parseZoomRange } from "../core/geo/zoomRange";
import { isLocalNoon, utcOffsetRange } from "../core/tiles/retention";
import { TimestampResolver } from "../core/time/TimestampResolver";
import { InvalidTimestampError, parseTimestamp, type Timestamp } from "../core/time/timestamp";
import { SystemClock } from "../infrastructure/clock/SystemClock";
import { MongoTaskStateStore } from "../infrastructure/mongo/MongoTaskStateStore";
import { ChildProcessCommandRunner } from "../infrastructure/process/ChildProcessCommandRunner";
import { FullDiskTileHttpClient } from "../infrastructure/source/FullDiskTileHttpClient";
import { SqliteTaskStateStore } from "../infrastructure/sqlite/SqliteTaskStateStore";
import { AcquireStep } from "../infrastructure/steps/AcquireStep";
import { AdjustStep } from "../infrastructure/steps/AdjustStep";
import { GeoreferenceStep } from "../infrastructure/steps/GeoreferenceStep";
import { OverlayStep } from "../infrastructure/steps/OverlayStep";
import { TileStep } from "../infrastructure/steps/TileStep";
import { manifestPathFor, TileManifest, type PruneResult } from "../infrastructure/tiles/TileManifest";
import type { Clock } from "../ports/Clock";
import type { CommandRunner } from "../ports/CommandRunner";
import type { PipelineStep } from "../ports/PipelineStep";
import type { TaskStateStore } from "../ports/TaskStateStore";
import type { TileSourceClient } from "../ports/TileSourceClient";
import { loadEnv, type Env } from "../shared/config/env";
import { loadRuntimeConfigFromEnv, type RuntimeConfig } from "../shared/config/runtime.config";

/** Flag values after the CLI has turned them into numbers and booleans. */
export type AcquisitionOptions = {
  timestamp?: string;
  dataDir?: string;
  concurrency?: number;
  cropX?: number;
  cropY?: number;
  keepFiles?: boolean;
  zoomRange?: string;
  force?: boolean;
  /** Retention mode: keep only the timestamps at local noon. */
  pruneNoonOnly?: boolean;
  utcOffset?: number;
  /** Without it, retention only reports what it would remove. */
  execute?: boolean;
};

export type ServiceOverrides = {
  store?: TaskStateStore;
  clock?: Clock;
  commandRunner?: CommandRunner;
  tileClient?: TileSourceClient;
};

export type AcquisitionService = {
  scheduler: Scheduler;
  store: TaskStateStore;
  close: () => Promise<void>;
};

export type AcquisitionOutcome =
  | { mode: "once"; result: DispatchResult; interrupted: boolean }
  | { mode: "daemon" }
  | { mode: "prune"; result: PruneResult; utcOffset: number };

export const DEFAULT_NOON_UTC_OFFSET = 8;

export const resolveRuntimeConfig = (options: AcquisitionOptions, env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const runtime = loadRuntimeConfigFromEnv(env);

  const scheduler = validateSchedulerConfig({
    ...runtime.scheduler,
    concurrency: options.concurrency ?? runtime.scheduler.concurrency
  });
  const pipeline = validatePipelineConfig({
    ...runtime.pipeline,
    dataDir: options.dataDir ?? runtime.pipeline.dataDir,
    cropX: options.cropX ?? runtime.pipeline.cropX,
    cropY: options.cropY ?? runtime.pipeline.cropY,
    keepFiles: options.keepFiles === true || runtime.pipeline.keepFiles,
    zoomRange: options.zoomRange !== undefined ? parseZoomRange(options.zoomRange) : runtime.pipeline.zoomRange
  });

  return { ...runtime, scheduler, pipeline };
};

export const createStateStore = (env: Env, pipeline: PipelineConfig): TaskStateStore =>
  env.STATE_STORE === "mongo"
    ? new MongoTaskStateStore(env.MONGO_URI)
    : new SqliteTaskStateStore(env.STATE_DB_PATH ?? stateDbPathFor(pipeline));

export const buildPipelineSteps = (
  config: PipelineConfig,
  deps: { tileClient: TileSourceClient; commandRunner: CommandRunner }
): PipelineStep[] => {
  const { tileClient, commandRunner } = deps;
  const steps: PipelineStep[] = [
    new AcquireStep(tileClient, commandRunner, {
      downloadConcurrency: config.downloadConcurrency,
      maxMissingTilePercent: config.maxMissingTilePercent
    }),
    new AdjustStep(commandRunner, {
      cropX: config.cropX,
      cropY: config.cropY,
      trimThreshold: config.trimThreshold
    }),
    new GeoreferenceStep(commandRunner, config.bbox)
  ];
  if (config.overlayBoundariesPath) {
    steps.push(new OverlayStep(commandRunner, config.overlayBoundariesPath));
  }
  steps.push(
    new TileStep(commandRunner, {
      tilesRoot: tilesRootFor(config),
      zoomRange: config.zoomRange,
      processes: config.tileProcesses
    })
  );
  return steps;
};

export const createAcquisitionService = (
  runtime: RuntimeConfig,
  env: Env,
  overrides: ServiceOverrides = {}
): AcquisitionService => {
  const store = overrides.store ?? createStateStore(env, runtime.pipeline);
  const commandRunner = overrides.commandRunner ?? new ChildProcessCommandRunner();
  const tileClient =
    overrides.tileClient ?? new FullDiskTileHttpClient(env.SOURCE_URL_TEMPLATE, { timeoutMs: runtime.sourceTimeoutMs });
  const { scheduler: schedulerConfig, pipeline: pipelineConfig } = runtime;

  const scheduler = new Scheduler({
    store,
    queue: new RetryQueue(retryPolicyFrom(schedulerConfig)),
    runner: new PipelineRunner(),
    resolver: new TimestampResolver({
      cadenceMs: schedulerConfig.cadenceMs,
      publicationDelayMs: schedulerConfig.publicationDelayMs
    }),
    clock: overrides.clock ?? new SystemClock(),
    config: schedulerConfig,
    pipeline: {
      steps: buildPipelineSteps(pipelineConfig, { tileClient, commandRunner }),
      workDirFor: (timestamp) => workDirFor(pipelineConfig, timestamp),
      keepFiles: pipelineConfig.keepFiles
    },
    publisher: new TileManifest(manifestPathFor(tilesRootFor(pipelineConfig)))
  });

  return { scheduler, store, close: () => store.close() };
};

const parseTimestampOption = (raw: string): Timestamp => {
  try {
    return parseTimestamp(raw);
  } catch (err) {
    if (err instanceof InvalidTimestampError) {
      throw new ConfigurationError(err.message, { cause: err });
    }
    throw err;
  }
};

/** Drops every published timestamp that is not local noon at UTC+`utcOffset`, with its tiles. */
export const pruneToLocalNoon = (
  pipeline: PipelineConfig,
  options: { utcOffset: number; execute: boolean }
): Promise<PruneResult> => {
  const { min, max } = utcOffsetRange;
  if (!Number.isInteger(options.utcOffset) || options.utcOffset < min || options.utcOffset > max) {
    throw new ConfigurationError(`utcOffset=${String(options.utcOffset)} is out of allowed range [${min}..${max}]`);
  }
  const manifest = new TileManifest(manifestPathFor(tilesRootFor(pipeline)));
  return manifest.prune({ keep: (timestamp) => isLocalNoon(timestamp, options.utcOffset), execute: options.execute });
};

/**
 * Retention mode with `options.pruneNoonOnly`.
 * One-shot mode when `options.timestamp` is set, daemon mode otherwise.
 * Aborting `signal` stops new dispatches; the state store is closed on the way out.
 */
export const runAcquisition = async (
  options: AcquisitionOptions,
  signal: AbortSignal,
  overrides: ServiceOverrides = {},
  processEnv: NodeJS.ProcessEnv = process.env
): Promise<AcquisitionOutcome> => {
  if (options.force && options.timestamp === undefined) {
    throw new ConfigurationError("--force only applies together with --timestamp");
  }
  if (options.pruneNoonOnly) {
    if (options.timestamp !== undefined) {
      throw new ConfigurationError("--prune-noon-only cannot be combined with --timestamp");
    }
    const utcOffset = options.utcOffset ?? DEFAULT_NOON_UTC_OFFSET;
    const { pipeline } = resolveRuntimeConfig(options, processEnv);
    const result = await pruneToLocalNoon(pipeline, { utcOffset, execute: options.execute === true });
    return { mode: "prune", result, utcOffset };
  }
  if (options.execute || options.utcOffset !== undefined) {
    throw new ConfigurationError("--execute and --utc-offset only apply together with --prune-noon-only");
  }
  const timestamp = options.timestamp !== undefined ? parseTimestampOption(options.timestamp) : undefined;
  const env = loadEnv(processEnv);
  const runtime = resolveRuntimeConfig(options, processEnv);

  const service = createAcquisitionService(runtime, env, overrides);
  const stop = () => service.scheduler.stop();
  signal.addEventListener("abort", stop, { once: true });
  if (signal.aborted) stop();

  try {
    if (timestamp === undefined) {
      await service.scheduler.run(signal);
      return { mode: "daemon" };
    }
    const result = await service.scheduler.processOne(timestamp, { force: options.force });
    return { mode: "once", result, interrupted: service.scheduler.stopping };
  } finally {
    signal.removeEventListener("abort", stop);
    await service.close();
  }
};
