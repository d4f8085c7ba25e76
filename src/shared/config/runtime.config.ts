import {
  defaultPipelineConfig,
  pipelineCaps,
  validatePipelineConfig,
  type PipelineConfig
} from "../../application/pipeline/pipeline.config";
import {
  defaultSchedulerConfig,
  schedulerCaps,
  validateSchedulerConfig,
  type SchedulerConfig
} from "../../application/scheduling/scheduler.config";
import { ConfigurationError } from "../../core/errors";
import { parseZoomRange } from "../../core/geo/zoomRange";

const MINUTE_MS = 60_000;

export const runtimeCaps = {
  cadenceMinutes: { min: 1, max: 1440 },
  publicationDelayMinutes: { min: 0, max: 1440 },
  tickIntervalMinutes: { min: 1, max: 1440 },
  sourceTimeoutMs: { min: 1000, max: 120000 }
} as const;

export type RuntimeConfig = {
  scheduler: SchedulerConfig;
  pipeline: PipelineConfig;
  sourceTimeoutMs: number;
};

type Range = { min: number; max: number };

const readRaw = (env: NodeJS.ProcessEnv, name: string): string | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;
  return raw.trim();
};

const parseOptionalIntInRange = (env: NodeJS.ProcessEnv, name: string, range: Range): number | undefined => {
  const raw = readRaw(env, name);
  if (raw === undefined) return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new ConfigurationError(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseOptionalMinutes = (env: NodeJS.ProcessEnv, name: string, range: Range): number | undefined => {
  const minutes = parseOptionalIntInRange(env, name, range);
  return minutes === undefined ? undefined : minutes * MINUTE_MS;
};

const parseOptionalNumber = (env: NodeJS.ProcessEnv, name: string): number | undefined => {
  const raw = readRaw(env, name);
  if (raw === undefined) return undefined;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${name} must be a finite number. Received: ${raw}`);
  }
  return value;
};

const parseOptionalBoolean = (env: NodeJS.ProcessEnv, name: string): boolean | undefined => {
  const raw = readRaw(env, name)?.toLowerCase();
  if (raw === undefined) return undefined;
  if (raw === "1" || raw === "true" || raw === "yes") return true;
  if (raw === "0" || raw === "false" || raw === "no") return false;
  throw new ConfigurationError(`${name} must be one of 1, true, yes, 0, false, no. Received: ${raw}`);
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const d = defaultSchedulerConfig;
  const scheduler = validateSchedulerConfig({
    ...d,
    cadenceMs: parseOptionalMinutes(env, "CADENCE_MINUTES", runtimeCaps.cadenceMinutes) ?? d.cadenceMs,
    publicationDelayMs:
      parseOptionalMinutes(env, "PUBLICATION_DELAY_MINUTES", runtimeCaps.publicationDelayMinutes) ??
      d.publicationDelayMs,
    tickIntervalMs:
      parseOptionalMinutes(env, "TICK_INTERVAL_MINUTES", runtimeCaps.tickIntervalMinutes) ?? d.tickIntervalMs,
    concurrency: parseOptionalIntInRange(env, "ACQUIRE_CONCURRENCY", schedulerCaps.concurrency) ?? d.concurrency,
    backfillLookback:
      parseOptionalIntInRange(env, "BACKFILL_LOOKBACK", schedulerCaps.backfillLookback) ?? d.backfillLookback,
    maxAttempts: parseOptionalIntInRange(env, "MAX_ATTEMPTS", schedulerCaps.maxAttempts) ?? d.maxAttempts,
    retryBaseDelayMs:
      parseOptionalIntInRange(env, "RETRY_BASE_DELAY_MS", schedulerCaps.retryBaseDelayMs) ?? d.retryBaseDelayMs,
    retryMaxDelayMs:
      parseOptionalIntInRange(env, "RETRY_MAX_DELAY_MS", schedulerCaps.retryMaxDelayMs) ?? d.retryMaxDelayMs,
    retryCapExponent:
      parseOptionalIntInRange(env, "RETRY_CAP_EXPONENT", schedulerCaps.retryCapExponent) ?? d.retryCapExponent,
    livenessTimeoutMs:
      parseOptionalIntInRange(env, "LIVENESS_TIMEOUT_MS", schedulerCaps.livenessTimeoutMs) ?? d.livenessTimeoutMs
  });

  const p = defaultPipelineConfig;
  const zoomRange = readRaw(env, "ZOOM_RANGE");
  const pipeline = validatePipelineConfig({
    ...p,
    dataDir: readRaw(env, "DATA_DIR") ?? p.dataDir,
    keepFiles: parseOptionalBoolean(env, "KEEP_FILES") ?? p.keepFiles,
    cropX: parseOptionalIntInRange(env, "ADJUST_CROP_X", pipelineCaps.cropX) ?? p.cropX,
    cropY: parseOptionalIntInRange(env, "ADJUST_CROP_Y", pipelineCaps.cropY) ?? p.cropY,
    trimThreshold: parseOptionalIntInRange(env, "ADJUST_THRESHOLD", pipelineCaps.trimThreshold) ?? p.trimThreshold,
    bbox: {
      north: parseOptionalNumber(env, "BBOX_NORTH") ?? p.bbox.north,
      south: parseOptionalNumber(env, "BBOX_SOUTH") ?? p.bbox.south,
      west: parseOptionalNumber(env, "BBOX_WEST") ?? p.bbox.west,
      east: parseOptionalNumber(env, "BBOX_EAST") ?? p.bbox.east
    },
    zoomRange: zoomRange === undefined ? p.zoomRange : parseZoomRange(zoomRange),
    downloadConcurrency:
      parseOptionalIntInRange(env, "DOWNLOAD_CONCURRENCY", pipelineCaps.downloadConcurrency) ?? p.downloadConcurrency,
    maxMissingTilePercent:
      parseOptionalIntInRange(env, "MAX_MISSING_TILE_PERCENT", pipelineCaps.maxMissingTilePercent) ??
      p.maxMissingTilePercent,
    tileProcesses: parseOptionalIntInRange(env, "TILE_PROCESSES", pipelineCaps.tileProcesses) ?? p.tileProcesses,
    overlayBoundariesPath: readRaw(env, "OVERLAY_BOUNDARIES_PATH")
  });

  const sourceTimeoutMs = parseOptionalIntInRange(env, "SOURCE_TIMEOUT_MS", runtimeCaps.sourceTimeoutMs) ?? 15000;

  return { scheduler, pipeline, sourceTimeoutMs };
};
