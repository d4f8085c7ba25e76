import { join } from "path";
import { ConfigurationError } from "../../core/errors";
import { validateBoundingBox, type BoundingBox } from "../../core/geo/webMercator";
import { validateZoomRange, type ZoomRange } from "../../core/geo/zoomRange";
import type { Timestamp } from "../../core/time/timestamp";

export type PipelineConfig = {
  dataDir: string;
  keepFiles: boolean;
  /** Positive crops each side, negative pads each side with black. */
  cropX: number;
  cropY: number;
  /** Grey level (0-255) below which border pixels count as empty when trimming. */
  trimThreshold: number;
  bbox: BoundingBox;
  zoomRange: ZoomRange;
  downloadConcurrency: number;
  maxMissingTilePercent: number;
  tileProcesses: number;
  overlayBoundariesPath?: string;
};

export type PipelineConfigInput = Partial<PipelineConfig>;

export const defaultPipelineConfig: PipelineConfig = {
  dataDir: "./data",
  keepFiles: false,
  cropX: -135,
  cropY: -162,
  trimThreshold: 10,
  bbox: { north: 55, south: -55, west: 60, east: 150 },
  zoomRange: { min: 1, max: 6 },
  downloadConcurrency: 10,
  maxMissingTilePercent: 25,
  tileProcesses: 1
};

export const pipelineCaps = {
  cropX: { min: -10000, max: 10000 },
  cropY: { min: -10000, max: 10000 },
  trimThreshold: { min: 0, max: 255 },
  downloadConcurrency: { min: 1, max: 64 },
  maxMissingTilePercent: { min: 0, max: 100 },
  tileProcesses: { min: 1, max: 256 }
} as const;

const cappedFields = [
  "cropX",
  "cropY",
  "trimThreshold",
  "downloadConcurrency",
  "maxMissingTilePercent",
  "tileProcesses"
] as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigurationError(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validatePipelineConfig = (config: PipelineConfig): PipelineConfig => {
  if (config.dataDir.trim() === "") {
    throw new ConfigurationError("dataDir must not be empty");
  }
  for (const name of cappedFields) {
    assertIntegerInRange(name, config[name], pipelineCaps[name].min, pipelineCaps[name].max);
  }
  validateBoundingBox(config.bbox);
  validateZoomRange(config.zoomRange);
  return config;
};

const normalizeOptionalString = (value: string | undefined): string | undefined => {
  if (typeof value !== "string") return undefined;
  const normalized = value.trim();
  return normalized === "" ? undefined : normalized;
};

export const resolvePipelineConfig = (input: PipelineConfigInput = {}): PipelineConfig =>
  validatePipelineConfig({
    ...defaultPipelineConfig,
    ...input,
    overlayBoundariesPath: normalizeOptionalString(input.overlayBoundariesPath)
  });

export const workDirFor = (config: Pick<PipelineConfig, "dataDir">, timestamp: Timestamp): string =>
  join(config.dataDir, "work", timestamp);

export const tilesRootFor = (config: Pick<PipelineConfig, "dataDir">): string => join(config.dataDir, "tiles");

export const stateDbPathFor = (config: Pick<PipelineConfig, "dataDir">): string =>
  join(config.dataDir, "state", "tasks.db");
