import { ConfigurationError } from "../../core/errors";
import type { RetryPolicy } from "./RetryQueue";

const MINUTE_MS = 60_000;
const DAY_MS = 24 * 60 * MINUTE_MS;

export type SchedulerConfig = {
  cadenceMs: number;
  publicationDelayMs: number;
  tickIntervalMs: number;
  concurrency: number;
  /** Extra cadence slots before the latest one that are checked for missing runs. */
  backfillLookback: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  retryCapExponent: number;
  retryJitterRatio: number;
  livenessTimeoutMs: number;
};

export type SchedulerConfigInput = Partial<SchedulerConfig>;

export const defaultSchedulerConfig: SchedulerConfig = {
  cadenceMs: 15 * MINUTE_MS,
  publicationDelayMs: 15 * MINUTE_MS,
  tickIntervalMs: 15 * MINUTE_MS,
  concurrency: 2,
  backfillLookback: 4,
  maxAttempts: 8,
  retryBaseDelayMs: MINUTE_MS,
  retryMaxDelayMs: 60 * MINUTE_MS,
  retryCapExponent: 5,
  retryJitterRatio: 0.1,
  livenessTimeoutMs: 30 * MINUTE_MS
};

export const schedulerCaps = {
  cadenceMs: { min: 1000, max: DAY_MS },
  publicationDelayMs: { min: 0, max: DAY_MS },
  tickIntervalMs: { min: 1000, max: DAY_MS },
  concurrency: { min: 1, max: 16 },
  backfillLookback: { min: 0, max: 96 },
  maxAttempts: { min: 1, max: 100 },
  retryBaseDelayMs: { min: 1, max: DAY_MS },
  retryMaxDelayMs: { min: 1, max: 7 * DAY_MS },
  retryCapExponent: { min: 0, max: 20 },
  livenessTimeoutMs: { min: 1, max: DAY_MS }
} as const;

const cappedFields = [
  "cadenceMs",
  "publicationDelayMs",
  "tickIntervalMs",
  "concurrency",
  "backfillLookback",
  "maxAttempts",
  "retryBaseDelayMs",
  "retryMaxDelayMs",
  "retryCapExponent",
  "livenessTimeoutMs"
] as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigurationError(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateSchedulerConfig = (config: SchedulerConfig): SchedulerConfig => {
  for (const name of cappedFields) {
    assertIntegerInRange(name, config[name], schedulerCaps[name].min, schedulerCaps[name].max);
  }
  if (config.retryMaxDelayMs < config.retryBaseDelayMs) {
    throw new ConfigurationError(
      `retryMaxDelayMs=${config.retryMaxDelayMs} must not be smaller than retryBaseDelayMs=${config.retryBaseDelayMs}`
    );
  }
  if (!Number.isFinite(config.retryJitterRatio) || config.retryJitterRatio < 0 || config.retryJitterRatio > 1) {
    throw new ConfigurationError(`retryJitterRatio=${String(config.retryJitterRatio)} is out of allowed range [0..1]`);
  }
  return config;
};

export const resolveSchedulerConfig = (input: SchedulerConfigInput = {}): SchedulerConfig =>
  validateSchedulerConfig({ ...defaultSchedulerConfig, ...input });

export const retryPolicyFrom = (config: SchedulerConfig): RetryPolicy => ({
  baseDelayMs: config.retryBaseDelayMs,
  maxDelayMs: config.retryMaxDelayMs,
  capExponent: config.retryCapExponent,
  maxAttempts: config.maxAttempts,
  jitterRatio: config.retryJitterRatio
});
