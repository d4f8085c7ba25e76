#!/usr/bin/env node
import { Command, CommanderError } from "commander";
import { runAcquisition, type AcquisitionOptions, type AcquisitionOutcome } from "../composition/root";
import { ConfigurationError, ConflictError } from "../core/errors";

export const EXIT_CODES = {
  success: 0,
  stepFailure: 1,
  resourceFailure: 2,
  configuration: 3,
  conflict: 4,
  interrupted: 130
} as const;

type RawCliOptions = {
  timestamp?: string;
  dataDir?: string;
  concurrency?: string;
  cropX?: string;
  cropY?: string;
  keepFiles?: boolean;
  zoomRange?: string;
  force?: boolean;
  pruneNoonOnly?: boolean;
  utcOffset?: string;
  execute?: boolean;
};

type ErrorContext = Partial<{
  timestamp: string;
  step: string;
  stepIndex: number;
  command: string;
  exitCode: number;
}>;

type CliErrorEnvelope = {
  event: "acquire.failed";
  name: string;
  message: string;
  code?: string;
  context?: ErrorContext;
  stack?: string;
};

const stringContextKeys = ["timestamp", "step", "command"] as const;
const numberContextKeys = ["stepIndex", "exitCode"] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const extractContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const sanitizedContext: ErrorContext = {};
  for (const key of stringContextKeys) {
    const raw = value[key];
    if (typeof raw === "string") sanitizedContext[key] = raw;
  }
  for (const key of numberContextKeys) {
    const raw = value[key];
    if (typeof raw === "number" && Number.isFinite(raw)) sanitizedContext[key] = raw;
  }

  return Object.keys(sanitizedContext).length > 0 ? sanitizedContext : undefined;
};

export const buildProgram = (): Command =>
  new Command()
    .name("full-disk-acquire")
    .description("Acquire full-disk imagery on its publication cadence and cut it into map tiles")
    .option("-t, --timestamp <id>", "process one timestamp (YYYYMMDDHHMMSS, UTC) and exit")
    .option("-d, --data-dir <dir>", "root of work files, tiles and task state (default: ./data)")
    .option("-c, --concurrency <n>", "timestamps processed in parallel")
    .option("--crop-x <px>", "crop (positive) or pad (negative) each left/right side after trimming")
    .option("--crop-y <px>", "crop (positive) or pad (negative) each top/bottom side after trimming")
    .option("--keep-files", "keep intermediate artifacts")
    .option("-z, --zoom-range <min-max>", "zoom levels to tile (default: 1-6)")
    .option("--force", "re-process a timestamp that already succeeded (with --timestamp)")
    .option("--prune-noon-only", "remove published tiles of every timestamp that is not local noon, then exit")
    .option("--utc-offset <hours>", "UTC offset whose noon is kept (with --prune-noon-only, default: 8)")
    .option("--execute", "actually delete when pruning; without it the prune is a dry run")
    .exitOverride();

const parseIntegerOption = (flag: string, raw: string | undefined): number | undefined => {
  if (raw === undefined) return undefined;
  const value = Number(raw.trim());
  if (raw.trim() === "" || !Number.isInteger(value)) {
    throw new ConfigurationError(`${flag} must be an integer. Received: ${raw}`);
  }
  return value;
};

/** Throws `CommanderError` for help and unknown flags, `ConfigurationError` for bad values. */
export const parseCliOptions = (argv: string[]): AcquisitionOptions => {
  const program = buildProgram();
  program.parse(argv, { from: "user" });
  const raw = program.opts<RawCliOptions>();

  return {
    timestamp: raw.timestamp,
    dataDir: raw.dataDir,
    concurrency: parseIntegerOption("--concurrency", raw.concurrency),
    cropX: parseIntegerOption("--crop-x", raw.cropX),
    cropY: parseIntegerOption("--crop-y", raw.cropY),
    keepFiles: raw.keepFiles === true,
    zoomRange: raw.zoomRange,
    force: raw.force === true,
    pruneNoonOnly: raw.pruneNoonOnly === true,
    utcOffset: parseIntegerOption("--utc-offset", raw.utcOffset),
    execute: raw.execute === true
  };
};

export const exitCodeForOutcome = (outcome: AcquisitionOutcome): number => {
  if (outcome.mode === "daemon" || outcome.mode === "prune") return EXIT_CODES.success;

  const { result, interrupted } = outcome;
  switch (result.kind) {
    case "succeeded":
      return EXIT_CODES.success;
    case "skipped":
      if (result.reason === "succeeded") return EXIT_CODES.success;
      if (result.reason === "running") return EXIT_CODES.conflict;
      return EXIT_CODES.interrupted;
    case "failed":
      return interrupted && !result.givenUp ? EXIT_CODES.interrupted : EXIT_CODES.stepFailure;
    case "error":
      return EXIT_CODES.resourceFailure;
  }
};

export const exitCodeForError = (err: unknown): number => {
  if (err instanceof ConfigurationError) return EXIT_CODES.configuration;
  if (err instanceof ConflictError) return EXIT_CODES.conflict;
  return EXIT_CODES.resourceFailure;
};

export const describeOutcome = (outcome: AcquisitionOutcome, exitCode: number): Record<string, unknown> => {
  if (outcome.mode === "daemon") {
    return { event: "acquire.completed", mode: "daemon", exitCode };
  }
  if (outcome.mode === "prune") {
    return {
      event: "acquire.completed",
      mode: "prune",
      utcOffset: outcome.utcOffset,
      executed: outcome.result.executed,
      kept: outcome.result.kept.length,
      removed: outcome.result.removed,
      exitCode
    };
  }

  const { result } = outcome;
  const summary: Record<string, unknown> = {
    event: "acquire.completed",
    mode: "once",
    timestamp: result.timestamp,
    outcome: result.kind,
    exitCode
  };
  if (result.kind === "succeeded") summary.artifactPath = result.artifactPath;
  if (result.kind === "skipped") summary.reason = result.reason;
  if (result.kind === "failed") {
    summary.step = result.stepName;
    summary.code = result.error.code;
    summary.attempts = result.record.attempts;
    summary.givenUp = result.givenUp;
  }
  return summary;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "acquire.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  const context = extractContext(errorRecord.context);
  if (context) {
    envelope.context = context;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

export const executeAcquireCli = async (argv: string[] = process.argv.slice(2)): Promise<void> => {
  let options: AcquisitionOptions;
  try {
    options = parseCliOptions(argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      // commander has already printed help or the usage error.
      process.exit(err.exitCode === 0 ? EXIT_CODES.success : EXIT_CODES.configuration);
    }
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(buildCliErrorEnvelope(err, isDebugMode())));
    process.exit(EXIT_CODES.configuration);
  }

  const controller = new AbortController();
  let signalsReceived = 0;
  const onSignal = (signal: NodeJS.Signals) => {
    signalsReceived += 1;
    if (signalsReceived > 1) {
      // eslint-disable-next-line no-console
      console.error(JSON.stringify({ event: "acquire.forced_exit", signal }));
      process.exit(EXIT_CODES.interrupted);
    }
    console.log(JSON.stringify({ event: "acquire.shutdown_requested", signal }));
    controller.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  let exitCode: number;
  try {
    const outcome = await runAcquisition(options, controller.signal);
    exitCode = exitCodeForOutcome(outcome);
    console.log(JSON.stringify(describeOutcome(outcome, exitCode)));
  } catch (err) {
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(buildCliErrorEnvelope(err, isDebugMode())));
    exitCode = exitCodeForError(err);
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }

  process.exit(exitCode);
};

if (require.main === module) {
  void executeAcquireCli();
}
