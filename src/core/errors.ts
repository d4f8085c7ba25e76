import type { Timestamp } from "./time/timestamp";

export type StepFailureCode =
  | "network"
  | "stitch_failed"
  | "invalid_geometry"
  | "projection_failed"
  | "asset_missing"
  | "tiling_failed"
  | "missing_input"
  | "command_failed"
  | "run_timeout"
  | "unexpected";

export type StepFailureSeverity = "transient" | "permanent";

export type StepErrorContext = {
  timestamp?: Timestamp;
  step?: string;
  stepIndex?: number;
  command?: string;
  exitCode?: number;
};

type StepErrorArgs = {
  code: StepFailureCode;
  message: string;
  context?: StepErrorContext;
  cause?: unknown;
};

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

/**
 * Failure of one pipeline step. Both severities are retried by the backfill
 * queue; the severity only changes how the failure is reported.
 */
export abstract class StepError extends Error {
  abstract readonly severity: StepFailureSeverity;
  readonly code: StepFailureCode;
  readonly context: StepErrorContext;

  protected constructor(args: StepErrorArgs) {
    super(args.message, { cause: args.cause });
    this.code = args.code;
    this.context = args.context ?? {};
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class TransientStepError extends StepError {
  readonly severity = "transient";

  constructor(args: StepErrorArgs) {
    super(args);
    this.name = "TransientStepError";
  }
}

export class PermanentStepError extends StepError {
  readonly severity = "permanent";

  constructor(args: StepErrorArgs) {
    super(args);
    this.name = "PermanentStepError";
  }
}

export class RunTimeoutError extends TransientStepError {
  constructor(args: { timeoutMs: number; context?: StepErrorContext }) {
    super({
      code: "run_timeout",
      message: `Run exceeded liveness timeout of ${args.timeoutMs}ms`,
      context: args.context
    });
    this.name = "RunTimeoutError";
  }
}

export type ConflictReason = "running" | "succeeded";

/** Raised by the state store when a timestamp cannot be claimed. */
export class ConflictError extends Error {
  readonly code = "conflict";
  readonly reason: ConflictReason;
  readonly timestamp: Timestamp;

  constructor(timestamp: Timestamp, reason: ConflictReason) {
    super(
      reason === "running"
        ? `Timestamp ${timestamp} is already running`
        : `Timestamp ${timestamp} already succeeded`
    );
    this.name = "ConflictError";
    this.reason = reason;
    this.timestamp = timestamp;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigurationError extends Error {
  readonly code = "invalid_configuration";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** An external command exited non-zero, could not be spawned, or was aborted. */
export class CommandFailedError extends Error {
  readonly code = "command_failed";
  readonly command: string;
  readonly exitCode?: number;
  readonly stderr: string;
  readonly notFound: boolean;
  readonly aborted: boolean;

  constructor(args: {
    command: string;
    message: string;
    exitCode?: number;
    stderr?: string;
    notFound?: boolean;
    aborted?: boolean;
    cause?: unknown;
  }) {
    super(args.message, { cause: args.cause });
    this.name = "CommandFailedError";
    this.command = args.command;
    this.exitCode = args.exitCode;
    this.stderr = args.stderr ?? "";
    this.notFound = args.notFound ?? false;
    this.aborted = args.aborted ?? false;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
