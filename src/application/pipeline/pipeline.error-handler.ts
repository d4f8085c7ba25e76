import {
  CommandFailedError,
  PermanentStepError,
  StepError,
  TransientStepError,
  toErrorMessage,
  type StepErrorContext
} from "../../core/errors";
import type { TaskErrorInput } from "../../ports/TaskStateStore";

const MAX_STORED_MESSAGE_LENGTH = 500;

const isAbortError = (reason: unknown): boolean => reason instanceof Error && reason.name === "AbortError";

/**
 * Converts whatever a step threw into the step-error taxonomy.
 * Unknown failures are transient: the retry queue gives them another chance.
 */
export const classifyStepFailure = (
  reason: unknown,
  context: StepErrorContext,
  signal?: AbortSignal
): StepError => {
  if (signal?.aborted && signal.reason instanceof StepError) {
    return signal.reason;
  }

  if (reason instanceof StepError) {
    return reason;
  }

  if (reason instanceof CommandFailedError) {
    if (reason.aborted && signal?.reason instanceof StepError) {
      return signal.reason;
    }
    const detail = reason.stderr.trim() === "" ? reason.message : `${reason.message}: ${reason.stderr.trim()}`;
    return new PermanentStepError({
      code: "command_failed",
      message: `Step ${context.step ?? "unknown"} failed running ${reason.command}: ${detail}`,
      context: { ...context, command: reason.command, exitCode: reason.exitCode },
      cause: reason
    });
  }

  if (isAbortError(reason)) {
    return new TransientStepError({
      code: "run_timeout",
      message: `Step ${context.step ?? "unknown"} was aborted`,
      context,
      cause: reason
    });
  }

  return new TransientStepError({
    code: "unexpected",
    message: `Unexpected failure in step ${context.step ?? "unknown"}: ${toErrorMessage(reason)}`,
    context,
    cause: reason
  });
};

export const describeStepError = (error: StepError): TaskErrorInput => {
  const message =
    error.message.length > MAX_STORED_MESSAGE_LENGTH
      ? `${error.message.slice(0, MAX_STORED_MESSAGE_LENGTH - 3)}...`
      : error.message;
  return { code: error.code, message };
};
