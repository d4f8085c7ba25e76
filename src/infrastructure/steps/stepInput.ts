import {
  CommandFailedError,
  PermanentStepError,
  TransientStepError,
  toErrorMessage,
  type StepFailureCode,
  type StepFailureSeverity
} from "../../core/errors";
import type { CommandResult, CommandRunner } from "../../ports/CommandRunner";
import type { StepInput } from "../../ports/PipelineStep";

export const requireSource = (input: StepInput, step: string): string => {
  if (!input.source) {
    throw new PermanentStepError({
      code: "missing_input",
      message: `Step ${step} needs the output of a previous step`,
      context: { timestamp: input.timestamp, step }
    });
  }
  return input.source;
};

/** `full_disk_<ts><suffix><ext>`, e.g. `full_disk_20250101120000_adjusted.png`. */
export const artifactName = (input: StepInput, suffix: string, ext: string): string =>
  `full_disk_${input.timestamp}${suffix}${ext}`;

export type CommandFailurePolicy = {
  step: string;
  code: StepFailureCode;
  severity: StepFailureSeverity;
  action: string;
};

/**
 * Runs a tool for a step and maps its failure onto the step's own error code.
 * An abort is rethrown untouched so the runner can report the abort reason.
 */
export const runStepCommand = async (
  runner: CommandRunner,
  command: string,
  args: string[],
  input: StepInput,
  policy: CommandFailurePolicy
): Promise<CommandResult> => {
  try {
    return await runner.run(command, args, { signal: input.signal });
  } catch (err) {
    if (input.signal.aborted) throw err;

    const detail =
      err instanceof CommandFailedError && err.stderr !== "" ? `${err.message}: ${err.stderr}` : toErrorMessage(err);
    const StepErrorClass = policy.severity === "permanent" ? PermanentStepError : TransientStepError;
    throw new StepErrorClass({
      code: policy.code,
      message: `${policy.action} failed: ${detail}`,
      context: {
        timestamp: input.timestamp,
        step: policy.step,
        command,
        exitCode: err instanceof CommandFailedError ? err.exitCode : undefined
      },
      cause: err
    });
  }
};
