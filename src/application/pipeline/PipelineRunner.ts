import { mkdir, rm, rmdir } from "fs/promises";
import { ConfigurationError, type StepError } from "../../core/errors";
import type { Timestamp } from "../../core/time/timestamp";
import type { PipelineStep, StepInput } from "../../ports/PipelineStep";
import { isErrnoException, pathExists } from "../../shared/fs/pathExists";
import { classifyStepFailure } from "./pipeline.error-handler";

export type PipelineRunOptions = {
  workDir: string;
  keepFiles: boolean;
  signal?: AbortSignal;
};

export type PipelineRunResult =
  | { ok: true; artifactPath: string; stepsRun: number }
  | { ok: false; stepIndex: number; stepName: string; error: StepError };

/** Everything the scheduler needs to turn a timestamp into a pipeline run. */
export type PipelineDefinition = {
  steps: PipelineStep[];
  workDirFor: (timestamp: Timestamp) => string;
  keepFiles: boolean;
};

type StepOutcome =
  | { ok: true; destination: string }
  | { ok: false; destination?: string; error: unknown };

const removeArtifact = async (path: string): Promise<void> => {
  try {
    await rm(path, { recursive: true, force: true });
  } catch (err) {
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({ event: "pipeline.cleanup_failed", path, reason: String(err) }));
  }
};

const removeDirIfEmpty = async (dir: string): Promise<void> => {
  try {
    await rmdir(dir);
  } catch (err) {
    if (isErrnoException(err) && (err.code === "ENOTEMPTY" || err.code === "EEXIST" || err.code === "ENOENT")) return;
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({ event: "pipeline.cleanup_failed", path: dir, reason: String(err) }));
  }
};

/**
 * Runs the steps of one timestamp strictly in order, feeding each step the
 * previous step's output. Intermediate artifacts are removed once the run ends,
 * whatever the outcome, unless `keepFiles` is set.
 */
export class PipelineRunner {
  async run(timestamp: Timestamp, steps: PipelineStep[], options: PipelineRunOptions): Promise<PipelineRunResult> {
    if (steps.length === 0) {
      throw new ConfigurationError("A pipeline needs at least one step");
    }

    const signal = options.signal ?? new AbortController().signal;
    const produced: string[] = [];
    let succeeded = false;

    await mkdir(options.workDir, { recursive: true });

    try {
      let source: string | undefined;
      for (let index = 0; index < steps.length; index += 1) {
        const step = steps[index];
        const input: StepInput = { timestamp, source, workDir: options.workDir, keepFiles: options.keepFiles, signal };
        const outcome = await this.runStep(step, input);

        if (!outcome.ok) {
          if (outcome.destination) produced.push(outcome.destination);
          return {
            ok: false,
            stepIndex: index,
            stepName: step.name,
            error: classifyStepFailure(outcome.error, { timestamp, step: step.name, stepIndex: index }, signal)
          };
        }

        produced.push(outcome.destination);
        source = outcome.destination;
      }

      succeeded = true;
      return { ok: true, artifactPath: produced[produced.length - 1], stepsRun: steps.length };
    } finally {
      if (!options.keepFiles) {
        const disposable = succeeded ? produced.slice(0, -1) : produced;
        for (const artifact of disposable) {
          await removeArtifact(artifact);
        }
        await removeDirIfEmpty(options.workDir);
      }
    }
  }

  private async runStep(step: PipelineStep, input: StepInput): Promise<StepOutcome> {
    if (input.signal.aborted) {
      return { ok: false, error: input.signal.reason };
    }

    let destination: string;
    try {
      destination = step.destinationFor(input);
    } catch (err) {
      return { ok: false, error: err };
    }

    try {
      if (!step.idempotentSafe) {
        await rm(destination, { recursive: true, force: true });
      }

      console.log(JSON.stringify({ event: "pipeline.step_started", timestamp: input.timestamp, step: step.name }));
      const startedAt = Date.now();
      await step.execute(input, destination);
      console.log(JSON.stringify({
        event: "pipeline.step_completed",
        timestamp: input.timestamp,
        step: step.name,
        durationMs: Date.now() - startedAt
      }));
      return { ok: true, destination };
    } catch (err) {
      if (step.idempotentSafe && !input.signal.aborted && (await pathExists(destination))) {
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({
          event: "pipeline.step_reused_output",
          timestamp: input.timestamp,
          step: step.name,
          destination,
          reason: err instanceof Error ? err.message : String(err)
        }));
        return { ok: true, destination };
      }
      return { ok: false, destination, error: err };
    }
  }
}
