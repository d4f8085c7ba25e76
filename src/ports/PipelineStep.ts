import type { Timestamp } from "../core/time/timestamp";

export type StepInput = {
  timestamp: Timestamp;
  /** Output of the previous step; absent for the first one. */
  source?: string;
  workDir: string;
  keepFiles: boolean;
  signal: AbortSignal;
};

export interface PipelineStep {
  readonly name: string;
  /**
   * When set, a failing step whose destination already exists counts as done,
   * and an existing destination is not removed before the step runs.
   */
  readonly idempotentSafe?: boolean;
  destinationFor(input: StepInput): string;
  execute(input: StepInput, destination: string): Promise<void>;
}
