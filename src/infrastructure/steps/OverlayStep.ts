import { copyFile } from "fs/promises";
import { join, parse } from "path";
import { PermanentStepError } from "../../core/errors";
import type { CommandRunner } from "../../ports/CommandRunner";
import type { PipelineStep, StepInput } from "../../ports/PipelineStep";
import { pathExists } from "../../shared/fs/pathExists";
import { artifactName, requireSource, runStepCommand } from "./stepInput";

/** Yellow (255, 255, 0) burnt into the RGB bands. */
const BURN_VALUES = ["255", "255", "0"];

export const buildRasterizeArgs = (boundariesPath: string, destination: string): string[] => [
  "-l", parse(boundariesPath).name,
  ...BURN_VALUES.flatMap((_, index) => ["-b", String(index + 1)]),
  ...BURN_VALUES.flatMap((value) => ["-burn", value]),
  boundariesPath,
  destination
];

/** Burns a boundary vector layer (coastlines, borders) into a copy of the raster. */
export class OverlayStep implements PipelineStep {
  readonly name = "overlay";

  constructor(
    private readonly runner: CommandRunner,
    private readonly boundariesPath: string
  ) {}

  destinationFor(input: StepInput): string {
    return join(input.workDir, artifactName(input, "_overlay", ".tif"));
  }

  async execute(input: StepInput, destination: string): Promise<void> {
    const source = requireSource(input, this.name);
    if (!(await pathExists(this.boundariesPath))) {
      throw new PermanentStepError({
        code: "asset_missing",
        message: `Boundary file not found: ${this.boundariesPath}`,
        context: { timestamp: input.timestamp, step: this.name }
      });
    }

    await copyFile(source, destination);
    await runStepCommand(this.runner, "gdal_rasterize", buildRasterizeArgs(this.boundariesPath, destination), input, {
      step: this.name,
      code: "command_failed",
      severity: "permanent",
      action: "Burning boundaries"
    });
  }
}
