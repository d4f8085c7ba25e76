import { copyFile } from "fs/promises";
import { join } from "path";
import { PermanentStepError, type StepErrorContext } from "../../core/errors";
import type { CommandRunner } from "../../ports/CommandRunner";
import type { PipelineStep, StepInput } from "../../ports/PipelineStep";
import { artifactName, requireSource, runStepCommand } from "./stepInput";

export type AdjustOptions = {
  cropX: number;
  cropY: number;
  /** Grey level (0-255) up to which border pixels are trimmed. */
  trimThreshold: number;
};

export type TrimBox = {
  width: number;
  height: number;
  x: number;
  y: number;
};

const TRIM_BOX_PATTERN = /^(\d+)x(\d+)([+-]\d+)([+-]\d+)$/;

const signed = (value: number) => (value < 0 ? String(value) : `+${value}`);

export const formatTrimBox = (box: TrimBox): string => `${box.width}x${box.height}${signed(box.x)}${signed(box.y)}`;

/** Parses the `%@` geometry ImageMagick prints for `-trim`, e.g. `2200x2180+12+10`. */
export const parseTrimBox = (output: string, context: StepErrorContext = {}): TrimBox => {
  const match = TRIM_BOX_PATTERN.exec(output.trim());
  if (!match) {
    throw new PermanentStepError({
      code: "invalid_geometry",
      message: `Unexpected trim geometry "${output.trim()}"`,
      context
    });
  }
  return { width: Number(match[1]), height: Number(match[2]), x: Number(match[3]), y: Number(match[4]) };
};

export const fuzzPercent = (threshold: number): string => `${((threshold / 255) * 100).toFixed(2)}%`;

const axisOperations = (
  axis: "x" | "y",
  offset: number,
  size: number,
  context: StepErrorContext
): string[] => {
  if (offset === 0) return [];
  const geometry = (amount: number) => (axis === "x" ? `${amount}x0` : `0x${amount}`);

  if (offset > 0) {
    if (2 * offset >= size) {
      throw new PermanentStepError({
        code: "invalid_geometry",
        message: `crop-${axis}=${offset} is too large for an image ${axis === "x" ? "width" : "height"} of ${size}px`,
        context
      });
    }
    return ["-shave", geometry(offset)];
  }
  return ["-bordercolor", "black", "-border", geometry(-offset)];
};

/**
 * `convert` arguments that cut the image down to `box`, then crop (positive
 * offset) or pad with black (negative offset) each side of both axes.
 */
export const buildAdjustArgs = (
  source: string,
  destination: string,
  box: TrimBox,
  offsets: Pick<AdjustOptions, "cropX" | "cropY">,
  context: StepErrorContext = {}
): string[] => [
  source,
  "-crop", formatTrimBox(box),
  "+repage",
  ...axisOperations("x", offsets.cropX, box.width, context),
  ...axisOperations("y", offsets.cropY, box.height, context),
  destination
];

export class AdjustStep implements PipelineStep {
  readonly name = "adjust";

  constructor(
    private readonly runner: CommandRunner,
    private readonly options: AdjustOptions
  ) {}

  destinationFor(input: StepInput): string {
    return join(input.workDir, artifactName(input, "_adjusted", ".png"));
  }

  async execute(input: StepInput, destination: string): Promise<void> {
    const source = requireSource(input, this.name);
    const context = { timestamp: input.timestamp, step: this.name };
    const policy = { step: this.name, code: "invalid_geometry" as const, severity: "permanent" as const };

    const { stdout } = await runStepCommand(
      this.runner,
      "convert",
      [source, "-fuzz", fuzzPercent(this.options.trimThreshold), "-trim", "-format", "%@", "info:"],
      input,
      { ...policy, action: "Trim detection" }
    );
    const box = parseTrimBox(stdout, context);

    if (box.width === 0 || box.height === 0) {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ event: "adjust.empty_image", timestamp: input.timestamp, source }));
      await copyFile(source, destination);
      return;
    }

    await runStepCommand(
      this.runner,
      "convert",
      buildAdjustArgs(source, destination, box, this.options, context),
      input,
      { ...policy, action: "Crop and pad" }
    );
  }
}
