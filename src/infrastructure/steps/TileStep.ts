import { join } from "path";
import { formatZoomRange, type ZoomRange } from "../../core/geo/zoomRange";
import type { CommandRunner } from "../../ports/CommandRunner";
import type { PipelineStep, StepInput } from "../../ports/PipelineStep";
import { requireSource, runStepCommand } from "./stepInput";

export type TileOptions = {
  tilesRoot: string;
  zoomRange: ZoomRange;
  processes: number;
  title?: string;
};

export const buildTilesArgs = (source: string, destination: string, options: Omit<TileOptions, "tilesRoot">): string[] => [
  "--profile", "mercator",
  "--zoom", formatZoomRange(options.zoomRange),
  "--processes", String(options.processes),
  "--webviewer", "leaflet",
  "--title", options.title ?? "Full Disk",
  "--quiet",
  source,
  destination
];

/** Cuts the Web Mercator raster into a `{z}/{x}/{y}.png` pyramid under `<tilesRoot>/<timestamp>`. */
export class TileStep implements PipelineStep {
  readonly name = "tile";

  constructor(
    private readonly runner: CommandRunner,
    private readonly options: TileOptions
  ) {}

  destinationFor(input: StepInput): string {
    return join(this.options.tilesRoot, input.timestamp);
  }

  async execute(input: StepInput, destination: string): Promise<void> {
    const source = requireSource(input, this.name);
    await runStepCommand(this.runner, "gdal2tiles.py", buildTilesArgs(source, destination, this.options), input, {
      step: this.name,
      code: "tiling_failed",
      severity: "transient",
      action: `Tiling zoom levels ${formatZoomRange(this.options.zoomRange)}`
    });
  }
}
