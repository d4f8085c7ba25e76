import { rm } from "fs/promises";
import { join } from "path";
import { bboxToWebMercator, type BoundingBox } from "../../core/geo/webMercator";
import type { CommandRunner } from "../../ports/CommandRunner";
import type { PipelineStep, StepInput } from "../../ports/PipelineStep";
import { artifactName, requireSource, runStepCommand } from "./stepInput";

/** Fixed-grid geostationary projection of the full-disk image. */
export const GEOS_PROJ4 = "+proj=geos +h=35785831 +lon_0=104.7 +sweep=x +datum=WGS84 +units=m";
export const GEOS_EXTENT_METERS = 5568748;
export const OUTPUT_WIDTH_PX = 4096;

export const buildTranslateArgs = (source: string, vrtPath: string): string[] => [
  "-of", "VRT",
  "-a_srs", GEOS_PROJ4,
  "-a_ullr",
  String(-GEOS_EXTENT_METERS), String(GEOS_EXTENT_METERS),
  String(GEOS_EXTENT_METERS), String(-GEOS_EXTENT_METERS),
  source,
  vrtPath
];

export const buildWarpArgs = (vrtPath: string, destination: string, bbox: BoundingBox): string[] => {
  const bounds = bboxToWebMercator(bbox);
  return [
    "-overwrite",
    "-t_srs", "EPSG:3857",
    "-te", String(bounds.minX), String(bounds.minY), String(bounds.maxX), String(bounds.maxY),
    "-ts", String(OUTPUT_WIDTH_PX), "0",
    "-r", "bilinear",
    "-dstalpha",
    "-of", "GTiff",
    "-co", "COMPRESS=LZW",
    "-co", "TILED=YES",
    vrtPath,
    destination
  ];
};

export class GeoreferenceStep implements PipelineStep {
  readonly name = "georeference";

  constructor(
    private readonly runner: CommandRunner,
    private readonly bbox: BoundingBox
  ) {}

  destinationFor(input: StepInput): string {
    return join(input.workDir, artifactName(input, "_mercator", ".tif"));
  }

  async execute(input: StepInput, destination: string): Promise<void> {
    const source = requireSource(input, this.name);
    const vrtPath = join(input.workDir, artifactName(input, "_geos", ".vrt"));
    const policy = { step: this.name, code: "projection_failed" as const, severity: "permanent" as const };

    try {
      await runStepCommand(this.runner, "gdal_translate", buildTranslateArgs(source, vrtPath), input, {
        ...policy,
        action: "Assigning the geostationary projection"
      });
      await runStepCommand(this.runner, "gdalwarp", buildWarpArgs(vrtPath, destination, this.bbox), input, {
        ...policy,
        action: "Reprojection to EPSG:3857"
      });
    } finally {
      await rm(vrtPath, { force: true });
    }
  }
}
