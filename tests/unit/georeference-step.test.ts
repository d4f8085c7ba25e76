import { join } from "path";
import { CommandFailedError } from "../../src/core/errors";
import { bboxToWebMercator } from "../../src/core/geo/webMercator";
import {
  buildTranslateArgs,
  buildWarpArgs,
  GEOS_PROJ4,
  GeoreferenceStep
} from "../../src/infrastructure/steps/GeoreferenceStep";
import type { StepInput } from "../../src/ports/PipelineStep";
import { FakeCommandRunner } from "../support/fakeCommandRunner";

const TS = "20250301114500";
const bbox = { north: 55, south: -55, west: 60, east: 150 };

describe("GeoreferenceStep", () => {
  const workDir = "/data/work/20250301114500";
  const input: StepInput = {
    timestamp: TS,
    source: join(workDir, `full_disk_${TS}_adjusted.png`),
    workDir,
    keepFiles: false,
    signal: new AbortController().signal
  };

  it("assigns the geostationary projection and full-disk extent", () => {
    expect(buildTranslateArgs("in.png", "out.vrt")).toEqual([
      "-of", "VRT",
      "-a_srs", GEOS_PROJ4,
      "-a_ullr", "-5568748", "5568748", "5568748", "-5568748",
      "in.png",
      "out.vrt"
    ]);
  });

  it("warps into the Web Mercator bounds of the bounding box", () => {
    const bounds = bboxToWebMercator(bbox);
    expect(buildWarpArgs("in.vrt", "out.tif", bbox)).toEqual([
      "-overwrite",
      "-t_srs", "EPSG:3857",
      "-te", String(bounds.minX), String(bounds.minY), String(bounds.maxX), String(bounds.maxY),
      "-ts", "4096", "0",
      "-r", "bilinear",
      "-dstalpha",
      "-of", "GTiff",
      "-co", "COMPRESS=LZW",
      "-co", "TILED=YES",
      "in.vrt",
      "out.tif"
    ]);
  });

  it("runs gdal_translate then gdalwarp through an intermediate VRT", async () => {
    const runner = new FakeCommandRunner();
    const step = new GeoreferenceStep(runner, bbox);
    const destination = step.destinationFor(input);
    const vrt = join(workDir, `full_disk_${TS}_geos.vrt`);

    await step.execute(input, destination);

    expect(destination).toBe(join(workDir, `full_disk_${TS}_mercator.tif`));
    expect(runner.calls.map((c) => c.command)).toEqual(["gdal_translate", "gdalwarp"]);
    expect(runner.calls[0].args.slice(-2)).toEqual([input.source, vrt]);
    expect(runner.calls[1].args.slice(-2)).toEqual([vrt, destination]);
  });

  it("reports a failed reprojection as a permanent projection error", async () => {
    const runner = new FakeCommandRunner((call) => {
      if (call.command === "gdalwarp") {
        throw new CommandFailedError({ command: "gdalwarp", message: "gdalwarp exited with code 1", exitCode: 1 });
      }
      return { stdout: "", stderr: "" };
    });
    const step = new GeoreferenceStep(runner, bbox);

    await expect(step.execute(input, step.destinationFor(input))).rejects.toMatchObject({
      severity: "permanent",
      code: "projection_failed",
      message: "Reprojection to EPSG:3857 failed: gdalwarp exited with code 1"
    });
  });
});
