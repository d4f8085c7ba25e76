import { readFile, writeFile } from "fs/promises";
import { join } from "path";
import { CommandFailedError, PermanentStepError } from "../../src/core/errors";
import {
  AdjustStep,
  buildAdjustArgs,
  formatTrimBox,
  fuzzPercent,
  parseTrimBox
} from "../../src/infrastructure/steps/AdjustStep";
import type { StepInput } from "../../src/ports/PipelineStep";
import { FakeCommandRunner, writesLastArgument } from "../support/fakeCommandRunner";
import { loggedEvents, makeTempDir, muteConsole, removeTempDir } from "../support/tempDir";

const TS = "20250301114500";
const box = { width: 2200, height: 2180, x: 12, y: 10 };

describe("adjust geometry helpers", () => {
  it("converts a grey threshold to an ImageMagick fuzz percentage", () => {
    expect(fuzzPercent(10)).toBe("3.92%");
    expect(fuzzPercent(0)).toBe("0.00%");
    expect(fuzzPercent(255)).toBe("100.00%");
  });

  it("parses and formats trim geometry with signed offsets", () => {
    expect(parseTrimBox("2200x2180+12+10\n")).toEqual(box);
    expect(parseTrimBox("100x50-5+3")).toEqual({ width: 100, height: 50, x: -5, y: 3 });
    expect(formatTrimBox({ width: 100, height: 50, x: -5, y: 3 })).toBe("100x50-5+3");
  });

  it("rejects geometry it cannot read", () => {
    expect(() => parseTrimBox("convert: no images")).toThrow('Unexpected trim geometry "convert: no images"');
  });

  it("pads both axes with black for negative offsets", () => {
    expect(buildAdjustArgs("in.png", "out.png", box, { cropX: -135, cropY: -162 })).toEqual([
      "in.png",
      "-crop", "2200x2180+12+10",
      "+repage",
      "-bordercolor", "black", "-border", "135x0",
      "-bordercolor", "black", "-border", "0x162",
      "out.png"
    ]);
  });

  it("shaves positive offsets and leaves zero offsets alone", () => {
    expect(buildAdjustArgs("in.png", "out.png", box, { cropX: 100, cropY: 0 })).toEqual([
      "in.png", "-crop", "2200x2180+12+10", "+repage", "-shave", "100x0", "out.png"
    ]);
  });

  it("refuses a crop that would consume the whole image", () => {
    expect(() => buildAdjustArgs("in.png", "out.png", box, { cropX: 1100, cropY: 0 })).toThrow(
      "crop-x=1100 is too large for an image width of 2200px"
    );
    expect(() => buildAdjustArgs("in.png", "out.png", box, { cropX: 0, cropY: 1090 })).toThrow(
      "crop-y=1090 is too large for an image height of 2180px"
    );
  });
});

describe("AdjustStep", () => {
  let workDir: string;
  let source: string;

  const inputFor = (withSource = true): StepInput => ({
    timestamp: TS,
    source: withSource ? source : undefined,
    workDir,
    keepFiles: false,
    signal: new AbortController().signal
  });

  beforeEach(async () => {
    workDir = await makeTempDir("adjust");
    source = join(workDir, `full_disk_${TS}.png`);
    await writeFile(source, "stitched");
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await removeTempDir(workDir);
  });

  it("detects the trim box, then crops and pads", async () => {
    const runner = new FakeCommandRunner((call) =>
      call.args.includes("info:") ? { stdout: "2200x2180+12+10", stderr: "" } : writesLastArgument(call)
    );
    const step = new AdjustStep(runner, { cropX: -135, cropY: -162, trimThreshold: 10 });
    const input = inputFor();
    const destination = step.destinationFor(input);

    await step.execute(input, destination);

    expect(destination).toBe(join(workDir, `full_disk_${TS}_adjusted.png`));
    expect(runner.calls.map((c) => [c.command, c.args])).toEqual([
      ["convert", [source, "-fuzz", "3.92%", "-trim", "-format", "%@", "info:"]],
      ["convert", buildAdjustArgs(source, destination, box, { cropX: -135, cropY: -162 })]
    ]);
  });

  it("copies an image with nothing left after trimming", async () => {
    const { warn } = muteConsole();
    const runner = new FakeCommandRunner(() => ({ stdout: "0x0+0+0", stderr: "" }));
    const step = new AdjustStep(runner, { cropX: -135, cropY: -162, trimThreshold: 10 });
    const input = inputFor();
    const destination = step.destinationFor(input);

    await step.execute(input, destination);

    expect(runner.calls).toHaveLength(1);
    expect(await readFile(destination, "utf8")).toBe("stitched");
    expect(loggedEvents(warn)).toEqual([{ event: "adjust.empty_image", timestamp: TS, source }]);
  });

  it("needs the output of the previous step", async () => {
    const step = new AdjustStep(new FakeCommandRunner(), { cropX: 0, cropY: 0, trimThreshold: 10 });
    const input = inputFor(false);

    await expect(step.execute(input, step.destinationFor(input))).rejects.toMatchObject({
      code: "missing_input",
      message: "Step adjust needs the output of a previous step"
    });
  });

  it("reports a failed trim as a permanent geometry error", async () => {
    const runner = new FakeCommandRunner(() => {
      throw new CommandFailedError({ command: "convert", message: "convert exited with code 1", exitCode: 1 });
    });
    const step = new AdjustStep(runner, { cropX: 0, cropY: 0, trimThreshold: 10 });
    const input = inputFor();

    const run = step.execute(input, step.destinationFor(input));

    await expect(run).rejects.toBeInstanceOf(PermanentStepError);
    await expect(run).rejects.toMatchObject({
      code: "invalid_geometry",
      message: "Trim detection failed: convert exited with code 1"
    });
  });
});
