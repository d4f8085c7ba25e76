import { mkdir, rm, stat, writeFile } from "fs/promises";
import { join } from "path";
import { toErrorMessage, TransientStepError } from "../../core/errors";
import type { CommandRunner } from "../../ports/CommandRunner";
import type { PipelineStep, StepInput } from "../../ports/PipelineStep";
import type { TileCoordinate, TileSourceClient } from "../../ports/TileSourceClient";
import { createLimiter } from "../../shared/concurrency/limiter";
import { isErrnoException } from "../../shared/fs/pathExists";
import { MIN_TILE_BYTES } from "../source/FullDiskTileHttpClient";
import { artifactName, runStepCommand } from "./stepInput";

export type AcquireOptions = {
  zoom?: number;
  gridSize?: number;
  downloadConcurrency: number;
  maxMissingTilePercent: number;
  minTileBytes?: number;
};

/** Row-major grid: tile (x, y) lands at row x, column y of the mosaic. */
export const tileGrid = (zoom: number, gridSize: number): TileCoordinate[] => {
  const tiles: TileCoordinate[] = [];
  for (let x = 0; x < gridSize; x += 1) {
    for (let y = 0; y < gridSize; y += 1) {
      tiles.push({ z: zoom, x, y });
    }
  }
  return tiles;
};

const hasValidTile = async (path: string, minBytes: number): Promise<boolean> => {
  try {
    return (await stat(path)).size >= minBytes;
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return false;
    throw err;
  }
};

/**
 * Downloads the full-disk tile grid of one timestamp and stitches it into a
 * single PNG with ImageMagick `montage`. Missing tiles are filled with black
 * up to `maxMissingTilePercent` of the grid.
 */
export class AcquireStep implements PipelineStep {
  readonly name = "acquire";
  private readonly zoom: number;
  private readonly gridSize: number;
  private readonly minTileBytes: number;

  constructor(
    private readonly client: TileSourceClient,
    private readonly runner: CommandRunner,
    private readonly options: AcquireOptions
  ) {
    this.zoom = options.zoom ?? 4;
    this.gridSize = options.gridSize ?? 16;
    this.minTileBytes = options.minTileBytes ?? MIN_TILE_BYTES;
  }

  destinationFor(input: StepInput): string {
    return join(input.workDir, artifactName(input, "", ".png"));
  }

  async execute(input: StepInput, destination: string): Promise<void> {
    const tileDir = join(input.workDir, `tiles_${input.timestamp}`);
    const context = { timestamp: input.timestamp, step: this.name };
    await mkdir(tileDir, { recursive: true });

    try {
      const tiles = tileGrid(this.zoom, this.gridSize);
      const limit = createLimiter(this.options.downloadConcurrency);
      const paths = await Promise.all(tiles.map((tile) => limit(() => this.downloadTile(input, tileDir, tile))));
      if (input.signal.aborted) throw input.signal.reason;

      const missing = paths.filter((path) => path === undefined).length;
      if ((missing * 100) / tiles.length > this.options.maxMissingTilePercent) {
        throw new TransientStepError({
          code: "network",
          message: `${missing} of ${tiles.length} tiles could not be downloaded`,
          context
        });
      }
      if (missing > 0) {
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({ event: "acquire.tiles_missing", timestamp: input.timestamp, missing, total: tiles.length }));
      }

      await runStepCommand(
        this.runner,
        "montage",
        [
          ...paths.map((path) => path ?? "null:"),
          "-tile", `${this.gridSize}x${this.gridSize}`,
          "-geometry", "+0+0",
          "-background", "black",
          destination
        ],
        input,
        { step: this.name, code: "stitch_failed", severity: "transient", action: `Stitching ${tiles.length} tiles` }
      );
    } finally {
      if (!input.keepFiles) {
        await rm(tileDir, { recursive: true, force: true });
      }
    }
  }

  private async downloadTile(input: StepInput, tileDir: string, tile: TileCoordinate): Promise<string | undefined> {
    const path = join(tileDir, `${tile.x}_${tile.y}.png`);
    if (await hasValidTile(path, this.minTileBytes)) return path;
    if (input.signal.aborted) return undefined;

    try {
      const body = await this.client.fetchTile(input.timestamp, tile, input.signal);
      await writeFile(path, body);
      return path;
    } catch (err) {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "acquire.tile_missing",
        timestamp: input.timestamp,
        x: tile.x,
        y: tile.y,
        reason: toErrorMessage(err)
      }));
      return undefined;
    }
  }
}
