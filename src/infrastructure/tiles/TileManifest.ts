import { mkdir, readFile, rename, rm, stat, writeFile } from "fs/promises";
import { dirname, join } from "path";
import { isTimestamp, type Timestamp } from "../../core/time/timestamp";
import type { ArtifactPublisher } from "../../ports/ArtifactPublisher";
import { createLimiter } from "../../shared/concurrency/limiter";
import { isErrnoException } from "../../shared/fs/pathExists";

export const MANIFEST_FILE_NAME = "timestamps.json";

const MAX_UPDATE_ROUNDS = 3;

export const manifestPathFor = (tilesRoot: string): string => join(tilesRoot, MANIFEST_FILE_NAME);

export type PruneOptions = {
  /** Timestamps to keep; every other entry and its tile directory goes. */
  keep: (timestamp: Timestamp) => boolean;
  /** Without it, nothing is deleted or rewritten. */
  execute?: boolean;
};

export type PruneResult = {
  kept: Timestamp[];
  removed: Timestamp[];
  executed: boolean;
};

type Update = (current: Timestamp[]) => Timestamp[];

const normalize = (timestamps: Timestamp[]): Timestamp[] => Array.from(new Set(timestamps)).sort();

const sameList = (a: Timestamp[], b: Timestamp[]): boolean =>
  a.length === b.length && a.every((value, index) => value === b[index]);

const isDirectory = async (path: string): Promise<boolean> => {
  try {
    return (await stat(path)).isDirectory();
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return false;
    throw err;
  }
};

/**
 * `timestamps.json` beside the tile pyramids: a sorted JSON array of every
 * timestamp whose tiles are complete. Map front ends read it to list layers.
 *
 * Updates are serialized within a process. Across processes there is no lock:
 * each update re-reads the file right before the rename and re-applies itself
 * until its change is visible, up to three rounds.
 */
export class TileManifest implements ArtifactPublisher {
  private readonly lock = createLimiter(1);

  constructor(private readonly manifestPath: string) {}

  get tilesRoot(): string {
    return dirname(this.manifestPath);
  }

  async read(): Promise<Timestamp[]> {
    let raw: string;
    try {
      raw = await readFile(this.manifestPath, "utf8");
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") return [];
      throw err;
    }

    const parsed: unknown = JSON.parse(raw);
    if (!Array.isArray(parsed)) {
      throw new Error(`${this.manifestPath} does not contain a JSON array`);
    }
    return parsed.filter(isTimestamp);
  }

  async publish(timestamp: Timestamp): Promise<void> {
    await this.update((current) => [...current, timestamp]);
  }

  /**
   * Retention pass over published timestamps. A dry run only reports what
   * would go.
   */
  prune(options: PruneOptions): Promise<PruneResult> {
    return this.lock(async () => {
      const current = normalize(await this.read());
      const kept = current.filter((timestamp) => options.keep(timestamp));
      const removed = current.filter((timestamp) => !options.keep(timestamp));
      const executed = options.execute === true;

      if (executed && removed.length > 0) {
        const dropped = new Set(removed);
        await this.apply((latest) => latest.filter((timestamp) => !dropped.has(timestamp)));
        for (const timestamp of removed) {
          const dir = join(this.tilesRoot, timestamp);
          if (await isDirectory(dir)) await rm(dir, { recursive: true, force: true });
        }
      }

      console.log(JSON.stringify({
        event: executed ? "manifest.pruned" : "manifest.prune_planned",
        path: this.manifestPath,
        kept: kept.length,
        removed: removed.length
      }));
      return { kept, removed, executed };
    });
  }

  private update(change: Update): Promise<Timestamp[]> {
    return this.lock(() => this.apply(change));
  }

  /** Caller holds the lock. */
  private async apply(change: Update): Promise<Timestamp[]> {
    for (let round = 1; ; round += 1) {
      const current = await this.read();
      const next = normalize(change(current));
      if (sameList(next, current)) return current;

      const written = await this.replace(current, change);
      const after = await this.read();
      if (sameList(normalize(change(after)), after)) {
        console.log(JSON.stringify({ event: "manifest.updated", path: this.manifestPath, count: written.length }));
        return after;
      }
      if (round >= MAX_UPDATE_ROUNDS) {
        throw new Error(`${this.manifestPath} kept changing underneath; update abandoned after ${round} rounds`);
      }
    }
  }

  private async replace(basis: Timestamp[], change: Update): Promise<Timestamp[]> {
    const tmpPath = `${this.manifestPath}.${process.pid}.tmp`;
    await mkdir(dirname(this.manifestPath), { recursive: true });

    let next = normalize(change(basis));
    await writeFile(tmpPath, `${JSON.stringify(next, null, 2)}\n`, "utf8");

    // Another process may have written since `basis` was read.
    const fresh = await this.read();
    if (!sameList(fresh, basis)) {
      next = normalize(change(fresh));
      await writeFile(tmpPath, `${JSON.stringify(next, null, 2)}\n`, "utf8");
    }

    await rename(tmpPath, this.manifestPath);
    return next;
  }
}
