import { mkdir, readFile, stat, writeFile } from "fs/promises";
import { join } from "path";
import { isLocalNoon } from "../../src/core/tiles/retention";
import { manifestPathFor, TileManifest } from "../../src/infrastructure/tiles/TileManifest";
import { loggedEvents, makeTempDir, muteConsole, removeTempDir } from "../support/tempDir";

describe("TileManifest", () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await makeTempDir("manifest");
    path = manifestPathFor(join(dir, "tiles"));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await removeTempDir(dir);
  });

  it("reads a missing manifest as empty", async () => {
    await expect(new TileManifest(path).read()).resolves.toEqual([]);
  });

  it("keeps timestamps sorted and unique", async () => {
    const { log } = muteConsole();
    const manifest = new TileManifest(path);

    await manifest.publish("20250301120000");
    await manifest.publish("20250301113000");
    await manifest.publish("20250301120000");

    expect(path).toBe(join(dir, "tiles", "timestamps.json"));
    expect(await readFile(path, "utf8")).toBe('[\n  "20250301113000",\n  "20250301120000"\n]\n');
    expect(loggedEvents(log)).toEqual([
      { event: "manifest.updated", path, count: 1 },
      { event: "manifest.updated", path, count: 2 }
    ]);
  });

  it("serializes concurrent publishes so none is lost", async () => {
    muteConsole();
    const manifest = new TileManifest(path);

    await Promise.all(["20250301110000", "20250301111500", "20250301113000"].map((ts) => manifest.publish(ts)));

    expect(await manifest.read()).toEqual(["20250301110000", "20250301111500", "20250301113000"]);
  });

  it("drops entries that are not timestamps", async () => {
    await mkdir(join(dir, "tiles"), { recursive: true });
    await writeFile(path, JSON.stringify(["20250301110000", "latest", 42]));

    await expect(new TileManifest(path).read()).resolves.toEqual(["20250301110000"]);
  });

  it("rejects a manifest that is not an array", async () => {
    await mkdir(join(dir, "tiles"), { recursive: true });
    await writeFile(path, "{}");

    await expect(new TileManifest(path).read()).rejects.toThrow(`${path} does not contain a JSON array`);
  });

  it("keeps an entry another writer added while it was updating", async () => {
    muteConsole();
    const manifest = new TileManifest(path);
    const readFromDisk = manifest.read.bind(manifest);
    jest.spyOn(manifest, "read").mockImplementationOnce(async () => {
      const seen = await readFromDisk();
      await mkdir(join(dir, "tiles"), { recursive: true });
      await writeFile(path, JSON.stringify(["20250301110000"]));
      return seen;
    });

    await manifest.publish("20250301113000");

    expect(await readFromDisk()).toEqual(["20250301110000", "20250301113000"]);
  });

  it("gives up when its change never becomes visible", async () => {
    muteConsole();
    const manifest = new TileManifest(path);
    jest.spyOn(manifest, "read").mockResolvedValue([]);

    await expect(manifest.publish("20250301113000")).rejects.toThrow(
      `${path} kept changing underneath; update abandoned after 3 rounds`
    );
  });

  describe("prune", () => {
    const noonAtUtc8 = "20250301040000";
    const quarterPast = "20250301041500";
    const utcNoon = "20250301120000";
    const keepLocalNoon = (timestamp: string) => isLocalNoon(timestamp, 8);
    const exists = (ts: string) =>
      stat(join(dir, "tiles", ts)).then(
        () => true,
        () => false
      );

    beforeEach(async () => {
      await mkdir(join(dir, "tiles", noonAtUtc8), { recursive: true });
      await mkdir(join(dir, "tiles", quarterPast), { recursive: true });
      await writeFile(path, JSON.stringify([utcNoon, noonAtUtc8, quarterPast]));
    });

    it("only reports what it would remove on a dry run", async () => {
      const { log } = muteConsole();

      const result = await new TileManifest(path).prune({ keep: keepLocalNoon });

      expect(result).toEqual({ kept: [noonAtUtc8], removed: [quarterPast, utcNoon], executed: false });
      expect(JSON.parse(await readFile(path, "utf8"))).toEqual([utcNoon, noonAtUtc8, quarterPast]);
      expect(await exists(quarterPast)).toBe(true);
      expect(loggedEvents(log)).toEqual([{ event: "manifest.prune_planned", path, kept: 1, removed: 2 }]);
    });

    it("removes pruned entries and their tile directories when executed", async () => {
      const { log } = muteConsole();

      const result = await new TileManifest(path).prune({ keep: keepLocalNoon, execute: true });

      expect(result.executed).toBe(true);
      expect(await readFile(path, "utf8")).toBe(`[\n  "${noonAtUtc8}"\n]\n`);
      expect(await exists(quarterPast)).toBe(false);
      expect(await exists(noonAtUtc8)).toBe(true);
      expect(loggedEvents(log)).toEqual([
        { event: "manifest.updated", path, count: 1 },
        { event: "manifest.pruned", path, kept: 1, removed: 2 }
      ]);
    });
  });
});
