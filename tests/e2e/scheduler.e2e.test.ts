import { readFile } from "fs/promises";
import { join } from "path";
import { PipelineRunner } from "../../src/application/pipeline/PipelineRunner";
import { RetryQueue } from "../../src/application/scheduling/RetryQueue";
import { Scheduler } from "../../src/application/scheduling/Scheduler";
import { resolveSchedulerConfig, retryPolicyFrom } from "../../src/application/scheduling/scheduler.config";
import { runAcquisition } from "../../src/composition/root";
import { TimestampResolver } from "../../src/core/time/TimestampResolver";
import { SqliteTaskStateStore } from "../../src/infrastructure/sqlite/SqliteTaskStateStore";
import { TileManifest } from "../../src/infrastructure/tiles/TileManifest";
import { FakeClock } from "../support/fakeClock";
import { FakeCommandRunner, writesLastArgument } from "../support/fakeCommandRunner";
import { failFirst, FakeStep } from "../support/fakeSteps";
import { makeTempDir, muteConsole, removeTempDir } from "../support/tempDir";

const MINUTE = 60_000;

describe("scheduler with an on-disk state store (e2e)", () => {
  let dir: string;

  beforeEach(async () => {
    muteConsole();
    dir = await makeTempDir("scheduler-e2e");
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await removeTempDir(dir);
  });

  const startProcess = (clock: FakeClock, step: FakeStep) => {
    const store = new SqliteTaskStateStore(join(dir, "state", "tasks.db"));
    const config = resolveSchedulerConfig({ backfillLookback: 0, retryJitterRatio: 0 });
    const scheduler = new Scheduler({
      store,
      queue: new RetryQueue(retryPolicyFrom(config)),
      runner: new PipelineRunner(),
      resolver: new TimestampResolver({ cadenceMs: config.cadenceMs, publicationDelayMs: config.publicationDelayMs }),
      clock,
      config,
      pipeline: { steps: [step], workDirFor: (ts) => join(dir, "work", ts), keepFiles: false },
      publisher: new TileManifest(join(dir, "tiles", "timestamps.json"))
    });
    return { store, scheduler };
  };

  it("picks up failures and abandoned runs after a restart", async () => {
    const clock = new FakeClock("2025-03-01T12:01:00.000Z");

    const first = startProcess(clock, new FakeStep("acquire", failFirst(1)));
    const tick = await first.scheduler.tick();
    expect(tick.results.map((r) => [r.timestamp, r.kind])).toEqual([["20250301114500", "failed"]]);
    // A run that was in flight when the process died.
    await first.store.markRunning("20250301113000", { now: clock.now() });
    await first.store.close();

    // The source has recovered by the time the next process starts.
    clock.advance(45 * MINUTE);
    const second = startProcess(clock, new FakeStep("acquire"));
    const summary = await second.scheduler.rebuildRetryQueue();
    expect(summary.queued.map((e) => [e.timestamp, e.attempts])).toEqual([
      ["20250301113000", 1],
      ["20250301114500", 1]
    ]);

    await second.scheduler.processOne("20250301114500");
    await second.scheduler.processOne("20250301113000");

    const records = await Promise.all(
      ["20250301113000", "20250301114500"].map((ts) => second.store.get(ts))
    );
    await second.store.close();

    expect(records.map((r) => [r?.status, r?.attempts])).toEqual([
      ["succeeded", 1],
      ["succeeded", 1]
    ]);
    expect(JSON.parse(await readFile(join(dir, "tiles", "timestamps.json"), "utf8"))).toEqual([
      "20250301113000",
      "20250301114500"
    ]);
  });

  it("runs the daemon end to end with the default state store", async () => {
    const clock = new FakeClock("2025-03-01T12:01:00.000Z");
    const controller = new AbortController();
    clock.onSleep = () => controller.abort();
    const commandRunner = new FakeCommandRunner((call) =>
      call.args.includes("info:") ? { stdout: "2200x2180+12+10", stderr: "" } : writesLastArgument(call)
    );

    const outcome = await runAcquisition(
      {},
      controller.signal,
      { clock, commandRunner, tileClient: { fetchTile: async () => Buffer.alloc(2048, 1) } },
      { DATA_DIR: dir, BACKFILL_LOOKBACK: "1" }
    );

    expect(outcome).toEqual({ mode: "daemon" });
    expect(JSON.parse(await readFile(join(dir, "tiles", "timestamps.json"), "utf8"))).toEqual([
      "20250301113000",
      "20250301114500"
    ]);

    const store = new SqliteTaskStateStore(join(dir, "state", "tasks.db"));
    const statuses = await Promise.all(["20250301113000", "20250301114500"].map((ts) => store.get(ts)));
    await store.close();
    expect(statuses.map((r) => r?.status)).toEqual(["succeeded", "succeeded"]);
  });
});
