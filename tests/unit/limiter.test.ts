import { createLimiter } from "../../src/shared/concurrency/limiter";

describe("createLimiter", () => {
  it("limits concurrency", async () => {
    const limit = createLimiter(2);
    let active = 0;
    let maxActive = 0;

    const work = async () => {
      active += 1;
      maxActive = Math.max(maxActive, active);
      await new Promise((r) => setTimeout(r, 20));
      active -= 1;
    };

    await Promise.all(Array.from({ length: 10 }, () => limit(work)));
    expect(maxActive).toBeLessThanOrEqual(2);
  });

  it("reports active and pending tasks", async () => {
    const limit = createLimiter(1);
    let release: () => void = () => undefined;
    const gate = new Promise<void>((r) => {
      release = r;
    });

    const first = limit(() => gate);
    const second = limit(async () => "second");

    expect(limit.active()).toBe(1);
    expect(limit.pending()).toBe(1);

    release();
    await first;
    await expect(second).resolves.toBe("second");
    expect(limit.active()).toBe(0);
    expect(limit.pending()).toBe(0);
  });

  it("releases the slot when a task rejects", async () => {
    const limit = createLimiter(1);

    await expect(limit(async () => {
      throw new Error("boom");
    })).rejects.toThrow("boom");
    await expect(limit(async () => 42)).resolves.toBe(42);
  });

  it("rejects invalid concurrency", () => {
    expect(() => createLimiter(0)).toThrow("concurrency must be an integer >= 1");
  });
});
