import { setTimeout as delay } from "timers/promises";
import type { Clock } from "../../ports/Clock";

const isAbortError = (err: unknown): boolean => err instanceof Error && err.name === "AbortError";

export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return;
    try {
      await delay(ms, undefined, { signal });
    } catch (err) {
      if (isAbortError(err)) return;
      throw err;
    }
  }
}
