export type Limiter = {
  <T>(task: () => Promise<T>): Promise<T>;
  /** Tasks currently holding a slot. */
  active: () => number;
  /** Tasks waiting for a slot. */
  pending: () => number;
};

/**
 * A tiny concurrency limiter (no external deps).
 * Usage:
 *   const limit = createLimiter(2);
 *   await Promise.all(timestamps.map((ts) => limit(() => dispatch(ts))));
 *
 * `createLimiter(1)` doubles as an async mutex.
 */
export const createLimiter = (concurrency: number): Limiter => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error("concurrency must be an integer >= 1");
  }

  let active = 0;
  const queue: Array<() => void> = [];

  const next = () => {
    if (active >= concurrency) return;
    const fn = queue.shift();
    if (!fn) return;
    active += 1;
    fn();
  };

  const limit = async <T>(task: () => Promise<T>): Promise<T> => {
    return new Promise<T>((resolve, reject) => {
      queue.push(async () => {
        try {
          const result = await task();
          resolve(result);
        } catch (err) {
          reject(err);
        } finally {
          active -= 1;
          next();
        }
      });
      next();
    });
  };

  return Object.assign(limit, {
    active: () => active,
    pending: () => queue.length
  });
};
