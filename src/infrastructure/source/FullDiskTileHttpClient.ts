import { toErrorMessage } from "../../core/errors";
import type { Timestamp } from "../../core/time/timestamp";
import type { TileCoordinate, TileSourceClient } from "../../ports/TileSourceClient";
import { retry } from "../../shared/retry/retry";

export const MIN_TILE_BYTES = 1024;

export const DEFAULT_SOURCE_URL_TEMPLATE =
  "http://rsapp.nsmc.org.cn/swapQuery/public/tileServer/getTile/fy-4b/full_disk/NatureColor_NoLit/{timestamp}/jpg/{z}/{x}/{y}.png";

export const sourceUrlPlaceholders = ["{timestamp}", "{z}", "{x}", "{y}"] as const;

export const buildTileUrl = (template: string, timestamp: Timestamp, tile: TileCoordinate): string =>
  template
    .split("{timestamp}").join(timestamp)
    .split("{z}").join(String(tile.z))
    .split("{x}").join(String(tile.x))
    .split("{y}").join(String(tile.y));

type TileRequestDetails = {
  url: string;
  status?: number;
  isTimeout?: boolean;
  retryable: boolean;
  retryDelayMs?: number;
};

export class TileRequestError extends Error {
  readonly url: string;
  readonly status?: number;
  readonly isTimeout: boolean;
  readonly retryable: boolean;
  /** Server-requested wait from a `Retry-After` header, in ms. */
  readonly retryDelayMs?: number;

  constructor(message: string, details: TileRequestDetails, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TileRequestError";
    this.url = details.url;
    this.status = details.status;
    this.isTimeout = details.isTimeout ?? false;
    this.retryable = details.retryable;
    this.retryDelayMs = details.retryDelayMs;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type TileHttpClientOptions = {
  timeoutMs?: number;
  /** Extra tries after the first one. */
  retries?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  minTileBytes?: number;
};

type TileResponse = {
  status: number;
  contentType: string;
  retryAfter: string | null;
  body: Buffer;
};

/** Only the delta-seconds form of `Retry-After` is honoured. */
export const parseRetryAfterMs = (header: string | null): number | undefined =>
  header !== null && /^\d+$/.test(header.trim()) ? Number(header.trim()) * 1000 : undefined;

/**
 * Fetches single tiles of the full-disk mosaic with native fetch (Node 20).
 * Timeouts, 5xx, 429 and truncated or non-image bodies are retried; other
 * 4xx responses fail at once. A `Retry-After` on 429 or 503 replaces the
 * back-off delay, capped at `maxDelayMs`.
 */
export class FullDiskTileHttpClient implements TileSourceClient {
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly minDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly minTileBytes: number;

  constructor(private readonly urlTemplate: string, options: TileHttpClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.retries = options.retries ?? 2;
    this.minDelayMs = options.minDelayMs ?? 500;
    this.maxDelayMs = options.maxDelayMs ?? 2000;
    this.minTileBytes = options.minTileBytes ?? MIN_TILE_BYTES;
  }

  async fetchTile(timestamp: Timestamp, tile: TileCoordinate, signal?: AbortSignal): Promise<Buffer> {
    const url = buildTileUrl(this.urlTemplate, timestamp, tile);

    const doFetch = async (): Promise<Buffer> => {
      const res = await this.request(url, signal);

      if (res.status < 200 || res.status >= 300) {
        throw new TileRequestError(`Tile request failed: ${res.status}`, {
          url,
          status: res.status,
          retryable: res.status === 429 || res.status >= 500,
          retryDelayMs: res.status === 429 || res.status === 503 ? parseRetryAfterMs(res.retryAfter) : undefined
        });
      }
      if (res.body.length < this.minTileBytes) {
        throw new TileRequestError(`Tile response too small: ${res.body.length} bytes`, {
          url,
          status: res.status,
          retryable: true
        });
      }
      if (res.contentType !== "" && !res.contentType.startsWith("image/")) {
        throw new TileRequestError(`Tile response is not an image: ${res.contentType}`, {
          url,
          status: res.status,
          retryable: true
        });
      }
      return res.body;
    };

    const logContext = (error: unknown) => ({
      timestamp,
      z: tile.z,
      x: tile.x,
      y: tile.y,
      status: error instanceof TileRequestError ? error.status ?? null : null,
      reason: toErrorMessage(error)
    });

    return retry(doFetch, {
      retries: this.retries,
      minDelayMs: this.minDelayMs,
      maxDelayMs: this.maxDelayMs,
      shouldRetry: (err) =>
        signal?.aborted !== true && err instanceof TileRequestError && err.retryable
          ? { retry: true, delayMs: err.retryDelayMs }
          : false,
      onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({ event: "acquire.tile_retry", ...logContext(error), attempt, maxAttempts, delayMs }));
      },
      onGiveUp: ({ attempt, maxAttempts, error }) => {
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({ event: "acquire.tile_give_up", ...logContext(error), attempt, maxAttempts }));
      }
    });
  }

  private async request(url: string, signal?: AbortSignal): Promise<TileResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener("abort", forwardAbort, { once: true });

    try {
      const res = await fetch(url, { signal: controller.signal });
      return {
        status: res.status,
        contentType: res.headers.get("content-type") ?? "",
        retryAfter: res.headers.get("retry-after"),
        body: Buffer.from(await res.arrayBuffer())
      };
    } catch (err) {
      if (signal?.aborted) throw err;
      if (controller.signal.aborted) {
        throw new TileRequestError(`Tile request timeout after ${this.timeoutMs}ms`, {
          url,
          isTimeout: true,
          retryable: true
        });
      }
      throw new TileRequestError(`Tile request failed: ${toErrorMessage(err)}`, { url, retryable: true }, { cause: err });
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", forwardAbort);
    }
  }
}
