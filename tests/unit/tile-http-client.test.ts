import http from "http";
import {
  buildTileUrl,
  FullDiskTileHttpClient,
  parseRetryAfterMs,
  TileRequestError
} from "../../src/infrastructure/source/FullDiskTileHttpClient";
import { loggedEvents } from "../support/tempDir";

type TestServer = {
  template: string;
  close: () => Promise<void>;
};

const startServer = async (
  handler: (req: http.IncomingMessage, res: http.ServerResponse) => void
): Promise<TestServer> => {
  const server = http.createServer(handler);
  await new Promise<void>((resolve) => {
    server.listen(0, "127.0.0.1", () => resolve());
  });

  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("test server is not listening on a TCP port");
  }
  return {
    template: `http://127.0.0.1:${address.port}/{timestamp}/{z}/{x}/{y}.png`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      })
  };
};

const TS = "20250301114500";
const TILE = { z: 4, x: 3, y: 7 };
const png = (bytes = 2048) => Buffer.alloc(bytes, 1);
const fastRetries = { minDelayMs: 1, maxDelayMs: 5 };

const sendTile = (res: http.ServerResponse, body: Buffer = png(), contentType = "image/png") => {
  res.writeHead(200, { "content-type": contentType });
  res.end(body);
};

describe("buildTileUrl", () => {
  it("fills every placeholder", () => {
    expect(buildTileUrl("https://tiles.example.test/{timestamp}/{z}/{x}/{y}.png?t={timestamp}", TS, TILE)).toBe(
      "https://tiles.example.test/20250301114500/4/3/7.png?t=20250301114500"
    );
  });
});

describe("parseRetryAfterMs", () => {
  it("reads delta seconds and ignores other forms", () => {
    expect(parseRetryAfterMs("2")).toBe(2000);
    expect(parseRetryAfterMs(" 0 ")).toBe(0);
    expect(parseRetryAfterMs("Sat, 01 Mar 2025 12:00:00 GMT")).toBeUndefined();
    expect(parseRetryAfterMs(null)).toBeUndefined();
  });
});

describe("FullDiskTileHttpClient", () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  it("requests the tile path and returns the body", async () => {
    const paths: string[] = [];
    const server = await startServer((req, res) => {
      paths.push(req.url ?? "");
      sendTile(res);
    });

    const client = new FullDiskTileHttpClient(server.template, fastRetries);
    const body = await client.fetchTile(TS, TILE);

    expect(body).toHaveLength(2048);
    expect(paths).toEqual(["/20250301114500/4/3/7.png"]);
    expect(warnSpy).not.toHaveBeenCalled();

    await server.close();
  });

  it("retries on 500 and eventually succeeds", async () => {
    let requests = 0;
    const server = await startServer((_req, res) => {
      requests += 1;
      if (requests < 3) {
        res.writeHead(500, { "content-type": "text/plain" });
        res.end("temporary failure");
        return;
      }
      sendTile(res);
    });

    const client = new FullDiskTileHttpClient(server.template, fastRetries);
    await client.fetchTile(TS, TILE);

    expect(requests).toBe(3);
    const events = loggedEvents(warnSpy);
    expect(events.map((e) => [e.event, e.attempt, e.status])).toEqual([
      ["acquire.tile_retry", 1, 500],
      ["acquire.tile_retry", 2, 500]
    ]);
    expect(events[0]).toMatchObject({ timestamp: TS, z: 4, x: 3, y: 7, maxAttempts: 3, reason: "Tile request failed: 500" });

    await server.close();
  });

  it("retries on transient network errors and eventually succeeds", async () => {
    let requests = 0;
    const server = await startServer((_req, res) => {
      requests += 1;
      if (requests < 3) {
        res.socket?.destroy();
        return;
      }
      sendTile(res);
    });

    const client = new FullDiskTileHttpClient(server.template, fastRetries);
    await expect(client.fetchTile(TS, TILE)).resolves.toHaveLength(2048);
    expect(requests).toBe(3);
    expect(loggedEvents(warnSpy)[0]).toMatchObject({ event: "acquire.tile_retry", status: null });

    await server.close();
  });

  it("retries on 429", async () => {
    let requests = 0;
    const server = await startServer((_req, res) => {
      requests += 1;
      if (requests < 2) {
        res.writeHead(429, { "content-type": "text/plain" });
        res.end("slow down");
        return;
      }
      sendTile(res);
    });

    const client = new FullDiskTileHttpClient(server.template, fastRetries);
    await client.fetchTile(TS, TILE);

    expect(requests).toBe(2);

    await server.close();
  });

  it("waits for the Retry-After delay of a 503", async () => {
    let requests = 0;
    const server = await startServer((_req, res) => {
      requests += 1;
      if (requests < 2) {
        res.writeHead(503, { "content-type": "text/plain", "retry-after": "0" });
        res.end("maintenance");
        return;
      }
      sendTile(res);
    });

    const client = new FullDiskTileHttpClient(server.template, { minDelayMs: 50, maxDelayMs: 100 });
    await client.fetchTile(TS, TILE);

    expect(requests).toBe(2);
    expect(loggedEvents(warnSpy)).toEqual([
      expect.objectContaining({ event: "acquire.tile_retry", status: 503, delayMs: 0 })
    ]);

    await server.close();
  });

  it("does not retry other 4xx responses", async () => {
    let requests = 0;
    const server = await startServer((_req, res) => {
      requests += 1;
      res.writeHead(404, { "content-type": "text/plain" });
      res.end("no such tile");
    });

    const client = new FullDiskTileHttpClient(server.template, fastRetries);
    const fetching = client.fetchTile(TS, TILE);

    await expect(fetching).rejects.toBeInstanceOf(TileRequestError);
    await expect(fetching).rejects.toMatchObject({ message: "Tile request failed: 404", status: 404, retryable: false });
    expect(requests).toBe(1);
    expect(loggedEvents(warnSpy)).toEqual([
      {
        event: "acquire.tile_give_up",
        timestamp: TS,
        z: 4,
        x: 3,
        y: 7,
        status: 404,
        reason: "Tile request failed: 404",
        attempt: 1,
        maxAttempts: 3
      }
    ]);

    await server.close();
  });

  it("treats a truncated body as a retryable failure", async () => {
    let requests = 0;
    const server = await startServer((_req, res) => {
      requests += 1;
      sendTile(res, png(100));
    });

    const client = new FullDiskTileHttpClient(server.template, fastRetries);

    await expect(client.fetchTile(TS, TILE)).rejects.toThrow("Tile response too small: 100 bytes");
    expect(requests).toBe(3);

    await server.close();
  });

  it("treats a non-image body as a retryable failure", async () => {
    let requests = 0;
    const server = await startServer((_req, res) => {
      requests += 1;
      if (requests < 2) {
        sendTile(res, png(), "text/html; charset=utf-8");
        return;
      }
      sendTile(res);
    });

    const client = new FullDiskTileHttpClient(server.template, fastRetries);
    await client.fetchTile(TS, TILE);

    expect(requests).toBe(2);
    expect(loggedEvents(warnSpy)[0]).toMatchObject({ reason: "Tile response is not an image: text/html; charset=utf-8" });

    await server.close();
  });

  it("retries timed out requests and eventually succeeds", async () => {
    let requests = 0;
    const server = await startServer((_req, res) => {
      requests += 1;
      if (requests === 1) {
        setTimeout(() => sendTile(res), 300);
        return;
      }
      sendTile(res);
    });

    const client = new FullDiskTileHttpClient(server.template, { ...fastRetries, timeoutMs: 50 });
    await client.fetchTile(TS, TILE);

    expect(requests).toBe(2);
    expect(loggedEvents(warnSpy)[0]).toMatchObject({
      event: "acquire.tile_retry",
      reason: "Tile request timeout after 50ms"
    });

    await server.close();
  });

  it("stops without retrying when the caller aborts", async () => {
    let requests = 0;
    const server = await startServer((_req, res) => {
      requests += 1;
      setTimeout(() => sendTile(res), 300);
    });

    const client = new FullDiskTileHttpClient(server.template, fastRetries);
    const controller = new AbortController();
    const fetching = client.fetchTile(TS, TILE, controller.signal);
    setTimeout(() => controller.abort(), 20);

    const error: unknown = await fetching.then(
      () => undefined,
      (err: unknown) => err
    );
    expect(error).toBeDefined();
    expect(error).not.toBeInstanceOf(TileRequestError);
    expect(requests).toBe(1);
    expect(loggedEvents(warnSpy).map((e) => e.event)).toEqual(["acquire.tile_give_up"]);

    await new Promise((r) => setTimeout(r, 300));
    await server.close();
  });
});
