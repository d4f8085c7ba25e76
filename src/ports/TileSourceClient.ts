import type { Timestamp } from "../core/time/timestamp";

export type TileCoordinate = {
  z: number;
  x: number;
  y: number;
};

export interface TileSourceClient {
  fetchTile(timestamp: Timestamp, tile: TileCoordinate, signal?: AbortSignal): Promise<Buffer>;
}
