import type { Timestamp } from "../core/time/timestamp";

export interface ArtifactPublisher {
  publish(timestamp: Timestamp, artifactPath: string): Promise<void>;
}
