import { ConfigurationError } from "../errors";
import { timestampFromDate, timestampToDate, type Timestamp } from "./timestamp";

export type Cadence = {
  /** Interval between publications, aligned to the UTC epoch. */
  cadenceMs: number;
  /** How long after a slot the source is assumed to have published it. */
  publicationDelayMs: number;
};

type Instant = Date | Timestamp;

const toMillis = (value: Instant): number =>
  typeof value === "string" ? timestampToDate(value).getTime() : value.getTime();

/**
 * Maps wall-clock instants onto the source's publication cadence.
 * Pure: no clock access, no I/O.
 */
export class TimestampResolver {
  constructor(private readonly cadence: Cadence) {
    if (!Number.isInteger(cadence.cadenceMs) || cadence.cadenceMs <= 0) {
      throw new ConfigurationError(`cadenceMs must be a positive integer. Received: ${cadence.cadenceMs}`);
    }
    if (!Number.isInteger(cadence.publicationDelayMs) || cadence.publicationDelayMs < 0) {
      throw new ConfigurationError(
        `publicationDelayMs must be a non-negative integer. Received: ${cadence.publicationDelayMs}`
      );
    }
  }

  latestExpected(now: Date): Timestamp {
    const available = now.getTime() - this.cadence.publicationDelayMs;
    return timestampFromDate(new Date(this.alignDown(available)));
  }

  /** Every cadence-aligned timestamp in `[from, to]`, ascending. */
  expectedTimestamps(from: Instant, to: Instant): Timestamp[] {
    const end = toMillis(to);
    const timestamps: Timestamp[] = [];
    for (let slot = this.alignUp(toMillis(from)); slot <= end; slot += this.cadence.cadenceMs) {
      timestamps.push(timestampFromDate(new Date(slot)));
    }
    return timestamps;
  }

  shift(timestamp: Timestamp, intervals: number): Timestamp {
    return timestampFromDate(new Date(toMillis(timestamp) + intervals * this.cadence.cadenceMs));
  }

  private alignDown(millis: number): number {
    return Math.floor(millis / this.cadence.cadenceMs) * this.cadence.cadenceMs;
  }

  private alignUp(millis: number): number {
    return Math.ceil(millis / this.cadence.cadenceMs) * this.cadence.cadenceMs;
  }
}
