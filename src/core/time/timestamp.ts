/**
 * A publication slot of the imagery source, as the 14-digit UTC string the
 * source uses in its tile URLs (`YYYYMMDDHHMMSS`). Lexicographic order is
 * chronological order.
 */
export type Timestamp = string;

const TIMESTAMP_PATTERN = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})$/;

export class InvalidTimestampError extends Error {
  constructor(value: string) {
    super(`Invalid timestamp "${value}": expected YYYYMMDDHHMMSS (UTC)`);
    this.name = "InvalidTimestampError";
  }
}

export const timestampFromDate = (date: Date): Timestamp =>
  date.toISOString().replace(/\D/g, "").slice(0, 14);

const toUtcMillis = (value: string): number | undefined => {
  const match = TIMESTAMP_PATTERN.exec(value);
  if (!match) return undefined;
  const [, year, month, day, hour, minute, second] = match.map(Number);
  return Date.UTC(year, month - 1, day, hour, minute, second);
};

export const isTimestamp = (value: unknown): value is Timestamp => {
  if (typeof value !== "string") return false;
  const millis = toUtcMillis(value);
  // Date.UTC rolls 20260231 over into March; the round trip catches it.
  return millis !== undefined && timestampFromDate(new Date(millis)) === value;
};

export const parseTimestamp = (value: string): Timestamp => {
  const normalized = value.trim();
  if (!isTimestamp(normalized)) {
    throw new InvalidTimestampError(value);
  }
  return normalized;
};

export const timestampToDate = (timestamp: Timestamp): Date => {
  const millis = toUtcMillis(timestamp);
  if (millis === undefined) {
    throw new InvalidTimestampError(timestamp);
  }
  return new Date(millis);
};

export const compareTimestamps = (a: Timestamp, b: Timestamp): number => (a < b ? -1 : a > b ? 1 : 0);
