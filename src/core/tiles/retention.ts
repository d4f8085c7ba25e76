import { timestampToDate, type Timestamp } from "../time/timestamp";

const HOUR_MS = 60 * 60_000;

export const utcOffsetRange = { min: -12, max: 14 } as const;

/** True when `timestamp` is exactly 12:00:00 local time at UTC+`utcOffsetHours`. */
export const isLocalNoon = (timestamp: Timestamp, utcOffsetHours: number): boolean => {
  const local = new Date(timestampToDate(timestamp).getTime() + utcOffsetHours * HOUR_MS);
  return local.getUTCHours() === 12 && local.getUTCMinutes() === 0 && local.getUTCSeconds() === 0;
};
