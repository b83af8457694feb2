import dayjs from "dayjs";
import utc from "dayjs/plugin/utc";
// active plugin dayjs
dayjs.extend(utc);

/** `YYYYMMDD` in UTC, used in subscription request ids. */
export function toCompactUtcDate(date: Date): string {
  return dayjs.utc(date).format("YYYYMMDD");
}

/** `YYYYMMDDTHHmmssZ` in UTC, used in backup file names. */
export function toCompactUtcStamp(date: Date): string {
  return dayjs.utc(date).format("YYYYMMDD[T]HHmmss[Z]");
}
