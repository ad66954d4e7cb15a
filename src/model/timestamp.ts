import dayjs from "dayjs";
import utc from "dayjs/plugin/utc";
import { InvalidUsageError } from "../errors/invalid-usage.error";
import type { DateType } from "../types";

dayjs.extend(utc);

/**
 * Seconds between 1601-01-01 and the unix epoch.
 */
const WINDOWS_EPOCH_OFFSET = 11644473600n;

/**
 * 100-nanosecond intervals per second.
 */
const WINDOWS_TICKS_PER_SECOND = 10000000n;

/**
 * Largest windows integer, used by the server for "never".
 */
const WINDOWS_INT_MAX = "9223372036854775807";

/**
 * Integers that instruct the server to reset a windows timestamp.
 */
export const RESET_INTEGERS = [0, -1];

export function isResetInteger(value: unknown): value is number {
  return typeof value === "number" && RESET_INTEGERS.includes(value);
}

const FORMATS: Record<Exclude<DateType, "windows-int">, string> = {
  ldap: "YYYYMMDDHHmmss[Z]",
  windows: "YYYYMMDDHHmmss[.0Z]",
};

/**
 * Convert a date into the given directory timestamp representation.
 *
 * @example
 * ```typescript
 * const date = new Date(Date.UTC(2024, 0, 31, 9, 30, 0));
 *
 * fromDateTime("ldap", date); // 20240131093000Z
 * fromDateTime("windows", date); // 20240131093000.0Z
 * fromDateTime("windows-int", date); // 133511670000000000
 * ```
 */
export function fromDateTime(type: DateType, date: Date): string {
  if (type === "windows-int") {
    const seconds = BigInt(dayjs.utc(date).unix());

    return ((seconds + WINDOWS_EPOCH_OFFSET) * WINDOWS_TICKS_PER_SECOND).toString();
  }

  return dayjs.utc(date).format(FORMATS[type]);
}

/**
 * Parse a directory timestamp, `null` for unset or "never" values.
 */
export function toDateTime(type: DateType, value: string): Date | null {
  if (type === "windows-int") {
    if (!/^-?\d+$/.test(value)) {
      throw new InvalidUsageError(`Invalid windows integer timestamp [${value}].`);
    }

    if (value === "0" || value.startsWith("-") || value === WINDOWS_INT_MAX) {
      return null;
    }

    const seconds = BigInt(value) / WINDOWS_TICKS_PER_SECOND - WINDOWS_EPOCH_OFFSET;

    return new Date(Number(seconds) * 1000);
  }

  const match = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})/.exec(value);

  if (!match) {
    throw new InvalidUsageError(`Invalid ${type} timestamp [${value}].`);
  }

  const [, year, month, day, hour, minute, second] = match.map(Number);

  return new Date(Date.UTC(year, month - 1, day, hour, minute, second));
}
