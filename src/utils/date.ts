import { toJalaali } from "jalaali-js";

/** Iran Standard Time, UTC+3:30 (no DST since 2022) */
const TEHRAN_OFFSET_MS = 3.5 * 60 * 60 * 1000;

/**
 * Shift a UTC instant to Tehran wall-clock time. Read the result with the
 * getUTC* accessors only.
 */
function toTehranWallClock(date: Date): Date {
  return new Date(date.getTime() + TEHRAN_OFFSET_MS);
}

/**
 * Solar Hijri (Jalali) calendar date of an instant, as seen in Tehran.
 * Format: YYYY/MM/DD, e.g. 1403/01/01
 */
export function toSolarDate(date: Date): string {
  const tehran = toTehranWallClock(date);
  const { jy, jm, jd } = toJalaali(
    tehran.getUTCFullYear(),
    tehran.getUTCMonth() + 1,
    tehran.getUTCDate()
  );
  return `${jy}/${String(jm).padStart(2, "0")}/${String(jd).padStart(2, "0")}`;
}
