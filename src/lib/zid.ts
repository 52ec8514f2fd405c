/**
 * Zid allocation.
 *
 * Zids are run-relative: the first file of every run gets the epoch and each
 * following file one minute more. All arithmetic is on UTC fields so the
 * result does not depend on the local time zone.
 */

import type { Zid } from "./models.js";

/** 1980-01-01 00:00:00 */
export const EPOCH = new Date(Date.UTC(1980, 0, 1, 0, 0, 0));

const MINUTE_MS = 60 * 1000;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Render a date as `YYYYMMDDHHMMSS`.
 */
export function formatZid(date: Date): Zid {
  return (
    pad(date.getUTCFullYear(), 4) +
    pad(date.getUTCMonth() + 1) +
    pad(date.getUTCDate()) +
    pad(date.getUTCHours()) +
    pad(date.getUTCMinutes()) +
    pad(date.getUTCSeconds())
  );
}

export function nextZidDate(date: Date): Date {
  return new Date(date.getTime() + MINUTE_MS);
}
