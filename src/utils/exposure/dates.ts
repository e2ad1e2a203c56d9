/**
 * Whole-day date helpers. All dates are epoch milliseconds in UTC.
 */

import { CONSTANTS } from "../../types";

/**
 * Truncate a timestamp to the start of its UTC day
 */
export function startOfUtcDay(timestamp: number): number {
  return Math.floor(timestamp / CONSTANTS.MS_PER_DAY) * CONSTANTS.MS_PER_DAY;
}

/**
 * Start of the UTC day that lies `days` days before the day of `timestamp`
 */
export function daysBefore(timestamp: number, days: number): number {
  return startOfUtcDay(timestamp) - days * CONSTANTS.MS_PER_DAY;
}

/**
 * Number of whole UTC days from `from` to `to` (negative if `to` is earlier)
 */
export function wholeDaysBetween(from: number, to: number): number {
  return Math.round((startOfUtcDay(to) - startOfUtcDay(from)) / CONSTANTS.MS_PER_DAY);
}

/**
 * Format a timestamp as its UTC calendar day, e.g. "2020-06-15"
 */
export function isoDateString(timestamp: number): string {
  return new Date(timestamp).toISOString().substring(0, 10);
}

/** Largest timestamp a Date can hold */
export const MAX_DATE_MS = 8.64e15;

/**
 * Whether a timestamp is a non-negative time a Date can represent
 */
export function isRepresentableDate(timestamp: number): boolean {
  return Number.isFinite(timestamp) && timestamp >= 0 && timestamp <= MAX_DATE_MS;
}
