/**
 * Backup time-window filters
 */

import { ValidationError } from "../errors.js";
import type { FilterExpression, SearchDirection } from "../types.js";

export const TIMESTAMP_FIELD = "start_timestamp";

export type SortAndFilter = {
  sort: string;
  filter: FilterExpression;
};

const DAY_MS = 24 * 60 * 60 * 1000;

function formatUtc(date: Date): string {
  return `${date.toISOString().slice(0, 19)}Z`;
}

function daysAgo(days: number, now: Date): Date {
  const day = new Date(now.getTime() - days * DAY_MS);
  if (Number.isNaN(day.getTime())) {
    throw new ValidationError(`Day offset ${days} is out of the supported date range`);
  }
  return day;
}

/** 00:00:00 UTC, `days` days before `now` */
export function startOfDayAgo(days: number, now: Date): string {
  const day = daysAgo(days, now);
  day.setUTCHours(0, 0, 0, 0);
  return formatUtc(day);
}

/** 23:59:59 UTC, `days` days before `now` */
export function endOfDayAgo(days: number, now: Date): string {
  const day = daysAgo(days, now);
  day.setUTCHours(23, 59, 59, 0);
  return formatUtc(day);
}

function assertOffset(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${name} must be a non-negative integer, got ${String(value)}`, name);
  }
}

/**
 * Sort key and timestamp filter for a search window.
 *
 * "after" bounds both ends and sorts ascending. "before" has no lower bound
 * and sorts newest first. Any other direction applies no time constraint.
 */
export function getSortAndTimestampFilter(
  direction: SearchDirection | string | undefined,
  startDayOffset: number,
  endDayOffset: number,
  now: Date = new Date(),
): SortAndFilter {
  assertOffset("startSearchDayOffset", startDayOffset);
  assertOffset("endSearchDayOffset", endDayOffset);

  const start = startOfDayAgo(startDayOffset, now);
  const end = endOfDayAgo(endDayOffset, now);

  if (direction === "after") {
    return { sort: TIMESTAMP_FIELD, filter: { [TIMESTAMP_FIELD]: { $gt: start, $lte: end } } };
  }
  if (direction === "before") {
    return { sort: `-${TIMESTAMP_FIELD}`, filter: { [TIMESTAMP_FIELD]: { $lte: end } } };
  }
  return { sort: TIMESTAMP_FIELD, filter: {} };
}
