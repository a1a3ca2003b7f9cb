import type { QueryWindow } from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;

const WINDOW_DAYS: Record<QueryWindow, number> = {
  today: 0,
  yesterday: 1,
  last_week: 7,
  last_month: 30,
  last_quarter: 90,
};

export const QUERY_WINDOWS: readonly QueryWindow[] = [
  "today",
  "yesterday",
  "last_week",
  "last_month",
  "last_quarter",
];

export const QUEUE_DEPTH_WINDOW_SECONDS = 60 * 60;

export function isQueryWindow(value: string): value is QueryWindow {
  return QUERY_WINDOWS.some((w) => w === value);
}

/** Lower bound (Unix seconds) of a window: UTC midnight today minus N days. */
export function windowStart(window: QueryWindow, now: Date = new Date()): number {
  const midnight = Math.floor(now.getTime() / DAY_MS) * DAY_MS;
  return Math.floor((midnight - WINDOW_DAYS[window] * DAY_MS) / 1000);
}

export function windowLabel(window: QueryWindow): string {
  return window
    .split("_")
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(" ");
}
