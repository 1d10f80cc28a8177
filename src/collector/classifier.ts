import type { HealthStatus, Release, WorkflowRun } from "../snapshot/schema.js";

export const STALENESS_THRESHOLD_DAYS = 45;

const DAY_MS = 1000 * 60 * 60 * 24;

/** Whole days elapsed between `date` and `now`, floored. Null for unparseable dates. */
export function daysSince(date: string, now: Date): number | null {
  const time = new Date(date).getTime();
  if (Number.isNaN(time)) return null;
  return Math.floor((now.getTime() - time) / DAY_MS);
}

/**
 * A successful latest run is required for anything but `failed`. With one,
 * the release age decides: up to and including `thresholdDays` whole days is
 * `healthy`, anything older is `stale`.
 */
export function classifyStatus(
  workflowRun: WorkflowRun | null | undefined,
  release: Release | null | undefined,
  now: Date,
  thresholdDays: number = STALENESS_THRESHOLD_DAYS,
): HealthStatus {
  if (!workflowRun || workflowRun.conclusion !== "success") {
    return "failed";
  }

  if (!release) {
    return "failed";
  }

  const ageDays = daysSince(release.date, now);
  if (ageDays === null) {
    return "failed";
  }

  return ageDays <= thresholdDays ? "healthy" : "stale";
}
