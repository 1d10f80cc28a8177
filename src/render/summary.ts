import type { HealthStatus, Ingest } from "../snapshot/schema.js";

export type StatusCounts = Record<HealthStatus, number> & { total: number };

export const STATUS_RANK: Record<HealthStatus, number> = {
  failed: 0,
  stale: 1,
  healthy: 2,
};

export function summarize(ingests: readonly Pick<Ingest, "status">[]): StatusCounts {
  const counts: StatusCounts = { healthy: 0, stale: 0, failed: 0, total: 0 };
  for (const ingest of ingests) {
    counts[ingest.status]++;
    counts.total++;
  }
  return counts;
}

/** Failed first, then stale, then healthy; by name within a status. Does not mutate. */
export function sortIngests<T extends Pick<Ingest, "status" | "name">>(
  ingests: readonly T[],
): T[] {
  return [...ingests].sort((a, b) => {
    const byStatus = STATUS_RANK[a.status] - STATUS_RANK[b.status];
    if (byStatus !== 0) return byStatus;
    return a.name.localeCompare(b.name);
  });
}
