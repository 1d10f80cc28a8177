export type FetchOperation =
  | "release"
  | "workflow-run"
  | "file-content"
  | "commits";

/** Listing the candidate repositories failed. Fatal to a collection run. */
export class DiscoveryError extends Error {
  constructor(
    public readonly query: string,
    options?: { cause?: unknown },
  ) {
    super(`Repository discovery failed for query "${query}"`, options);
    this.name = "DiscoveryError";
  }
}

/** A per-repository lookup failed. The collector records the field as absent. */
export class FetchError extends Error {
  constructor(
    public readonly repo: string,
    public readonly operation: FetchOperation,
    options?: { cause?: unknown },
  ) {
    super(`Failed to fetch ${operation} for ${repo}`, options);
    this.name = "FetchError";
  }
}

/** The snapshot artifact could not be retrieved, parsed or validated. */
export class ArtifactLoadError extends Error {
  constructor(
    public readonly source: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Could not load snapshot from ${source}: ${reason}`, options);
    this.name = "ArtifactLoadError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
