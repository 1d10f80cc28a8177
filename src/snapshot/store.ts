import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { Logger } from "../logger.js";
import { ArtifactLoadError } from "../errors.js";
import { snapshotSchema, type Snapshot } from "./schema.js";

export function parseSnapshot(content: string, source: string): Snapshot {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new ArtifactLoadError(source, "invalid JSON", { cause: err });
  }

  const result = snapshotSchema.safeParse(parsed);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ArtifactLoadError(source, `schema mismatch (${detail})`, {
      cause: result.error,
    });
  }
  return result.data;
}

export function serializeSnapshot(snapshot: Snapshot): string {
  return `${JSON.stringify(snapshot, null, 2)}\n`;
}

/**
 * Replaces the snapshot artifact on disk. Writes go to a temp file that is
 * renamed over the target, so readers never see a partial document. Reading
 * goes through `createSnapshotLoader`.
 */
export class SnapshotStore {
  private filePath: string;
  private log: Logger;

  constructor(filePath: string, logger: Logger) {
    this.filePath = filePath;
    this.log = logger;
  }

  get path(): string {
    return this.filePath;
  }

  async save(snapshot: Snapshot): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await writeFile(tempPath, serializeSnapshot(snapshot), "utf-8");
      await rename(tempPath, this.filePath);
    } finally {
      await rm(tempPath, { force: true });
    }
    this.log.debug({ filePath: this.filePath }, "Snapshot saved atomically");
  }
}
