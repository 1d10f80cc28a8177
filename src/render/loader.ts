import { readFile } from "node:fs/promises";
import { ArtifactLoadError, errorMessage } from "../errors.js";
import type { Snapshot } from "../snapshot/schema.js";
import { parseSnapshot } from "../snapshot/store.js";

export type SnapshotLoader = () => Promise<Snapshot>;

export type FetchFn = (url: string) => Promise<Response>;

function isUrl(source: string): boolean {
  return /^https?:\/\//i.test(source);
}

async function readSource(source: string, fetchFn: FetchFn): Promise<string> {
  if (!isUrl(source)) {
    try {
      return await readFile(source, "utf-8");
    } catch (err) {
      throw new ArtifactLoadError(source, errorMessage(err), { cause: err });
    }
  }

  let response: Response;
  try {
    response = await fetchFn(source);
  } catch (err) {
    throw new ArtifactLoadError(source, errorMessage(err), { cause: err });
  }
  if (!response.ok) {
    throw new ArtifactLoadError(source, `HTTP error! status: ${response.status}`);
  }
  try {
    return await response.text();
  } catch (err) {
    throw new ArtifactLoadError(source, errorMessage(err), { cause: err });
  }
}

/** `http(s)://` sources are fetched, anything else is read from disk. */
export function createSnapshotLoader(
  source: string,
  fetchFn: FetchFn = (url) => fetch(url),
): SnapshotLoader {
  return async () => parseSnapshot(await readSource(source, fetchFn), source);
}
