import YAML from "yaml";
import { z } from "zod";
import type { TemplateInfo } from "../snapshot/schema.js";

const copierAnswersSchema = z.object({
  _commit: z.string().min(1).optional(),
  _src_path: z.string().optional(),
});

export interface CopierInfo {
  commit: string;
  srcPath: string | null;
}

export function parseCopierAnswers(content: string): CopierInfo | null {
  let data: unknown;
  try {
    // failsafe keeps every scalar a string, so hex commits stay intact
    data = YAML.parse(content, { schema: "failsafe" });
  } catch {
    return null;
  }

  const result = copierAnswersSchema.safeParse(data);
  if (!result.success || !result.data._commit) return null;

  return {
    commit: result.data._commit,
    srcPath: result.data._src_path ?? null,
  };
}

/**
 * Position of the copier commit in the template history (newest first).
 * The commit may be abbreviated. Null when it is not in the history.
 */
export function commitsBehind(
  copierCommit: string,
  templateCommits: string[],
): number | null {
  const index = templateCommits.findIndex((sha) => sha.startsWith(copierCommit));
  return index === -1 ? null : index;
}

export function describeTemplate(
  templateRepo: string,
  templateCommits: string[],
): TemplateInfo | null {
  const latest = templateCommits[0];
  if (latest === undefined) return null;
  return {
    repo_url: `https://github.com/${templateRepo}`,
    latest_commit: latest.slice(0, 7),
    total_commits: templateCommits.length,
  };
}
