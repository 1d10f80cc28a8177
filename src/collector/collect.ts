import type { RepositoryDataProvider, RepositoryRef } from "../github/provider.js";
import { compareByName } from "../github/search.js";
import type { SnapshotStore } from "../snapshot/store.js";
import type { Ingest, Snapshot, TemplateStatus } from "../snapshot/schema.js";
import { summarize } from "../render/summary.js";
import { classifyStatus, STALENESS_THRESHOLD_DAYS } from "./classifier.js";
import { detectKozaVersion } from "./koza.js";
import { commitsBehind, describeTemplate, parseCopierAnswers } from "./template.js";
import { errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("collector");

export const PYPROJECT_PATH = "pyproject.toml";
export const COPIER_ANSWERS_PATH = ".copier-answers.yml";

export interface CollectOptions {
  org: string;
  topic: string;
  /** `owner/name` of the copier template, or null to skip template tracking. */
  templateRepo: string | null;
  thresholdDays?: number;
}

function valueOrNull<T>(
  result: PromiseSettledResult<T | null>,
  repo: RepositoryRef,
  field: string,
): T | null {
  if (result.status === "fulfilled") return result.value;
  log.warn(
    { repo: repo.fullName, field, err: errorMessage(result.reason) },
    "Fetch failed, recording as absent",
  );
  return null;
}

async function fetchTemplateCommits(
  provider: RepositoryDataProvider,
  templateRepo: string | null,
): Promise<string[]> {
  if (!templateRepo) return [];
  try {
    const commits = await provider.listCommitShas(templateRepo);
    log.info({ templateRepo, count: commits.length }, "Template history fetched");
    return commits;
  } catch (err) {
    log.warn({ templateRepo, err: errorMessage(err) }, "Template history unavailable");
    return [];
  }
}

async function collectIngest(
  provider: RepositoryDataProvider,
  repo: RepositoryRef,
  templateCommits: string[],
  thresholdDays: number,
  now: Date,
): Promise<Ingest> {
  const [release, workflowRun, pyproject, copierAnswers] = await Promise.allSettled([
    provider.getLatestRelease(repo),
    provider.getLatestWorkflowRun(repo),
    provider.getFileContent(repo, PYPROJECT_PATH),
    provider.getFileContent(repo, COPIER_ANSWERS_PATH),
  ]);

  const lastRelease = valueOrNull(release, repo, "last_release");
  const lastWorkflowRun = valueOrNull(workflowRun, repo, "last_workflow_run");
  const pyprojectContent = valueOrNull(pyproject, repo, "koza_version");
  const copierContent = valueOrNull(copierAnswers, repo, "template_status");

  let templateStatus: TemplateStatus | null = null;
  const copier = copierContent === null ? null : parseCopierAnswers(copierContent);
  if (copier && templateCommits.length > 0) {
    templateStatus = {
      commit: copier.commit,
      commits_behind: commitsBehind(copier.commit, templateCommits),
    };
  }

  const status = classifyStatus(lastWorkflowRun, lastRelease, now, thresholdDays);
  log.debug({ repo: repo.fullName, status }, "Repository classified");

  return {
    name: repo.name,
    repo_url: repo.url,
    status,
    last_release: lastRelease,
    last_workflow_run: lastWorkflowRun,
    koza_version: pyprojectContent === null ? null : detectKozaVersion(pyprojectContent),
    template_status: templateStatus,
  };
}

/**
 * Builds a fresh snapshot. Discovery failures propagate; per-repository
 * failures become absent fields on that repository's entry.
 */
export async function collect(
  provider: RepositoryDataProvider,
  options: CollectOptions,
  now: Date = new Date(),
): Promise<Snapshot> {
  const thresholdDays = options.thresholdDays ?? STALENESS_THRESHOLD_DAYS;

  log.info({ org: options.org, topic: options.topic }, "Discovering repositories");
  const repos = [...(await provider.listRepositories(options.org, options.topic))].sort(
    compareByName,
  );
  log.info({ count: repos.length }, "Repositories discovered");

  const templateCommits = await fetchTemplateCommits(provider, options.templateRepo);

  const ingests: Ingest[] = [];
  const seen = new Set<string>();
  for (const repo of repos) {
    if (seen.has(repo.name)) {
      log.warn({ repo: repo.fullName }, "Duplicate repository name, skipping");
      continue;
    }
    seen.add(repo.name);
    ingests.push(await collectIngest(provider, repo, templateCommits, thresholdDays, now));
  }

  return {
    last_updated: now.toISOString(),
    template: options.templateRepo
      ? describeTemplate(options.templateRepo, templateCommits)
      : null,
    ingests,
  };
}

export async function runCollection(
  provider: RepositoryDataProvider,
  store: SnapshotStore,
  options: CollectOptions,
  now: Date = new Date(),
): Promise<Snapshot> {
  const snapshot = await collect(provider, options, now);
  await store.save(snapshot);

  const counts = summarize(snapshot.ingests);
  log.info(
    {
      filePath: store.path,
      total: counts.total,
      healthy: counts.healthy,
      stale: counts.stale,
      failed: counts.failed,
    },
    "Snapshot written",
  );
  return snapshot;
}
