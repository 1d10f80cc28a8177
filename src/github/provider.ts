import { Buffer } from "node:buffer";
import type { GitHubClient } from "./client.js";
import { buildSearchQuery, searchRepositories } from "./search.js";
import { DiscoveryError, FetchError } from "../errors.js";
import type { Release, WorkflowRun } from "../snapshot/schema.js";
import { createLogger } from "../logger.js";

const log = createLogger("github:provider");

export interface RepositoryRef {
  owner: string;
  name: string;
  fullName: string;
  url: string;
}

/**
 * Lookups the collector needs. `null` means the provider answered that there
 * is nothing to return; any other failure is thrown.
 */
export interface RepositoryDataProvider {
  listRepositories(org: string, topic: string): Promise<RepositoryRef[]>;
  getLatestRelease(repo: RepositoryRef): Promise<Release | null>;
  getLatestWorkflowRun(repo: RepositoryRef): Promise<WorkflowRun | null>;
  getFileContent(repo: RepositoryRef, path: string): Promise<string | null>;
  listCommitShas(fullName: string): Promise<string[]>;
}

export interface GitHubProviderOptions {
  /** Case-insensitive substring that marks the release workflow by name. */
  workflowPattern: string;
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && "status" in err && err.status === 404;
}

function splitFullName(fullName: string): { owner: string; repo: string } {
  const [owner = "", repo = ""] = fullName.split("/");
  return { owner, repo };
}

export function createGitHubProvider(
  client: GitHubClient,
  options: GitHubProviderOptions,
): RepositoryDataProvider {
  const pattern = options.workflowPattern.toLowerCase();

  async function latestCompletedRun(
    repo: RepositoryRef,
  ): Promise<WorkflowRun | null> {
    const { data: workflows } = await client.rest.actions.listRepoWorkflows({
      owner: repo.owner,
      repo: repo.name,
      per_page: 100,
    });

    const releaseWorkflow = workflows.workflows.find((w) =>
      w.name.toLowerCase().includes(pattern),
    );

    if (releaseWorkflow) {
      const { data } = await client.rest.actions.listWorkflowRuns({
        owner: repo.owner,
        repo: repo.name,
        workflow_id: releaseWorkflow.id,
        status: "completed",
        per_page: 1,
      });
      const run = data.workflow_runs[0];
      if (run) {
        return { url: run.html_url, conclusion: run.conclusion, date: run.created_at };
      }
      log.debug(
        { repo: repo.fullName, workflow: releaseWorkflow.name },
        "Release workflow has no completed runs, falling back to any workflow",
      );
    }

    const { data } = await client.rest.actions.listWorkflowRunsForRepo({
      owner: repo.owner,
      repo: repo.name,
      status: "completed",
      per_page: 1,
    });
    const run = data.workflow_runs[0];
    if (!run) return null;
    return { url: run.html_url, conclusion: run.conclusion, date: run.created_at };
  }

  return {
    async listRepositories(org, topic) {
      try {
        return await searchRepositories(client, org, topic);
      } catch (err) {
        throw new DiscoveryError(buildSearchQuery(org, topic), { cause: err });
      }
    },

    async getLatestRelease(repo) {
      try {
        const { data } = await client.rest.repos.getLatestRelease({
          owner: repo.owner,
          repo: repo.name,
        });
        return {
          tag: data.tag_name,
          url: data.html_url,
          date: data.published_at ?? data.created_at,
        };
      } catch (err) {
        if (isNotFound(err)) return null;
        throw new FetchError(repo.fullName, "release", { cause: err });
      }
    },

    async getLatestWorkflowRun(repo) {
      try {
        return await latestCompletedRun(repo);
      } catch (err) {
        if (isNotFound(err)) return null;
        throw new FetchError(repo.fullName, "workflow-run", { cause: err });
      }
    },

    async getFileContent(repo, path) {
      try {
        const { data } = await client.rest.repos.getContent({
          owner: repo.owner,
          repo: repo.name,
          path,
        });
        if (Array.isArray(data) || !("content" in data) || typeof data.content !== "string") {
          return null;
        }
        return Buffer.from(data.content, "base64").toString("utf-8");
      } catch (err) {
        if (isNotFound(err)) return null;
        throw new FetchError(repo.fullName, "file-content", { cause: err });
      }
    },

    async listCommitShas(fullName) {
      const { owner, repo } = splitFullName(fullName);
      try {
        const commits = await client.paginate(client.rest.repos.listCommits, {
          owner,
          repo,
          per_page: 100,
        });
        return commits.map((c) => c.sha);
      } catch (err) {
        throw new FetchError(fullName, "commits", { cause: err });
      }
    },
  };
}
