import type { RepositoryDataProvider, RepositoryRef } from "../../github/provider.js";
import { DiscoveryError, FetchError } from "../../errors.js";
import type { Release, WorkflowRun } from "../../snapshot/schema.js";

export interface RepoFixture {
  release?: Release | null;
  workflowRun?: WorkflowRun | null;
  files?: Record<string, string>;
  failing?: Array<"release" | "workflow-run" | "file-content">;
}

export interface InMemoryProviderOptions {
  org?: string;
  templateCommits?: Record<string, string[]>;
  failDiscovery?: boolean;
  failTemplate?: boolean;
}

/** Serves repositories from fixtures, in insertion order. */
export class InMemoryProvider implements RepositoryDataProvider {
  readonly calls: string[] = [];
  private readonly org: string;

  constructor(
    private readonly repos: Record<string, RepoFixture>,
    private readonly options: InMemoryProviderOptions = {},
  ) {
    this.org = options.org ?? "test-org";
  }

  private fixture(repo: RepositoryRef): RepoFixture {
    return this.repos[repo.name] ?? {};
  }

  async listRepositories(org: string, topic: string): Promise<RepositoryRef[]> {
    this.calls.push(`list:${org}:${topic}`);
    if (this.options.failDiscovery) {
      throw new DiscoveryError(`org:${org} topic:${topic}`, {
        cause: new Error("search unavailable"),
      });
    }
    return Object.keys(this.repos).map((name) => ({
      owner: this.org,
      name,
      fullName: `${this.org}/${name}`,
      url: `https://github.com/${this.org}/${name}`,
    }));
  }

  async getLatestRelease(repo: RepositoryRef): Promise<Release | null> {
    this.calls.push(`release:${repo.name}`);
    const fixture = this.fixture(repo);
    if (fixture.failing?.includes("release")) {
      throw new FetchError(repo.fullName, "release", { cause: new Error("timeout") });
    }
    return fixture.release ?? null;
  }

  async getLatestWorkflowRun(repo: RepositoryRef): Promise<WorkflowRun | null> {
    this.calls.push(`workflow:${repo.name}`);
    const fixture = this.fixture(repo);
    if (fixture.failing?.includes("workflow-run")) {
      throw new FetchError(repo.fullName, "workflow-run", { cause: new Error("timeout") });
    }
    return fixture.workflowRun ?? null;
  }

  async getFileContent(repo: RepositoryRef, path: string): Promise<string | null> {
    this.calls.push(`file:${repo.name}:${path}`);
    const fixture = this.fixture(repo);
    if (fixture.failing?.includes("file-content")) {
      throw new FetchError(repo.fullName, "file-content", { cause: new Error("timeout") });
    }
    return fixture.files?.[path] ?? null;
  }

  async listCommitShas(fullName: string): Promise<string[]> {
    this.calls.push(`commits:${fullName}`);
    if (this.options.failTemplate) {
      throw new FetchError(fullName, "commits", { cause: new Error("forbidden") });
    }
    return this.options.templateCommits?.[fullName] ?? [];
  }
}
