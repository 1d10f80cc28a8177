import type { GitHubClient } from "./client.js";
import type { RepositoryRef } from "./provider.js";
import { createLogger } from "../logger.js";

const log = createLogger("github:search");

const PER_PAGE = 100;
// GitHub search never returns more than this many results for one query.
const MAX_SEARCH_RESULTS = 1000;

type SearchItem = Awaited<
  ReturnType<GitHubClient["rest"]["search"]["repos"]>
>["data"]["items"][number];

export function buildSearchQuery(org: string, topic: string): string {
  return `org:${org} topic:${topic}`;
}

export class IncompleteSearchError extends Error {
  constructor(query: string, reason: string) {
    super(`GitHub search for "${query}" is incomplete: ${reason}`);
    this.name = "IncompleteSearchError";
  }
}

/**
 * Every repository in `org` tagged with `topic`, all pages read, deduplicated
 * by name and ordered by name. Throws rather than return a partial list.
 */
export async function searchRepositories(
  client: GitHubClient,
  org: string,
  topic: string,
): Promise<RepositoryRef[]> {
  const query = buildSearchQuery(org, topic);

  const items: SearchItem[] = [];
  let totalCount = 0;
  for (let page = 1; ; page++) {
    const { data } = await client.rest.search.repos({
      q: query,
      per_page: PER_PAGE,
      page,
    });

    if (data.incomplete_results) {
      log.warn({ query, page }, "GitHub search returned incomplete results");
      throw new IncompleteSearchError(query, `page ${page} timed out`);
    }

    totalCount = data.total_count;
    if (totalCount > MAX_SEARCH_RESULTS) {
      throw new IncompleteSearchError(
        query,
        `${totalCount} matches exceed the ${MAX_SEARCH_RESULTS} result limit`,
      );
    }

    items.push(...data.items);
    if (data.items.length < PER_PAGE || items.length >= totalCount) break;
  }

  if (items.length < totalCount) {
    throw new IncompleteSearchError(
      query,
      `received ${items.length} of ${totalCount} matches`,
    );
  }

  const byName = new Map<string, RepositoryRef>();
  for (const item of items) {
    byName.set(item.name, {
      owner: item.owner?.login ?? org,
      name: item.name,
      fullName: item.full_name,
      url: item.html_url,
    });
  }

  log.info(
    { query, totalCount, returnedCount: items.length, uniqueCount: byName.size },
    "GitHub search completed",
  );

  return [...byName.values()].sort(compareByName);
}

export function compareByName(a: { name: string }, b: { name: string }): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}
