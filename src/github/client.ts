import { Octokit } from "@octokit/rest";
import { throttling } from "@octokit/plugin-throttling";
import { createLogger } from "../logger.js";

const log = createLogger("github");

const ThrottledOctokit: typeof Octokit = Octokit.plugin(throttling) as never;

export type GitHubClient = InstanceType<typeof Octokit>;

/** Anonymous clients work too, with a much lower rate limit. */
export function createGitHubClient(token: string | undefined): GitHubClient {
  if (token) {
    log.info("Using GitHub token for authentication");
  } else {
    log.warn("No GITHUB_TOKEN set, using anonymous access");
  }

  return new ThrottledOctokit({
    auth: token,
    throttle: {
      onRateLimit: (retryAfter, options, _octokit, retryCount) => {
        log.warn(
          {
            method: options.method,
            url: options.url,
            retryAfter,
            retryCount,
          },
          "GitHub rate limit hit",
        );
        if (retryCount < 1) {
          log.info({ retryAfter }, "Retrying after rate limit");
          return true;
        }
        return false;
      },
      onSecondaryRateLimit: (retryAfter, options) => {
        log.warn(
          { method: options.method, url: options.url, retryAfter },
          "GitHub secondary rate limit hit",
        );
        return false;
      },
    },
  });
}
