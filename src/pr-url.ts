import type { PullRequestTarget } from "./types.js";

const PR_URL_PATTERN = /^https:\/\/([^/]+)\/([^/]+)\/([^/]+)\/pull\/(\d+)(?:[/?#].*)?$/;

/**
 * Parses `https://{host}/{owner}/{repo}/pull/{number}`. Trailing path
 * segments, query strings and fragments (`/files`, `?diff=split`, `#r123`)
 * are accepted and ignored.
 */
export function parsePullRequestUrl(url: string): PullRequestTarget {
  const match = url.trim().match(PR_URL_PATTERN);
  if (!match) {
    throw new Error(`Invalid PR URL format: ${url}. Expected https://{host}/owner/repo/pull/123`);
  }
  const [, host, owner, repo, number] = match;
  return { host: host.toLowerCase(), owner, repo, pullNumber: Number.parseInt(number, 10) };
}
