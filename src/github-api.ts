export const GITHUB_ACCEPT_HEADER = "application/vnd.github+json";
export const GITHUB_API_VERSION = "2022-11-28";
export const PACKAGE_VERSION = "0.1.0";
export const GITHUB_USER_AGENT = `pr-review-comments/${PACKAGE_VERSION}`;

export type RestReviewCommentRecord = {
  id?: number | null;
  user?: { login?: string | null } | null;
  path?: string | null;
  line?: number | null;
  body?: string | null;
  diff_hunk?: string | null;
};

export type ReviewThreadCommentGraphQL = {
  id?: string | null;
  author?: { login?: string | null } | null;
  body?: string | null;
  path?: string | null;
  line?: number | null;
  diffHunk?: string | null;
};

export type CommentConnectionGraphQL = {
  nodes?: ReviewThreadCommentGraphQL[] | null;
  pageInfo?: { hasNextPage?: boolean | null; endCursor?: string | null } | null;
};

export type ReviewThreadGraphQL = {
  id?: string | null;
  isResolved?: boolean | null;
  isOutdated?: boolean | null;
  resolvedBy?: { login?: string | null } | null;
  comments?: CommentConnectionGraphQL | null;
};

export type GraphQLErrorInfo = { type: string | null; message: string };

export type ReviewThreadsPage =
  | { kind: "errors"; errors: GraphQLErrorInfo[] }
  | { kind: "missing_pull_request" }
  | { kind: "threads"; threads: ReviewThreadGraphQL[]; hasNextPage: boolean; endCursor: string | null };

export type ThreadCommentsPage =
  | { kind: "errors"; errors: GraphQLErrorInfo[] }
  | { kind: "missing_thread" }
  | { kind: "comments"; nodes: ReviewThreadCommentGraphQL[]; hasNextPage: boolean; endCursor: string | null };

const COMMENT_FIELDS = `pageInfo {
            hasNextPage
            endCursor
          }
          nodes {
            id
            author { login }
            body
            path
            line
            diffHunk
          }`;

export const REVIEW_THREADS_QUERY = `query($owner: String!, $repo: String!, $number: Int!, $first: Int!, $after: String) {
  repository(owner: $owner, name: $repo) {
    pullRequest(number: $number) {
      reviewThreads(first: $first, after: $after) {
        pageInfo {
          hasNextPage
          endCursor
        }
        nodes {
          id
          isResolved
          isOutdated
          resolvedBy { login }
          comments(first: 100) {
          ${COMMENT_FIELDS}
          }
        }
      }
    }
  }
}`;

// Follow-up pages for threads holding more than 100 comments.
export const THREAD_COMMENTS_QUERY = `query($id: ID!, $first: Int!, $after: String) {
  node(id: $id) {
    ... on PullRequestReviewThread {
      comments(first: $first, after: $after) {
          ${COMMENT_FIELDS}
      }
    }
  }
}`;

export const THREAD_COMMENTS_PAGE_SIZE = 100;

/** Returns null unless the body is an array of objects. */
export function parseRestCommentsPage(body: unknown): RestReviewCommentRecord[] | null {
  if (!Array.isArray(body)) return null;
  const records: RestReviewCommentRecord[] = [];
  for (const item of body) {
    if (!isObject(item)) return null;
    const user = isObject(item.user) ? { login: stringOrNull(item.user.login) } : null;
    records.push({
      id: numberOrNull(item.id),
      user,
      path: stringOrNull(item.path),
      line: numberOrNull(item.line),
      body: stringOrNull(item.body),
      diff_hunk: stringOrNull(item.diff_hunk),
    });
  }
  return records;
}

export function parseReviewThreadsPage(body: unknown): ReviewThreadsPage {
  const errors = graphqlErrors(body);
  if (errors) return { kind: "errors", errors };
  const data = isObject(body) && isObject(body.data) ? body.data : null;
  const repository = data && isObject(data.repository) ? data.repository : null;
  const pullRequest = repository && isObject(repository.pullRequest) ? repository.pullRequest : null;
  if (!pullRequest) return { kind: "missing_pull_request" };

  const connection = isObject(pullRequest.reviewThreads) ? pullRequest.reviewThreads : null;
  const nodes = connection && Array.isArray(connection.nodes) ? connection.nodes : [];
  const pageInfo = readPageInfo(connection);
  return { kind: "threads", threads: nodes.filter(isObject).map(toThread), ...pageInfo };
}

export function parseThreadCommentsPage(body: unknown): ThreadCommentsPage {
  const errors = graphqlErrors(body);
  if (errors) return { kind: "errors", errors };
  const data = isObject(body) && isObject(body.data) ? body.data : null;
  const node = data && isObject(data.node) ? data.node : null;
  if (!node || !isObject(node.comments)) return { kind: "missing_thread" };
  return { kind: "comments", nodes: toComments(node.comments), ...readPageInfo(node.comments) };
}

/**
 * GraphQL errors carried in the body, or null when there are none. A body
 * that is not a JSON object is reported as an error too.
 */
export function graphqlErrors(body: unknown): GraphQLErrorInfo[] | null {
  if (!isObject(body)) return [{ type: null, message: "GraphQL response was not a JSON object" }];
  if (!Array.isArray(body.errors) || body.errors.length === 0) return null;
  return body.errors.map((error) =>
    isObject(error)
      ? {
          type: stringOrNull(error.type),
          message: typeof error.message === "string" ? error.message : JSON.stringify(error),
        }
      : { type: null, message: JSON.stringify(error) }
  );
}

function readPageInfo(connection: Record<string, unknown> | null): { hasNextPage: boolean; endCursor: string | null } {
  const pageInfo = connection && isObject(connection.pageInfo) ? connection.pageInfo : null;
  return {
    hasNextPage: pageInfo?.hasNextPage === true,
    endCursor: pageInfo ? stringOrNull(pageInfo.endCursor) : null,
  };
}

function toThread(node: Record<string, unknown>): ReviewThreadGraphQL {
  const connection = isObject(node.comments) ? node.comments : null;
  return {
    id: stringOrNull(node.id),
    isResolved: node.isResolved === true,
    isOutdated: node.isOutdated === true,
    resolvedBy: isObject(node.resolvedBy) ? { login: stringOrNull(node.resolvedBy.login) } : null,
    comments: {
      nodes: connection ? toComments(connection) : [],
      pageInfo: readPageInfo(connection),
    },
  };
}

function toComments(connection: Record<string, unknown>): ReviewThreadCommentGraphQL[] {
  const nodes = Array.isArray(connection.nodes) ? connection.nodes : [];
  return nodes.filter(isObject).map((comment) => ({
    id: stringOrNull(comment.id),
    author: isObject(comment.author) ? { login: stringOrNull(comment.author.login) } : null,
    body: stringOrNull(comment.body),
    path: stringOrNull(comment.path),
    line: numberOrNull(comment.line),
    diffHunk: stringOrNull(comment.diffHunk),
  }));
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringOrNull(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function numberOrNull(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

export function reviewCommentsPath(owner: string, repo: string, pullNumber: number): string {
  return `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/pulls/${pullNumber}/comments`;
}

type EndpointEnv = Record<string, string | undefined>;

/**
 * REST base URL for a host. An explicit override always wins; `GITHUB_API_URL`
 * only applies when it points at the same host, so a github.com value set by
 * CI does not leak into requests for an enterprise host.
 */
export function apiBaseForHost(host: string, override?: string, env: EndpointEnv = process.env): string {
  if (override) return trimTrailingSlash(override);
  const fromEnv = env.GITHUB_API_URL;
  if (fromEnv && hostsMatch(host, hostOf(fromEnv))) {
    return trimTrailingSlash(fromEnv);
  }
  if (host.toLowerCase() === "github.com") return "https://api.github.com";
  return `https://${host}/api/v3`;
}

export function graphqlUrlForHost(
  host: string,
  overrides: { apiUrl?: string; graphqlUrl?: string } = {},
  env: EndpointEnv = process.env
): string {
  if (overrides.graphqlUrl) return trimTrailingSlash(overrides.graphqlUrl);
  const fromEnv = env.GITHUB_GRAPHQL_URL;
  if (fromEnv && hostsMatch(host, hostOf(fromEnv))) {
    return trimTrailingSlash(fromEnv);
  }
  const envApi = env.GITHUB_API_URL;
  const restBase = overrides.apiUrl ?? (envApi && hostsMatch(host, hostOf(envApi)) ? envApi : undefined);
  if (restBase) {
    const base = trimTrailingSlash(restBase);
    if (base.endsWith("/api/v3")) return `${base.slice(0, -"/api/v3".length)}/api/graphql`;
    return `${base}/graphql`;
  }
  if (host.toLowerCase() === "github.com") return "https://api.github.com/graphql";
  return `https://${host}/api/graphql`;
}

function hostsMatch(target: string, candidate: string): boolean {
  const targetLower = target.toLowerCase();
  const candidateLower = candidate.toLowerCase();
  if (!candidateLower) return false;
  if (targetLower === "github.com") {
    return candidateLower === "api.github.com" || candidateLower === "github.com";
  }
  return candidateLower === targetLower;
}

function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch (_error) {
    return "";
  }
}

function trimTrailingSlash(value: string): string {
  return value.replace(/\/+$/, "");
}
