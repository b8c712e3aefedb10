import { createPolicySession, sendWithPolicy, type PolicySession } from "../fetch-policy.js";
import {
  parseReviewThreadsPage,
  parseThreadCommentsPage,
  REVIEW_THREADS_QUERY,
  THREAD_COMMENTS_PAGE_SIZE,
  THREAD_COMMENTS_QUERY,
} from "../github-api.js";
import type { GraphQLErrorInfo, ReviewThreadCommentGraphQL, ReviewThreadGraphQL } from "../github-api.js";
import type { Logger } from "../logger.js";
import { fromGraphqlComment } from "../normalize.js";
import type { Comment, RetrievalConfig, RetrievalFailure, RetrievalOutcome } from "../types.js";
import { resolveRuntime } from "./types.js";
import type { CommentWalker, WalkDependencies } from "./types.js";

/**
 * Walks review threads page by page, keeping thread order and, inside each
 * thread, comment order exactly as GitHub returns them.
 *
 * `limitReached` is the single stop flag for both loops: it is checked at the
 * head of the thread loop and of the comment loop, so once the ceiling is hit
 * no later thread is entered. Threads holding more than one page of comments
 * are paged through `node(id:)` before the walk moves to the next thread;
 * those requests do not count toward `maxPages`.
 */
export async function walkGraphql(config: RetrievalConfig, deps: WalkDependencies): Promise<RetrievalOutcome> {
  const { owner, repo, pullNumber } = config.target;
  const { logger } = deps;
  const session = createPolicySession(resolveRuntime(deps), config);
  const comments: Comment[] = [];
  let cursor: string | null = null;
  let pages = 0;

  logger.debug(`Fetching review comments for ${owner}/${repo}#${pullNumber} via GraphQL`);

  while (true) {
    const after = cursor;
    const result = await sendWithPolicy(session, (authScheme) => ({
      method: "POST",
      url: config.graphqlUrl,
      body: {
        query: REVIEW_THREADS_QUERY,
        variables: { owner, repo, number: pullNumber, first: config.perPage, after },
      },
      authScheme,
    }));
    if (result.kind === "failed") {
      return { status: "failed", failure: result.failure };
    }
    if (result.kind === "stopped") {
      return stoppedBySecondaryLimit(logger, comments);
    }

    const page = parseReviewThreadsPage(result.response.body);
    if (page.kind === "errors") {
      return { status: "failed", failure: graphqlFailure(page.errors) };
    }
    if (page.kind === "missing_pull_request") {
      return {
        status: "failed",
        failure: { kind: "not_found", message: `No pull request data returned for ${owner}/${repo}#${pullNumber}.` },
      };
    }
    pages += 1;

    const { threads } = page;
    let limitReached = false;
    let truncated = false;
    for (let t = 0; t < threads.length; t += 1) {
      if (limitReached) break;
      const thread = threads[t];
      let nodes = thread.comments?.nodes ?? [];
      let next = nextCommentsCursor(thread, thread.comments?.pageInfo);
      while (true) {
        for (let c = 0; c < nodes.length; c += 1) {
          if (limitReached) break;
          comments.push(fromGraphqlComment(thread, nodes[c]));
          if (comments.length >= config.maxComments) {
            limitReached = true;
            truncated =
              c < nodes.length - 1 || next !== null || threads.slice(t + 1).some(hasComments) || page.hasNextPage;
          }
        }
        if (limitReached || next === null) break;

        const more = await fetchThreadComments(session, config, next);
        if (more.kind === "failed") return { status: "failed", failure: more.failure };
        if (more.kind === "stopped") return stoppedBySecondaryLimit(logger, comments);
        nodes = more.nodes;
        next = more.next;
      }
    }
    logger.debug(`Fetched ${threads.length} threads, total comments: ${comments.length}`);

    if (limitReached) {
      if (!truncated) return { status: "complete", comments };
      logger.warning(`Reached max_comments limit (${config.maxComments}); returning partial results.`);
      return { status: "partial", comments, limit: "max_comments" };
    }
    if (!page.hasNextPage || !page.endCursor) {
      return { status: "complete", comments };
    }
    if (pages >= config.maxPages) {
      logger.warning(
        `Reached max_pages limit (${config.maxPages}) with ${comments.length} comments; remaining threads were not fetched.`
      );
      return { status: "partial", comments, limit: "max_pages" };
    }
    cursor = page.endCursor;
  }
}

type ThreadCursor = { threadId: string; after: string };

type ThreadCommentsResult =
  | { kind: "comments"; nodes: ReviewThreadCommentGraphQL[]; next: ThreadCursor | null }
  | { kind: "failed"; failure: RetrievalFailure }
  | { kind: "stopped" };

async function fetchThreadComments(
  session: PolicySession,
  config: RetrievalConfig,
  cursor: ThreadCursor
): Promise<ThreadCommentsResult> {
  const result = await sendWithPolicy(session, (authScheme) => ({
    method: "POST",
    url: config.graphqlUrl,
    body: {
      query: THREAD_COMMENTS_QUERY,
      variables: { id: cursor.threadId, first: THREAD_COMMENTS_PAGE_SIZE, after: cursor.after },
    },
    authScheme,
  }));
  if (result.kind === "failed") return { kind: "failed", failure: result.failure };
  if (result.kind === "stopped") return { kind: "stopped" };

  const page = parseThreadCommentsPage(result.response.body);
  if (page.kind === "errors") return { kind: "failed", failure: graphqlFailure(page.errors) };
  if (page.kind === "missing_thread") {
    return { kind: "failed", failure: { kind: "not_found", message: `Review thread ${cursor.threadId} was not returned.` } };
  }
  const next = page.hasNextPage && page.endCursor ? { threadId: cursor.threadId, after: page.endCursor } : null;
  return { kind: "comments", nodes: page.nodes, next };
}

function nextCommentsCursor(
  thread: ReviewThreadGraphQL,
  pageInfo: { hasNextPage?: boolean | null; endCursor?: string | null } | null | undefined
): ThreadCursor | null {
  if (!pageInfo?.hasNextPage || !pageInfo.endCursor || !thread.id) return null;
  return { threadId: thread.id, after: pageInfo.endCursor };
}

function graphqlFailure(errors: GraphQLErrorInfo[]): RetrievalFailure {
  const message = `GraphQL errors: ${errors.map((error) => error.message).join("; ")}`;
  const notFound = errors.some((error) => error.type === "NOT_FOUND");
  return { kind: notFound ? "not_found" : "fatal", message };
}

function stoppedBySecondaryLimit(logger: Logger, comments: Comment[]): RetrievalOutcome {
  logger.warning(
    `Secondary rate limit persisted after one retry; returning ${comments.length} comments collected so far.`
  );
  return { status: "partial", comments, limit: "secondary_rate_limit" };
}

function hasComments(thread: ReviewThreadGraphQL): boolean {
  return (thread.comments?.nodes?.length ?? 0) > 0;
}

export const graphqlWalker: CommentWalker = {
  strategy: "graphql",
  walk: walkGraphql,
};
