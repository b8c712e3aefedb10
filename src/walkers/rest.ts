import { createPolicySession, sendWithPolicy } from "../fetch-policy.js";
import { parseRestCommentsPage, reviewCommentsPath } from "../github-api.js";
import type { Logger } from "../logger.js";
import { fromRestComment } from "../normalize.js";
import type { Comment, RetrievalConfig, RetrievalOutcome } from "../types.js";
import { resolveRuntime } from "./types.js";
import type { CommentWalker, WalkDependencies } from "./types.js";

export async function walkRest(config: RetrievalConfig, deps: WalkDependencies): Promise<RetrievalOutcome> {
  const { owner, repo, pullNumber } = config.target;
  const { logger } = deps;
  const session = createPolicySession(resolveRuntime(deps), config);
  const url = `${config.apiUrl}${reviewCommentsPath(owner, repo, pullNumber)}`;
  const comments: Comment[] = [];
  let page = 1;
  // Set when the ceiling landed on a full page that gave no end signal; the
  // next request only checks whether anything is left.
  let atCeiling = false;

  logger.debug(`Fetching review comments for ${owner}/${repo}#${pullNumber} via REST`);

  while (true) {
    const result = await sendWithPolicy(session, (authScheme) => ({
      method: "GET",
      url,
      query: { per_page: config.perPage, page },
      authScheme,
    }));
    if (result.kind === "stopped") {
      logger.warning(
        `Secondary rate limit persisted after one retry; returning ${comments.length} comments collected so far.`
      );
      return { status: "partial", comments, limit: result.limit };
    }
    if (atCeiling) {
      const rest = result.kind === "ok" ? parseRestCommentsPage(result.response.body) : null;
      if (rest && rest.length === 0) return { status: "complete", comments };
      return ceilingReached(logger, config, comments);
    }
    if (result.kind === "failed") {
      return { status: "failed", failure: result.failure };
    }

    const records = parseRestCommentsPage(result.response.body);
    if (!records) {
      return {
        status: "failed",
        failure: { kind: "fatal", message: `Unexpected REST response shape on page ${page}: expected an array of comments.` },
      };
    }

    const room = config.maxComments - comments.length;
    for (const record of records.slice(0, room)) {
      comments.push(fromRestComment(record));
    }
    logger.debug(`Fetched page ${page}: ${records.length} comments (total ${comments.length})`);

    const link = result.response.headers.link;
    const naturalEnd = records.length < config.perPage || isLastPage(link);
    if (records.length > room) {
      return ceilingReached(logger, config, comments);
    }
    if (naturalEnd) {
      logger.debug(`Fetched ${comments.length} comments across ${page} page(s)`);
      return { status: "complete", comments };
    }
    if (comments.length >= config.maxComments) {
      if (hasNextLink(link) || page >= config.maxPages) return ceilingReached(logger, config, comments);
      atCeiling = true;
    } else if (page >= config.maxPages) {
      logger.warning(
        `Reached max_pages limit (${config.maxPages}) with ${comments.length} comments; remaining pages were not fetched.`
      );
      return { status: "partial", comments, limit: "max_pages" };
    }
    page += 1;
  }
}

function ceilingReached(logger: Logger, config: RetrievalConfig, comments: Comment[]): RetrievalOutcome {
  logger.warning(`Reached max_comments limit (${config.maxComments}); returning partial results.`);
  return { status: "partial", comments, limit: "max_comments" };
}

const NEXT_LINK = /<[^>]+>;\s*rel="next"/;

function hasNextLink(link: string | undefined): boolean {
  return link !== undefined && NEXT_LINK.test(link);
}

// A Link header without rel="next" marks the final page; no header says nothing.
function isLastPage(link: string | undefined): boolean {
  if (!link) return false;
  return !NEXT_LINK.test(link);
}

export const restWalker: CommentWalker = {
  strategy: "rest",
  walk: walkRest,
};
