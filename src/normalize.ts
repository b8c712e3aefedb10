import type { RestReviewCommentRecord, ReviewThreadCommentGraphQL, ReviewThreadGraphQL } from "./github-api.js";
import type { Comment } from "./types.js";

export const UNKNOWN_AUTHOR = "unknown";

export function fromRestComment(record: RestReviewCommentRecord): Comment {
  const comment: Comment = {
    author: normalizeLogin(record.user?.login),
    path: record.path ?? "",
    line: normalizeLine(record.line),
    body: record.body ?? "",
    diffContext: record.diff_hunk ?? "",
    isResolved: false,
    isOutdated: false,
  };
  if (record.id !== null && record.id !== undefined) comment.id = record.id;
  return Object.freeze(comment);
}

/**
 * Resolution and outdated state come from the thread, so every comment in a
 * resolved thread is reported as resolved.
 */
export function fromGraphqlComment(thread: ReviewThreadGraphQL, node: ReviewThreadCommentGraphQL): Comment {
  const isResolved = thread.isResolved === true;
  const comment: Comment = {
    author: normalizeLogin(node.author?.login),
    path: node.path ?? "",
    line: normalizeLine(node.line),
    body: node.body ?? "",
    diffContext: node.diffHunk ?? "",
    isResolved,
    isOutdated: thread.isOutdated === true,
  };
  if (node.id) comment.id = node.id;
  const resolver = thread.resolvedBy?.login?.trim();
  if (isResolved && resolver) comment.resolvedBy = resolver;
  return Object.freeze(comment);
}

function normalizeLogin(login: string | null | undefined): string {
  const trimmed = login?.trim() ?? "";
  return trimmed || UNKNOWN_AUTHOR;
}

function normalizeLine(line: number | null | undefined): number {
  if (typeof line !== "number" || !Number.isInteger(line) || line < 0) return 0;
  return line;
}
