import type { ReviewThreadCommentGraphQL, ReviewThreadGraphQL } from "../../src/github-api.js";

export function restRecords(count: number, offset = 0): Array<Record<string, unknown>> {
  return Array.from({ length: count }, (_, i) => {
    const n = offset + i + 1;
    return {
      id: n,
      user: { login: "alice" },
      path: "src/app.ts",
      line: n,
      body: `comment ${n}`,
      diff_hunk: "@@ -1 +1 @@",
    };
  });
}

export function commentNodes(label: string, count: number, offset = 0): ReviewThreadCommentGraphQL[] {
  return Array.from({ length: count }, (_, i) => {
    const n = offset + i + 1;
    return {
      id: `${label}-${n}`,
      author: { login: "bob" },
      body: `${label} comment ${n}`,
      path: `src/${label}.ts`,
      line: n,
      diffHunk: "@@ -1 +1 @@",
    };
  });
}

export function thread(label: string, size: number, extra: Partial<ReviewThreadGraphQL> = {}): ReviewThreadGraphQL {
  return {
    isResolved: false,
    isOutdated: false,
    resolvedBy: null,
    comments: { nodes: commentNodes(label, size) },
    ...extra,
  };
}

export function threadCommentsPage(
  nodes: ReviewThreadCommentGraphQL[],
  pageInfo: { hasNextPage: boolean; endCursor: string | null } = { hasNextPage: false, endCursor: null }
) {
  return { data: { node: { comments: { pageInfo, nodes } } } };
}

export function threadsPage(
  threads: ReviewThreadGraphQL[],
  pageInfo: { hasNextPage: boolean; endCursor: string | null } = { hasNextPage: false, endCursor: null }
) {
  return {
    data: {
      repository: {
        pullRequest: {
          reviewThreads: { pageInfo, nodes: threads },
        },
      },
    },
  };
}
