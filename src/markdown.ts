import type { Comment } from "./types.js";

export const MARKDOWN_TITLE = "# Pull Request Review Comments";

/**
 * Renders comments grouped by file in first-seen order; comments keep their
 * input order inside a group. Output depends only on the input, so equal
 * lists render to identical strings.
 */
export function renderMarkdown(comments: readonly Comment[]): string {
  if (comments.length === 0) {
    return `${MARKDOWN_TITLE}\n\nNo comments found.\n`;
  }

  const lines: string[] = [MARKDOWN_TITLE, ""];
  for (const [path, group] of groupByPath(comments)) {
    lines.push(`## ${path ? inlineCode(path) : "(no file)"}`, "");
    for (const comment of group) {
      lines.push(`### ${renderHeading(comment)}`, "");
      if (comment.diffContext) {
        lines.push(...fencedBlock(comment.diffContext, "diff"), "");
      }
      if (comment.body) {
        lines.push(...fencedBlock(comment.body), "");
      } else {
        lines.push("_No comment body._", "");
      }
    }
  }
  return `${lines.join("\n").trimEnd()}\n`;
}

export function groupByPath(comments: readonly Comment[]): Map<string, Comment[]> {
  const groups = new Map<string, Comment[]>();
  for (const comment of comments) {
    const group = groups.get(comment.path);
    if (group) {
      group.push(comment);
    } else {
      groups.set(comment.path, [comment]);
    }
  }
  return groups;
}

/** One backtick longer than the longest run inside `text`, never shorter than three. */
export function fenceFor(text: string, minimum = 3): string {
  return "`".repeat(Math.max(minimum, longestBacktickRun(text) + 1));
}

export function fencedBlock(text: string, info = ""): string[] {
  const fence = fenceFor(text);
  return [`${fence}${info}`, text, fence];
}

export function inlineCode(text: string): string {
  const fence = "`".repeat(longestBacktickRun(text) + 1);
  const pad = text.startsWith("`") || text.endsWith("`") ? " " : "";
  return `${fence}${pad}${text}${pad}${fence}`;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#x27;");
}

function renderHeading(comment: Comment): string {
  const parts = [comment.line > 0 ? `Line ${comment.line}` : "File-level", `@${escapeHtml(comment.author)}`];
  if (comment.isResolved) {
    parts.push(comment.resolvedBy ? `✓ Resolved by @${escapeHtml(comment.resolvedBy)}` : "✓ Resolved");
  }
  if (comment.isOutdated) {
    parts.push("⚠ Outdated");
  }
  return parts.join(" · ");
}

function longestBacktickRun(text: string): number {
  let longest = 0;
  let current = 0;
  for (const char of text) {
    if (char === "`") {
      current += 1;
      if (current > longest) longest = current;
    } else {
      current = 0;
    }
  }
  return longest;
}
