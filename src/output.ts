import { renderMarkdown } from "./markdown.js";
import type { LimitKind, OutputMode, RetrievalOutcome } from "./types.js";

export interface FormattedOutput {
  json?: string;
  markdown?: string;
}

const LIMIT_NOTES: Record<LimitKind, string> = {
  max_comments: "the max_comments ceiling was reached",
  max_pages: "the max_pages ceiling was reached",
  secondary_rate_limit: "GitHub's secondary rate limit persisted after one retry",
};

export function formatOutcome(outcome: RetrievalOutcome, mode: OutputMode): FormattedOutput {
  if (outcome.status === "failed") return {};
  const formatted: FormattedOutput = {};
  if (mode === "json" || mode === "both") {
    formatted.json = JSON.stringify(outcome.comments, null, 2);
  }
  if (mode === "markdown" || mode === "both") {
    const markdown = renderMarkdown(outcome.comments);
    formatted.markdown = outcome.status === "partial" ? `${markdown}\n${partialNote(outcome.limit)}\n` : markdown;
  }
  return formatted;
}

export function partialNote(limit: LimitKind): string {
  return `> Partial results: ${LIMIT_NOTES[limit]}.`;
}
