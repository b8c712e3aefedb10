import * as github from "@actions/github";
import type { PullRequestTarget } from "../types.js";

type ActionContext = Pick<typeof github.context, "payload" | "repo" | "serverUrl">;

export function readContext(ctx: ActionContext = github.context): PullRequestTarget {
  const pullNumber = ctx.payload.pull_request?.number ?? ctx.payload.issue?.number;
  if (!pullNumber) {
    throw new Error("No pull request found in event payload. Set the pr-url input.");
  }
  return {
    host: hostFromServerUrl(ctx.serverUrl),
    owner: ctx.repo.owner,
    repo: ctx.repo.repo,
    pullNumber,
  };
}

function hostFromServerUrl(serverUrl: string): string {
  try {
    return new URL(serverUrl).host.toLowerCase() || "github.com";
  } catch (_error) {
    return "github.com";
  }
}
