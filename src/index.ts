import * as core from "@actions/core";
import { readConfig } from "./app/config.js";
import { formatFailure } from "./errors.js";
import { actionsLogger } from "./logger.js";
import { fetchPullRequestComments } from "./tools/fetch-comments.js";

async function main(): Promise<void> {
  try {
    const config = readConfig();
    const result = await fetchPullRequestComments(config.args, {
      token: config.token,
      rc: config.rc,
      logger: actionsLogger,
    });
    const { outcome } = result;
    if (outcome.status === "failed") {
      core.setOutput("status", "failed");
      core.setFailed(formatFailure(outcome.failure));
      return;
    }

    core.setOutput("status", outcome.status);
    core.setOutput("count", outcome.comments.length);
    if (result.json !== undefined) core.setOutput("comments-json", result.json);
    if (result.markdown !== undefined) {
      core.setOutput("markdown", result.markdown);
      if (process.env.GITHUB_STEP_SUMMARY) {
        await core.summary.addRaw(result.markdown).write();
      }
    }
    core.info(`Retrieved ${outcome.comments.length} review comments (${outcome.status}).`);
  } catch (error) {
    core.setFailed(error instanceof Error ? error.message : String(error));
  }
}

void main();
