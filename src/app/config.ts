import * as core from "@actions/core";
import { readContext } from "./context.js";
import { readPrCommentsRc, type PrCommentsRc } from "./prcommentsrc.js";
import type { FetchCommentsArgs } from "../tools/fetch-comments.js";
import type { OutputMode, WalkStrategy } from "../types.js";

export interface ActionConfig {
  args: FetchCommentsArgs;
  token: string;
  rc: PrCommentsRc | null;
  workspace: string;
}

type InputReader = (name: string) => string;

function optionalInput(read: InputReader, name: string): string | undefined {
  const trimmed = read(name)?.trim() ?? "";
  return trimmed ? trimmed : undefined;
}

export function readConfig(
  read: InputReader = (name) => core.getInput(name),
  env: Record<string, string | undefined> = process.env
): ActionConfig {
  const workspace = env.GITHUB_WORKSPACE || process.cwd();
  const rc = readPrCommentsRc(workspace);

  const token = optionalInput(read, "github-token") ?? env.GITHUB_TOKEN ?? "";
  if (token) core.setSecret(token);

  const prUrl = optionalInput(read, "pr-url");
  const args: FetchCommentsArgs = prUrl ? { prUrl } : { ...readContext() };

  const output = optionalInput(read, "output");
  if (output !== undefined) args.output = parseOutputMode(output);
  const strategy = optionalInput(read, "strategy");
  if (strategy !== undefined) args.strategy = parseStrategy(strategy);

  const perPage = parseIntegerInput(read, "per-page");
  if (perPage !== undefined) args.perPage = perPage;
  const maxPages = parseIntegerInput(read, "max-pages");
  if (maxPages !== undefined) args.maxPages = maxPages;
  const maxComments = parseIntegerInput(read, "max-comments");
  if (maxComments !== undefined) args.maxComments = maxComments;
  const maxRetries = parseIntegerInput(read, "max-retries");
  if (maxRetries !== undefined) args.maxRetries = maxRetries;

  const timeoutRaw = optionalInput(read, "timeout-seconds");
  if (timeoutRaw !== undefined) {
    const timeout = Number(timeoutRaw);
    if (!Number.isFinite(timeout)) {
      throw new Error(`Invalid timeout-seconds: ${timeoutRaw}`);
    }
    args.timeoutSeconds = timeout;
  }

  const apiUrl = optionalInput(read, "api-url");
  if (apiUrl) args.apiUrl = apiUrl;
  const graphqlUrl = optionalInput(read, "graphql-url");
  if (graphqlUrl) args.graphqlUrl = graphqlUrl;

  return { args, token, rc, workspace };
}

export function parseOutputMode(value: string): OutputMode {
  switch (value.toLowerCase()) {
    case "json":
      return "json";
    case "markdown":
      return "markdown";
    case "both":
      return "both";
    default:
      throw new Error(`Invalid output: ${value}. Expected json, markdown or both.`);
  }
}

export function parseStrategy(value: string): WalkStrategy {
  switch (value.toLowerCase()) {
    case "graphql":
      return "graphql";
    case "rest":
      return "rest";
    default:
      throw new Error(`Invalid strategy: ${value}. Expected graphql or rest.`);
  }
}

function parseIntegerInput(read: InputReader, name: string): number | undefined {
  const raw = optionalInput(read, name);
  if (raw === undefined) return undefined;
  if (!/^-?\d+$/.test(raw)) {
    throw new Error(`Invalid ${name}: ${raw}`);
  }
  return Number.parseInt(raw, 10);
}
