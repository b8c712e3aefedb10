import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { PrCommentsRc } from "../app/prcommentsrc.js";
import { resolveRetrievalConfig } from "../config.js";
import { RetrievalError } from "../errors.js";
import { actionsLogger, type Logger } from "../logger.js";
import { formatOutcome } from "../output.js";
import { parsePullRequestUrl } from "../pr-url.js";
import type { Sleep } from "../retry.js";
import { createOctokitTransport } from "../transport.js";
import type { LimitKind, OutputMode, PullRequestTarget, RetrievalOutcome, Transport, WalkStrategy } from "../types.js";
import { getWalker } from "../walkers/index.js";

export const FETCH_COMMENTS_TOOL_NAME = "fetch_pr_review_comments";

export const FetchCommentsArgsSchema = Type.Object(
  {
    prUrl: Type.Optional(Type.String({ description: "Pull request URL, e.g. https://github.com/owner/repo/pull/123" })),
    host: Type.Optional(Type.String({ description: "GitHub host when prUrl is not given (default github.com)" })),
    owner: Type.Optional(Type.String()),
    repo: Type.Optional(Type.String()),
    pullNumber: Type.Optional(Type.Integer({ minimum: 1 })),
    output: Type.Optional(Type.Union([Type.Literal("markdown"), Type.Literal("json"), Type.Literal("both")])),
    strategy: Type.Optional(Type.Union([Type.Literal("graphql"), Type.Literal("rest")])),
    perPage: Type.Optional(Type.Integer({ description: "Page size, clamped to 1-100" })),
    maxPages: Type.Optional(Type.Integer({ description: "Page ceiling, clamped to 1-200" })),
    maxComments: Type.Optional(Type.Integer({ description: "Comment ceiling, clamped to 100-100000" })),
    maxRetries: Type.Optional(Type.Integer({ description: "Retries for server errors, clamped to 0-10" })),
    timeoutSeconds: Type.Optional(Type.Number({ description: "Per-request timeout, clamped to 1-300 seconds" })),
    apiUrl: Type.Optional(Type.String({ description: "REST base URL override" })),
    graphqlUrl: Type.Optional(Type.String({ description: "GraphQL endpoint override" })),
  },
  { additionalProperties: false }
);

export type FetchCommentsArgs = Static<typeof FetchCommentsArgsSchema>;

export interface FetchCommentsDeps {
  logger?: Logger;
  token?: string;
  transport?: Transport;
  env?: Record<string, string | undefined>;
  rc?: PrCommentsRc | null;
  sleep?: Sleep;
  now?: () => number;
  random?: () => number;
  signal?: AbortSignal;
}

export interface FetchCommentsResult {
  outcome: RetrievalOutcome;
  output: OutputMode;
  json?: string;
  markdown?: string;
}

export interface ToolResult<TDetails> {
  content: Array<{ type: "text"; text: string }>;
  details: TDetails;
}

export interface ToolDefinition<TParameters extends TSchema, TDetails> {
  name: string;
  label: string;
  description: string;
  parameters: TParameters;
  execute(args: unknown): Promise<ToolResult<TDetails>>;
}

export interface FetchCommentsDetails {
  status: "complete" | "partial";
  count: number;
  limit?: LimitKind;
}

export function parseFetchCommentsArgs(raw: unknown): FetchCommentsArgs {
  if (Value.Check(FetchCommentsArgsSchema, raw)) return raw;
  const first = Value.Errors(FetchCommentsArgsSchema, raw).First();
  const where = first?.path ? first.path : "(root)";
  throw new Error(`Invalid ${FETCH_COMMENTS_TOOL_NAME} arguments: ${where}: ${first?.message ?? "unknown error"}`);
}

export function resolveTarget(args: FetchCommentsArgs, env: Record<string, string | undefined> = process.env): PullRequestTarget {
  if (args.prUrl) return parsePullRequestUrl(args.prUrl);
  const { owner, repo, pullNumber } = args;
  if (!owner || !repo || pullNumber === undefined) {
    throw new Error("Provide prUrl, or owner, repo and pullNumber.");
  }
  const host = (args.host ?? env.GH_HOST ?? "github.com").trim().toLowerCase() || "github.com";
  return { host, owner, repo, pullNumber };
}

export async function fetchPullRequestComments(
  rawArgs: unknown,
  deps: FetchCommentsDeps = {}
): Promise<FetchCommentsResult> {
  const args = parseFetchCommentsArgs(rawArgs);
  const env = deps.env ?? process.env;
  const rcDefaults: NonNullable<PrCommentsRc["defaults"]> = deps.rc?.defaults ?? {};
  const rcEndpoints: NonNullable<PrCommentsRc["endpoints"]> = deps.rc?.endpoints ?? {};
  const target = resolveTarget(args, env);

  const config = resolveRetrievalConfig(
    {
      ...target,
      perPage: args.perPage,
      maxPages: args.maxPages,
      maxComments: args.maxComments,
      maxRetries: args.maxRetries,
      timeoutSeconds: args.timeoutSeconds,
      apiUrl: args.apiUrl ?? rcEndpoints.apiUrl,
      graphqlUrl: args.graphqlUrl ?? rcEndpoints.graphqlUrl,
    },
    {
      env,
      defaults: {
        perPage: rcDefaults.perPage,
        maxPages: rcDefaults.maxPages,
        maxComments: rcDefaults.maxComments,
        maxRetries: rcDefaults.maxRetries,
        timeoutSeconds: rcDefaults.timeoutSeconds,
      },
    }
  );
  const strategy: WalkStrategy = args.strategy ?? rcDefaults.strategy ?? "graphql";
  const output: OutputMode = args.output ?? rcDefaults.output ?? "markdown";
  const transport =
    deps.transport ??
    createOctokitTransport({ token: deps.token ?? env.GITHUB_TOKEN, timeoutMs: config.timeoutMs, signal: deps.signal });

  const outcome = await getWalker(strategy).walk(config, {
    transport,
    logger: deps.logger ?? actionsLogger,
    sleep: deps.sleep,
    now: deps.now,
    random: deps.random,
    signal: deps.signal,
  });
  return { outcome, output, ...formatOutcome(outcome, output) };
}

export function createFetchCommentsTool(
  deps: FetchCommentsDeps = {}
): ToolDefinition<typeof FetchCommentsArgsSchema, FetchCommentsDetails> {
  return {
    name: FETCH_COMMENTS_TOOL_NAME,
    label: "Fetch PR review comments",
    description:
      "Fetch every review comment on a GitHub pull request as JSON, Markdown grouped by file, or both. " +
      "Results stop at the configured page or comment ceiling and are then marked partial.",
    parameters: FetchCommentsArgsSchema,
    execute: async (args) => {
      const result = await fetchPullRequestComments(args, deps);
      const { outcome } = result;
      if (outcome.status === "failed") {
        throw new RetrievalError(outcome.failure);
      }
      const content: Array<{ type: "text"; text: string }> = [];
      if (result.json !== undefined) content.push({ type: "text", text: result.json });
      if (result.markdown !== undefined) content.push({ type: "text", text: result.markdown });
      const details: FetchCommentsDetails = { status: outcome.status, count: outcome.comments.length };
      if (outcome.status === "partial") details.limit = outcome.limit;
      return { content, details };
    },
  };
}
