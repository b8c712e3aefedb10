import { describe, expect, it } from "vitest";
import { RetrievalError } from "../src/errors.js";
import {
  createFetchCommentsTool,
  FETCH_COMMENTS_TOOL_NAME,
  fetchPullRequestComments,
  parseFetchCommentsArgs,
  resolveTarget,
} from "../src/tools/fetch-comments.js";
import { FakeTransport, makeMemoryLogger, makeRecordingSleep, ok, reply } from "./helpers/fake-transport.js";
import { restRecords, thread, threadsPage } from "./helpers/fixtures.js";

const PR_URL = "https://github.com/octo/widgets/pull/7";

function deps(transport: FakeTransport) {
  const { logger } = makeMemoryLogger();
  const { sleep } = makeRecordingSleep();
  return { transport, logger, sleep, env: {}, random: () => 0 };
}

describe("parseFetchCommentsArgs", () => {
  it("accepts out-of-range integers for the engine to clamp", () => {
    expect(parseFetchCommentsArgs({ prUrl: PR_URL, perPage: 5000, maxComments: 1 })).toEqual({
      prUrl: PR_URL,
      perPage: 5000,
      maxComments: 1,
    });
  });

  it("rejects fractional numbers, booleans and unknown modes", () => {
    expect(() => parseFetchCommentsArgs({ prUrl: PR_URL, perPage: 2.5 })).toThrow(
      `Invalid ${FETCH_COMMENTS_TOOL_NAME} arguments: /perPage`
    );
    expect(() => parseFetchCommentsArgs({ prUrl: PR_URL, maxPages: true })).toThrow("/maxPages");
    expect(() => parseFetchCommentsArgs({ prUrl: PR_URL, output: "html" })).toThrow("/output");
    expect(() => parseFetchCommentsArgs({ prUrl: PR_URL, strategy: "soap" })).toThrow("/strategy");
  });

  it("rejects unknown properties", () => {
    expect(() => parseFetchCommentsArgs({ prUrl: PR_URL, colour: "blue" })).toThrow(FETCH_COMMENTS_TOOL_NAME);
  });
});

describe("resolveTarget", () => {
  it("prefers the PR URL", () => {
    expect(resolveTarget({ prUrl: PR_URL, owner: "other" }, {})).toEqual({
      host: "github.com",
      owner: "octo",
      repo: "widgets",
      pullNumber: 7,
    });
  });

  it("uses explicit coordinates with GH_HOST as the default host", () => {
    expect(resolveTarget({ owner: "o", repo: "r", pullNumber: 3 }, { GH_HOST: "GHE.example.com" })).toEqual({
      host: "ghe.example.com",
      owner: "o",
      repo: "r",
      pullNumber: 3,
    });
  });

  it("requires a URL or full coordinates", () => {
    expect(() => resolveTarget({ owner: "o" }, {})).toThrow("Provide prUrl, or owner, repo and pullNumber.");
  });
});

describe("fetchPullRequestComments", () => {
  it("defaults to GraphQL and Markdown", async () => {
    const transport = new FakeTransport([ok(threadsPage([thread("a", 1)]))]);
    const result = await fetchPullRequestComments({ prUrl: PR_URL }, deps(transport));
    expect(transport.requests[0]?.method).toBe("POST");
    expect(result.output).toBe("markdown");
    expect(result.json).toBeUndefined();
    expect(result.markdown).toContain("## `src/a.ts`");
  });

  it("takes strategy, output and tunables from .prcommentsrc", async () => {
    const transport = new FakeTransport([ok(restRecords(2))]);
    const result = await fetchPullRequestComments(
      { prUrl: PR_URL },
      { ...deps(transport), rc: { version: 1, defaults: { strategy: "rest", output: "json", perPage: 20 } } }
    );
    expect(transport.requests[0]).toMatchObject({ method: "GET", query: { per_page: 20, page: 1 } });
    expect(result.markdown).toBeUndefined();
    expect(JSON.parse(result.json ?? "[]")).toHaveLength(2);
  });
});

describe("fetch_pr_review_comments tool", () => {
  it("returns JSON before Markdown in both mode", async () => {
    const transport = new FakeTransport([ok(restRecords(1))]);
    const tool = createFetchCommentsTool(deps(transport));
    const result = await tool.execute({ prUrl: PR_URL, strategy: "rest", output: "both" });
    expect(result.details).toEqual({ status: "complete", count: 1 });
    expect(result.content).toHaveLength(2);
    expect(JSON.parse(result.content[0]?.text ?? "[]")).toEqual([
      {
        id: 1,
        author: "alice",
        path: "src/app.ts",
        line: 1,
        body: "comment 1",
        diffContext: "@@ -1 +1 @@",
        isResolved: false,
        isOutdated: false,
      },
    ]);
    expect(result.content[1]?.text.startsWith("# Pull Request Review Comments\n")).toBe(true);
  });

  it("appends a note to partial Markdown", async () => {
    const transport = new FakeTransport([ok(restRecords(100))]);
    const tool = createFetchCommentsTool(deps(transport));
    const result = await tool.execute({ prUrl: PR_URL, strategy: "rest", maxPages: 1 });
    expect(result.details).toEqual({ status: "partial", count: 100, limit: "max_pages" });
    expect(result.content[0]?.text.endsWith("\n\n> Partial results: the max_pages ceiling was reached.\n")).toBe(true);
  });

  it("raises terminal failures as RetrievalError", async () => {
    const transport = new FakeTransport([reply(404, { message: "Not Found" }, { "x-github-request-id": "AB:12" })]);
    const tool = createFetchCommentsTool(deps(transport));
    const error = await tool.execute({ prUrl: PR_URL, strategy: "rest" }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(RetrievalError);
    if (error instanceof RetrievalError) {
      expect(error.failure.kind).toBe("not_found");
      expect(error.message).toBe(
        "not_found (HTTP 404): Pull request or repository not found (404). Not Found [request id AB:12]"
      );
    }
  });
});
