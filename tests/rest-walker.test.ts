import { describe, expect, it } from "vitest";
import { resolveRetrievalConfig } from "../src/config.js";
import type { RetrievalRequest } from "../src/types.js";
import { getWalker } from "../src/walkers/index.js";
import { walkRest } from "../src/walkers/rest.js";
import { FakeTransport, makeMemoryLogger, makeRecordingSleep, ok, reply, SECONDARY_LIMIT_BODY } from "./helpers/fake-transport.js";
import { restRecords } from "./helpers/fixtures.js";

function config(overrides: Partial<RetrievalRequest> = {}) {
  return resolveRetrievalConfig({ host: "github.com", owner: "octo", repo: "widgets", pullNumber: 7, ...overrides }, { env: {} });
}

function pages(sizes: number[]) {
  let offset = 0;
  return sizes.map((size) => {
    const page = ok(restRecords(size, offset));
    offset += size;
    return page;
  });
}

async function run(transport: FakeTransport, overrides: Partial<RetrievalRequest> = {}) {
  const memory = makeMemoryLogger();
  const { sleep } = makeRecordingSleep();
  const outcome = await walkRest(config(overrides), { transport, logger: memory.logger, sleep, random: () => 0 });
  return { outcome, ...memory };
}

describe("walkRest", () => {
  it("requests the flat comment listing starting at page 1", async () => {
    const transport = new FakeTransport(pages([3]));
    await run(transport);
    expect(transport.requests).toEqual([
      {
        method: "GET",
        url: "https://api.github.com/repos/octo/widgets/pulls/7/comments",
        query: { per_page: 100, page: 1 },
        authScheme: "bearer",
      },
    ]);
  });

  it("stops at the page ceiling without fetching further pages", async () => {
    const transport = new FakeTransport(pages([100, 100, 40]));
    const { outcome, warnings } = await run(transport, { maxPages: 2 });
    expect(outcome.status).toBe("partial");
    if (outcome.status === "partial") {
      expect(outcome.comments).toHaveLength(200);
      expect(outcome.limit).toBe("max_pages");
    }
    expect(transport.requests).toHaveLength(2);
    expect(warnings).toEqual(["Reached max_pages limit (2) with 200 comments; remaining pages were not fetched."]);
  });

  it("completes on a short page without any diagnostic", async () => {
    const transport = new FakeTransport(pages([100, 100, 40]));
    const { outcome, warnings } = await run(transport);
    expect(outcome.status).toBe("complete");
    if (outcome.status === "complete") {
      expect(outcome.comments).toHaveLength(240);
      expect(outcome.comments[239]?.body).toBe("comment 240");
    }
    expect(warnings).toEqual([]);
  });

  it("truncates the current page exactly at max_comments", async () => {
    const transport = new FakeTransport(pages([100, 100, 100]));
    const { outcome, warnings } = await run(transport, { maxComments: 150 });
    expect(outcome.status).toBe("partial");
    if (outcome.status === "partial") {
      expect(outcome.comments).toHaveLength(150);
      expect(outcome.comments[149]?.body).toBe("comment 150");
      expect(outcome.limit).toBe("max_comments");
    }
    expect(transport.requests).toHaveLength(2);
    expect(warnings).toEqual(["Reached max_comments limit (150); returning partial results."]);
  });

  it("reports complete when the data ends exactly at max_comments", async () => {
    const last = ok(restRecords(100), { link: '<https://api.github.com/repos/octo/widgets/pulls/7/comments?page=1>; rel="first"' });
    const transport = new FakeTransport([last]);
    const { outcome, warnings } = await run(transport, { maxComments: 100 });
    expect(outcome.status).toBe("complete");
    expect(warnings).toEqual([]);
  });

  it("checks one page past a full page that ends exactly at max_comments without a Link header", async () => {
    const transport = new FakeTransport([ok(restRecords(100)), ok([])]);
    const { outcome, warnings } = await run(transport, { maxComments: 100 });
    expect(transport.requests).toHaveLength(2);
    expect(transport.requests[1]).toMatchObject({ query: { per_page: 100, page: 2 } });
    expect(outcome.status).toBe("complete");
    if (outcome.status === "complete") expect(outcome.comments).toHaveLength(100);
    expect(warnings).toEqual([]);
  });

  it("reports partial when the page after the ceiling still has comments", async () => {
    const transport = new FakeTransport([ok(restRecords(100)), ok(restRecords(5, 100))]);
    const { outcome, warnings } = await run(transport, { maxComments: 100 });
    expect(transport.requests).toHaveLength(2);
    expect(outcome.status).toBe("partial");
    if (outcome.status === "partial") {
      expect(outcome.comments).toHaveLength(100);
      expect(outcome.comments[99]?.body).toBe("comment 100");
      expect(outcome.limit).toBe("max_comments");
    }
    expect(warnings).toEqual(["Reached max_comments limit (100); returning partial results."]);
  });

  it("does not look past the ceiling when the Link header offers a next page", async () => {
    const first = ok(restRecords(100), { link: '<https://api.github.com/x?page=2>; rel="next"' });
    const transport = new FakeTransport([first]);
    const { outcome } = await run(transport, { maxComments: 100 });
    expect(transport.requests).toHaveLength(1);
    expect(outcome.status).toBe("partial");
  });

  it("keeps paging while the Link header offers a next page", async () => {
    const first = ok(restRecords(100), { link: '<https://api.github.com/x?page=2>; rel="next"' });
    const transport = new FakeTransport([first, ok(restRecords(10, 100))]);
    const { outcome } = await run(transport);
    expect(transport.requests).toHaveLength(2);
    expect(outcome.status).toBe("complete");
  });

  it("returns what was collected when the secondary limit persists", async () => {
    const transport = new FakeTransport((_request, index) => (index === 0 ? ok(restRecords(100)) : reply(403, SECONDARY_LIMIT_BODY)));
    const { outcome, warnings } = await run(transport);
    expect(outcome.status).toBe("partial");
    if (outcome.status === "partial") {
      expect(outcome.comments).toHaveLength(100);
      expect(outcome.limit).toBe("secondary_rate_limit");
    }
    expect(warnings).toEqual([
      "Secondary rate limit hit; waiting 60.00s before a single retry.",
      "Secondary rate limit persisted after one retry; returning 100 comments collected so far.",
    ]);
  });

  it("fails on a missing pull request", async () => {
    const transport = new FakeTransport([reply(404, { message: "Not Found" })]);
    const { outcome } = await run(transport);
    expect(outcome).toEqual({
      status: "failed",
      failure: { kind: "not_found", message: "Pull request or repository not found (404). Not Found", status: 404 },
    });
  });

  it("fails on an unexpected body shape", async () => {
    const transport = new FakeTransport([ok({ message: "not a list" })]);
    const { outcome } = await run(transport);
    expect(outcome.status).toBe("failed");
    if (outcome.status === "failed") expect(outcome.failure.kind).toBe("fatal");
  });

  it("uses the explicit API base for enterprise hosts", async () => {
    const transport = new FakeTransport(pages([1]));
    await run(transport, { host: "ghe.example.com", apiUrl: "https://ghe.example.com/api/v3/" });
    expect(transport.requests[0]?.url).toBe("https://ghe.example.com/api/v3/repos/octo/widgets/pulls/7/comments");
  });
});

describe("getWalker", () => {
  it("selects the walker by strategy", () => {
    expect(getWalker("rest").strategy).toBe("rest");
    expect(getWalker("graphql").strategy).toBe("graphql");
  });
});
