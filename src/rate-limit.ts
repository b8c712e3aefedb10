import { computePrimaryWaitMs, computeServerBackoffMs, SECONDARY_RATE_LIMIT_WAIT_MS } from "./retry.js";
import type { AuthScheme, HttpResponse, RetrievalFailure } from "./types.js";

const SECONDARY_LIMIT_PHRASES = ["secondary rate limit", "abuse detection", "abuse rate limit"];

export type Classification =
  | { kind: "success" }
  | { kind: "auth_failure" }
  | { kind: "not_found" }
  | { kind: "secondary_rate_limited" }
  | { kind: "primary_rate_limited"; waitMs: number }
  | { kind: "server_error" }
  | { kind: "fatal" };

export type Decision =
  | { action: "accept" }
  | { action: "retry"; delayMs: number; reason: string }
  | { action: "stop"; limit: "secondary_rate_limit" }
  | { action: "fail"; failure: RetrievalFailure };

/**
 * Retry bookkeeping for one retrieval call. `authScheme`, `authSwitched` and
 * `secondaryRetried` live for the whole call; `serverAttempt` and
 * `rateLimitWaits` restart with every new request.
 */
export interface PolicyState {
  authScheme: AuthScheme;
  authSwitched: boolean;
  secondaryRetried: boolean;
  serverAttempt: number;
  rateLimitWaits: number;
}

export interface PolicyLimits {
  maxRetries: number;
  maxRateLimitWaits: number;
  hasCredential: boolean;
}

export function initialPolicyState(): PolicyState {
  return {
    authScheme: "bearer",
    authSwitched: false,
    secondaryRetried: false,
    serverAttempt: 0,
    rateLimitWaits: 0,
  };
}

export function classifyResponse(response: HttpResponse, nowMs: number = Date.now()): Classification {
  const { status, headers } = response;
  if (status >= 200 && status < 300) {
    // GraphQL reports its rate limit inside a 200 body.
    if (hasGraphqlErrorType(response.body, "RATE_LIMITED")) {
      return { kind: "primary_rate_limited", waitMs: computePrimaryWaitMs(headers, nowMs) };
    }
    return { kind: "success" };
  }
  if (status === 401) return { kind: "auth_failure" };
  if (status === 404) return { kind: "not_found" };
  const throttled = status === 403 || status === 429;
  if (throttled && mentionsSecondaryLimit(response.body)) {
    return { kind: "secondary_rate_limited" };
  }
  if (throttled || headers["x-ratelimit-remaining"] === "0") {
    return { kind: "primary_rate_limited", waitMs: computePrimaryWaitMs(headers, nowMs) };
  }
  // Status 0 stands for a transport-level failure (connection reset, timeout).
  if (status === 0 || (status >= 500 && status < 600)) return { kind: "server_error" };
  return { kind: "fatal" };
}

function hasGraphqlErrorType(body: unknown, type: string): boolean {
  if (typeof body !== "object" || body === null || !("errors" in body)) return false;
  const { errors } = body;
  return (
    Array.isArray(errors) &&
    errors.some((error: unknown) => typeof error === "object" && error !== null && "type" in error && error.type === type)
  );
}

export function decideNext(
  classification: Classification,
  response: HttpResponse,
  state: PolicyState,
  limits: PolicyLimits,
  random: () => number = Math.random
): { decision: Decision; state: PolicyState } {
  switch (classification.kind) {
    case "success":
      return { decision: { action: "accept" }, state };
    case "auth_failure":
      if (!limits.hasCredential || state.authSwitched) {
        return {
          decision: {
            action: "fail",
            failure: buildFailure("auth_failure", response, "GitHub rejected the credential (401 Unauthorized)."),
          },
          state,
        };
      }
      return {
        decision: { action: "retry", delayMs: 0, reason: "401 with Bearer scheme; retrying with token scheme" },
        state: { ...state, authScheme: "token", authSwitched: true },
      };
    case "not_found":
      return {
        decision: {
          action: "fail",
          failure: buildFailure("not_found", response, "Pull request or repository not found (404)."),
        },
        state,
      };
    case "secondary_rate_limited":
      if (state.secondaryRetried) {
        return { decision: { action: "stop", limit: "secondary_rate_limit" }, state };
      }
      return {
        decision: {
          action: "retry",
          delayMs: SECONDARY_RATE_LIMIT_WAIT_MS,
          reason: "secondary rate limit",
        },
        state: { ...state, secondaryRetried: true },
      };
    case "primary_rate_limited":
      if (state.rateLimitWaits >= limits.maxRateLimitWaits) {
        return {
          decision: {
            action: "fail",
            failure: {
              ...buildFailure("rate_limited", response, "Primary rate limit did not clear after waiting."),
              scope: "primary",
            },
          },
          state,
        };
      }
      return {
        decision: { action: "retry", delayMs: classification.waitMs, reason: "primary rate limit" },
        state: { ...state, rateLimitWaits: state.rateLimitWaits + 1 },
      };
    case "server_error":
      if (state.serverAttempt >= limits.maxRetries) {
        const label = response.status === 0 ? "Request failed" : `Server error ${response.status}`;
        return {
          decision: {
            action: "fail",
            failure: buildFailure(
              "server_error",
              response,
              `${label} after ${state.serverAttempt} retr${state.serverAttempt === 1 ? "y" : "ies"}.`
            ),
          },
          state,
        };
      }
      return {
        decision: {
          action: "retry",
          delayMs: computeServerBackoffMs(state.serverAttempt, random),
          reason: response.status === 0 ? `request error${response.error ? ` (${response.error})` : ""}` : `server error ${response.status}`,
        },
        state: { ...state, serverAttempt: state.serverAttempt + 1 },
      };
    case "fatal":
      return {
        decision: {
          action: "fail",
          failure: buildFailure("fatal", response, `Unexpected HTTP status ${response.status}.`),
        },
        state,
      };
  }
}

export function extractMessage(body: unknown): string | null {
  if (typeof body === "string") return body.trim() || null;
  if (body && typeof body === "object" && "message" in body && typeof body.message === "string") {
    return body.message;
  }
  return null;
}

function mentionsSecondaryLimit(body: unknown): boolean {
  const text = typeof body === "string" ? body : body === null || body === undefined ? "" : JSON.stringify(body);
  const lowered = text.toLowerCase();
  return SECONDARY_LIMIT_PHRASES.some((phrase) => lowered.includes(phrase));
}

function buildFailure(kind: RetrievalFailure["kind"], response: HttpResponse, fallback: string): RetrievalFailure {
  const detail = extractMessage(response.body);
  const failure: RetrievalFailure = {
    kind,
    message: detail ? `${fallback} ${detail}` : fallback,
  };
  if (response.status !== 0) failure.status = response.status;
  const requestId = response.headers["x-github-request-id"];
  if (requestId) failure.requestId = requestId;
  return failure;
}
