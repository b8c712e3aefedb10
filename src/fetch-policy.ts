import type { Logger } from "./logger.js";
import { classifyResponse, decideNext, initialPolicyState } from "./rate-limit.js";
import type { PolicyLimits, PolicyState } from "./rate-limit.js";
import type { Sleep } from "./retry.js";
import type { AuthScheme, HttpResponse, RetrievalFailure, Transport, TransportRequest } from "./types.js";

export interface PolicyRuntime {
  transport: Transport;
  logger: Logger;
  sleep: Sleep;
  now: () => number;
  random: () => number;
  signal?: AbortSignal;
}

/** Owned by a single walker call; never shared between retrievals. */
export interface PolicySession extends PolicyRuntime {
  limits: PolicyLimits;
  state: PolicyState;
}

export type PolicyResult =
  | { kind: "ok"; response: HttpResponse }
  | { kind: "stopped"; limit: "secondary_rate_limit" }
  | { kind: "failed"; failure: RetrievalFailure };

export function createPolicySession(
  runtime: PolicyRuntime,
  options: { maxRetries: number; maxRateLimitWaits: number }
): PolicySession {
  return {
    ...runtime,
    limits: {
      maxRetries: options.maxRetries,
      maxRateLimitWaits: options.maxRateLimitWaits,
      hasCredential: runtime.transport.hasCredential,
    },
    state: initialPolicyState(),
  };
}

export async function sendWithPolicy(
  session: PolicySession,
  build: (authScheme: AuthScheme) => TransportRequest
): Promise<PolicyResult> {
  session.state = { ...session.state, serverAttempt: 0, rateLimitWaits: 0 };

  while (true) {
    if (session.signal?.aborted) return abortedResult();
    const response = await session.transport.send(build(session.state.authScheme));
    if (session.signal?.aborted) return abortedResult();

    const classification = classifyResponse(response, session.now());
    const { decision, state } = decideNext(classification, response, session.state, session.limits, session.random);
    session.state = state;

    const requestId = response.headers["x-github-request-id"];
    if (classification.kind !== "success" && requestId) {
      session.logger.info(`GitHub responded ${response.status} (${classification.kind}); request id ${requestId}`);
    }

    switch (decision.action) {
      case "accept":
        return { kind: "ok", response };
      case "fail":
        return { kind: "failed", failure: decision.failure };
      case "stop":
        return { kind: "stopped", limit: decision.limit };
      case "retry": {
        const seconds = (decision.delayMs / 1000).toFixed(2);
        if (classification.kind === "secondary_rate_limited") {
          session.logger.warning(`Secondary rate limit hit; waiting ${seconds}s before a single retry.`);
        } else {
          session.logger.info(`${capitalize(decision.reason)}. Retrying in ${seconds}s...`);
        }
        if (decision.delayMs > 0) {
          await session.sleep(decision.delayMs, session.signal);
        }
        break;
      }
    }
  }
}

function abortedResult(): PolicyResult {
  return { kind: "failed", failure: { kind: "aborted", message: "Retrieval was cancelled." } };
}

function capitalize(value: string): string {
  return value ? value[0].toUpperCase() + value.slice(1) : value;
}
