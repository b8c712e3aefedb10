import type { RetrievalFailure } from "./types.js";

export class RetrievalError extends Error {
  readonly failure: RetrievalFailure;

  constructor(failure: RetrievalFailure) {
    super(formatFailure(failure));
    this.name = "RetrievalError";
    this.failure = failure;
  }
}

export function formatFailure(failure: RetrievalFailure): string {
  const status = failure.status !== undefined ? ` (HTTP ${failure.status})` : "";
  const requestId = failure.requestId ? ` [request id ${failure.requestId}]` : "";
  return `${failure.kind}${status}: ${failure.message}${requestId}`;
}
