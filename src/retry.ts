export const SERVER_BACKOFF_BASE_MS = 500;
export const SERVER_BACKOFF_MAX_MS = 15_000;
export const SERVER_BACKOFF_JITTER_MS = 250;
export const SECONDARY_RATE_LIMIT_WAIT_MS = 60_000;
export const DEFAULT_PRIMARY_WAIT_MS = 60_000;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Exponential backoff for transient server failures:
 * `min(15s, 0.5s * 2^attempt + jitter)` with jitter drawn from [0, 250ms).
 */
export function computeServerBackoffMs(attempt: number, random: () => number = Math.random): number {
  const exponential = SERVER_BACKOFF_BASE_MS * Math.pow(2, Math.max(0, attempt));
  const jitter = random() * SERVER_BACKOFF_JITTER_MS;
  return Math.min(SERVER_BACKOFF_MAX_MS, exponential + jitter);
}

/**
 * Wait before retrying after a primary (quota) rate limit. `Retry-After` wins;
 * otherwise the distance to `X-RateLimit-Reset`, floored at zero.
 */
export function computePrimaryWaitMs(headers: Record<string, string>, nowMs: number = Date.now()): number {
  const retryAfter = headers["retry-after"];
  if (retryAfter !== undefined) {
    const parsed = parseRetryAfterMs(retryAfter, nowMs);
    if (parsed !== null) return parsed;
  }
  const reset = headers["x-ratelimit-reset"];
  if (reset !== undefined) {
    const resetSeconds = Number(reset.trim());
    if (reset.trim() !== "" && Number.isFinite(resetSeconds)) {
      return Math.max(0, resetSeconds * 1000 - nowMs);
    }
  }
  return DEFAULT_PRIMARY_WAIT_MS;
}

export function parseRetryAfterMs(value: string, nowMs: number = Date.now()): number | null {
  const trimmed = value.trim();
  if (!trimmed) return null;
  const numeric = Number(trimmed);
  if (Number.isFinite(numeric)) {
    return Math.max(0, numeric * 1000);
  }
  const parsedDate = Date.parse(trimmed);
  if (!Number.isNaN(parsedDate)) {
    return Math.max(0, parsedDate - nowMs);
  }
  return null;
}

// Resolves early when the signal aborts; callers check `signal.aborted` afterwards.
export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
