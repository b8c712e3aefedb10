import { apiBaseForHost, graphqlUrlForHost } from "./github-api.js";
import type { RetrievalConfig, RetrievalRequest } from "./types.js";

export type TunableName = "perPage" | "maxPages" | "maxComments" | "maxRetries" | "timeoutSeconds";

interface TunableSpec {
  min: number;
  max: number;
  fallback: number;
  env: string;
  integer: boolean;
}

export const TUNABLES: Record<TunableName, TunableSpec> = {
  perPage: { min: 1, max: 100, fallback: 100, env: "HTTP_PER_PAGE", integer: true },
  maxPages: { min: 1, max: 200, fallback: 50, env: "PR_FETCH_MAX_PAGES", integer: true },
  maxComments: { min: 100, max: 100_000, fallback: 2000, env: "PR_FETCH_MAX_COMMENTS", integer: true },
  maxRetries: { min: 0, max: 10, fallback: 3, env: "HTTP_MAX_RETRIES", integer: true },
  timeoutSeconds: { min: 1, max: 300, fallback: 30, env: "HTTP_TIMEOUT", integer: false },
};

export const MAX_RATE_LIMIT_WAITS = 5;

export type Tunables = Record<TunableName, number>;

export interface ConfigSources {
  env?: Record<string, string | undefined>;
  /** Defaults read from `.prcommentsrc`; they sit between explicit values and the environment. */
  defaults?: Partial<Tunables>;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Picks the first usable value from explicit → file defaults → environment →
 * built-in fallback, then clamps it into range. Out-of-range values are
 * clamped, never rejected.
 */
export function resolveTunable(
  name: TunableName,
  explicit: number | undefined,
  sources: ConfigSources = {}
): number {
  const spec = TUNABLES[name];
  const env = sources.env ?? process.env;
  const candidates: Array<number | undefined> = [explicit, sources.defaults?.[name], parseNumber(env[spec.env])];
  for (const candidate of candidates) {
    if (candidate === undefined || !Number.isFinite(candidate)) continue;
    if (spec.integer && !Number.isInteger(candidate)) continue;
    return clamp(candidate, spec.min, spec.max);
  }
  return spec.fallback;
}

export function resolveTunables(request: Partial<Tunables>, sources: ConfigSources = {}): Tunables {
  return {
    perPage: resolveTunable("perPage", request.perPage, sources),
    maxPages: resolveTunable("maxPages", request.maxPages, sources),
    maxComments: resolveTunable("maxComments", request.maxComments, sources),
    maxRetries: resolveTunable("maxRetries", request.maxRetries, sources),
    timeoutSeconds: resolveTunable("timeoutSeconds", request.timeoutSeconds, sources),
  };
}

export function resolveRetrievalConfig(request: RetrievalRequest, sources: ConfigSources = {}): RetrievalConfig {
  const env = sources.env ?? process.env;
  const tunables = resolveTunables(request, sources);
  return {
    target: {
      host: request.host,
      owner: request.owner,
      repo: request.repo,
      pullNumber: request.pullNumber,
    },
    perPage: tunables.perPage,
    maxPages: tunables.maxPages,
    maxComments: tunables.maxComments,
    maxRetries: tunables.maxRetries,
    maxRateLimitWaits: MAX_RATE_LIMIT_WAITS,
    timeoutMs: Math.round(tunables.timeoutSeconds * 1000),
    apiUrl: apiBaseForHost(request.host, request.apiUrl, env),
    graphqlUrl: graphqlUrlForHost(request.host, { apiUrl: request.apiUrl, graphqlUrl: request.graphqlUrl }, env),
  };
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (!trimmed) return undefined;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}
