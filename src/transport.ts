import { request as octokitRequest } from "@octokit/request";
import { RequestError } from "@octokit/request-error";
import { GITHUB_ACCEPT_HEADER, GITHUB_API_VERSION, GITHUB_USER_AGENT } from "./github-api.js";
import type { AuthScheme, HttpResponse, Transport, TransportRequest } from "./types.js";

type RequestFn = typeof octokitRequest;

export interface OctokitTransportOptions {
  token?: string;
  timeoutMs: number;
  userAgent?: string;
  signal?: AbortSignal;
  request?: RequestFn;
}

/**
 * Thin wrapper over `@octokit/request`. Every outcome, including non-2xx
 * statuses and network failures, comes back as an `HttpResponse` so the
 * rate-limit classifier sees it; nothing is thrown.
 */
export function createOctokitTransport(options: OctokitTransportOptions): Transport {
  const token = options.token?.trim() ?? "";
  const request = (options.request ?? octokitRequest).defaults({
    headers: {
      accept: GITHUB_ACCEPT_HEADER,
      "x-github-api-version": GITHUB_API_VERSION,
      "user-agent": options.userAgent ?? GITHUB_USER_AGENT,
    },
  });

  return {
    hasCredential: token.length > 0,
    async send(req: TransportRequest): Promise<HttpResponse> {
      const controller = new AbortController();
      const onCallerAbort = () => controller.abort();
      if (options.signal?.aborted) controller.abort();
      options.signal?.addEventListener("abort", onCallerAbort, { once: true });
      const timer = setTimeout(() => controller.abort(), options.timeoutMs);

      const headers: Record<string, string> = {};
      if (token) headers.authorization = authorizationHeader(req.authScheme, token);

      try {
        const route: string = req.method === "GET" ? `GET ${req.url}` : `POST ${req.url}`;
        const params = req.method === "GET" ? { ...req.query } : { query: req.body.query, variables: req.body.variables };
        const response = await request(route, {
          ...params,
          headers,
          request: { signal: controller.signal },
        });
        return { status: response.status, headers: normalizeHeaders(response.headers), body: response.data };
      } catch (error) {
        return toHttpResponse(error, options.signal?.aborted ?? false);
      } finally {
        clearTimeout(timer);
        options.signal?.removeEventListener("abort", onCallerAbort);
      }
    },
  };
}

export function authorizationHeader(scheme: AuthScheme, token: string): string {
  return scheme === "bearer" ? `Bearer ${token}` : `token ${token}`;
}

export function toHttpResponse(error: unknown, callerAborted: boolean): HttpResponse {
  if (error instanceof RequestError && error.response) {
    return {
      status: error.response.status,
      headers: normalizeHeaders(error.response.headers),
      body: error.response.data,
    };
  }
  const message = error instanceof Error ? error.message : String(error);
  if (callerAborted) {
    return { status: 0, headers: {}, body: null, error: "aborted" };
  }
  if (error instanceof Error && error.name === "AbortError") {
    return { status: 0, headers: {}, body: null, error: "request timed out" };
  }
  return { status: 0, headers: {}, body: null, error: message };
}

export function normalizeHeaders(headers: Record<string, string | number | undefined>): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    normalized[name.toLowerCase()] = String(value);
  }
  return normalized;
}
