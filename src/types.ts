export interface Comment {
  id?: number | string;
  author: string;
  path: string;
  line: number;
  body: string;
  diffContext: string;
  isResolved: boolean;
  isOutdated: boolean;
  resolvedBy?: string;
}

export type WalkStrategy = "graphql" | "rest";

export type OutputMode = "json" | "markdown" | "both";

export interface PullRequestTarget {
  host: string;
  owner: string;
  repo: string;
  pullNumber: number;
}

export interface RetrievalRequest extends PullRequestTarget {
  perPage?: number;
  maxPages?: number;
  maxComments?: number;
  maxRetries?: number;
  timeoutSeconds?: number;
  apiUrl?: string;
  graphqlUrl?: string;
}

export interface RetrievalConfig {
  target: PullRequestTarget;
  perPage: number;
  maxPages: number;
  maxComments: number;
  maxRetries: number;
  maxRateLimitWaits: number;
  timeoutMs: number;
  apiUrl: string;
  graphqlUrl: string;
}

export type LimitKind = "max_comments" | "max_pages" | "secondary_rate_limit";

export type FailureKind =
  | "auth_failure"
  | "not_found"
  | "rate_limited"
  | "server_error"
  | "fatal"
  | "aborted";

export interface RetrievalFailure {
  kind: FailureKind;
  message: string;
  status?: number;
  requestId?: string;
  scope?: "primary" | "secondary";
}

export type RetrievalOutcome =
  | { status: "complete"; comments: Comment[] }
  | { status: "partial"; comments: Comment[]; limit: LimitKind }
  | { status: "failed"; failure: RetrievalFailure };

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: unknown;
  error?: string;
}

export type AuthScheme = "bearer" | "token";

export type TransportRequest =
  | {
      method: "GET";
      url: string;
      query: Record<string, string | number>;
      authScheme: AuthScheme;
    }
  | {
      method: "POST";
      url: string;
      body: { query: string; variables: Record<string, unknown> };
      authScheme: AuthScheme;
    };

export interface Transport {
  readonly hasCredential: boolean;
  send(request: TransportRequest): Promise<HttpResponse>;
}
