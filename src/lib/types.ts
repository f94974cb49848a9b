export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type RequestKind =
  | "profile"
  | "model"
  | "chat"
  | "agent"
  | "solo"
  | "icube"
  | "auth"
  | "other";

export type EpochMs = number;

export interface UserIdentity {
  userId: string;
  screenName: string;
  email: string;
  region: string;
}

export interface Credentials {
  accessToken: string;
  refreshToken?: string;
  /** Unknown expiry means the token is trusted until the server rejects it. */
  accessExpiresAt?: EpochMs;
  refreshExpiresAt?: EpochMs;
  user?: UserIdentity;
}

export type QueryValue = string | number | boolean | undefined;
export type QueryParams = Record<string, QueryValue>;

export interface ResponseMetadata {
  RequestId?: string;
  TraceID?: string;
  Action?: string;
  Version?: string;
  Source?: string;
  Region?: string;
  WID?: string;
  OID?: string;
}

/** Decoded JSON object of a REST call, returned to callers untouched. */
export type ApiResponse = Record<string, unknown>;

export type TraceOutcome = "success" | "failure";

export interface RequestRecord {
  traceId: string;
  kind: RequestKind;
  method: HttpMethod;
  path: string;
  outcome: TraceOutcome;
  statusCode?: number;
  errorCode?: string;
  durationMs: number;
  startedAt: string;
  summary?: string;
}

export interface PerformanceReport {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  /** Percentage in the 0-100 range. */
  successRate: number;
  avgCostMs: number;
  recentRequests: RequestRecord[];
}

export interface StreamChunk {
  id: string;
  index: number;
  content: string;
  role?: string;
  model?: string;
  finishReason: string | null;
  done: boolean;
  /** Set only on the terminal chunk of a stream that failed mid-flight. */
  error?: string;
}

export interface ChatMessage {
  role: "user" | "assistant" | "system";
  content: string;
  timestamp: string;
}
