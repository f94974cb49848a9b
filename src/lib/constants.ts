export const DEFAULT_BASE_URL = "https://api.trae.com.cn";
export const DEFAULT_USER_AGENT = "Trae-CN/3.3.11";
export const DEFAULT_MODEL = "MiniMax-M2.1";

export const AUTH_HEADERS = {
  authorization: "Authorization",
  platformToken: "x-cloudide-token"
} as const;

export const REQUEST_ID_HEADERS = ["x-tt-logid", "x-request-id"] as const;

export const ENDPOINTS = {
  login: "/auth/login",
  refresh: "/auth/refresh",
  userInfo: "/cloudide/api/v3/trae/GetUserInfo",
  userData: "/icube/api/v1/user",
  nativeConfig: "/icube/api/v1/native/config/query",
  releaseNotes: "/icube/api/v1/release/note",
  controlUrl: "/icube/api/v1/control-url/latest",
  checkUpdate: "/icube/api/v1/package/check_update",
  modelList: "/model/list",
  modelSelectionModes: "/model/selection/modes",
  agentList: "/agent/list",
  chatCompletions: "/chat/completions",
  chatSessions: "/chat/sessions",
  soloQualification: "/trae/api/v1/trae_solo_qualification",
  soloEnable: "/trae/api/v1/trae_solo/enable",
  soloDisable: "/trae/api/v1/trae_solo/disable",
  soloSessions: "/trae/api/v1/trae_solo/sessions"
} as const;

export const ERROR_CODES = {
  badRequest: "ERR_BAD_REQUEST",
  invalidToken: "ERR_INVALID_TOKEN",
  tokenExpired: "ERR_TOKEN_EXPIRED",
  forbidden: "ERR_FORBIDDEN",
  notFound: "ERR_NOT_FOUND",
  rateLimited: "ERR_RATE_LIMITED",
  modelUnavailable: "ERR_MODEL_UNAVAILABLE",
  quotaExceeded: "ERR_QUOTA_EXCEEDED",
  serverError: "ERR_SERVER_ERROR",
  malformedResponse: "ERR_MALFORMED_RESPONSE",
  httpError: "ERR_HTTP",
  network: "ERR_NETWORK",
  timeout: "ERR_TIMEOUT",
  streamInterrupted: "ERR_STREAM_INTERRUPTED",
  decode: "ERR_DECODE"
} as const;

export const SSE_DONE_SENTINEL = "[DONE]";

/** Messages replayed to the chat endpoint as conversational context. */
export const CHAT_HISTORY_WINDOW = 10;

/** Records returned in the `recentRequests` slice of a performance report. */
export const REPORT_RECENT_LIMIT = 20;

/** Device and build descriptors the desktop IDE sends with icube queries. */
export const CLIENT_BUILD = {
  userRegion: "CN",
  packageType: "stable_cn",
  platform: "Mac",
  arch: "arm64",
  tenant: "marscode",
  appVersion: "3.3.11",
  buildVersion: "1.0.27213",
  traeVersionCode: "20250325"
} as const;
