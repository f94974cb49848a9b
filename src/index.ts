export { TraeClient, createClient } from "./client.js";
export type { TraeClientOptions } from "./client.js";
export { createClientContext, delay } from "./context.js";
export type { ClientContext, ClientContextOptions, FetchLike } from "./context.js";
export { getConfig, resolveTransportConfig, transportConfigFromEnv } from "./config.js";
export type { EnvConfig, TransportConfig, TransportConfigInput } from "./config.js";
export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { initTracing, shutdownTracing } from "./tracing.js";
export type { TracingOptions } from "./tracing.js";

export { AuthManager, parseTokenGrant, toEpochMs } from "./auth/auth-manager.js";
export type { TokenGrant } from "./auth/auth-manager.js";
export { CredentialStore, isAccessValid, isRefreshExpired, isWithinRefreshWindow } from "./auth/credentials.js";
export { DEFAULT_STORAGE_PATH, readTokenFromStorage } from "./auth/token-storage.js";

export { Transport } from "./transport/transport.js";
export type { ExecuteOptions, RequestOptions } from "./transport/transport.js";
export { RequestTracer, newTraceId } from "./transport/request-tracer.js";
export type { TraceHandle, TraceResult } from "./transport/request-tracer.js";
export { RequestPool } from "./transport/request-pool.js";
export { backoffDelay, runWithRetry, transition } from "./transport/retry.js";
export type { AttemptOutcome, RetryPolicy, RetryState } from "./transport/retry.js";
export { decodeSse, parseSseEvent } from "./transport/sse-decoder.js";
export type { ByteSource, DecodeOptions } from "./transport/sse-decoder.js";

export { ChatService } from "./services/chat-service.js";
export type { ChatReply, SendOptions } from "./services/chat-service.js";
export { ModelService } from "./services/model-service.js";
export type { ModelInfo, SelectionModes } from "./services/model-service.js";
export { ProfileService } from "./services/profile-service.js";
export type { DeviceIds, ReleaseNoteQuery, UpdateChannel } from "./services/profile-service.js";
export { SoloService } from "./services/solo-service.js";
export type { SoloQualification, SoloSession, SoloStatus } from "./services/solo-service.js";
export type { ServiceResult } from "./services/results.js";

export { AuthError, DecodeError, TraeAPIError, TransportError } from "./lib/errors.js";
export type { AuthErrorKind } from "./lib/errors.js";
export { DEFAULT_BASE_URL, DEFAULT_MODEL, ENDPOINTS, ERROR_CODES } from "./lib/constants.js";
export type * from "./lib/types.js";
