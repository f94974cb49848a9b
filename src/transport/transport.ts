import type { AuthManager } from "../auth/auth-manager.js";
import type { ClientContext } from "../context.js";
import { ERROR_CODES } from "../lib/constants.js";
import { AuthError, DecodeError, TraeAPIError, TransportError, describeError } from "../lib/errors.js";
import {
  Deadline,
  apiErrorFrom,
  buildUrl,
  isRetriableStatus,
  parseJsonObject,
  requestIdFrom,
  toApiError
} from "../lib/http.js";
import type { Logger } from "../logger.js";
import type {
  ApiResponse,
  HttpMethod,
  QueryParams,
  RequestKind,
  StreamChunk
} from "../lib/types.js";
import { RequestPool } from "./request-pool.js";
import type { RequestTracer, TraceHandle, TraceResult } from "./request-tracer.js";
import { runWithRetry } from "./retry.js";
import type { AttemptOutcome, RetryPolicy } from "./retry.js";
import { decodeSse } from "./sse-decoder.js";

export interface RequestOptions {
  method: HttpMethod;
  path: string;
  params?: QueryParams;
  body?: unknown;
  kind?: RequestKind;
  timeoutMs?: number;
}

export type ExecuteOptions = RequestOptions & { stream?: boolean };

interface HttpReply {
  status: number;
  ok: boolean;
  headers: Headers;
  text: string;
}

interface Success {
  status: number;
  body: ApiResponse;
}

export interface TransportDeps {
  auth: AuthManager;
  tracer: RequestTracer;
  pool?: RequestPool;
}

const SUMMARY_LIMIT = 200;

function summarizeBody(body: ApiResponse): string {
  const text = JSON.stringify(body);
  return text.length > SUMMARY_LIMIT ? `${text.slice(0, SUMMARY_LIMIT)}…` : text;
}

function traceResultFor(error: unknown): TraceResult {
  if (error instanceof TraeAPIError) {
    return { outcome: "failure", statusCode: error.statusCode, errorCode: error.errorCode };
  }
  if (error instanceof TransportError) {
    return {
      outcome: "failure",
      errorCode: error.timedOut ? ERROR_CODES.timeout : ERROR_CODES.network
    };
  }
  if (error instanceof AuthError) {
    return { outcome: "failure", errorCode: error.kind };
  }
  if (error instanceof DecodeError) {
    return { outcome: "failure", errorCode: ERROR_CODES.decode };
  }
  return { outcome: "failure" };
}

/**
 * The one path every API call takes: credentials are checked (and refreshed
 * when due), the call is traced, sent, retried on transient failures and
 * turned into a decoded body or a typed error.
 */
export class Transport {
  readonly auth: AuthManager;
  readonly tracer: RequestTracer;
  private readonly pool: RequestPool;
  private readonly policy: RetryPolicy;

  constructor(
    private readonly context: ClientContext,
    deps: TransportDeps
  ) {
    this.auth = deps.auth;
    this.tracer = deps.tracer;
    this.pool = deps.pool ?? new RequestPool(context.config.poolSize);
    this.policy = {
      maxRetries: context.config.maxRetries,
      retryDelayMs: context.config.retryDelayMs,
      backoffFactor: context.config.backoffFactor
    };
  }

  execute(options: RequestOptions & { stream: true }): AsyncGenerator<StreamChunk>;
  execute(options: RequestOptions & { stream?: false }): Promise<ApiResponse>;
  execute(options: ExecuteOptions): Promise<ApiResponse> | AsyncGenerator<StreamChunk> {
    return options.stream ? this.stream(options) : this.request(options);
  }

  async request(options: RequestOptions): Promise<ApiResponse> {
    await this.ensureAuthorized();
    return this.pool.run(() => this.runRequest(options, options.kind ?? "other"));
  }

  /**
   * Opens an SSE call. Single attempt: a stream that breaks after opening
   * ends with a `{ done: true, error }` chunk, and the caller decides
   * whether to call again.
   */
  async *stream(options: RequestOptions): AsyncGenerator<StreamChunk> {
    await this.ensureAuthorized();

    const handle = this.tracer.start(options.kind ?? "chat", options.method, options.path);
    const log = this.context.logger.child({ traceId: handle.traceId });
    const timeoutMs = options.timeoutMs ?? this.context.config.timeoutMs;

    log.info({ kind: handle.kind, path: options.path }, "Opening stream");

    let headers: Record<string, string>;
    try {
      headers = { ...this.buildHeaders(), Accept: "text/event-stream" };
    } catch (error) {
      this.tracer.finish(handle, traceResultFor(error), describeError(error));
      throw error;
    }

    const deadline = new Deadline(timeoutMs);
    let response: Response;
    try {
      response = await this.context.fetch(buildUrl(this.context.config.baseUrl, options.path, options.params), {
        method: options.method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: deadline.signal
      });
    } catch (error) {
      deadline.clear();
      const failure = new TransportError(
        deadline.timedOut ? `Stream connect timed out after ${timeoutMs}ms` : `Stream connect failed: ${describeError(error)}`,
        { traceId: handle.traceId, timedOut: deadline.timedOut, cause: error }
      );
      this.tracer.finish(handle, traceResultFor(failure), failure.message);
      throw failure;
    }

    if (!response.ok || !response.body) {
      deadline.clear();
      const failure = response.ok
        ? new TraeAPIError({
            statusCode: response.status,
            errorCode: ERROR_CODES.malformedResponse,
            message: "Stream response has no body",
            requestId: requestIdFrom(response.headers, {}, handle.traceId),
            traceId: handle.traceId
          })
        : await toApiError(response, handle.traceId);
      this.tracer.finish(handle, traceResultFor(failure), failure.message);
      log.error({ statusCode: failure.statusCode, errorCode: failure.errorCode }, "Stream rejected");
      throw failure;
    }

    let received = 0;
    let failed = false;
    try {
      const chunks = decodeSse(response.body, { logger: log, onRead: () => deadline.touch() });
      for await (const chunk of chunks) {
        received += 1;
        // the idle timer only runs while waiting on the network
        deadline.clear();
        yield chunk;
        deadline.touch();
      }
    } catch (error) {
      failed = true;
      const message = deadline.timedOut
        ? `Stream idle for more than ${timeoutMs}ms`
        : `Stream interrupted: ${describeError(error)}`;
      this.tracer.finish(
        handle,
        {
          outcome: "failure",
          statusCode: response.status,
          errorCode: deadline.timedOut
            ? ERROR_CODES.timeout
            : error instanceof DecodeError
              ? ERROR_CODES.decode
              : ERROR_CODES.streamInterrupted
        },
        message
      );
      log.warn({ received, error: describeError(error) }, "Stream ended early");
      yield { id: "", index: received, content: "", finishReason: null, done: true, error: message };
    } finally {
      deadline.clear();
      if (!failed) {
        this.tracer.finish(handle, { outcome: "success", statusCode: response.status }, `${received} chunks`);
        log.info({ received }, "Stream closed");
      }
    }
  }

  private async ensureAuthorized(): Promise<void> {
    const now = this.context.now();

    if (!this.auth.isValid(now)) {
      await this.auth.refresh(now);
      return;
    }

    if (this.auth.needsRefresh(now) && this.auth.canRefresh()) {
      try {
        await this.auth.refresh(now);
      } catch (error) {
        // the current token is still valid, so the call goes ahead
        this.context.logger.warn({ error: describeError(error) }, "Proactive token refresh failed");
      }
    }
  }

  private buildHeaders(): Record<string, string> {
    return {
      ...this.auth.headers(),
      "Content-Type": "application/json",
      "User-Agent": this.context.config.userAgent
    };
  }

  private async runRequest(options: RequestOptions, kind: RequestKind): Promise<ApiResponse> {
    const handle = this.tracer.start(kind, options.method, options.path);
    const log = this.context.logger.child({ traceId: handle.traceId });

    if (this.context.config.enableLogging) {
      log.info({ kind, method: options.method, path: options.path }, "executeRequest");
    }

    try {
      const result = await runWithRetry(
        this.policy,
        this.context.sleep,
        (attempt) => this.attempt(options, handle, attempt, log),
        (state) => {
          if (state.phase === "retry-wait") {
            log.warn({ attempt: state.attempt, delayMs: state.delayMs }, "Retrying request");
          }
        }
      );
      this.tracer.finish(handle, { outcome: "success", statusCode: result.status }, summarizeBody(result.body));
      log.info({ path: options.path, statusCode: result.status }, "executeRequest success");
      return result.body;
    } catch (error) {
      this.tracer.finish(handle, traceResultFor(error), describeError(error));
      log.error({ path: options.path, error: describeError(error) }, "executeRequest failed");
      throw error;
    }
  }

  private async attempt(
    options: RequestOptions,
    handle: TraceHandle,
    attemptNumber: number,
    log: Logger
  ): Promise<AttemptOutcome<Success>> {
    let reply: HttpReply;
    try {
      reply = await this.send(options, handle.traceId, attemptNumber);
      if (reply.status === 401 && this.auth.canRefresh()) {
        log.warn({ attempt: attemptNumber }, "Access token rejected, refreshing");
        await this.auth.refresh();
        reply = await this.send(options, handle.traceId, attemptNumber);
      }
    } catch (error) {
      if (error instanceof TransportError) {
        log.warn({ attempt: attemptNumber, timedOut: error.timedOut }, error.message);
        return { ok: false, error, retriable: true };
      }
      throw error;
    }

    if (reply.ok) {
      const body = reply.text.trim() === "" ? {} : parseJsonObject(reply.text);
      if (!body) {
        return {
          ok: false,
          retriable: false,
          error: new TraeAPIError({
            statusCode: reply.status,
            errorCode: ERROR_CODES.malformedResponse,
            message: "Response body is not a JSON object",
            requestId: requestIdFrom(reply.headers, {}, handle.traceId),
            traceId: handle.traceId
          })
        };
      }
      return { ok: true, value: { status: reply.status, body } };
    }

    return {
      ok: false,
      error: apiErrorFrom(reply.status, reply.headers, reply.text, handle.traceId),
      retriable: isRetriableStatus(reply.status)
    };
  }

  private async send(options: RequestOptions, traceId: string, attemptNumber: number): Promise<HttpReply> {
    const timeoutMs = options.timeoutMs ?? this.context.config.timeoutMs;
    const url = buildUrl(this.context.config.baseUrl, options.path, options.params);
    // outside the try: a missing token is an AuthError, not a network failure
    const headers = this.buildHeaders();
    const deadline = new Deadline(timeoutMs);

    try {
      const response = await this.context.fetch(url, {
        method: options.method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: deadline.signal
      });
      const text = await response.text();
      return { status: response.status, ok: response.ok, headers: response.headers, text };
    } catch (error) {
      throw new TransportError(
        deadline.timedOut ? `Request timed out after ${timeoutMs}ms` : `Network error: ${describeError(error)}`,
        { traceId, timedOut: deadline.timedOut, attempts: attemptNumber, cause: error }
      );
    } finally {
      deadline.clear();
    }
  }
}
