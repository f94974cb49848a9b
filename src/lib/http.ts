import { z } from "zod";
import { ERROR_CODES, REQUEST_ID_HEADERS } from "./constants.js";
import { TraeAPIError } from "./errors.js";
import type { ApiResponse, QueryParams } from "./types.js";

export function buildUrl(baseUrl: string, path: string, params?: QueryParams): string {
  const normalizedPath = path.startsWith("/") ? path : `/${path}`;
  const url = new URL(`${baseUrl}${normalizedPath}`);

  if (params) {
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
  }

  return url.toString();
}

/** 429 and 5xx are worth another attempt; every other status is final. */
export function isRetriableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export function defaultErrorCode(status: number): string {
  switch (status) {
    case 400:
      return ERROR_CODES.badRequest;
    case 401:
      return ERROR_CODES.invalidToken;
    case 403:
      return ERROR_CODES.forbidden;
    case 404:
      return ERROR_CODES.notFound;
    case 429:
      return ERROR_CODES.rateLimited;
    default:
      return status >= 500 ? ERROR_CODES.serverError : ERROR_CODES.httpError;
  }
}

const errorBodySchema = z.object({
  ResponseMetadata: z
    .object({
      RequestId: z.string().optional(),
      Error: z
        .object({
          Code: z.string().optional(),
          Message: z.string().optional()
        })
        .optional()
    })
    .optional(),
  error_code: z.string().optional(),
  code: z.union([z.string(), z.number()]).optional(),
  message: z.string().optional(),
  error: z
    .union([
      z.string(),
      z.object({
        code: z.string().optional(),
        message: z.string().optional()
      })
    ])
    .optional()
});

export interface ErrorDetails {
  errorCode?: string;
  message?: string;
  requestId?: string;
}

export function readErrorDetails(text: string): ErrorDetails {
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return text.trim() ? { message: text.trim().slice(0, 200) } : {};
  }

  const parsed = errorBodySchema.safeParse(body);
  if (!parsed.success) {
    return {};
  }

  const data = parsed.data;
  const nested = typeof data.error === "object" ? data.error : undefined;
  const code = data.code !== undefined ? String(data.code) : undefined;

  return {
    errorCode: data.ResponseMetadata?.Error?.Code ?? data.error_code ?? nested?.code ?? code,
    message:
      data.ResponseMetadata?.Error?.Message ??
      data.message ??
      nested?.message ??
      (typeof data.error === "string" ? data.error : undefined),
    requestId: data.ResponseMetadata?.RequestId
  };
}

export function requestIdFrom(headers: Headers, details: ErrorDetails, fallback: string): string {
  if (details.requestId) {
    return details.requestId;
  }
  for (const name of REQUEST_ID_HEADERS) {
    const value = headers.get(name);
    if (value) {
      return value;
    }
  }
  return fallback;
}

export function apiErrorFrom(
  status: number,
  headers: Headers,
  text: string,
  traceId: string
): TraeAPIError {
  const details = readErrorDetails(text);

  return new TraeAPIError({
    statusCode: status,
    errorCode: details.errorCode ?? defaultErrorCode(status),
    message: `HTTP ${status}${details.message ? `: ${details.message}` : ""}`,
    requestId: requestIdFrom(headers, details, traceId),
    traceId
  });
}

export async function toApiError(response: Response, traceId: string): Promise<TraeAPIError> {
  const text = await response.text().catch(() => "");
  return apiErrorFrom(response.status, response.headers, text, traceId);
}

const objectBodySchema = z.record(z.unknown());

/** Returns null for bodies that are not a JSON object. */
export function parseJsonObject(text: string): ApiResponse | null {
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return null;
  }
  const parsed = objectBodySchema.safeParse(body);
  return parsed.success ? parsed.data : null;
}

/**
 * Abort timer for one network exchange. `touch()` restarts the countdown,
 * which turns the same timer into an idle limit for streamed bodies.
 */
export class Deadline {
  private readonly controller = new AbortController();
  private timer: ReturnType<typeof setTimeout> | null = null;
  private expired = false;

  constructor(private readonly timeoutMs: number) {
    this.touch();
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get timedOut(): boolean {
    return this.expired;
  }

  touch(): void {
    this.clear();
    this.timer = setTimeout(() => {
      this.expired = true;
      this.controller.abort(new Error(`Timed out after ${this.timeoutMs}ms`));
    }, this.timeoutMs);
  }

  clear(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
