export type AuthErrorKind = "RefreshExpired" | "RefreshRejected" | "MissingToken";

export class AuthError extends Error {
  public readonly kind: AuthErrorKind;

  constructor(kind: AuthErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AuthError";
    this.kind = kind;
  }
}

interface TraeAPIErrorInit {
  statusCode: number;
  errorCode: string;
  message: string;
  requestId: string;
  traceId: string;
  details?: Record<string, unknown>;
}

/** Terminal non-2xx REST failure, raised once retries are spent or for non-retriable statuses. */
export class TraeAPIError extends Error {
  public readonly statusCode: number;
  public readonly errorCode: string;
  public readonly requestId: string;
  public readonly traceId: string;
  public readonly details?: Record<string, unknown>;

  constructor(init: TraeAPIErrorInit) {
    super(init.message);
    this.name = "TraeAPIError";
    this.statusCode = init.statusCode;
    this.errorCode = init.errorCode;
    this.requestId = init.requestId;
    this.traceId = init.traceId;
    this.details = init.details;
  }
}

/** Failure before any HTTP status was received: connect errors, resets, timeouts. */
export class TransportError extends Error {
  public readonly traceId: string;
  public readonly timedOut: boolean;
  public readonly attempts: number;

  constructor(
    message: string,
    init: { traceId: string; timedOut?: boolean; attempts?: number; cause?: unknown }
  ) {
    super(message, { cause: init.cause });
    this.name = "TransportError";
    this.traceId = init.traceId;
    this.timedOut = init.timedOut ?? false;
    this.attempts = init.attempts ?? 1;
  }
}

export class DecodeError extends Error {
  public readonly raw: string;

  constructor(message: string, raw: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DecodeError";
    this.raw = raw;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
