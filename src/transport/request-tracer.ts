import { randomBytes } from "node:crypto";
import { SpanStatusCode } from "@opentelemetry/api";
import type { Span, Tracer } from "@opentelemetry/api";
import type { ClientContext } from "../context.js";
import { REPORT_RECENT_LIMIT } from "../lib/constants.js";
import type {
  EpochMs,
  HttpMethod,
  PerformanceReport,
  RequestKind,
  RequestRecord,
  TraceOutcome
} from "../lib/types.js";
import { getTracer } from "../tracing.js";

/** 128 random bits as 32 lowercase hex characters, the W3C trace-id format. */
export function newTraceId(): string {
  return randomBytes(16).toString("hex");
}

export interface TraceHandle {
  readonly traceId: string;
  readonly kind: RequestKind;
  readonly method: HttpMethod;
  readonly path: string;
  readonly startedAt: EpochMs;
}

export interface TraceResult {
  outcome: TraceOutcome;
  statusCode?: number;
  errorCode?: string;
}

interface OpenTrace {
  handle: TraceHandle;
  span: Span;
}

export class RequestTracer {
  private readonly records: RequestRecord[] = [];
  private readonly open = new Map<string, OpenTrace>();
  private readonly maxHistory?: number;

  constructor(
    private readonly context: ClientContext,
    private readonly tracer: Tracer = getTracer()
  ) {
    this.maxHistory = context.config.maxHistory;
  }

  start(kind: RequestKind, method: HttpMethod, path: string): TraceHandle {
    const handle: TraceHandle = Object.freeze({
      traceId: newTraceId(),
      kind,
      method,
      path,
      startedAt: this.context.now()
    });

    const span = this.tracer.startSpan(`${method} ${path}`, {
      attributes: {
        "trae.trace_id": handle.traceId,
        "trae.request.kind": kind,
        "http.request.method": method,
        "url.path": path
      }
    });

    this.open.set(handle.traceId, { handle, span });
    return handle;
  }

  /** Returns false, and records nothing, when the handle was already finished. */
  finish(handle: TraceHandle, result: TraceResult, summary?: string): boolean {
    const entry = this.open.get(handle.traceId);
    if (!entry) {
      this.context.logger.debug({ traceId: handle.traceId }, "Ignoring repeated trace finish");
      return false;
    }
    this.open.delete(handle.traceId);

    const record: RequestRecord = {
      traceId: handle.traceId,
      kind: handle.kind,
      method: handle.method,
      path: handle.path,
      outcome: result.outcome,
      durationMs: Math.max(0, this.context.now() - handle.startedAt),
      startedAt: new Date(handle.startedAt).toISOString(),
      ...(result.statusCode !== undefined ? { statusCode: result.statusCode } : {}),
      ...(result.errorCode ? { errorCode: result.errorCode } : {}),
      ...(summary ? { summary } : {})
    };

    this.records.push(record);
    if (this.maxHistory !== undefined && this.records.length > this.maxHistory) {
      this.records.splice(0, this.records.length - this.maxHistory);
    }

    if (result.statusCode !== undefined) {
      entry.span.setAttribute("http.response.status_code", result.statusCode);
    }
    if (result.outcome === "failure") {
      entry.span.setStatus({ code: SpanStatusCode.ERROR, message: result.errorCode ?? summary });
    } else {
      entry.span.setStatus({ code: SpanStatusCode.OK });
    }
    entry.span.end();

    return true;
  }

  history(): RequestRecord[] {
    return [...this.records];
  }

  get inFlight(): number {
    return this.open.size;
  }

  report(): PerformanceReport {
    const total = this.records.length;
    if (total === 0) {
      return {
        totalRequests: 0,
        successfulRequests: 0,
        failedRequests: 0,
        successRate: 0,
        avgCostMs: 0,
        recentRequests: []
      };
    }

    const successful = this.records.filter((record) => record.outcome === "success").length;
    const totalCost = this.records.reduce((sum, record) => sum + record.durationMs, 0);

    return {
      totalRequests: total,
      successfulRequests: successful,
      failedRequests: total - successful,
      successRate: Number(((successful / total) * 100).toFixed(2)),
      avgCostMs: Number((totalCost / total).toFixed(2)),
      recentRequests: this.records.slice(-REPORT_RECENT_LIMIT)
    };
  }

  reset(): void {
    this.records.length = 0;
  }
}
