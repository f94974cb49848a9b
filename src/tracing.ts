import { trace } from "@opentelemetry/api";
import type { Tracer } from "@opentelemetry/api";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { resourceFromAttributes } from "@opentelemetry/resources";
import { NodeSDK } from "@opentelemetry/sdk-node";
import { ATTR_SERVICE_NAME } from "@opentelemetry/semantic-conventions";
import { getConfig } from "./config.js";
import { logger } from "./logger.js";

export interface TracingOptions {
  endpoint?: string;
  headers?: Record<string, string>;
  serviceName?: string;
}

const tracer = trace.getTracer("trae-transport");
let sdk: NodeSDK | null = null;

/** `OTEL_EXPORTER_OTLP_HEADERS` format: `name=value` pairs joined by commas. */
export function parseHeaders(raw: string | undefined): Record<string, string> | undefined {
  const headers: Record<string, string> = {};
  for (const pair of raw?.split(",") ?? []) {
    const separator = pair.indexOf("=");
    if (separator <= 0) {
      continue;
    }
    const name = pair.slice(0, separator).trim();
    const value = pair.slice(separator + 1).trim();
    if (name && value) {
      headers[name] = value;
    }
  }
  return Object.keys(headers).length > 0 ? headers : undefined;
}

/**
 * Starts exporting the transport's request spans over OTLP. Options win over
 * the `OTEL_*` environment; without an endpoint from either this does nothing.
 */
export async function initTracing(options: TracingOptions = {}): Promise<void> {
  const config = getConfig();
  const endpoint = options.endpoint ?? config.OTEL_EXPORTER_OTLP_ENDPOINT;
  if (!endpoint || sdk) {
    return;
  }

  sdk = new NodeSDK({
    traceExporter: new OTLPTraceExporter({
      url: endpoint,
      headers: options.headers ?? parseHeaders(config.OTEL_EXPORTER_OTLP_HEADERS)
    }),
    resource: resourceFromAttributes({
      [ATTR_SERVICE_NAME]: options.serviceName ?? config.OTEL_SERVICE_NAME
    })
  });
  sdk.start();
  logger.debug({ endpoint }, "Request span export started");
}

export async function shutdownTracing(): Promise<void> {
  const current = sdk;
  sdk = null;
  if (!current) {
    return;
  }
  try {
    await current.shutdown();
  } catch (error) {
    logger.warn({ error }, "Request span exporter shutdown failed");
  }
}

export function getTracer(): Tracer {
  return tracer;
}
