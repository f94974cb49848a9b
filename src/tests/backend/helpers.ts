import { vi } from "vitest";
import type { Mock } from "vitest";
import { createClientContext } from "../../context.js";
import type { ClientContext, FetchLike } from "../../context.js";
import type { TransportConfigInput } from "../../config.js";
import { createLogger } from "../../logger.js";

export const NOW = Date.parse("2025-01-01T00:00:00.000Z");

export interface TestContext {
  context: ClientContext;
  fetchMock: Mock<FetchLike>;
  sleeps: number[];
  clock: { now: number };
}

export function testContext(config: TransportConfigInput = {}): TestContext {
  const fetchMock = vi.fn<FetchLike>();
  const sleeps: number[] = [];
  const clock = { now: NOW };

  const context = createClientContext({
    config,
    logger: createLogger({ enabled: false }),
    fetch: fetchMock,
    now: () => clock.now,
    sleep: async (ms) => {
      sleeps.push(ms);
    }
  });

  return { context, fetchMock, sleeps, clock };
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers }
  });
}

export function sseEvent(payload: unknown): string {
  return `data: ${typeof payload === "string" ? payload : JSON.stringify(payload)}\n\n`;
}

export function contentEvent(content: string, finishReason: string | null = null): string {
  return sseEvent({
    id: "chunk-1",
    model: "MiniMax-M2.1",
    choices: [{ index: 0, delta: { content }, finish_reason: finishReason }]
  });
}

export function sseResponse(parts: string[], status = 200): Response {
  const encoder = new TextEncoder();
  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const part of parts) {
        controller.enqueue(encoder.encode(part));
      }
      controller.close();
    }
  });
  return new Response(stream, { status, headers: { "content-type": "text/event-stream" } });
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

export function requestInit(fetchMock: TestContext["fetchMock"], call: number): RequestInit {
  const args = fetchMock.mock.calls[call];
  if (!args) {
    throw new Error(`fetch was not called ${call + 1} times`);
  }
  return args[1];
}

export function requestUrl(fetchMock: TestContext["fetchMock"], call: number): URL {
  const args = fetchMock.mock.calls[call];
  if (!args) {
    throw new Error(`fetch was not called ${call + 1} times`);
  }
  return new URL(args[0]);
}

export function requestHeaders(fetchMock: TestContext["fetchMock"], call: number): Headers {
  return new Headers(requestInit(fetchMock, call).headers);
}

export function requestBody(fetchMock: TestContext["fetchMock"], call: number): unknown {
  const body = requestInit(fetchMock, call).body;
  return typeof body === "string" ? JSON.parse(body) : undefined;
}
