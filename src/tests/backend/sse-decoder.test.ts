import { describe, expect, it, vi } from "vitest";
import { DecodeError } from "../../lib/errors.js";
import { createLogger } from "../../logger.js";
import { decodeSse, extractData, parseSseEvent } from "../../transport/sse-decoder.js";
import { collect, contentEvent, sseEvent } from "./helpers.js";

const logger = createLogger({ enabled: false });

async function* bytesOf(...parts: string[]): AsyncGenerator<Uint8Array> {
  const encoder = new TextEncoder();
  for (const part of parts) {
    yield encoder.encode(part);
  }
}

function splitEvery(text: string, size: number): string[] {
  const parts: string[] = [];
  for (let offset = 0; offset < text.length; offset += size) {
    parts.push(text.slice(offset, offset + size));
  }
  return parts;
}

const greeting = [
  sseEvent({ id: "chunk-1", choices: [{ index: 0, delta: { role: "assistant" } }] }),
  contentEvent("h"),
  contentEvent("i"),
  sseEvent("[DONE]")
].join("");

describe("extractData", () => {
  it("joins multi-line data and ignores other fields", () => {
    expect(extractData("event: message\ndata: first\ndata:second")).toBe("first\nsecond");
    expect(extractData(": keep-alive")).toBeNull();
  });
});

describe("parseSseEvent", () => {
  it("classifies comments, sentinels and bad payloads", () => {
    expect(parseSseEvent(": keep-alive")).toEqual({ type: "ignore" });
    expect(parseSseEvent("data: [DONE]")).toEqual({ type: "done" });
    expect(parseSseEvent("data: not-json").type).toBe("invalid");
    expect(parseSseEvent("data: 42").type).toBe("invalid");
  });

  it("skips role-only deltas", () => {
    expect(parseSseEvent('data: {"choices":[{"delta":{"role":"assistant"}}]}')).toEqual({ type: "ignore" });
  });
});

describe("decodeSse", () => {
  it("yields content chunks in order and stops at the sentinel", async () => {
    const chunks = await collect(decodeSse(bytesOf(greeting, contentEvent("ignored")), { logger }));

    expect(chunks).toEqual([
      { id: "chunk-1", index: 0, content: "h", model: "MiniMax-M2.1", finishReason: null, done: false },
      { id: "chunk-1", index: 1, content: "i", model: "MiniMax-M2.1", finishReason: null, done: false }
    ]);
  });

  it("reassembles events split across arbitrary reads", async () => {
    const chunks = await collect(decodeSse(bytesOf(...splitEvery(greeting, 3)), { logger }));

    expect(chunks.map((chunk) => chunk.content).join("")).toBe("hi");
  });

  it("accepts CRLF line endings split between reads", async () => {
    const crlf = greeting.replace(/\n/g, "\r\n");
    const chunks = await collect(decodeSse(bytesOf(...splitEvery(crlf, 7)), { logger }));

    expect(chunks.map((chunk) => chunk.content)).toEqual(["h", "i"]);
  });

  it("skips a malformed event and keeps going", async () => {
    const chunks = await collect(decodeSse(bytesOf(sseEvent("not-json"), contentEvent("ok")), { logger }));

    expect(chunks.map((chunk) => chunk.content)).toEqual(["ok"]);
  });

  it("ends on a finish reason", async () => {
    const chunks = await collect(
      decodeSse(bytesOf(contentEvent("!", "stop"), contentEvent("after")), { logger })
    );

    expect(chunks).toHaveLength(1);
    expect(chunks[0]).toMatchObject({ content: "!", finishReason: "stop", done: true });
  });

  it("decodes a final event without a trailing blank line", async () => {
    const chunks = await collect(decodeSse(bytesOf(`data: ${JSON.stringify({ choices: [{ delta: { content: "tail" } }] })}`), { logger }));

    expect(chunks.map((chunk) => chunk.content)).toEqual(["tail"]);
  });

  it("throws when every data event is malformed", async () => {
    const error = await collect(decodeSse(bytesOf(sseEvent("not-json"), sseEvent("{broken")), { logger })).catch(
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(DecodeError);
    expect(error).toMatchObject({ message: "Stream produced no valid events", raw: "not-json" });
  });

  it("yields nothing for a stream of comments", async () => {
    await expect(collect(decodeSse(bytesOf(": ping\n\n", ": ping\n\n"), { logger }))).resolves.toEqual([]);
  });

  it("reports every read", async () => {
    const onRead = vi.fn();
    await collect(decodeSse(bytesOf(contentEvent("a"), contentEvent("b")), { logger, onRead }));

    expect(onRead).toHaveBeenCalledTimes(2);
  });

  it("cancels a readable stream the consumer abandons", async () => {
    const cancel = vi.fn();
    const encoder = new TextEncoder();
    const stream = new ReadableStream<Uint8Array>({
      pull(controller) {
        controller.enqueue(encoder.encode(contentEvent("more")));
      },
      cancel
    });

    for await (const chunk of decodeSse(stream, { logger })) {
      expect(chunk.content).toBe("more");
      break;
    }

    expect(cancel).toHaveBeenCalledTimes(1);
  });
});
