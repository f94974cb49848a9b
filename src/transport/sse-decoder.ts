import { z } from "zod";
import { SSE_DONE_SENTINEL } from "../lib/constants.js";
import { DecodeError, describeError } from "../lib/errors.js";
import type { StreamChunk } from "../lib/types.js";
import { logger as defaultLogger } from "../logger.js";
import type { Logger } from "../logger.js";

export type ByteSource = AsyncIterable<Uint8Array> | ReadableStream<Uint8Array>;

const chatEventSchema = z.object({
  id: z.union([z.string(), z.number()]).optional(),
  object: z.string().optional(),
  created: z.number().optional(),
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        index: z.number().optional(),
        delta: z
          .object({
            role: z.string().nullish(),
            content: z.string().nullish()
          })
          .optional(),
        finish_reason: z.string().nullish()
      })
    )
    .default([])
});

export type SseEvent =
  | { type: "ignore" }
  | { type: "done" }
  | { type: "chunk"; chunk: Omit<StreamChunk, "index"> }
  | { type: "invalid"; error: DecodeError };

/** Joins the `data:` lines of one event; null when the event carries none. */
export function extractData(rawEvent: string): string | null {
  const lines: string[] = [];
  for (const line of rawEvent.split("\n")) {
    if (line.startsWith("data:")) {
      lines.push(line.slice("data:".length).replace(/^ /, ""));
    }
  }
  return lines.length > 0 ? lines.join("\n") : null;
}

export function parseSseEvent(rawEvent: string): SseEvent {
  const data = extractData(rawEvent);
  if (data === null || data.trim() === "") {
    return { type: "ignore" };
  }
  if (data.trim() === SSE_DONE_SENTINEL) {
    return { type: "done" };
  }

  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch (error) {
    return {
      type: "invalid",
      error: new DecodeError(`Malformed SSE data: ${describeError(error)}`, data, { cause: error })
    };
  }

  const parsed = chatEventSchema.safeParse(json);
  if (!parsed.success) {
    return {
      type: "invalid",
      error: new DecodeError(`Unexpected SSE event shape: ${parsed.error.message}`, data)
    };
  }

  const event = parsed.data;
  const choice = event.choices[0];
  const content = choice?.delta?.content ?? "";
  const finishReason = choice?.finish_reason ?? null;

  if (!content && finishReason === null) {
    return { type: "ignore" };
  }

  return {
    type: "chunk",
    chunk: {
      id: event.id !== undefined ? String(event.id) : "",
      content,
      ...(choice?.delta?.role ? { role: choice.delta.role } : {}),
      ...(event.model ? { model: event.model } : {}),
      finishReason,
      done: finishReason !== null
    }
  };
}

async function* readBytes(source: ByteSource, logger: Logger): AsyncGenerator<Uint8Array> {
  if (!("getReader" in source)) {
    yield* source;
    return;
  }

  const reader = source.getReader();
  let finished = false;
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        return;
      }
      if (value) {
        yield value;
      }
    }
  } finally {
    if (!finished) {
      await reader.cancel().catch((error: unknown) => {
        logger.debug({ error: describeError(error) }, "Stream cancel failed");
      });
    }
    reader.releaseLock();
  }
}

interface DecodeState {
  index: number;
  dataEvents: number;
  validEvents: number;
  firstError: DecodeError | null;
  ended: boolean;
}

export interface DecodeOptions {
  logger?: Logger;
  /** Called after every read from the source, including reads that complete no event. */
  onRead?: (byteLength: number) => void;
}

/**
 * Turns an SSE byte stream into chat chunks. Forward-only and single
 * consumer: a new sequence needs a new connection.
 *
 * A malformed event is logged and skipped. The sequence ends on `[DONE]`,
 * on a chunk with a finish reason, or when the source closes.
 */
export async function* decodeSse(
  source: ByteSource,
  options: DecodeOptions = {}
): AsyncGenerator<StreamChunk> {
  const logger = options.logger ?? defaultLogger;
  const textDecoder = new TextDecoder();
  let buffer = "";
  let pendingCr = "";
  const state: DecodeState = {
    index: 0,
    dataEvents: 0,
    validEvents: 0,
    firstError: null,
    ended: false
  };

  const takeEvents = (flush: boolean): string[] => {
    buffer = buffer.replace(/\r\n?/g, "\n");
    const events: string[] = [];
    let boundary: number;
    while ((boundary = buffer.indexOf("\n\n")) !== -1) {
      events.push(buffer.slice(0, boundary));
      buffer = buffer.slice(boundary + 2);
    }
    if (flush && buffer.trim()) {
      events.push(buffer);
      buffer = "";
    }
    return events;
  };

  function* emit(rawEvents: string[]): Generator<StreamChunk> {
    for (const rawEvent of rawEvents) {
      const event = parseSseEvent(rawEvent);
      if (event.type === "ignore") {
        continue;
      }
      state.dataEvents += 1;
      if (event.type === "invalid") {
        state.firstError = state.firstError ?? event.error;
        logger.warn(
          { error: event.error.message, data: event.error.raw.slice(0, 200) },
          "Skipping malformed SSE event"
        );
        continue;
      }
      state.validEvents += 1;
      if (event.type === "done") {
        state.ended = true;
        return;
      }
      yield { ...event.chunk, index: state.index };
      state.index += 1;
      if (event.chunk.done) {
        state.ended = true;
        return;
      }
    }
  }

  for await (const bytes of readBytes(source, logger)) {
    options.onRead?.(bytes.byteLength);
    let text = pendingCr + textDecoder.decode(bytes, { stream: true });
    pendingCr = "";
    // a trailing "\r" may be the first half of "\r\n"
    if (text.endsWith("\r")) {
      pendingCr = "\r";
      text = text.slice(0, -1);
    }
    buffer += text;

    yield* emit(takeEvents(false));
    if (state.ended) {
      return;
    }
  }

  buffer += pendingCr + textDecoder.decode();
  yield* emit(takeEvents(true));
  if (state.ended) {
    return;
  }

  if (state.dataEvents > 0 && state.validEvents === 0) {
    throw new DecodeError("Stream produced no valid events", state.firstError?.raw ?? "", {
      cause: state.firstError ?? undefined
    });
  }
}
