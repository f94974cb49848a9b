import { z } from "zod";
import type { ClientContext } from "../context.js";
import { CHAT_HISTORY_WINDOW, ENDPOINTS } from "../lib/constants.js";
import type { ChatMessage, StreamChunk } from "../lib/types.js";
import type { Transport } from "../transport/transport.js";
import type { ModelService } from "./model-service.js";
import { parseResult } from "./results.js";
import type { ServiceResult } from "./results.js";

export interface SendOptions {
  sessionId?: string;
  /** Defaults to the model currently selected on the model service. */
  model?: string;
  context?: Record<string, unknown>;
}

export interface ChatReply {
  content: string;
  sessionId?: string;
}

const chatReplySchema = z
  .object({
    response: z.string().optional(),
    sessionId: z.string().optional(),
    choices: z
      .array(z.object({ message: z.object({ content: z.string().nullish() }).optional() }))
      .optional()
  })
  .refine((data) => data.response !== undefined || data.choices?.[0]?.message !== undefined, {
    message: "reply content missing"
  })
  .transform(
    (data): ChatReply => ({
      content: data.response ?? data.choices?.[0]?.message?.content ?? "",
      ...(data.sessionId ? { sessionId: data.sessionId } : {})
    })
  );

const sessionsSchema = z.object({ sessions: z.array(z.record(z.unknown())) });
const messagesSchema = z.object({ messages: z.array(z.record(z.unknown())) });

export type ChatSession = Record<string, unknown>;
export type SessionMessage = Record<string, unknown>;

export class ChatService {
  private readonly history: ChatMessage[] = [];
  private currentSessionId: string | undefined;

  constructor(
    private readonly transport: Transport,
    private readonly models: ModelService,
    private readonly context: ClientContext
  ) {}

  useSession(sessionId: string | undefined): void {
    this.currentSessionId = sessionId;
  }

  async sendMessage(message: string, options: SendOptions = {}): Promise<ServiceResult<"reply", ChatReply>> {
    const payload = await this.transport.request({
      method: "POST",
      path: ENDPOINTS.chatCompletions,
      body: this.buildPayload(message, options, false),
      kind: "chat"
    });

    this.remember("user", message);
    const result = parseResult("reply", chatReplySchema, payload, this.context.logger);
    if (result.kind === "reply") {
      this.remember("assistant", result.data.content);
    }
    return result;
  }

  /**
   * Streams the reply chunk by chunk. The exchange is added to the history
   * only when the stream completes without an error chunk.
   */
  async *streamMessage(message: string, options: SendOptions = {}): AsyncGenerator<StreamChunk> {
    const chunks = this.transport.stream({
      method: "POST",
      path: ENDPOINTS.chatCompletions,
      body: this.buildPayload(message, options, true),
      kind: "chat"
    });

    let reply = "";
    let failed = false;
    for await (const chunk of chunks) {
      if (chunk.error) {
        failed = true;
      } else {
        reply += chunk.content;
      }
      yield chunk;
    }

    if (!failed) {
      this.remember("user", message);
      this.remember("assistant", reply);
    }
  }

  getHistory(): ChatMessage[] {
    return [...this.history];
  }

  clearHistory(): void {
    this.history.length = 0;
    this.context.logger.info("Chat history cleared");
  }

  async getSessions(): Promise<ServiceResult<"sessions", ChatSession[]>> {
    const payload = await this.transport.request({
      method: "GET",
      path: ENDPOINTS.chatSessions,
      kind: "chat"
    });
    const result = parseResult("sessions", sessionsSchema, payload, this.context.logger);
    return result.kind === "raw" ? result : { kind: "sessions", data: result.data.sessions };
  }

  async getMessages(sessionId: string): Promise<ServiceResult<"messages", SessionMessage[]>> {
    const payload = await this.transport.request({
      method: "GET",
      path: `${ENDPOINTS.chatSessions}/${encodeURIComponent(sessionId)}/messages`,
      kind: "chat"
    });
    const result = parseResult("messages", messagesSchema, payload, this.context.logger);
    return result.kind === "raw" ? result : { kind: "messages", data: result.data.messages };
  }

  private buildPayload(message: string, options: SendOptions, stream: boolean): Record<string, unknown> {
    const payload: Record<string, unknown> = {
      message,
      model: options.model ?? this.models.getSelectedModel(),
      stream,
      sessionId: options.sessionId ?? this.currentSessionId,
      context: options.context ?? {}
    };
    if (this.history.length > 0) {
      payload.history = this.history.slice(-CHAT_HISTORY_WINDOW);
    }
    return payload;
  }

  private remember(role: ChatMessage["role"], content: string): void {
    this.history.push({ role, content, timestamp: new Date(this.context.now()).toISOString() });
  }
}
