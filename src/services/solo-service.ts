import { z } from "zod";
import type { ClientContext } from "../context.js";
import { ENDPOINTS } from "../lib/constants.js";
import type { Transport } from "../transport/transport.js";
import { parseResult, unwrapResult } from "./results.js";
import type { ServiceResult } from "./results.js";

export const qualificationSchema = z
  .object({
    qualified: z.boolean().default(false),
    can_use_solo: z.boolean().default(false),
    plan_type: z.string().default("free"),
    features: z.array(z.string()).default([])
  })
  .transform((data) => ({
    qualified: data.qualified,
    canUseSolo: data.can_use_solo,
    planType: data.plan_type,
    features: data.features
  }));

export type SoloQualification = z.output<typeof qualificationSchema>;

const sessionSchema = z.object({ id: z.union([z.string(), z.number()]).transform(String) }).passthrough();
const sessionListSchema = z.object({ sessions: z.array(sessionSchema) });
const createdSessionSchema = z.object({ session: sessionSchema });
const enabledSchema = z.object({ enabled: z.boolean().optional() });

export type SoloSession = z.output<typeof sessionSchema>;

export interface SoloStatus {
  qualified: boolean;
  canUse: boolean;
  modeEnabled: boolean;
  sessionsCount: number;
  qualification: SoloQualification | null;
}

export class SoloService {
  private qualification: SoloQualification | null = null;
  private modeEnabled = false;
  private sessions: SoloSession[] = [];

  constructor(
    private readonly transport: Transport,
    private readonly context: ClientContext
  ) {}

  async getQualification(): Promise<ServiceResult<"qualification", SoloQualification>> {
    const payload = await this.transport.request({
      method: "GET",
      path: ENDPOINTS.soloQualification,
      kind: "solo"
    });
    const result = parseResult("qualification", qualificationSchema, payload, this.context.logger);
    if (result.kind === "qualification") {
      this.qualification = result.data;
    }
    return result;
  }

  /** Refuses without a request when the account cannot use solo mode. */
  async enable(): Promise<boolean> {
    const qualification = await this.loadQualification();
    if (!qualification?.canUseSolo) {
      this.context.logger.warn("Account is not qualified for solo mode");
      return false;
    }

    const payload = await this.transport.request({
      method: "POST",
      path: ENDPOINTS.soloEnable,
      kind: "solo"
    });
    const parsed = enabledSchema.safeParse(unwrapResult(payload));
    this.modeEnabled = parsed.success ? (parsed.data.enabled ?? true) : true;
    this.context.logger.info({ enabled: this.modeEnabled }, "Solo mode enabled");
    return this.modeEnabled;
  }

  async disable(): Promise<boolean> {
    await this.transport.request({
      method: "POST",
      path: ENDPOINTS.soloDisable,
      kind: "solo"
    });
    this.modeEnabled = false;
    this.context.logger.info("Solo mode disabled");
    return true;
  }

  async listSessions(): Promise<ServiceResult<"sessions", SoloSession[]>> {
    const payload = await this.transport.request({
      method: "GET",
      path: ENDPOINTS.soloSessions,
      kind: "solo"
    });
    const result = parseResult("sessions", sessionListSchema, payload, this.context.logger);
    if (result.kind === "raw") {
      return result;
    }
    this.sessions = result.data.sessions;
    return { kind: "sessions", data: result.data.sessions };
  }

  async createSession(name?: string): Promise<ServiceResult<"session", SoloSession>> {
    const payload = await this.transport.request({
      method: "POST",
      path: ENDPOINTS.soloSessions,
      body: name ? { name } : {},
      kind: "solo"
    });
    const result = parseResult("session", createdSessionSchema, payload, this.context.logger);
    if (result.kind === "raw") {
      return result;
    }
    this.sessions.push(result.data.session);
    this.context.logger.info({ sessionId: result.data.session.id }, "Solo session created");
    return { kind: "session", data: result.data.session };
  }

  async endSession(sessionId: string): Promise<void> {
    await this.transport.request({
      method: "DELETE",
      path: `${ENDPOINTS.soloSessions}/${encodeURIComponent(sessionId)}`,
      kind: "solo"
    });
    this.sessions = this.sessions.filter((session) => session.id !== sessionId);
    this.context.logger.info({ sessionId }, "Solo session ended");
  }

  /** Fetches the qualification first when none is cached. */
  async getStatus(): Promise<SoloStatus> {
    const qualification = await this.loadQualification();
    return {
      qualified: qualification?.qualified ?? false,
      canUse: qualification?.canUseSolo ?? false,
      modeEnabled: this.modeEnabled,
      sessionsCount: this.sessions.length,
      qualification
    };
  }

  private async loadQualification(): Promise<SoloQualification | null> {
    if (!this.qualification) {
      await this.getQualification();
    }
    return this.qualification;
  }
}
