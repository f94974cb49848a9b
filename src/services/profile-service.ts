import { z } from "zod";
import type { AuthManager } from "../auth/auth-manager.js";
import type { ClientContext } from "../context.js";
import { CLIENT_BUILD, ENDPOINTS } from "../lib/constants.js";
import type { QueryParams, UserIdentity } from "../lib/types.js";
import type { Transport } from "../transport/transport.js";
import { parseResult } from "./results.js";
import type { ServiceResult } from "./results.js";

/** Machine, device and user ids the desktop IDE attaches to icube queries. */
export interface DeviceIds {
  mid: string;
  did: string;
  uid: string;
}

export interface UpdateChannel {
  pid?: string;
  branch?: string;
}

export interface ReleaseNoteQuery {
  version?: string;
  pkg?: string;
  language?: string;
  platform?: string;
  arch?: string;
}

const DEFAULT_UPDATE_CHANNEL = {
  pid: "7409949320595642651",
  branch: "release_desktop_yoma_cn"
} as const;

export const userIdentitySchema = z
  .object({
    UserID: z.union([z.string(), z.number()]).optional(),
    userId: z.union([z.string(), z.number()]).optional(),
    ScreenName: z.string().optional(),
    screenName: z.string().optional(),
    Email: z.string().optional(),
    email: z.string().optional(),
    Region: z.string().optional(),
    region: z.string().optional()
  })
  .refine((data) => data.UserID !== undefined || data.userId !== undefined, {
    message: "user id missing"
  })
  .transform(
    (data): UserIdentity => ({
      userId: String(data.UserID ?? data.userId ?? ""),
      screenName: data.ScreenName ?? data.screenName ?? "",
      email: data.Email ?? data.email ?? "",
      region: data.Region ?? data.region ?? "CN"
    })
  );

const agentListSchema = z.object({ agents: z.array(z.record(z.unknown())) });

const controlUrlSchema = z
  .object({
    url: z.string().optional(),
    control_url: z.string().optional()
  })
  .refine((data) => Boolean(data.url ?? data.control_url), { message: "url missing" })
  .transform((data) => data.url ?? data.control_url ?? "");

const recordSchema = z.record(z.unknown());

export type AgentInfo = Record<string, unknown>;

export class ProfileService {
  constructor(
    private readonly transport: Transport,
    private readonly auth: AuthManager,
    private readonly context: ClientContext
  ) {}

  /** Also stores the identity on the current credentials. */
  async getUserInfo(): Promise<ServiceResult<"user", UserIdentity>> {
    const payload = await this.transport.request({
      method: "GET",
      path: ENDPOINTS.userInfo,
      kind: "profile"
    });
    const result = parseResult("user", userIdentitySchema, payload, this.context.logger);
    if (result.kind === "user") {
      this.auth.setUserIdentity(result.data);
    }
    return result;
  }

  async getUserData(): Promise<ServiceResult<"user-data", Record<string, unknown>>> {
    const payload = await this.transport.request({
      method: "GET",
      path: ENDPOINTS.userData,
      kind: "profile"
    });
    return parseResult("user-data", recordSchema, payload, this.context.logger);
  }

  async getNativeConfig(device: DeviceIds): Promise<ServiceResult<"native-config", Record<string, unknown>>> {
    const payload = await this.transport.request({
      method: "GET",
      path: ENDPOINTS.nativeConfig,
      params: deviceParams(device),
      kind: "icube"
    });
    return parseResult("native-config", recordSchema, payload, this.context.logger);
  }

  async getReleaseNotes(
    query: ReleaseNoteQuery = {}
  ): Promise<ServiceResult<"release-notes", Record<string, unknown>>> {
    const payload = await this.transport.request({
      method: "GET",
      path: ENDPOINTS.releaseNotes,
      params: {
        v: query.version ?? CLIENT_BUILD.appVersion,
        pkg: query.pkg ?? CLIENT_BUILD.packageType,
        language: query.language ?? "zh-cn",
        platform: query.platform ?? CLIENT_BUILD.platform,
        arch: query.arch ?? CLIENT_BUILD.arch
      },
      kind: "icube"
    });
    return parseResult("release-notes", recordSchema, payload, this.context.logger);
  }

  async getControlUrl(): Promise<ServiceResult<"control-url", string>> {
    const payload = await this.transport.request({
      method: "GET",
      path: ENDPOINTS.controlUrl,
      kind: "icube"
    });
    return parseResult("control-url", controlUrlSchema, payload, this.context.logger);
  }

  async checkUpdate(
    device: DeviceIds,
    channel: UpdateChannel = {}
  ): Promise<ServiceResult<"update", Record<string, unknown>>> {
    const payload = await this.transport.request({
      method: "GET",
      path: ENDPOINTS.checkUpdate,
      params: {
        ...deviceParams(device),
        pid: channel.pid ?? DEFAULT_UPDATE_CHANNEL.pid,
        branch: channel.branch ?? DEFAULT_UPDATE_CHANNEL.branch
      },
      kind: "icube"
    });
    return parseResult("update", recordSchema, payload, this.context.logger);
  }

  async listAgents(): Promise<ServiceResult<"agents", AgentInfo[]>> {
    const payload = await this.transport.request({
      method: "POST",
      path: ENDPOINTS.agentList,
      kind: "agent"
    });
    const result = parseResult("agents", agentListSchema, payload, this.context.logger);
    return result.kind === "raw" ? result : { kind: "agents", data: result.data.agents };
  }
}

export function deviceParams(device: DeviceIds): QueryParams {
  return {
    mid: device.mid,
    did: device.did,
    uid: device.uid,
    ...CLIENT_BUILD
  };
}
