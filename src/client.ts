import { AuthManager } from "./auth/auth-manager.js";
import { getConfig } from "./config.js";
import { createClientContext } from "./context.js";
import type { ClientContext, ClientContextOptions } from "./context.js";
import type { Credentials, PerformanceReport, RequestRecord } from "./lib/types.js";
import { ChatService } from "./services/chat-service.js";
import { ModelService } from "./services/model-service.js";
import { ProfileService } from "./services/profile-service.js";
import { SoloService } from "./services/solo-service.js";
import { RequestPool } from "./transport/request-pool.js";
import { RequestTracer } from "./transport/request-tracer.js";
import { Transport } from "./transport/transport.js";

export interface TraeClientOptions extends ClientContextOptions {
  /** Full credential set; takes precedence over `token` and `refreshToken`. */
  credentials?: Credentials;
  token?: string;
  refreshToken?: string;
}

function initialCredentials(options: TraeClientOptions): Credentials | undefined {
  if (options.credentials) {
    return options.credentials;
  }
  const env = options.token ? undefined : getConfig();
  const accessToken = options.token ?? env?.TRAE_TOKEN;
  if (!accessToken) {
    return undefined;
  }
  return {
    accessToken,
    refreshToken: options.refreshToken ?? env?.TRAE_REFRESH_TOKEN
  };
}

export class TraeClient {
  readonly context: ClientContext;
  readonly auth: AuthManager;
  readonly tracer: RequestTracer;
  readonly transport: Transport;
  readonly models: ModelService;
  readonly profile: ProfileService;
  readonly chat: ChatService;
  readonly solo: SoloService;

  constructor(options: TraeClientOptions = {}) {
    this.context = createClientContext(options);
    this.auth = new AuthManager(this.context, initialCredentials(options));
    this.tracer = new RequestTracer(this.context);
    this.transport = new Transport(this.context, {
      auth: this.auth,
      tracer: this.tracer,
      pool: new RequestPool(this.context.config.poolSize)
    });
    this.models = new ModelService(this.transport, this.context);
    this.profile = new ProfileService(this.transport, this.auth, this.context);
    this.chat = new ChatService(this.transport, this.models, this.context);
    this.solo = new SoloService(this.transport, this.context);
  }

  login(username: string, password: string): Promise<Readonly<Credentials>> {
    return this.auth.login(username, password);
  }

  refreshToken(): Promise<Readonly<Credentials>> {
    return this.auth.refresh();
  }

  getPerformanceReport(): PerformanceReport {
    return this.tracer.report();
  }

  getRequestHistory(): RequestRecord[] {
    return this.tracer.history();
  }

  /** Drops credentials, request history and chat history. */
  close(): void {
    this.auth.logout();
    this.tracer.reset();
    this.chat.clearHistory();
    this.context.logger.info("Client closed");
  }
}

export function createClient(options: TraeClientOptions = {}): TraeClient {
  return new TraeClient(options);
}
