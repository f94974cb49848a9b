import { z } from "zod";
import type { ClientContext } from "../context.js";
import { AUTH_HEADERS, ENDPOINTS } from "../lib/constants.js";
import { AuthError, TraeAPIError, TransportError, describeError } from "../lib/errors.js";
import { Deadline, buildUrl, toApiError } from "../lib/http.js";
import type { Credentials, EpochMs, UserIdentity } from "../lib/types.js";
import { newTraceId } from "../transport/request-tracer.js";
import {
  CredentialStore,
  isAccessValid,
  isRefreshExpired,
  isWithinRefreshWindow
} from "./credentials.js";

const timestampSchema = z.union([z.string(), z.number()]);

const tokenGrantSchema = z.object({
  token: z.string().min(1).optional(),
  accessToken: z.string().min(1).optional(),
  expiredAt: timestampSchema.optional(),
  expiresAt: timestampSchema.optional(),
  refreshToken: z.string().min(1).optional(),
  refreshExpiredAt: timestampSchema.optional(),
  refreshExpiresAt: timestampSchema.optional()
});

const envelopeSchema = z.object({ Result: z.record(z.unknown()) });

export interface TokenGrant {
  token: string;
  accessExpiresAt?: EpochMs;
  refreshToken?: string;
  refreshExpiresAt?: EpochMs;
}

/**
 * Accepts ISO strings, numeric strings and epoch numbers. Values below 1e12
 * are read as seconds.
 */
export function toEpochMs(value: string | number | undefined): EpochMs | undefined {
  if (value === undefined || value === "") {
    return undefined;
  }
  const numeric = typeof value === "number" ? value : Number(value);
  if (Number.isFinite(numeric)) {
    return numeric < 1e12 ? numeric * 1000 : numeric;
  }
  const parsed = Date.parse(String(value));
  return Number.isNaN(parsed) ? undefined : parsed;
}

export function parseTokenGrant(body: unknown): TokenGrant | null {
  const envelope = envelopeSchema.safeParse(body);
  const parsed = tokenGrantSchema.safeParse(envelope.success ? envelope.data.Result : body);
  if (!parsed.success) {
    return null;
  }

  const data = parsed.data;
  const token = data.token ?? data.accessToken;
  if (!token) {
    return null;
  }

  return {
    token,
    accessExpiresAt: toEpochMs(data.expiredAt ?? data.expiresAt),
    refreshToken: data.refreshToken,
    refreshExpiresAt: toEpochMs(data.refreshExpiredAt ?? data.refreshExpiresAt)
  };
}

export class AuthManager {
  private readonly store: CredentialStore;
  private refreshInFlight: Promise<Readonly<Credentials>> | null = null;

  constructor(
    private readonly context: ClientContext,
    initial?: Credentials
  ) {
    this.store = new CredentialStore(initial);
  }

  getCredentials(): Readonly<Credentials> | null {
    return this.store.snapshot();
  }

  /** Both headers come from one snapshot so they always carry the same token. */
  headers(): Record<string, string> {
    const credentials = this.store.snapshot();
    if (!credentials?.accessToken) {
      throw new AuthError("MissingToken", "No access token available; sign in first");
    }
    return {
      [AUTH_HEADERS.authorization]: `Bearer ${credentials.accessToken}`,
      [AUTH_HEADERS.platformToken]: credentials.accessToken
    };
  }

  isValid(now: EpochMs = this.context.now()): boolean {
    return isAccessValid(this.store.snapshot(), now);
  }

  needsRefresh(
    now: EpochMs = this.context.now(),
    thresholdMs: number = this.context.config.refreshThresholdMs
  ): boolean {
    return isWithinRefreshWindow(this.store.snapshot(), now, thresholdMs);
  }

  canRefresh(): boolean {
    return Boolean(this.store.snapshot()?.refreshToken);
  }

  /**
   * Exchanges the refresh token for a new access token. Concurrent callers
   * share the exchange already in flight.
   */
  async refresh(now: EpochMs = this.context.now()): Promise<Readonly<Credentials>> {
    if (this.refreshInFlight) {
      return this.refreshInFlight;
    }

    const pending = this.performRefresh(now);
    this.refreshInFlight = pending;
    try {
      return await pending;
    } finally {
      this.refreshInFlight = null;
    }
  }

  async login(username: string, password: string): Promise<Readonly<Credentials>> {
    const grant = await this.exchange(ENDPOINTS.login, { username, password });
    if (!grant) {
      throw new AuthError("MissingToken", "Login response did not contain a token");
    }

    this.store.clear();
    this.updateTokenInfo(grant.token, grant.accessExpiresAt, grant.refreshToken, grant.refreshExpiresAt);
    this.context.logger.info({ expiresAt: grant.accessExpiresAt }, "Signed in");
    return this.requireCredentials();
  }

  /** Atomic replacement; omitted refresh fields keep their previous values. */
  updateTokenInfo(
    token: string,
    accessExpiresAt: EpochMs | undefined,
    refreshToken?: string,
    refreshExpiresAt?: EpochMs
  ): void {
    const previous = this.store.snapshot();

    const next: Credentials = {
      accessToken: token,
      refreshToken: refreshToken ?? previous?.refreshToken,
      accessExpiresAt: this.laterOf(previous?.accessExpiresAt, accessExpiresAt, "access"),
      refreshExpiresAt: this.laterOf(previous?.refreshExpiresAt, refreshExpiresAt, "refresh"),
      user: previous?.user
    };

    this.store.replace(next);
    this.context.logger.debug(
      {
        accessExpiresAt: next.accessExpiresAt && new Date(next.accessExpiresAt).toISOString()
      },
      "Token updated"
    );
  }

  setUserIdentity(user: UserIdentity): void {
    const previous = this.store.snapshot();
    if (!previous) {
      return;
    }
    this.store.replace({ ...previous, user });
  }

  logout(): void {
    this.store.clear();
    this.context.logger.info("Credentials cleared");
  }

  private async performRefresh(now: EpochMs): Promise<Readonly<Credentials>> {
    const credentials = this.store.snapshot();
    if (!credentials?.refreshToken) {
      throw new AuthError("MissingToken", "No refresh token available; sign in again");
    }
    if (isRefreshExpired(credentials, now)) {
      throw new AuthError("RefreshExpired", "Refresh token has expired; sign in again");
    }

    let grant: TokenGrant | null;
    try {
      grant = await this.exchange(ENDPOINTS.refresh, { refreshToken: credentials.refreshToken });
    } catch (error) {
      throw new AuthError("RefreshRejected", `Token refresh failed: ${describeError(error)}`, {
        cause: error
      });
    }
    if (!grant) {
      throw new AuthError("RefreshRejected", "Token refresh response did not contain a token");
    }

    this.updateTokenInfo(grant.token, grant.accessExpiresAt, grant.refreshToken, grant.refreshExpiresAt);
    this.context.logger.info(
      { expiresAt: grant.accessExpiresAt && new Date(grant.accessExpiresAt).toISOString() },
      "Access token refreshed"
    );
    return this.requireCredentials();
  }

  private requireCredentials(): Readonly<Credentials> {
    const credentials = this.store.snapshot();
    if (!credentials) {
      throw new AuthError("MissingToken", "Credentials were cleared during the exchange");
    }
    return credentials;
  }

  /** Expiries only move forward. */
  private laterOf(
    previous: EpochMs | undefined,
    incoming: EpochMs | undefined,
    label: "access" | "refresh"
  ): EpochMs | undefined {
    if (incoming === undefined) {
      return label === "refresh" ? previous : undefined;
    }
    if (previous !== undefined && incoming < previous) {
      this.context.logger.warn({ previous, incoming }, `Ignoring earlier ${label} expiry`);
      return previous;
    }
    return incoming;
  }

  private async exchange(path: string, body: Record<string, string>): Promise<TokenGrant | null> {
    const { config } = this.context;
    const traceId = newTraceId();
    const deadline = new Deadline(config.timeoutMs);

    let text: string;
    try {
      const response = await this.context.fetch(buildUrl(config.baseUrl, path), {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "User-Agent": config.userAgent
        },
        body: JSON.stringify(body),
        signal: deadline.signal
      });
      if (!response.ok) {
        throw await toApiError(response, traceId);
      }
      text = await response.text();
    } catch (error) {
      if (error instanceof TraeAPIError) {
        throw error;
      }
      throw new TransportError(`Auth exchange ${path} failed: ${describeError(error)}`, {
        traceId,
        timedOut: deadline.timedOut,
        cause: error
      });
    } finally {
      deadline.clear();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      return null;
    }
    return parseTokenGrant(parsed);
  }
}
