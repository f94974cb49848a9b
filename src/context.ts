import { resolveTransportConfig, transportConfigFromEnv } from "./config.js";
import type { TransportConfig, TransportConfigInput } from "./config.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import type { EpochMs } from "./lib/types.js";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Everything a client instance shares between its components.
 *
 * One context per client: two clients in the same process never see each
 * other's credentials or request history.
 */
export interface ClientContext {
  readonly config: TransportConfig;
  readonly logger: Logger;
  readonly fetch: FetchLike;
  readonly now: () => EpochMs;
  readonly sleep: (ms: number) => Promise<void>;
}

export interface ClientContextOptions {
  /** Falls back to the `TRAE_*` environment variables when omitted. */
  config?: TransportConfigInput;
  logger?: Logger;
  fetch?: FetchLike;
  now?: () => EpochMs;
  sleep?: (ms: number) => Promise<void>;
}

export function createClientContext(options: ClientContextOptions = {}): ClientContext {
  const config = options.config ? resolveTransportConfig(options.config) : transportConfigFromEnv();

  return {
    config,
    logger: options.logger ?? createLogger({ enabled: config.enableLogging }),
    fetch: options.fetch ?? ((input, init) => fetch(input, init)),
    now: options.now ?? (() => Date.now()),
    sleep: options.sleep ?? delay
  };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
