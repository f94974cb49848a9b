import { z } from "zod";
import dotenv from "dotenv";
import { DEFAULT_BASE_URL, DEFAULT_USER_AGENT } from "./lib/constants.js";

dotenv.config({ path: ".env" });

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => {
    if (!value) {
      return undefined;
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  });

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  TRAE_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  TRAE_TOKEN: optionalSecret,
  TRAE_REFRESH_TOKEN: optionalSecret,
  TRAE_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  TRAE_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  TRAE_RETRY_DELAY_MS: z.coerce.number().min(0).default(1_000),
  TRAE_BACKOFF_FACTOR: z.coerce.number().min(1).default(2),
  TRAE_REFRESH_THRESHOLD_MS: z.coerce.number().int().min(0).default(10 * 60 * 1000),
  TRAE_POOL_SIZE: z.coerce.number().int().positive().default(5),
  TRAE_ENABLE_LOGGING: z
    .enum(["true", "false", "1", "0"])
    .default("true")
    .transform((value) => value === "true" || value === "1"),
  TRAE_USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  TRAE_MAX_HISTORY: z.coerce.number().int().positive().optional(),
  OTEL_SERVICE_NAME: z.string().default("trae-transport"),
  OTEL_EXPORTER_OTLP_ENDPOINT: z.string().url().optional(),
  OTEL_EXPORTER_OTLP_HEADERS: z.string().optional(),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
});

export type EnvConfig = z.infer<typeof envSchema>;
export type LogLevel = EnvConfig["LOG_LEVEL"];

let cached: EnvConfig | null = null;

export function getConfig(): EnvConfig {
  if (cached) {
    return cached;
  }
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    throw new Error(`Invalid client configuration: ${parsed.error.message}`);
  }
  cached = parsed.data;
  return cached;
}

export function __resetConfigForTest(): void {
  cached = null;
}

export const transportConfigSchema = z.object({
  baseUrl: z
    .string()
    .url()
    .default(DEFAULT_BASE_URL)
    .transform((value) => value.replace(/\/+$/, "")),
  timeoutMs: z.number().int().positive().default(60_000),
  maxRetries: z.number().int().min(0).default(3),
  retryDelayMs: z.number().min(0).default(1_000),
  backoffFactor: z.number().min(1).default(2),
  refreshThresholdMs: z.number().int().min(0).default(10 * 60 * 1000),
  poolSize: z.number().int().positive().default(5),
  enableLogging: z.boolean().default(true),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  maxHistory: z.number().int().positive().optional()
});

export type TransportConfigInput = z.input<typeof transportConfigSchema>;
export type TransportConfig = Readonly<z.output<typeof transportConfigSchema>>;

export function resolveTransportConfig(input: TransportConfigInput = {}): TransportConfig {
  const parsed = transportConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new Error(`Invalid transport configuration: ${parsed.error.message}`);
  }
  return Object.freeze(parsed.data);
}

export function transportConfigFromEnv(env: EnvConfig = getConfig()): TransportConfig {
  return resolveTransportConfig({
    baseUrl: env.TRAE_BASE_URL,
    timeoutMs: env.TRAE_TIMEOUT_MS,
    maxRetries: env.TRAE_MAX_RETRIES,
    retryDelayMs: env.TRAE_RETRY_DELAY_MS,
    backoffFactor: env.TRAE_BACKOFF_FACTOR,
    refreshThresholdMs: env.TRAE_REFRESH_THRESHOLD_MS,
    poolSize: env.TRAE_POOL_SIZE,
    enableLogging: env.TRAE_ENABLE_LOGGING,
    userAgent: env.TRAE_USER_AGENT,
    maxHistory: env.TRAE_MAX_HISTORY
  });
}
