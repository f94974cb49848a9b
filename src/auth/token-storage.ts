import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import path from "node:path";
import { z } from "zod";
import { describeError } from "../lib/errors.js";
import { logger as defaultLogger } from "../logger.js";
import type { Logger } from "../logger.js";

export const DEFAULT_STORAGE_PATH = path.join(
  homedir(),
  "Library",
  "Application Support",
  "Trae CN",
  "User",
  "globalStorage",
  "storage.json"
);

const storageSchema = z.record(z.unknown());
const authInfoSchema = z.object({ token: z.string().min(1) }).passthrough();

/**
 * Reads the token the desktop IDE persisted in its global `storage.json`.
 * The auth entry sits under a key containing both `iCubeAuthInfo` and
 * `cloudide`, with a JSON string as its value.
 *
 * Returns null when the file, the entry or the token is missing.
 */
export async function readTokenFromStorage(
  storagePath: string = DEFAULT_STORAGE_PATH,
  logger: Logger = defaultLogger
): Promise<string | null> {
  let raw: string;
  try {
    raw = await readFile(storagePath, "utf8");
  } catch (error) {
    logger.warn({ storagePath, error: describeError(error) }, "Token storage not readable");
    return null;
  }

  let storage: Record<string, unknown>;
  try {
    storage = storageSchema.parse(JSON.parse(raw));
  } catch (error) {
    logger.warn({ storagePath, error: describeError(error) }, "Token storage is not a JSON object");
    return null;
  }

  const key = Object.keys(storage).find((name) => name.includes("iCubeAuthInfo") && name.includes("cloudide"));
  if (!key) {
    return null;
  }

  const value = storage[key];
  if (typeof value !== "string") {
    return null;
  }

  try {
    const parsed = authInfoSchema.safeParse(JSON.parse(value));
    return parsed.success ? parsed.data.token : null;
  } catch (error) {
    logger.warn({ key, error: describeError(error) }, "Stored auth entry is not valid JSON");
    return null;
  }
}
