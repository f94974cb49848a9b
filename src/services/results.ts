import { z } from "zod";
import type { Logger } from "../logger.js";
import type { ApiResponse } from "../lib/types.js";

/**
 * A parsed response, or the untouched body when it does not match the
 * expected shape. Gateway schemas drift between IDE releases, so a mismatch
 * is reported to the caller rather than thrown.
 */
export type ServiceResult<K extends string, T> =
  | { kind: K; data: T }
  | { kind: "raw"; payload: ApiResponse };

const envelopeSchema = z.object({ Result: z.record(z.unknown()) });

/** Gateway responses wrap their data in `Result`; some endpoints do not. */
export function unwrapResult(payload: ApiResponse): ApiResponse {
  const envelope = envelopeSchema.safeParse(payload);
  return envelope.success ? envelope.data.Result : payload;
}

export function parseResult<K extends string, S extends z.ZodTypeAny>(
  kind: K,
  schema: S,
  payload: ApiResponse,
  logger?: Logger
): ServiceResult<K, z.output<S>> {
  const parsed = schema.safeParse(unwrapResult(payload));
  if (!parsed.success) {
    logger?.warn({ kind, issues: parsed.error.issues.length }, "Response did not match expected shape");
    return { kind: "raw", payload };
  }
  return { kind, data: parsed.data };
}
