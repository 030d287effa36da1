import { z } from "zod";
import type { SessionValue } from "../../core/ports/session-store.js";

const sessionValueSchema: z.ZodType<SessionValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(sessionValueSchema),
    z.record(sessionValueSchema),
  ]),
);

/** Serialise a session value for storage. */
export const encodeSessionValue = (value: SessionValue): string => JSON.stringify(value);

/**
 * Parse a stored session value. Undecodable rows read as absent rather than
 * leaking malformed data into a request.
 */
export const decodeSessionValue = (raw: string): SessionValue | undefined => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  const result = sessionValueSchema.safeParse(parsed);
  return result.success ? result.data : undefined;
};
