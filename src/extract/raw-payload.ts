import { z } from 'zod';

/**
 * One record as received from the source. No fixed schema: fields may be
 * missing, extra or nested.
 */
export type RawRecord = Record<string, unknown>;
export type RawPayload = RawRecord[];

function isRawRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Records pass through by reference so every received key, `__proto__`
// included, reaches the snapshot unchanged.
export const rawPayloadSchema = z.array(z.custom<RawRecord>(isRawRecord));

export type PayloadDecodeResult =
  | { ok: true; payload: RawPayload }
  | { ok: false; reason: string };

/**
 * Decode JSON text into a RawPayload. Never throws.
 */
export function decodePayload(text: string): PayloadDecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    return { ok: false, reason: `invalid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }
  return validatePayload(parsed);
}

export function validatePayload(value: unknown): PayloadDecodeResult {
  const result = rawPayloadSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at [${issue.path.join('.')}]` : '';
    return { ok: false, reason: `expected an array of records${where}` };
  }
  return { ok: true, payload: result.data };
}
