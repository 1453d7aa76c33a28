import { z } from 'zod';
import type { SessionPayload, SessionValue } from '../types/session.js';

export const sessionValueSchema: z.ZodType<SessionValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.date(),
    z.instanceof(Uint8Array),
    z.array(sessionValueSchema),
    z.record(sessionValueSchema),
  ])
);

export const sessionPayloadSchema: z.ZodType<SessionPayload> = z.record(sessionValueSchema);

/**
 * Versioned envelope written by the codec
 */
export const sessionEnvelopeSchema = z.object({
  $v: z.number().int().positive(),
  data: z.record(z.unknown()),
});
