// backend/services/flock/src/contracts/envelope.contract.ts
/**
 * Purpose:
 * - Wire envelope shared by every agent-facing response.
 *
 * Invariants:
 * - success → application fields + `error: false` (HTTP 200)
 * - failure → `{ error: true, error_msg }` (HTTP 400)
 * - auth failure is NOT enveloped (401, empty body)
 */

import { z } from "zod";

export const ErrorEnvelopeSchema = z.object({
  error: z.literal(true),
  error_msg: z.string(),
});
export type ErrorEnvelope = z.infer<typeof ErrorEnvelopeSchema>;

export type SuccessEnvelope<T extends Record<string, unknown>> = T & {
  error: false;
};

export const RegisterResponseSchema = z.object({
  auth_token: z.string().regex(/^[0-9a-f]{32}$/),
  error: z.literal(false),
});

export const SubmitResponseSchema = z.object({
  processed_count: z.number().int().nonnegative(),
  error: z.literal(false),
});

export function apiSuccess<T extends Record<string, unknown>>(
  body: T
): SuccessEnvelope<T> {
  return { ...body, error: false };
}

export function apiError(errorMsg: string): ErrorEnvelope {
  return { error: true, error_msg: errorMsg };
}
