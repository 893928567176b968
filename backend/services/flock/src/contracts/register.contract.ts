// backend/services/flock/src/contracts/register.contract.ts
/**
 * Purpose:
 * - Loose parse of the /register body. Field-level rules and their messages
 *   live in RegistrationService; this only normalizes types.
 *
 * Notes:
 * - Non-string `username` or `name` values degrade to absent.
 */

import { z } from "zod";

export const RegisterRequestSchema = z
  .object({
    username: z.string().optional().catch(undefined),
    name: z.string().optional().catch(undefined),
  })
  .passthrough();
export type RegisterRequest = z.infer<typeof RegisterRequestSchema>;

export const USERNAME_PATTERN = /^[A-Za-z0-9_-]+$/;

/** Characters removed from display names rather than rejected. */
export const NAME_STRIP_PATTERN = /[`{}!@#$%^&*_]/g;
