// backend/services/flock/src/repo/principal.store.types.ts
/**
 * Purpose:
 * - Store interface for registered principals (agents).
 * - Insert-once; principals are immutable after registration.
 */

/** Persisted principal, field names as stored in the `user` collection. */
export type PrincipalRecord = {
  username: string;
  /** Display name. */
  name: string;
  /** Shared secret (auth token). */
  token: string;
};

export type InsertOutcome = "inserted" | "duplicate";

export interface IPrincipalStore {
  /** Ensure required indexes (idempotent; safe to call at startup). */
  ensureIndexes(): Promise<void>;

  findByUsername(username: string): Promise<PrincipalRecord | null>;

  /** Insert a new principal; an existing username yields "duplicate". */
  insert(principal: PrincipalRecord): Promise<InsertOutcome>;
}
