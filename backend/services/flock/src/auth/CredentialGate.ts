// backend/services/flock/src/auth/CredentialGate.ts
/**
 * Purpose:
 * - Allow/deny predicate over (name, secret) against the principal store.
 *
 * Invariants:
 * - Fails closed: a lookup error, timeout, unknown name or malformed stored
 *   record is "deny".
 * - Never throws to the caller.
 * - Secrets are compared as equal-length SHA-256 digests via timingSafeEqual.
 */

import { createHash, timingSafeEqual } from "crypto";
import { ServiceBase } from "@flock/shared/base/ServiceBase";
import { withDeadline } from "@flock/shared/utils/withDeadline";
import type {
  IPrincipalStore,
  PrincipalRecord,
} from "../repo/principal.store.types";

export type AuthResult =
  | { ok: true; principal: PrincipalRecord }
  | { ok: false };

function digest(s: string): Buffer {
  return createHash("sha256").update(s, "utf8").digest();
}

export function secretsMatch(stored: string, supplied: string): boolean {
  return timingSafeEqual(digest(stored), digest(supplied));
}

export class CredentialGate extends ServiceBase {
  private readonly principals: IPrincipalStore;
  private readonly timeoutMs: number;

  constructor(deps: { principals: IPrincipalStore; timeoutMs: number }) {
    super({ service: "flock" });
    this.principals = deps.principals;
    this.timeoutMs = deps.timeoutMs;
  }

  /** True iff `name` exists and its stored secret equals `secret`. */
  public async authenticate(name: string, secret: string): Promise<boolean> {
    return (await this.check(name, secret)).ok;
  }

  /** Same decision as authenticate(), also returning the principal on allow. */
  public async check(name: string, secret: string): Promise<AuthResult> {
    try {
      const principal = await withDeadline(
        () => this.principals.findByUsername(name),
        this.timeoutMs,
        "principal.lookup"
      );
      // A stored record without a string token can never match.
      if (
        !principal ||
        typeof principal.token !== "string" ||
        !secretsMatch(principal.token, secret)
      ) {
        return { ok: false };
      }
      return { ok: true, principal };
    } catch (err) {
      this.log.warn(
        { username: name, err: this.log.serializeError(err).message },
        "credential check failed; denying"
      );
      return { ok: false };
    }
  }
}
