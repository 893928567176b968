// backend/services/flock/src/auth/basicAuth.ts
/**
 * Purpose:
 * - HTTP Basic credentials → CredentialGate → `req.principal`.
 *
 * Invariants:
 * - Runs before any body parsing on protected routes.
 * - Missing, malformed or rejected credentials → 401 with an empty body.
 * - Credentials are never logged.
 */

import type { RequestHandler } from "express";
import type { PrincipalRecord } from "../repo/principal.store.types";
import type { CredentialGate } from "./CredentialGate";

declare module "express-serve-static-core" {
  interface Request {
    /** Set by basicAuth once the caller's credentials were accepted. */
    principal?: PrincipalRecord;
  }
}

export type BasicCredentials = { name: string; secret: string };

/** Parse `Authorization: Basic base64(name:secret)`; null when unusable. */
export function parseBasicAuth(
  header: string | undefined
): BasicCredentials | null {
  if (!header) return null;
  const m = /^Basic\s+([A-Za-z0-9+/=]+)\s*$/i.exec(header);
  if (!m) return null;
  const decoded = Buffer.from(m[1], "base64").toString("utf8");
  const sep = decoded.indexOf(":");
  if (sep < 0) return null;
  return { name: decoded.slice(0, sep), secret: decoded.slice(sep + 1) };
}

export function basicAuth(gate: CredentialGate): RequestHandler {
  return (req, res, next) => {
    const creds = parseBasicAuth(req.headers.authorization);
    if (!creds) {
      res.status(401).end();
      return;
    }
    gate
      .check(creds.name, creds.secret)
      .then((result) => {
        if (!result.ok) {
          res.status(401).end();
          return;
        }
        req.principal = result.principal;
        next();
      })
      .catch(next);
  };
}
