// backend/services/flock/src/routes/flock.routes.ts
/**
 * Purpose:
 * - Router for the agent-facing endpoints.
 *
 * Order per protected route: basicAuth → json parser → controller.
 * Credentials are checked before the body is read.
 *
 * The parser is non-strict: any top-level JSON value (5, "abc", null) reaches
 * the validators, which own the client-facing messages.
 */

import express, { Router, type Router as IRouter } from "express";
import { asyncHandler } from "@flock/shared/middleware/asyncHandler";
import { basicAuth } from "../auth/basicAuth";
import type { CredentialGate } from "../auth/CredentialGate";
import type { FlockController } from "../controllers/flock.controller";

export const JSON_BODY_LIMIT = "10mb";

export class FlockRouter {
  private readonly r: IRouter;

  constructor(controller: FlockController, gate: CredentialGate) {
    this.r = Router();
    const auth = basicAuth(gate);
    const json = express.json({ limit: JSON_BODY_LIMIT, strict: false });

    this.r.post("/register", json, asyncHandler(controller.register));
    this.r.get("/ping", auth, asyncHandler(controller.ping));
    this.r.post("/submit", auth, json, asyncHandler(controller.submit));
    this.r.post(
      "/submit_flock_logs",
      auth,
      json,
      asyncHandler(controller.submitFlockLogs)
    );
  }

  /** Return the Express Router for mounting by the app. */
  public router(): IRouter {
    return this.r;
  }
}
