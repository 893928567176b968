// backend/services/flock/src/controllers/flock.controller.ts
/**
 * Purpose:
 * - Thin HTTP adapters for the agent-facing endpoints.
 * - Each handler calls one service method and envelopes the result.
 *
 * Notes:
 * - Errors are thrown to the app's error funnel (FlockError → envelope).
 * - Protected handlers rely on basicAuth having set req.principal.
 */

import type { Request, Response } from "express";
import { ServiceBase } from "@flock/shared/base/ServiceBase";
import { apiSuccess } from "../contracts/envelope.contract";
import { AuthError } from "../errors";
import type { PrincipalRecord } from "../repo/principal.store.types";
import type { RegistrationService } from "../services/RegistrationService";
import type { SubmissionService } from "../services/SubmissionService";

export class FlockController extends ServiceBase {
  constructor(
    private readonly registration: RegistrationService,
    private readonly submission: SubmissionService
  ) {
    super({ service: "flock" });
  }

  private principalOf(req: Request): PrincipalRecord {
    if (!req.principal) throw new AuthError();
    return req.principal;
  }

  /** POST /register */
  public register = async (req: Request, res: Response): Promise<void> => {
    this.log.edge({ path: req.path }, "register");
    const { auth_token } = await this.registration.register(req.body);
    res.status(200).json(apiSuccess({ auth_token }));
  };

  /** GET /ping */
  public ping = async (req: Request, res: Response): Promise<void> => {
    this.principalOf(req);
    res.status(200).json(apiSuccess({}));
  };

  /** POST /submit */
  public submit = async (req: Request, res: Response): Promise<void> => {
    const principal = this.principalOf(req);
    this.log.edge({ path: req.path, username: principal.username }, "submit");
    const result = await this.submission.submitTelemetry(principal, req.body);
    res.status(200).json(apiSuccess({ processed_count: result.processed_count }));
  };

  /** POST /submit_flock_logs */
  public submitFlockLogs = async (req: Request, res: Response): Promise<void> => {
    const principal = this.principalOf(req);
    this.log.edge({ path: req.path, username: principal.username }, "submit_flock_logs");
    const result = await this.submission.submitFlockLogs(principal, req.body);
    res.status(200).json(apiSuccess({ processed_count: result.processed_count }));
  };
}
