// backend/services/shared/src/base/AppBase.ts
/**
 * Purpose:
 * - Canonical Express composition for services.
 * - Centralizes lifecycle & middleware order:
 *   onBoot → health → preRouting → parsers → routes → postRouting
 *
 * Invariants:
 * - Health mounts FIRST (never gated, never logged per request).
 * - Subclasses supply routes and may replace the default error funnel.
 * - `instance` is only available after boot().
 */

import express, {
  type ErrorRequestHandler,
  type Express,
  type Request,
  type Response,
} from "express";
import type { Logger as PinoLogger } from "pino";
import { ServiceBase } from "./ServiceBase";
import { makeHttpLogger } from "../middleware/httpLogger";

export type AppBaseCtor = {
  service: string;
  /**
   * Raw pino instance for request logging. When omitted (tests), no
   * per-request log lines are written.
   */
  httpLog?: PinoLogger;
};

export abstract class AppBase extends ServiceBase {
  protected readonly app: Express;
  private readonly httpLog?: PinoLogger;
  private _booted = false;

  constructor(opts: AppBaseCtor) {
    super({ service: opts.service });
    this.httpLog = opts.httpLog;
    this.app = express();
    this.app.disable("x-powered-by");
  }

  /**
   * Public async lifecycle entry.
   * MUST be awaited by the entrypoint before listen().
   */
  public async boot(): Promise<void> {
    if (this._booted) return;

    await this.onBoot();

    // 1) Health, always first
    this.mountHealth();

    // 2) Pre-routing (request logging)
    this.mountPreRouting();

    // 3) Parsers
    this.mountParsers();

    // 4) Routes (auth is per route)
    this.mountRoutes();

    // 5) Post-routing (404 + error funnel)
    this.mountPostRouting();

    this._booted = true;
    this.log.info({ service: this.service }, "app booted");
  }

  // ─────────────── Hooks (override sparingly) ───────────────

  /** One-time, awaitable boot hook (index ensure, settings load). */
  protected async onBoot(): Promise<void> {
    return;
  }

  /** Readiness contribution for /health. */
  protected async readyCheck(): Promise<boolean> {
    return true;
  }

  /** Extra fields merged into the /health body. */
  protected healthDetails(): Record<string, unknown> {
    return {};
  }

  protected mountHealth(): void {
    this.app.get("/health", async (_req: Request, res: Response) => {
      let ready = false;
      try {
        ready = await this.readyCheck();
      } catch (err) {
        this.log.warn({ err: String(err) }, "readyCheck threw");
      }
      res.status(200).json({
        ok: true,
        service: this.service,
        ready,
        ...this.healthDetails(),
        ts: new Date().toISOString(),
      });
    });
  }

  protected mountPreRouting(): void {
    if (this.httpLog) {
      this.app.use(makeHttpLogger(this.service, this.httpLog));
    }
  }

  /** Body parsers. Default: JSON for every route. */
  protected mountParsers(): void {
    this.app.use(express.json());
  }

  /** Service routes. Must be overridden. */
  protected abstract mountRoutes(): void;

  /** Post-routing: JSON 404 then the error funnel. */
  protected mountPostRouting(): void {
    this.app.use((_req: Request, res: Response) => {
      res.status(404).json({ type: "about:blank", title: "Not Found" });
    });
    this.app.use(this.errorFunnel());
  }

  /** Final error handler; subclasses map their own error types here. */
  protected errorFunnel(): ErrorRequestHandler {
    return (err, req, res, _next) => {
      this.log.error(
        {
          reqId: req.id,
          path: req.path,
          error:
            err instanceof Error
              ? { message: err.message, stack: err.stack }
              : String(err),
        },
        "unhandled error in request pipeline"
      );
      res.status(500).json(this.internalErrorBody());
    };
  }

  /** Body of the generic 500 response. */
  protected internalErrorBody(): Record<string, unknown> {
    return { type: "about:blank", title: "Internal Server Error" };
  }

  /** Expose the Express instance to the entrypoint (after boot). */
  public get instance(): Express {
    if (!this._booted) {
      throw new Error(
        `[${this.service}] App not booted. Call and await app.boot() before using instance.`
      );
    }
    return this.app;
  }
}
