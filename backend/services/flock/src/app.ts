// backend/services/flock/src/app.ts
/**
 * Purpose:
 * - Composes the Flock ingestion runtime: stores → gate, writer, config
 *   store, dispatcher → services → controller → router.
 * - Orchestration only; domain mechanics live in the modules it wires.
 *
 * Order (via AppBase):
 *   onBoot → health → preRouting → parsers → routes → postRouting
 *
 * Notes:
 * - All I/O collaborators are injected, so specs compose the same app over
 *   in-memory stores and a stub transport.
 * - No global body parser: protected routes authenticate before parsing.
 */

import type { ErrorRequestHandler, Request } from "express";
import { AppBase, type AppBaseCtor } from "@flock/shared/base/AppBase";
import { CredentialGate } from "./auth/CredentialGate";
import type { NotificationCatalogEntry } from "./contracts/catalog.contract";
import { apiError } from "./contracts/envelope.contract";
import { FlockController } from "./controllers/flock.controller";
import { FlockError } from "./errors";
import { NotificationConfigStore } from "./notify/NotificationConfigStore";
import { NotificationDispatcher } from "./notify/NotificationDispatcher";
import type { IChatTransport } from "./notify/transport/IChatTransport";
import type { IPrincipalStore } from "./repo/principal.store.types";
import type { ISettingsStore } from "./repo/settings.store.types";
import type { ITelemetryStore } from "./repo/telemetry.store.types";
import { FlockRouter } from "./routes/flock.routes";
import {
  RegistrationService,
  type TokenFactory,
} from "./services/RegistrationService";
import { SubmissionService } from "./services/SubmissionService";
import { PartitionedWriter, type Clock } from "./writer/PartitionedWriter";

export const SERVICE_SLUG = "flock";

export type FlockAppDeps = {
  principals: IPrincipalStore;
  telemetry: ITelemetryStore;
  settings: ISettingsStore;
  transport: IChatTransport;
  catalog: readonly NotificationCatalogEntry[];
  storeTimeoutMs: number;
  notifyTimeoutMs: number;
  channelId?: string;
  adminUsernames?: readonly string[];
  clock?: Clock;
  tokenFactory?: TokenFactory;
  /** Readiness check for the backing store; ready when omitted. */
  isReady?: () => boolean;
  httpLog?: AppBaseCtor["httpLog"];
};

type HttpErrorLike = { status: number; type?: string };

/** Bodies are cut to this many characters in rejection logs. */
export const LOGGED_BODY_LIMIT = 1024;

/** Request context for a rejected call. Credentials are never included. */
export function rejectionContext(req: Request): Record<string, unknown> {
  const headers: Record<string, unknown> = { ...req.headers };
  delete headers["authorization"];
  delete headers["cookie"];

  let body: string | undefined;
  if (req.body !== undefined) {
    const raw = typeof req.body === "string" ? req.body : JSON.stringify(req.body);
    body = raw.length > LOGGED_BODY_LIMIT ? raw.slice(0, LOGGED_BODY_LIMIT) : raw;
  }

  return {
    method: req.method,
    path: req.path,
    headers,
    body,
    username: req.principal?.username,
  };
}

function isHttpErrorLike(err: unknown): err is HttpErrorLike {
  return (
    typeof err === "object" &&
    err !== null &&
    "status" in err &&
    typeof err.status === "number"
  );
}

export class FlockApp extends AppBase {
  private readonly deps: FlockAppDeps;
  public readonly configStore: NotificationConfigStore;
  public readonly dispatcher: NotificationDispatcher;
  private readonly gate: CredentialGate;
  private readonly registration: RegistrationService;
  private readonly submission: SubmissionService;

  constructor(deps: FlockAppDeps) {
    super({ service: SERVICE_SLUG, httpLog: deps.httpLog });
    this.deps = deps;

    this.configStore = new NotificationConfigStore({
      catalog: deps.catalog,
      settings: deps.settings,
      channelId: deps.channelId,
      adminUsernames: deps.adminUsernames,
    });
    this.dispatcher = new NotificationDispatcher({
      transport: deps.transport,
      timeoutMs: deps.notifyTimeoutMs,
    });
    this.gate = new CredentialGate({
      principals: deps.principals,
      timeoutMs: deps.storeTimeoutMs,
    });
    this.registration = new RegistrationService({
      principals: deps.principals,
      configStore: this.configStore,
      dispatcher: this.dispatcher,
      timeoutMs: deps.storeTimeoutMs,
      tokenFactory: deps.tokenFactory,
    });
    this.submission = new SubmissionService({
      writer: new PartitionedWriter({
        store: deps.telemetry,
        timeoutMs: deps.storeTimeoutMs,
        clock: deps.clock,
      }),
      configStore: this.configStore,
      dispatcher: this.dispatcher,
    });
  }

  /** Indexes, persisted notification settings, then the chat transport. */
  protected async onBoot(): Promise<void> {
    await this.deps.principals.ensureIndexes();
    await this.deps.settings.ensureIndexes();
    await this.configStore.load();
    await this.deps.transport.start();
  }

  protected async readyCheck(): Promise<boolean> {
    return this.deps.isReady ? this.deps.isReady() : true;
  }

  protected healthDetails(): Record<string, unknown> {
    return { notifications: this.dispatcher.stats() };
  }

  /** Bodies are parsed per route, after authentication. */
  protected mountParsers(): void {
    return;
  }

  protected mountRoutes(): void {
    const controller = new FlockController(this.registration, this.submission);
    this.app.use(new FlockRouter(controller, this.gate).router());
  }

  /** FlockError → envelope; body-parser failures → "Invalid JSON object". */
  protected errorFunnel(): ErrorRequestHandler {
    const fallback = super.errorFunnel();
    return (err, req, res, next) => {
      if (err instanceof FlockError) {
        if (err.status === 401) {
          res.status(401).end();
          return;
        }
        this.log.debug(
          { ...rejectionContext(req), code: err.code, msg: err.message },
          "request rejected"
        );
        res.status(err.status).json(apiError(err.message));
        return;
      }
      if (isHttpErrorLike(err) && err.status >= 400 && err.status < 500) {
        if (err.type === "entity.too.large") {
          res.status(413).json(apiError("Payload too large"));
        } else {
          res.status(400).json(apiError("Invalid JSON object"));
        }
        return;
      }
      fallback(err, req, res, next);
    };
  }

  protected internalErrorBody(): Record<string, unknown> {
    return apiError("Internal server error");
  }

  /** Release the chat transport; the entrypoint closes the db. */
  public async stop(): Promise<void> {
    await this.deps.transport.stop();
  }
}
