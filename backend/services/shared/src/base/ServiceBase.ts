// backend/services/shared/src/base/ServiceBase.ts
/**
 * Purpose:
 * - Root for runtime classes (apps, controllers, pipeline stages, stores).
 * - Provides a consistent, pre-bound logger across all services.
 *
 * Notes:
 * - Uses shared logger with .bind(ctx).
 * - service defaults from SVC_NAME to keep logs coherent per service.
 */

import { getLogger, type IBoundLogger } from "../logger/Logger";

type Dict = Record<string, unknown>;

export abstract class ServiceBase {
  protected readonly service: string;
  protected readonly log: IBoundLogger;
  private readonly baseLogContext: Dict;

  constructor(opts?: { service?: string; context?: Dict }) {
    this.service =
      (opts?.service || process.env.SVC_NAME || "unknown").trim() || "unknown";
    this.baseLogContext = {
      service: this.service,
      component: this.constructor.name,
      ...(opts?.context || {}),
    };
    this.log = getLogger().bind(this.baseLogContext);
  }
}
