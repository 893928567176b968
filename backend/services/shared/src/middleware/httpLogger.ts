// backend/services/shared/src/middleware/httpLogger.ts
/**
 * Purpose:
 * - Structured request logs via pino-http so ops can aggregate by `service`
 *   and correlate by `reqId`.
 * - Telemetry only. Never blocks a request.
 *
 * Notes:
 * - Severity mapping: 2xx/3xx=info, 4xx=warn, 5xx/error=error.
 * - Health probes are not logged.
 * - An inbound x-request-id is reused; otherwise a UUID is minted. The id is
 *   always echoed back in the response header.
 * - Request bodies are never serialized (submitted telemetry can be large).
 */

import pinoHttp from "pino-http";
import { randomUUID } from "crypto";
import type { IncomingMessage, ServerResponse } from "http";
import type { Logger as PinoLogger } from "pino";

function firstHeader(v: string | string[] | undefined): string | undefined {
  const s = Array.isArray(v) ? v[0] : v;
  return s && s.trim() ? s.trim() : undefined;
}

export function makeHttpLogger(serviceName: string, logger: PinoLogger) {
  return pinoHttp({
    logger,

    genReqId: (req: IncomingMessage, res: ServerResponse) => {
      const id =
        firstHeader(req.headers["x-request-id"]) ??
        firstHeader(req.headers["x-correlation-id"]) ??
        randomUUID();
      res.setHeader("x-request-id", id);
      return id;
    },

    customLogLevel: (
      _req: IncomingMessage,
      res: ServerResponse,
      err?: Error
    ) => {
      if (err) return "error";
      const s = res.statusCode;
      if (s >= 500) return "error";
      if (s >= 400) return "warn";
      return "info";
    },

    customProps: (req: IncomingMessage) => ({
      service: serviceName,
      reqId: req.id,
    }),

    autoLogging: {
      ignore: (req: IncomingMessage) =>
        req.url === "/health" || req.url === "/favicon.ico",
    },

    serializers: {
      req(req: IncomingMessage) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: ServerResponse) {
        return { statusCode: res.statusCode };
      },
      err(err: Error) {
        return { type: err.name, msg: err.message };
      },
    },
  });
}
