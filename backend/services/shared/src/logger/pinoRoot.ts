// backend/services/shared/src/logger/pinoRoot.ts
/**
 * Purpose:
 * - Build the process-wide pino sink behind the shared Logger.
 * - Also exposes the raw pino instance so pino-http can share it.
 *
 * Notes:
 * - Extra positional args are folded into `extra` so every line stays JSON.
 * - Authorization headers are redacted at the sink.
 */

import pino, { type Logger as PinoLogger } from "pino";
import type { ILogger, LevelName } from "./Logger";

export type PinoRoot = {
  sink: ILogger;
  pino: PinoLogger;
};

export function createPinoRoot(opts: {
  service: string;
  level: LevelName;
}): PinoRoot {
  const p = pino({
    level: opts.level,
    base: { service: opts.service },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: ["req.headers.authorization", "headers.authorization"],
  });

  const fold = (obj: Record<string, unknown>, rest: unknown[]) =>
    rest.length > 0 ? { ...obj, extra: rest } : obj;

  const sink: ILogger = {
    edge: (obj, msg, ...rest) => p.info(fold(obj, rest), msg),
    info: (obj, msg, ...rest) => p.info(fold(obj, rest), msg),
    debug: (obj, msg, ...rest) => p.debug(fold(obj, rest), msg),
    warn: (obj, msg, ...rest) => p.warn(fold(obj, rest), msg),
    error: (obj, msg, ...rest) => p.error(fold(obj, rest), msg),
  };

  return { sink, pino: p };
}
