// backend/services/flock/src/validation/BatchValidator.ts
/**
 * Purpose:
 * - Batch-wide shape checks for both submission paths.
 * - First failure wins; the whole batch is rejected (no partial acceptance).
 *
 * Invariants:
 * - Synchronous and side-effect free.
 * - Error messages are client-facing and stable.
 */

import { ValidationError } from "../errors";
import {
  TWIG_LOG_TYPES,
  type JsonObject,
  type LogEvent,
  type TelemetryRecord,
} from "../contracts/telemetry.contract";

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type ValidatedTelemetryBatch = {
  kind: "telemetry";
  records: TelemetryRecord[];
};

export type ValidatedFlockLogBatch = {
  kind: "flock_logs";
  records: LogEvent[];
};

function isJsonObject(x: unknown): x is JsonObject {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

/** JSON values an agent library treats as "no payload". */
function isEmptyPayload(body: unknown): boolean {
  if (body === undefined || body === null) return true;
  if (body === false || body === 0 || body === "") return true;
  if (Array.isArray(body)) return body.length === 0;
  if (isJsonObject(body)) return Object.keys(body).length === 0;
  return false;
}

function fail<T>(message: string, index?: number, field?: string): Result<T, ValidationError> {
  return { ok: false, error: new ValidationError(message, index, field) };
}

/**
 * /submit path. Every element must be an object whose `hostIdentifier`
 * equals the submitter's name exactly.
 */
export function validateTelemetryBatch(
  body: unknown,
  submitterName: string
): Result<ValidatedTelemetryBatch, ValidationError> {
  if (isEmptyPayload(body)) return fail("Invalid JSON object", undefined, "body");
  if (!Array.isArray(body)) return fail("Data is not an array", undefined, "body");

  const records: TelemetryRecord[] = [];
  for (let i = 0; i < body.length; i++) {
    const item: unknown = body[i];
    if (!isJsonObject(item)) {
      return fail(`Item ${i} is not an object`, i);
    }
    const host = item["hostIdentifier"];
    if (typeof host !== "string" || host !== submitterName) {
      return fail(
        `Item ${i} does not contain the correct hostIdentifier`,
        i,
        "hostIdentifier"
      );
    }
    records.push({ ...item, hostIdentifier: host });
  }
  return { ok: true, value: { kind: "telemetry", records } };
}

/**
 * /submit_flock_logs path. An empty array is accepted.
 */
export function validateFlockLogBatch(
  body: unknown
): Result<ValidatedFlockLogBatch, ValidationError> {
  if (!Array.isArray(body)) return fail("Data is not an array", undefined, "body");

  const records: LogEvent[] = [];
  for (let i = 0; i < body.length; i++) {
    const item: unknown = body[i];
    if (!isJsonObject(item)) {
      return fail(`Item ${i} is not an object`, i);
    }
    if (!("type" in item)) {
      return fail(`Item ${i} does not contain a type field`, i, "type");
    }
    if (!("timestamp" in item)) {
      return fail(`Item ${i} does not contain a timestamp field`, i, "timestamp");
    }
    const type = item["type"];
    if (isTwigLogType(type) && !("twig_id" in item)) {
      return fail(
        `Item ${i} is about a twig, but does not contain a twig_id field`,
        i,
        "twig_id"
      );
    }
    records.push({ ...item, type, timestamp: item["timestamp"] });
  }
  return { ok: true, value: { kind: "flock_logs", records } };
}

function isTwigLogType(t: unknown): boolean {
  return TWIG_LOG_TYPES.some((k) => k === t);
}
