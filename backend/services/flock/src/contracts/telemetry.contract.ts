// backend/services/flock/src/contracts/telemetry.contract.ts
/**
 * Purpose:
 * - Record and event shapes flowing through the ingestion pipeline.
 *
 * Notes:
 * - Agent records are open mappings; only the fields the pipeline reads are
 *   named here. Everything else is carried verbatim.
 */

import { z } from "zod";

export type JsonObject = Record<string, unknown>;

/** One osquery-style record as submitted to /submit (after validation). */
export type TelemetryRecord = JsonObject & { hostIdentifier: string };

/** TelemetryRecord after the writer stamped submitter identity onto it. */
export type StampedRecord = TelemetryRecord & {
  username: string;
  user_name: string;
  "@timestamp"?: string;
};

/** One agent state-change log line as submitted to /submit_flock_logs. */
export type LogEvent = JsonObject & { type: unknown; timestamp: unknown };

export const TWIG_LOG_TYPES = ["enable_twig", "disable_twig"] as const;

export const STATE_CHANGE_LOG_TYPES = [
  "server_enabled",
  "server_disabled",
  "twigs_enabled",
  "twigs_disabled",
] as const;
export type StateChangeLogType = (typeof STATE_CHANGE_LOG_TYPES)[number];

export const SummaryEventSchema = z.object({
  type: z.literal("summary"),
  username: z.string(),
  name: z.string(),
  added_count: z.number().int().nonnegative(),
  removed_count: z.number().int().nonnegative(),
  other_count: z.number().int().nonnegative(),
});
export type SummaryEvent = z.infer<typeof SummaryEventSchema>;

export type NotificationEvent = {
  kind: string;
  /** A verbatim record, a system payload, or a burst SummaryEvent. */
  payload: JsonObject;
};

export function isSummaryEvent(payload: JsonObject): payload is SummaryEvent {
  return SummaryEventSchema.safeParse(payload).success;
}

/** Identity the pipeline stamps and reports with. */
export type Submitter = {
  username: string;
  name: string;
};
