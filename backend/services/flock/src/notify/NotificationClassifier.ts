// backend/services/flock/src/notify/NotificationClassifier.ts
/**
 * Purpose:
 * - Turn one validated batch into an ordered list of notification events.
 *
 * Invariants:
 * - Pure: no I/O, no clock, no shared state.
 * - Telemetry: only catalog kinds with category "osquery" match, by the
 *   record's `name`. Kinds appear in first-seen order.
 *   1 record → that record verbatim; >1 → exactly one SummaryEvent.
 * - Flock logs: one event per state-change record, no summarization.
 */

import {
  STATE_CHANGE_LOG_TYPES,
  type JsonObject,
  type LogEvent,
  type NotificationEvent,
  type StateChangeLogType,
  type Submitter,
  type SummaryEvent,
} from "../contracts/telemetry.contract";
import type { CatalogSnapshot } from "./NotificationConfigStore";

export function classifyTelemetry(
  records: readonly JsonObject[],
  snapshot: CatalogSnapshot,
  submitter: Submitter
): NotificationEvent[] {
  const osqueryKinds = new Set(
    snapshot.entries.filter((e) => e.category === "osquery").map((e) => e.kind)
  );

  // Map preserves insertion order → first-seen order per kind.
  const byKind = new Map<string, JsonObject[]>();
  for (const rec of records) {
    const name = rec["name"];
    if (typeof name !== "string" || !osqueryKinds.has(name)) continue;
    const group = byKind.get(name);
    if (group) group.push(rec);
    else byKind.set(name, [rec]);
  }

  const events: NotificationEvent[] = [];
  for (const [kind, group] of byKind) {
    if (group.length === 1) {
      events.push({ kind, payload: group[0] });
    } else {
      events.push({ kind, payload: summarize(group, submitter) });
    }
  }
  return events;
}

export function summarize(
  group: readonly JsonObject[],
  submitter: Submitter
): SummaryEvent {
  let added = 0;
  let removed = 0;
  let other = 0;
  for (const rec of group) {
    const action = rec["action"];
    if (action === "added") added++;
    else if (action === "removed") removed++;
    else other++;
  }
  return {
    type: "summary",
    username: submitter.username,
    name: submitter.name,
    added_count: added,
    removed_count: removed,
    other_count: other,
  };
}

function isStateChange(t: unknown): t is StateChangeLogType {
  return STATE_CHANGE_LOG_TYPES.some((k) => k === t);
}

export function classifyFlockLogs(
  records: readonly LogEvent[],
  submitter: Submitter
): NotificationEvent[] {
  const events: NotificationEvent[] = [];
  for (const rec of records) {
    const type = rec.type;
    if (!isStateChange(type)) continue;

    const payload: JsonObject = {
      username: submitter.username,
      name: submitter.name,
    };
    if (type === "twigs_enabled" || type === "twigs_disabled") {
      payload["twig_ids"] = "twig_ids" in rec ? rec["twig_ids"] : [];
    }
    events.push({ kind: type, payload });
  }
  return events;
}
