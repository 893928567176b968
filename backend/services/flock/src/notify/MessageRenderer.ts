// backend/services/flock/src/notify/MessageRenderer.ts
/**
 * Purpose:
 * - Render a notification event into a chat line using its catalog template.
 *
 * Template syntax:
 * - `{{path}}` or `{{a.b.c}}`, resolved against the payload plus `kind`.
 * - Missing values render as "?"; arrays join with ", "; objects as JSON.
 */

import type { NotificationCatalogEntry } from "../contracts/catalog.contract";
import {
  isSummaryEvent,
  type JsonObject,
  type NotificationEvent,
} from "../contracts/telemetry.contract";

export const DEFAULT_SUMMARY_TEMPLATE =
  "{{name}} ({{username}}): {{kind}}: {{added_count}} added, {{removed_count}} removed, {{other_count}} other";

const PLACEHOLDER = /\{\{\s*([\w@.-]+)\s*\}\}/g;

function lookup(ctx: JsonObject, path: string): unknown {
  let cur: unknown = ctx;
  for (const part of path.split(".")) {
    if (typeof cur !== "object" || cur === null || Array.isArray(cur)) {
      return undefined;
    }
    cur = Object.prototype.hasOwnProperty.call(cur, part)
      ? Reflect.get(cur, part)
      : undefined;
  }
  return cur;
}

function format(v: unknown): string {
  if (v === undefined || v === null) return "?";
  if (typeof v === "string") return v;
  if (typeof v === "number" || typeof v === "boolean") return String(v);
  if (Array.isArray(v)) return v.length ? v.map(format).join(", ") : "(none)";
  return JSON.stringify(v);
}

export function renderTemplate(template: string, ctx: JsonObject): string {
  return template.replace(PLACEHOLDER, (_m, path: string) =>
    format(lookup(ctx, path))
  );
}

export function renderMessage(
  entry: NotificationCatalogEntry,
  event: NotificationEvent
): string {
  const ctx: JsonObject = { kind: event.kind, ...event.payload };
  const template = isSummaryEvent(event.payload)
    ? entry.template.summary ?? DEFAULT_SUMMARY_TEMPLATE
    : entry.template.single;
  return renderTemplate(template, ctx);
}
