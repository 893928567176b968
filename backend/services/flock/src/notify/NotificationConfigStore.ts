// backend/services/flock/src/notify/NotificationConfigStore.ts
/**
 * Purpose:
 * - Owns per-kind notification enablement plus channel/admin metadata.
 * - Seeded from the catalog file, overlaid with persisted overrides.
 *
 * Invariants:
 * - Readers take an immutable CatalogSnapshot; a write swaps in a new one.
 *   A snapshot taken before a toggle keeps its old view.
 * - setEnabled persists first, then swaps. A failed save changes nothing.
 */

import fs from "fs";
import { ServiceBase } from "@flock/shared/base/ServiceBase";
import {
  NotificationCatalogSchema,
  type NotificationCatalogEntry,
  type NotificationTypeConfig,
} from "../contracts/catalog.contract";
import type { NotificationOverrides } from "../contracts/settings.contract";
import type { ISettingsStore } from "../repo/settings.store.types";

export type CatalogSnapshot = Readonly<{
  entries: readonly NotificationCatalogEntry[];
  byKind: ReadonlyMap<string, NotificationCatalogEntry>;
  /** Chat channel notifications go to; transport default when absent. */
  channelId?: string;
  adminUsernames: readonly string[];
}>;

/** Read and validate a catalog JSON file. Throws with the zod issues. */
export function loadCatalogFile(filePath: string): NotificationCatalogEntry[] {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  const parsed = NotificationCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid notification catalog ${filePath}: ${issues}`);
  }
  return parsed.data.notifications;
}

function toTypeConfig(e: NotificationCatalogEntry): NotificationTypeConfig {
  return { kind: e.kind, category: e.category, enabled: e.enabled };
}

export class NotificationConfigStore extends ServiceBase {
  private readonly catalog: readonly NotificationCatalogEntry[];
  private readonly settings: ISettingsStore;
  private readonly channelId?: string;
  private readonly adminUsernames: readonly string[];

  private overrides: NotificationOverrides = {};
  private current: CatalogSnapshot;

  constructor(deps: {
    catalog: readonly NotificationCatalogEntry[];
    settings: ISettingsStore;
    channelId?: string;
    adminUsernames?: readonly string[];
  }) {
    super({ service: "flock" });
    this.catalog = deps.catalog;
    this.settings = deps.settings;
    this.channelId = deps.channelId;
    this.adminUsernames = Object.freeze([...(deps.adminUsernames ?? [])]);
    this.current = this.build({});
  }

  /** Apply persisted overrides. Call once at boot. */
  public async load(): Promise<void> {
    const persisted = await this.settings.loadNotificationOverrides();
    const known: NotificationOverrides = {};
    for (const [kind, enabled] of Object.entries(persisted)) {
      if (this.catalog.some((e) => e.kind === kind)) known[kind] = enabled;
      else this.log.warn({ kind }, "ignoring override for unknown notification kind");
    }
    this.overrides = known;
    this.current = this.build(known);
    this.log.info(
      { kinds: this.catalog.length, overrides: Object.keys(known).length },
      "notification settings loaded"
    );
  }

  public get(kind: string): NotificationTypeConfig | undefined {
    const e = this.current.byKind.get(kind);
    return e ? toTypeConfig(e) : undefined;
  }

  public all(): NotificationTypeConfig[] {
    return this.current.entries.map(toTypeConfig);
  }

  /** One immutable view per pipeline invocation. */
  public snapshot(): CatalogSnapshot {
    return this.current;
  }

  /** Administrative seam: persist then swap. Unknown kinds throw. */
  public async setEnabled(
    kind: string,
    enabled: boolean
  ): Promise<NotificationTypeConfig> {
    const entry = this.requireEntry(kind);
    const next: NotificationOverrides = { ...this.overrides, [kind]: enabled };
    await this.settings.saveNotificationOverrides(next);
    this.overrides = next;
    this.current = this.build(next);
    this.log.info({ kind, enabled }, "notification kind toggled");
    return { kind, category: entry.category, enabled };
  }

  private requireEntry(kind: string): NotificationCatalogEntry {
    const e = this.current.byKind.get(kind);
    if (!e) throw new Error(`Unknown notification kind: ${kind}`);
    return e;
  }

  private build(overrides: NotificationOverrides): CatalogSnapshot {
    const entries = this.catalog.map((e) =>
      Object.freeze({ ...e, enabled: overrides[e.kind] ?? e.enabled })
    );
    return Object.freeze({
      entries: Object.freeze(entries),
      byKind: new Map(entries.map((e) => [e.kind, e] as const)),
      channelId: this.channelId,
      adminUsernames: this.adminUsernames,
    });
  }
}
