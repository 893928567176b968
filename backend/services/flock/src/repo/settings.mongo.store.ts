// backend/services/flock/src/repo/settings.mongo.store.ts
/**
 * Purpose:
 * - Mongo adapter for the `setting` collection (key/value documents).
 *
 * Notes:
 * - A malformed persisted document is logged and treated as "no overrides";
 *   the catalog defaults then apply.
 */

import type { IndexDescription } from "mongodb";
import { RepoBase } from "@flock/shared/base/RepoBase";
import type { DbClient } from "@flock/shared/db/DbClient";
import {
  NOTIFICATION_SETTINGS_KEY,
  NotificationOverridesSchema,
  SettingDocSchema,
  type NotificationOverrides,
  type SettingDoc,
} from "../contracts/settings.contract";
import type { ISettingsStore } from "./settings.store.types";

export const SETTING_COLLECTION = "setting";

export class SettingsMongoStore
  extends RepoBase<SettingDoc>
  implements ISettingsStore
{
  public constructor(db: DbClient, opts?: { dbName?: string }) {
    super(db, {
      collection: SETTING_COLLECTION,
      dbName: opts?.dbName,
      retry: { attempts: 3, baseDelayMs: 60, maxDelayMs: 800 },
    });
  }

  public async ensureIndexes(): Promise<void> {
    const indexes: IndexDescription[] = [
      { key: { key: 1 }, unique: true, name: "uq_key" },
    ];
    await super.ensureIndexes(indexes);
  }

  public async loadNotificationOverrides(): Promise<NotificationOverrides> {
    const col = await this.coll();
    const raw = await this.withRetry(
      () =>
        col.findOne(
          { key: NOTIFICATION_SETTINGS_KEY },
          { projection: { _id: 0 } }
        ),
      "settings.load"
    );
    if (!raw) return {};

    const doc = SettingDocSchema.safeParse(raw);
    const value = doc.success
      ? NotificationOverridesSchema.safeParse(doc.data.value)
      : null;
    if (!value?.success) {
      this.log.warn(
        { key: NOTIFICATION_SETTINGS_KEY },
        "persisted notification settings malformed; using catalog defaults"
      );
      return {};
    }
    return value.data;
  }

  public async saveNotificationOverrides(
    overrides: NotificationOverrides
  ): Promise<void> {
    const col = await this.coll();
    await this.withRetry(
      () =>
        col.updateOne(
          { key: NOTIFICATION_SETTINGS_KEY },
          { $set: { value: overrides } },
          { upsert: true }
        ),
      "settings.save"
    );
  }
}
