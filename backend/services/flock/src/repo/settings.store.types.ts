// backend/services/flock/src/repo/settings.store.types.ts
/**
 * Purpose:
 * - Persistence seam for notification enablement overrides.
 */

import type { NotificationOverrides } from "../contracts/settings.contract";

export interface ISettingsStore {
  /** Ensure required indexes (idempotent; safe to call at startup). */
  ensureIndexes(): Promise<void>;

  /** Persisted overrides; `{}` when none were ever saved. */
  loadNotificationOverrides(): Promise<NotificationOverrides>;

  /** Replace the persisted overrides (upsert). */
  saveNotificationOverrides(overrides: NotificationOverrides): Promise<void>;
}
