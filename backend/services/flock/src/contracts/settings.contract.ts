// backend/services/flock/src/contracts/settings.contract.ts
/**
 * Purpose:
 * - Persisted per-kind enablement overrides (`setting` collection).
 *
 * Invariants:
 * - One document keyed "notifications"; `value` maps kind → enabled.
 * - Overrides for kinds no longer in the catalog are ignored on load.
 */

import { z } from "zod";

export const NOTIFICATION_SETTINGS_KEY = "notifications";

export const NotificationOverridesSchema = z.record(z.string(), z.boolean());
export type NotificationOverrides = z.infer<typeof NotificationOverridesSchema>;

export const SettingDocSchema = z.object({
  key: z.string(),
  value: z.unknown(),
});
export type SettingDoc = z.infer<typeof SettingDocSchema>;
