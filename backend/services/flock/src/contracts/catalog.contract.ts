// backend/services/flock/src/contracts/catalog.contract.ts
/**
 * Purpose:
 * - Shape of the notification catalog (config/notifications.json) and of the
 *   per-kind enablement it seeds.
 *
 * Invariants:
 * - `kind` is unique across the catalog.
 * - Only `osquery` kinds can be triggered by a telemetry batch; `system`
 *   kinds are raised by the service itself (registration, flock logs).
 */

import { z } from "zod";

export const NotificationCategorySchema = z.enum(["osquery", "system"]);
export type NotificationCategory = z.infer<typeof NotificationCategorySchema>;

export const NotificationTemplateSchema = z.object({
  /** Used for a single record (or a system event payload). */
  single: z.string().min(1),
  /** Used for a burst summary; a generic line is rendered when absent. */
  summary: z.string().min(1).optional(),
});

export const NotificationCatalogEntrySchema = z.object({
  kind: z.string().regex(/^[a-z0-9_]+$/),
  category: NotificationCategorySchema,
  enabled: z.boolean(),
  description: z.string(),
  template: NotificationTemplateSchema,
});
export type NotificationCatalogEntry = z.infer<
  typeof NotificationCatalogEntrySchema
>;

export const NotificationCatalogSchema = z
  .object({
    notifications: z.array(NotificationCatalogEntrySchema).min(1),
  })
  .superRefine((cat, ctx) => {
    const seen = new Set<string>();
    cat.notifications.forEach((n, i) => {
      if (seen.has(n.kind)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["notifications", i, "kind"],
          message: `duplicate notification kind "${n.kind}"`,
        });
      }
      seen.add(n.kind);
    });
  });

/** The enablement view the dispatcher decides on. */
export type NotificationTypeConfig = Pick<
  NotificationCatalogEntry,
  "kind" | "category" | "enabled"
>;
