// backend/services/flock/src/repo/telemetry.store.types.ts
/**
 * Purpose:
 * - Append-only sink for stamped telemetry records, one collection per
 *   day partition (`flock-YYYY-MM-DD`).
 * - No reads, no updates, no dedup.
 */

import type { StampedRecord } from "../contracts/telemetry.contract";

export interface ITelemetryStore {
  /**
   * Append one record to `partition`, tagged with `category`.
   * Resolves once the store acknowledged the write.
   */
  append(
    partition: string,
    category: string,
    record: StampedRecord
  ): Promise<void>;
}
