// backend/services/flock/src/repo/telemetry.mongo.store.ts
/**
 * Purpose:
 * - Mongo adapter for the partitioned telemetry sink.
 *
 * Notes:
 * - A partition collection is created implicitly by its first insert.
 * - The category tag is stored as `_type`.
 * - The caller's record is copied; the driver adds `_id` to what it inserts.
 */

import type { Document } from "mongodb";
import { RepoBase } from "@flock/shared/base/RepoBase";
import type { DbClient } from "@flock/shared/db/DbClient";
import type { StampedRecord } from "../contracts/telemetry.contract";
import type { ITelemetryStore } from "./telemetry.store.types";

export class TelemetryMongoStore
  extends RepoBase<Document>
  implements ITelemetryStore
{
  public constructor(db: DbClient, opts?: { dbName?: string }) {
    // Default collection is only a placeholder; every append names its partition.
    super(db, { collection: "flock", dbName: opts?.dbName });
  }

  public async append(
    partition: string,
    category: string,
    record: StampedRecord
  ): Promise<void> {
    const col = await this.coll(partition);
    await col.insertOne({ ...record, _type: category });
  }
}
