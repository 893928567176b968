// backend/services/flock/src/repo/principal.mongo.store.ts
/**
 * Purpose:
 * - Mongo adapter for registered principals.
 *
 * Notes:
 * - Unique index on username; a racing duplicate insert surfaces as E11000
 *   and is reported as "duplicate" rather than thrown.
 * - Inserts are not retried (see RepoBase.withRetry notes).
 */

import type { Document, IndexDescription } from "mongodb";
import { RepoBase } from "@flock/shared/base/RepoBase";
import type { DbClient } from "@flock/shared/db/DbClient";
import type {
  InsertOutcome,
  IPrincipalStore,
  PrincipalRecord,
} from "./principal.store.types";

export const PRINCIPAL_COLLECTION = "user";

type PrincipalDoc = PrincipalRecord & Document;

export class PrincipalMongoStore
  extends RepoBase<PrincipalDoc>
  implements IPrincipalStore
{
  public constructor(db: DbClient, opts?: { dbName?: string }) {
    super(db, {
      collection: PRINCIPAL_COLLECTION,
      dbName: opts?.dbName,
      retry: { attempts: 3, baseDelayMs: 60, maxDelayMs: 800 },
    });
  }

  public async ensureIndexes(): Promise<void> {
    const indexes: IndexDescription[] = [
      { key: { username: 1 }, unique: true, name: "uq_username" },
    ];
    await super.ensureIndexes(indexes);
  }

  public async findByUsername(username: string): Promise<PrincipalRecord | null> {
    const col = await this.coll();
    const doc = await this.withRetry(
      () => col.findOne({ username }, { projection: { _id: 0 } }),
      "principal.findByUsername"
    );
    if (!doc) return null;
    return { username: doc.username, name: doc.name, token: doc.token };
  }

  public async insert(principal: PrincipalRecord): Promise<InsertOutcome> {
    const col = await this.coll();
    try {
      await col.insertOne({ ...principal });
      return "inserted";
    } catch (err: unknown) {
      if (isDuplicateKeyError(err)) return "duplicate";
      throw err;
    }
  }
}

/** Detect a Mongo duplicate key error (E11000). */
function isDuplicateKeyError(err: unknown): boolean {
  if (!err || typeof err !== "object") return false;
  const code = "code" in err ? err.code : undefined;
  const message = "message" in err ? String(err.message) : "";
  return code === 11000 || /E11000/i.test(message);
}
