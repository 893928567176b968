// backend/services/shared/src/base/RepoBase.ts
/**
 * Purpose:
 * - Thin shared base for Mongo-backed stores using DbClient.
 * - Handles collection access, index setup and bounded retries.
 *
 * Notes:
 * - withRetry is for idempotent operations only (reads, upserts, index builds).
 *   Plain inserts are not retried here; a retried insert can duplicate a record.
 */

import type { Collection, Document, IndexDescription } from "mongodb";
import type { DbClient } from "../db/DbClient";
import { ServiceBase } from "./ServiceBase";

type RetryCfg = { attempts: number; baseDelayMs: number; maxDelayMs: number };

export interface RepoBaseConfig {
  /** Default collection name (required). */
  collection: string;
  /** Optional db name override (else DbClient's default). */
  dbName?: string;
  /** Retry policy for withRetry. (all optional on input) */
  retry?: Partial<RetryCfg>;
}

export abstract class RepoBase<TDoc extends Document = Document> extends ServiceBase {
  protected readonly db: DbClient;
  protected readonly collection: string;
  protected readonly dbName?: string;
  private readonly retry: RetryCfg;

  constructor(db: DbClient, cfg: RepoBaseConfig) {
    super({ context: { collection: cfg.collection } });
    if (!cfg.collection || !cfg.collection.trim()) {
      throw new Error("RepoBase: collection is required");
    }
    this.db = db;
    this.collection = cfg.collection.trim();
    this.dbName = cfg.dbName;

    this.retry = {
      attempts: cfg.retry?.attempts ?? 3,
      baseDelayMs: cfg.retry?.baseDelayMs ?? 50,
      maxDelayMs: cfg.retry?.maxDelayMs ?? 1000,
    };
  }

  /** Typed collection; name defaults to the repo's own collection. */
  protected async coll(name: string = this.collection): Promise<Collection<TDoc>> {
    return this.db.getCollection<TDoc>(name, this.dbName);
  }

  /** Ensure indexes (idempotent). */
  protected async ensureIndexes(indexes: IndexDescription[]): Promise<void> {
    if (indexes.length === 0) return;
    const col = await this.coll();
    await this.withRetry(() => col.createIndexes(indexes), "ensureIndexes");
    this.log.info(
      { collection: this.collection, count: indexes.length },
      "indexes ensured"
    );
  }

  /** Bounded retry wrapper with jitter. */
  protected async withRetry<T>(
    fn: () => Promise<T>,
    label = "repo.op"
  ): Promise<T> {
    const { attempts, baseDelayMs, maxDelayMs } = this.retry;
    let lastErr: unknown;
    for (let i = 0; i < attempts; i++) {
      try {
        return await fn();
      } catch (err) {
        lastErr = err;
        if (i === attempts - 1) break;
        const delay = Math.min(
          maxDelayMs,
          Math.floor(baseDelayMs * 2 ** i + Math.random() * baseDelayMs)
        );
        this.log.warn(
          { err: String(err) },
          `${label} failed (attempt ${i + 1}/${attempts})`
        );
        await sleep(delay);
      }
    }
    this.log.error(
      { err: String(lastErr) },
      `${label} failed after ${attempts} attempts`
    );
    throw lastErr;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((res) => setTimeout(res, ms));
}
