// backend/services/shared/src/db/DbClient.ts
/**
 * Purpose:
 * - Thin, reusable wrapper around the MongoDB driver.
 * - Owns connection lifecycle + lazy connect; exposes typed helpers.
 *
 * Notes:
 * - Use one DbClient per service/process (or per data source).
 * - Concurrent first callers share a single in-flight connect.
 */

import { MongoClient, type Collection, type Db, type Document } from "mongodb";

export interface IDbConnectionInfo {
  uri: string;
  dbName: string;
  /** Driver-level server selection budget (ms). */
  serverSelectionTimeoutMS?: number;
}

export class DbClient {
  private readonly info: IDbConnectionInfo;
  private client: MongoClient | null = null;
  private connecting: Promise<MongoClient> | null = null;

  constructor(info: IDbConnectionInfo) {
    if (!info.uri?.trim()) throw new Error("[DbClient] uri is required");
    if (!info.dbName?.trim()) throw new Error("[DbClient] dbName is required");
    this.info = info;
  }

  /** Explicit connect (safe to call multiple times). */
  public async connect(): Promise<void> {
    await this.ensure();
  }

  private async ensure(): Promise<MongoClient> {
    if (this.client) return this.client;
    if (!this.connecting) {
      const c = new MongoClient(this.info.uri, {
        serverSelectionTimeoutMS: this.info.serverSelectionTimeoutMS ?? 5000,
      });
      this.connecting = c
        .connect()
        .then((connected) => {
          this.client = connected;
          return connected;
        })
        .finally(() => {
          this.connecting = null;
        });
    }
    return this.connecting;
  }

  public async getDb(dbName?: string): Promise<Db> {
    const c = await this.ensure();
    return c.db(dbName ?? this.info.dbName);
  }

  public async getCollection<T extends Document = Document>(
    name: string,
    dbName?: string
  ): Promise<Collection<T>> {
    const db = await this.getDb(dbName);
    return db.collection<T>(name);
  }

  /** Close the connection (safe to call multiple times). */
  public async close(): Promise<void> {
    const c = this.client;
    this.client = null;
    if (c) await c.close();
  }

  public isConnected(): boolean {
    return this.client !== null;
  }
}
