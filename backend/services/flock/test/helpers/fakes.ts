// backend/services/flock/test/helpers/fakes.ts
/**
 * In-process stand-ins for the Mongo stores and the chat transport.
 * Each records what it saw so specs can assert on it.
 */

import type { NotificationOverrides } from "../../src/contracts/settings.contract";
import type { StampedRecord } from "../../src/contracts/telemetry.contract";
import type { IChatTransport } from "../../src/notify/transport/IChatTransport";
import type {
  InsertOutcome,
  IPrincipalStore,
  PrincipalRecord,
} from "../../src/repo/principal.store.types";
import type { ISettingsStore } from "../../src/repo/settings.store.types";
import type { ITelemetryStore } from "../../src/repo/telemetry.store.types";

export class InMemoryPrincipalStore implements IPrincipalStore {
  public readonly rows = new Map<string, PrincipalRecord>();
  public lookups = 0;
  public failLookups = false;

  constructor(seed: PrincipalRecord[] = []) {
    for (const p of seed) this.rows.set(p.username, { ...p });
  }

  public async ensureIndexes(): Promise<void> {
    return;
  }

  public async findByUsername(username: string): Promise<PrincipalRecord | null> {
    this.lookups++;
    if (this.failLookups) throw new Error("store offline");
    const row = this.rows.get(username);
    return row ? { ...row } : null;
  }

  public async insert(principal: PrincipalRecord): Promise<InsertOutcome> {
    if (this.rows.has(principal.username)) return "duplicate";
    this.rows.set(principal.username, { ...principal });
    return "inserted";
  }
}

export type AppendCall = {
  partition: string;
  category: string;
  record: StampedRecord;
};

export class InMemoryTelemetryStore implements ITelemetryStore {
  public readonly appends: AppendCall[] = [];
  /** Indexes (0-based, by call order) whose append rejects. */
  public readonly failAt = new Set<number>();
  /** Indexes whose append never settles (deadline path). */
  public readonly hangAt = new Set<number>();
  private calls = 0;

  public async append(
    partition: string,
    category: string,
    record: StampedRecord
  ): Promise<void> {
    const i = this.calls++;
    if (this.hangAt.has(i)) return new Promise<void>(() => undefined);
    if (this.failAt.has(i)) throw new Error(`append ${i} rejected`);
    this.appends.push({ partition, category, record });
  }

  public get callCount(): number {
    return this.calls;
  }

  public partition(name: string): StampedRecord[] {
    return this.appends.filter((a) => a.partition === name).map((a) => a.record);
  }
}

export class InMemorySettingsStore implements ISettingsStore {
  public saved: NotificationOverrides;
  public saves = 0;
  public failSaves = false;

  constructor(initial: NotificationOverrides = {}) {
    this.saved = { ...initial };
  }

  public async ensureIndexes(): Promise<void> {
    return;
  }

  public async loadNotificationOverrides(): Promise<NotificationOverrides> {
    return { ...this.saved };
  }

  public async saveNotificationOverrides(o: NotificationOverrides): Promise<void> {
    if (this.failSaves) throw new Error("settings store offline");
    this.saves++;
    this.saved = { ...o };
  }
}

export type SentMessage = { message: string; channelId?: string };

export class StubChatTransport implements IChatTransport {
  public readonly name = "stub";
  public readonly sent: SentMessage[] = [];
  public started = false;
  public stopped = false;
  /** When set, send() rejects with this error. */
  public failWith: Error | null = null;
  /** When true, send() never settles. */
  public hang = false;

  public async start(): Promise<void> {
    this.started = true;
  }

  public async send(message: string, channelId?: string): Promise<void> {
    if (this.hang) return new Promise<void>(() => undefined);
    if (this.failWith) throw this.failWith;
    this.sent.push({ message, channelId });
  }

  public async stop(): Promise<void> {
    this.stopped = true;
  }

  public said(substring: string): boolean {
    return this.sent.some((s) => s.message.includes(substring));
  }
}
