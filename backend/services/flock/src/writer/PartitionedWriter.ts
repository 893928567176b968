// backend/services/flock/src/writer/PartitionedWriter.ts
/**
 * Purpose:
 * - Stamp validated telemetry with submitter identity and append it to the
 *   day partition for the current processing date.
 *
 * Invariants:
 * - Partition comes from the injected clock's LOCAL date, not the record's.
 *   The clock is read per record, so a batch written across midnight lands
 *   in two partitions.
 * - Records are appended one after another; partition order == batch order.
 * - A failed or timed-out append is logged and counted; the rest continue.
 * - No dedup: the same batch submitted twice is written twice.
 */

import { ServiceBase } from "@flock/shared/base/ServiceBase";
import { withDeadline } from "@flock/shared/utils/withDeadline";
import type {
  StampedRecord,
  TelemetryRecord,
} from "../contracts/telemetry.contract";
import type { ITelemetryStore } from "../repo/telemetry.store.types";

export const PARTITION_PREFIX = "flock";
export const TELEMETRY_CATEGORY = "osquery";

export type WriteReport = {
  /** Distinct partitions appended to, in first-use order. */
  partitions: string[];
  written: number;
  failed: number;
  /** Stamped copies of the input, in batch order. */
  records: StampedRecord[];
};

export type Clock = () => Date;

const pad2 = (n: number) => String(n).padStart(2, "0");

/** `flock-YYYY-MM-DD` for the local date of `now`. */
export function partitionFor(now: Date): string {
  return `${PARTITION_PREFIX}-${now.getFullYear()}-${pad2(
    now.getMonth() + 1
  )}-${pad2(now.getDate())}`;
}

/**
 * Epoch seconds → `YYYY-MM-DDTHH:MM:SS.000Z` (UTC).
 * Accepts a finite number (fraction truncated) or a string of digits.
 * Anything else yields undefined and the record passes through untouched.
 */
export function toTimestamp(unixTime: unknown): string | undefined {
  let seconds: number;
  if (typeof unixTime === "number" && Number.isFinite(unixTime)) {
    seconds = Math.trunc(unixTime);
  } else if (typeof unixTime === "string" && /^\s*[-+]?\d+\s*$/.test(unixTime)) {
    seconds = Number.parseInt(unixTime.trim(), 10);
  } else {
    return undefined;
  }

  const d = new Date(seconds * 1000);
  const year = d.getUTCFullYear();
  if (Number.isNaN(year) || year < 1 || year > 9999) return undefined;
  return d.toISOString();
}

export function stampRecord(
  record: TelemetryRecord,
  submitterName: string,
  displayName: string
): StampedRecord {
  const stamped: StampedRecord = {
    ...record,
    username: submitterName,
    user_name: displayName,
  };
  if ("unixTime" in record) {
    const ts = toTimestamp(record["unixTime"]);
    if (ts !== undefined) stamped["@timestamp"] = ts;
  }
  return stamped;
}

export class PartitionedWriter extends ServiceBase {
  private readonly store: ITelemetryStore;
  private readonly timeoutMs: number;
  private readonly clock: Clock;

  constructor(deps: { store: ITelemetryStore; timeoutMs: number; clock?: Clock }) {
    super({ service: "flock" });
    this.store = deps.store;
    this.timeoutMs = deps.timeoutMs;
    this.clock = deps.clock ?? (() => new Date());
  }

  public async write(
    batch: readonly TelemetryRecord[],
    submitterName: string,
    displayName: string
  ): Promise<WriteReport> {
    const records = batch.map((r) => stampRecord(r, submitterName, displayName));
    const partitions: string[] = [];

    let written = 0;
    let failed = 0;
    for (let i = 0; i < records.length; i++) {
      const partition = partitionFor(this.clock());
      if (!partitions.includes(partition)) partitions.push(partition);
      try {
        await withDeadline(
          () => this.store.append(partition, TELEMETRY_CATEGORY, records[i]),
          this.timeoutMs,
          "telemetry.append"
        );
        written++;
      } catch (err) {
        failed++;
        this.log.error(
          {
            partition,
            index: i,
            username: submitterName,
            err: this.log.serializeError(err).message,
          },
          "telemetry append failed"
        );
      }
    }

    this.log.debug(
      { partitions, written, failed, username: submitterName },
      "batch written"
    );
    return { partitions, written, failed, records };
  }
}
