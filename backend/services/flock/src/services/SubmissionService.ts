// backend/services/flock/src/services/SubmissionService.ts
/**
 * Purpose:
 * - Orchestrate one submission: snapshot → validate → write → classify →
 *   dispatch. Stages run sequentially.
 *
 * Invariants:
 * - A rejected batch is never written and never classified.
 * - Only a write phase in which every record failed fails the request;
 *   dispatch outcomes never do.
 * - The whole submission reads a single CatalogSnapshot.
 */

import { ServiceBase } from "@flock/shared/base/ServiceBase";
import type { Submitter } from "../contracts/telemetry.contract";
import { UpstreamUnavailableError } from "../errors";
import {
  classifyFlockLogs,
  classifyTelemetry,
} from "../notify/NotificationClassifier";
import type { NotificationConfigStore } from "../notify/NotificationConfigStore";
import type {
  DispatchReport,
  NotificationDispatcher,
} from "../notify/NotificationDispatcher";
import type { PrincipalRecord } from "../repo/principal.store.types";
import {
  validateFlockLogBatch,
  validateTelemetryBatch,
} from "../validation/BatchValidator";
import type { PartitionedWriter, WriteReport } from "../writer/PartitionedWriter";

export type SubmissionResult = {
  processed_count: number;
  write?: WriteReport;
  dispatch: DispatchReport;
};

export class SubmissionService extends ServiceBase {
  private readonly writer: PartitionedWriter;
  private readonly configStore: NotificationConfigStore;
  private readonly dispatcher: NotificationDispatcher;

  constructor(deps: {
    writer: PartitionedWriter;
    configStore: NotificationConfigStore;
    dispatcher: NotificationDispatcher;
  }) {
    super({ service: "flock" });
    this.writer = deps.writer;
    this.configStore = deps.configStore;
    this.dispatcher = deps.dispatcher;
  }

  public async submitTelemetry(
    principal: PrincipalRecord,
    body: unknown
  ): Promise<SubmissionResult> {
    const snapshot = this.configStore.snapshot();

    const validated = validateTelemetryBatch(body, principal.username);
    if (!validated.ok) throw validated.error;
    const { records } = validated.value;

    const write = await this.writer.write(records, principal.username, principal.name);
    if (records.length > 0 && write.written === 0) {
      throw new UpstreamUnavailableError("Submission failed");
    }

    const events = classifyTelemetry(write.records, snapshot, submitterOf(principal));
    const dispatch = await this.dispatcher.dispatchAll(events, snapshot);

    this.log.info(
      {
        username: principal.username,
        partitions: write.partitions,
        count: records.length,
        written: write.written,
        writeFailed: write.failed,
        events: events.length,
        notifySent: dispatch.sent,
        notifySuppressed: dispatch.suppressed,
        notifyFailed: dispatch.failed,
      },
      "telemetry batch processed"
    );
    return { processed_count: records.length, write, dispatch };
  }

  public async submitFlockLogs(
    principal: PrincipalRecord,
    body: unknown
  ): Promise<SubmissionResult> {
    const snapshot = this.configStore.snapshot();

    const validated = validateFlockLogBatch(body);
    if (!validated.ok) throw validated.error;
    const { records } = validated.value;

    const events = classifyFlockLogs(records, submitterOf(principal));
    const dispatch = await this.dispatcher.dispatchAll(events, snapshot);

    this.log.info(
      { username: principal.username, count: records.length, events: events.length },
      "flock logs processed"
    );
    return { processed_count: records.length, dispatch };
  }
}

function submitterOf(p: PrincipalRecord): Submitter {
  return { username: p.username, name: p.name };
}
