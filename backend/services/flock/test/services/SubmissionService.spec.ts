// backend/services/flock/test/services/SubmissionService.spec.ts
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { ValidationError } from "../../src/errors";
import { NotificationConfigStore } from "../../src/notify/NotificationConfigStore";
import { NotificationDispatcher } from "../../src/notify/NotificationDispatcher";
import { SubmissionService } from "../../src/services/SubmissionService";
import { PartitionedWriter } from "../../src/writer/PartitionedWriter";
import { osqueryRecord, testCatalog } from "../fixtures/catalog.samples";
import { InMemorySettingsStore, InMemoryTelemetryStore, StubChatTransport } from "../helpers/fakes";
import { captureLogs } from "../helpers/logs";
import { ALICE, FIXED_NOW } from "../helpers/server";

describe("SubmissionService", () => {
  let telemetry: InMemoryTelemetryStore;
  let transport: StubChatTransport;
  let svc: SubmissionService;
  let logs: ReturnType<typeof captureLogs>;

  beforeEach(() => {
    telemetry = new InMemoryTelemetryStore();
    transport = new StubChatTransport();
    svc = new SubmissionService({
      writer: new PartitionedWriter({ store: telemetry, timeoutMs: 50, clock: () => FIXED_NOW }),
      configStore: new NotificationConfigStore({
        catalog: testCatalog(),
        settings: new InMemorySettingsStore(),
      }),
      dispatcher: new NotificationDispatcher({ transport, timeoutMs: 50 }),
    });
    logs = captureLogs("info");
  });

  afterEach(() => {
    logs.restore();
  });

  it("reports write failures and notification failures separately", async () => {
    telemetry.failAt.add(1);
    transport.failWith = new Error("channel gone");

    const result = await svc.submitTelemetry(ALICE, [
      osqueryRecord("alice-laptop", "launchd"),
      osqueryRecord("alice-laptop", "crontab"),
    ]);

    expect(result.processed_count).toBe(2);
    expect(result.write?.failed).toBe(1);
    expect(result.dispatch).toEqual({ sent: 0, suppressed: 0, failed: 2 });

    const line = logs.find("telemetry batch processed");
    expect(line?.obj).toMatchObject({
      partitions: ["flock-2024-03-09"],
      count: 2,
      written: 1,
      writeFailed: 1,
      events: 2,
      notifySent: 0,
      notifySuppressed: 0,
      notifyFailed: 2,
    });
  });

  it("throws the validation error without writing", async () => {
    await expect(svc.submitTelemetry(ALICE, 5)).rejects.toBeInstanceOf(ValidationError);
    expect(telemetry.callCount).toBe(0);
  });

  it("dispatches flock-log state changes without writing telemetry", async () => {
    const result = await svc.submitFlockLogs(ALICE, [{ type: "server_enabled", timestamp: 1 }]);
    expect(result).toEqual({ processed_count: 1, dispatch: { sent: 1, suppressed: 0, failed: 0 } });
    expect(telemetry.callCount).toBe(0);
  });
});
