// backend/services/flock/src/notify/NotificationDispatcher.ts
/**
 * Purpose:
 * - Forward classified events to the chat transport, filtered by the
 *   enablement in the caller's CatalogSnapshot.
 *
 * Invariants:
 * - Unknown or disabled kind → "suppressed"; the transport is never called.
 * - Each send is bounded by a deadline. A failure is logged, counted and
 *   dropped (no retry queue; at most one attempt per dispatch).
 * - Never throws; the submitting client must not see delivery outcomes.
 * - dispatchAll sends in classification order, one at a time.
 */

import { ServiceBase } from "@flock/shared/base/ServiceBase";
import { withDeadline } from "@flock/shared/utils/withDeadline";
import type { NotificationEvent } from "../contracts/telemetry.contract";
import type { CatalogSnapshot } from "./NotificationConfigStore";
import { renderMessage } from "./MessageRenderer";
import type { IChatTransport } from "./transport/IChatTransport";

export type DispatchOutcome = "sent" | "suppressed" | "failed";

export type DispatchReport = Record<DispatchOutcome, number>;

const emptyReport = (): DispatchReport => ({ sent: 0, suppressed: 0, failed: 0 });

export class NotificationDispatcher extends ServiceBase {
  private readonly transport: IChatTransport;
  private readonly timeoutMs: number;
  private readonly totals: DispatchReport = emptyReport();

  constructor(deps: { transport: IChatTransport; timeoutMs: number }) {
    super({ service: "flock" });
    this.transport = deps.transport;
    this.timeoutMs = deps.timeoutMs;
  }

  public async dispatch(
    event: NotificationEvent,
    snapshot: CatalogSnapshot
  ): Promise<DispatchOutcome> {
    const outcome = await this.attempt(event, snapshot);
    this.totals[outcome]++;
    return outcome;
  }

  public async dispatchAll(
    events: readonly NotificationEvent[],
    snapshot: CatalogSnapshot
  ): Promise<DispatchReport> {
    const report = emptyReport();
    for (const event of events) {
      report[await this.dispatch(event, snapshot)]++;
    }
    return report;
  }

  /** Process-lifetime counters. */
  public stats(): DispatchReport {
    return { ...this.totals };
  }

  private async attempt(
    event: NotificationEvent,
    snapshot: CatalogSnapshot
  ): Promise<DispatchOutcome> {
    const entry = snapshot.byKind.get(event.kind);
    if (!entry || !entry.enabled) {
      this.log.debug(
        { kind: event.kind, known: !!entry },
        "notification suppressed"
      );
      return "suppressed";
    }

    try {
      const message = renderMessage(entry, event);
      await withDeadline(
        () => this.transport.send(message, snapshot.channelId),
        this.timeoutMs,
        `${this.transport.name}.send`
      );
      return "sent";
    } catch (err) {
      this.log.warn(
        {
          kind: event.kind,
          transport: this.transport.name,
          err: this.log.serializeError(err).message,
        },
        "notification send failed; dropped"
      );
      return "failed";
    }
  }
}
