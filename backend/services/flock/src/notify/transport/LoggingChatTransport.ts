// backend/services/flock/src/notify/transport/LoggingChatTransport.ts
/**
 * Purpose:
 * - Transport used when chat delivery is disabled: each message becomes
 *   an info log line instead.
 */

import { ServiceBase } from "@flock/shared/base/ServiceBase";
import type { IChatTransport } from "./IChatTransport";

export class LoggingChatTransport extends ServiceBase implements IChatTransport {
  public readonly name = "log";

  constructor() {
    super({ service: "flock" });
  }

  public async start(): Promise<void> {
    this.log.info("chat delivery disabled; notifications are logged only");
  }

  public async send(message: string, channelId?: string): Promise<void> {
    this.log.info({ channelId, notification: message }, "notification");
  }

  public async stop(): Promise<void> {
    return;
  }
}
