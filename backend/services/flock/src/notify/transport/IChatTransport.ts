// backend/services/flock/src/notify/transport/IChatTransport.ts
/**
 * Purpose:
 * - Seam between the dispatcher and whatever chat system carries messages.
 *
 * Contract:
 * - send() resolves once the message was accepted; any failure rejects.
 * - channelId undefined → the transport's configured default channel.
 */

export interface IChatTransport {
  readonly name: string;
  start(): Promise<void>;
  send(message: string, channelId?: string): Promise<void>;
  stop(): Promise<void>;
}
