// backend/services/flock/src/notify/transport/DiscordChatTransport.ts
/**
 * Purpose:
 * - Deliver notification lines to a Discord text channel via discord.js.
 *
 * Notes:
 * - Only the Guilds intent is requested; the bot never reads messages.
 * - Messages above Discord's 2000-character cap are truncated.
 */

import { Client, GatewayIntentBits } from "discord.js";
import { ServiceBase } from "@flock/shared/base/ServiceBase";
import type { IChatTransport } from "./IChatTransport";

export const DISCORD_MESSAGE_LIMIT = 2000;

export class DiscordChatTransport extends ServiceBase implements IChatTransport {
  public readonly name = "discord";
  private readonly client: Client;
  private readonly token: string;
  private readonly defaultChannelId: string;

  constructor(opts: { token: string; channelId: string }) {
    super({ service: "flock" });
    this.token = opts.token;
    this.defaultChannelId = opts.channelId;
    this.client = new Client({ intents: [GatewayIntentBits.Guilds] });
  }

  public async start(): Promise<void> {
    await this.client.login(this.token);
    this.log.info(
      { user: this.client.user?.tag, channelId: this.defaultChannelId },
      "discord transport ready"
    );
  }

  public async send(message: string, channelId?: string): Promise<void> {
    const id = channelId ?? this.defaultChannelId;
    const channel = await this.client.channels.fetch(id);
    if (!channel || !channel.isSendable()) {
      throw new Error(`Discord channel ${id} is not a sendable text channel`);
    }
    const text =
      message.length > DISCORD_MESSAGE_LIMIT
        ? `${message.slice(0, DISCORD_MESSAGE_LIMIT - 3)}...`
        : message;
    await channel.send(text);
  }

  public async stop(): Promise<void> {
    await this.client.destroy();
  }
}
