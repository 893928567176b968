// backend/services/flock/index.ts
/**
 * Service Slug: flock
 *
 * Purpose:
 * - Process entrypoint: env cascade + logging via Bootstrap, then Mongo
 *   connect and app boot before the HTTP server binds its port.
 *
 * Notes:
 * - Chat delivery uses Discord only when FLOCK_CHAT_ENABLED=true; otherwise
 *   notifications are written to the log.
 */
import "tsconfig-paths/register";
import path from "path";
import { Bootstrap } from "@flock/shared/bootstrap/Bootstrap";
import { DbClient } from "@flock/shared/db/DbClient";
import { FlockApp, SERVICE_SLUG } from "./src/app";
import { loadFlockConfig } from "./src/config";
import { loadCatalogFile } from "./src/notify/NotificationConfigStore";
import { DiscordChatTransport } from "./src/notify/transport/DiscordChatTransport";
import type { IChatTransport } from "./src/notify/transport/IChatTransport";
import { LoggingChatTransport } from "./src/notify/transport/LoggingChatTransport";
import { PrincipalMongoStore } from "./src/repo/principal.mongo.store";
import { SettingsMongoStore } from "./src/repo/settings.mongo.store";
import { TelemetryMongoStore } from "./src/repo/telemetry.mongo.store";

async function main(): Promise<void> {
  const boot = new Bootstrap({
    service: SERVICE_SLUG,
    serviceRoot: path.resolve(__dirname),
    portEnvName: "FLOCK_PORT",
  });
  const { pino, log } = boot.init();

  const cfg = loadFlockConfig();
  const db = new DbClient({
    uri: cfg.mongoUri,
    dbName: cfg.mongoDb,
    serverSelectionTimeoutMS: cfg.storeTimeoutMs,
  });

  const transport: IChatTransport = cfg.chat.enabled
    ? new DiscordChatTransport({
        token: cfg.chat.token,
        channelId: cfg.chat.channelId,
      })
    : new LoggingChatTransport();

  const app = new FlockApp({
    principals: new PrincipalMongoStore(db),
    telemetry: new TelemetryMongoStore(db),
    settings: new SettingsMongoStore(db),
    transport,
    catalog: loadCatalogFile(cfg.catalogPath),
    storeTimeoutMs: cfg.storeTimeoutMs,
    notifyTimeoutMs: cfg.notifyTimeoutMs,
    channelId: cfg.chat.channelId,
    adminUsernames: cfg.adminUsernames,
    isReady: () => db.isConnected(),
    httpLog: pino,
  });

  await boot.run(() => app.instance, {
    preStart: async () => {
      await db.connect();
      await app.boot();
      log.info(
        { db: cfg.mongoDb, transport: transport.name },
        "flock ready"
      );
    },
    onShutdown: async () => {
      await app.stop();
      await db.close();
    },
  });
}

main().catch((err: unknown) => {
  // Logger may not be installed yet when boot fails this early.
  console.error("[flock] fatal boot error:", err);
  process.exit(1);
});
