// backend/services/flock/src/config.ts
/**
 * Purpose:
 * - Typed service configuration built from the (already loaded) environment.
 *
 * Notes:
 * - No dotenv loading here (Bootstrap handles the env cascade).
 * - No silent defaults for required vars; optional ones default as documented.
 * - Chat credentials are only required when FLOCK_CHAT_ENABLED=true.
 */

import path from "path";
import {
  optionalBoolean,
  optionalEnv,
  optionalList,
  optionalNumber,
  requireEnv,
  type EnvSource,
} from "@flock/shared/env";

export type ChatConfig =
  | { enabled: false; channelId?: string }
  | { enabled: true; token: string; channelId: string };

export type FlockConfig = {
  mongoUri: string;
  mongoDb: string;
  storeTimeoutMs: number;
  notifyTimeoutMs: number;
  catalogPath: string;
  chat: ChatConfig;
  adminUsernames: string[];
};

export const DEFAULT_CATALOG_PATH = path.resolve(
  __dirname,
  "..",
  "config",
  "notifications.json"
);

export function loadFlockConfig(env: EnvSource = process.env): FlockConfig {
  const storeTimeoutMs = optionalNumber("FLOCK_STORE_TIMEOUT_MS", 5000, env);
  const notifyTimeoutMs = optionalNumber("FLOCK_NOTIFY_TIMEOUT_MS", 5000, env);
  if (storeTimeoutMs <= 0 || notifyTimeoutMs <= 0) {
    throw new Error("FLOCK_STORE_TIMEOUT_MS and FLOCK_NOTIFY_TIMEOUT_MS must be > 0");
  }

  const chatEnabled = optionalBoolean("FLOCK_CHAT_ENABLED", false, env);
  const chat: ChatConfig = chatEnabled
    ? {
        enabled: true,
        token: requireEnv("DISCORD_TOKEN", env),
        channelId: requireEnv("DISCORD_CHANNEL_ID", env),
      }
    : { enabled: false, channelId: optionalEnv("DISCORD_CHANNEL_ID", env) };

  return {
    mongoUri: requireEnv("FLOCK_MONGO_URI", env),
    mongoDb: requireEnv("FLOCK_MONGO_DB", env),
    storeTimeoutMs,
    notifyTimeoutMs,
    catalogPath: optionalEnv("FLOCK_CATALOG_PATH", env) ?? DEFAULT_CATALOG_PATH,
    chat,
    adminUsernames: optionalList("FLOCK_ADMIN_USERNAMES", env),
  };
}
