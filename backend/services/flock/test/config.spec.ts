// backend/services/flock/test/config.spec.ts
import { describe, it, expect } from "vitest";
import { DEFAULT_CATALOG_PATH, loadFlockConfig } from "../src/config";

const base = {
  FLOCK_MONGO_URI: "mongodb://127.0.0.1:27017",
  FLOCK_MONGO_DB: "flock",
};

describe("loadFlockConfig", () => {
  it("applies documented defaults", () => {
    expect(loadFlockConfig(base)).toEqual({
      mongoUri: "mongodb://127.0.0.1:27017",
      mongoDb: "flock",
      storeTimeoutMs: 5000,
      notifyTimeoutMs: 5000,
      catalogPath: DEFAULT_CATALOG_PATH,
      chat: { enabled: false, channelId: undefined },
      adminUsernames: [],
    });
  });

  it("reads chat credentials only when chat is enabled", () => {
    const cfg = loadFlockConfig({
      ...base,
      FLOCK_CHAT_ENABLED: "true",
      DISCORD_TOKEN: "test-secret",
      DISCORD_CHANNEL_ID: "12345",
      FLOCK_ADMIN_USERNAMES: "ops-admin, sec-admin,,",
    });
    expect(cfg.chat).toEqual({ enabled: true, token: "test-secret", channelId: "12345" });
    expect(cfg.adminUsernames).toEqual(["ops-admin", "sec-admin"]);
  });

  it("fails fast on missing or malformed values", () => {
    expect(() => loadFlockConfig({ ...base, FLOCK_CHAT_ENABLED: "true" })).toThrow(
      "Missing required env var: DISCORD_TOKEN"
    );
    expect(() => loadFlockConfig({ ...base, FLOCK_MONGO_DB: " " })).toThrow(
      "Missing required env var: FLOCK_MONGO_DB"
    );
    expect(() => loadFlockConfig({ ...base, FLOCK_STORE_TIMEOUT_MS: "soon" })).toThrow(
      'Env var FLOCK_STORE_TIMEOUT_MS must be a number, got "soon"'
    );
    expect(() => loadFlockConfig({ ...base, FLOCK_NOTIFY_TIMEOUT_MS: "0" })).toThrow(
      "FLOCK_STORE_TIMEOUT_MS and FLOCK_NOTIFY_TIMEOUT_MS must be > 0"
    );
  });
});
