// backend/services/flock/test/helpers/server.ts
/**
 * Compose a booted FlockApp over in-memory fakes and hand back a supertest
 * agent plus every fake, so API specs can assert on side effects.
 */

import request from "supertest";
import { FlockApp, type FlockAppDeps } from "../../src/app";
import type { PrincipalRecord } from "../../src/repo/principal.store.types";
import { testCatalog } from "../fixtures/catalog.samples";
import {
  InMemoryPrincipalStore,
  InMemorySettingsStore,
  InMemoryTelemetryStore,
  StubChatTransport,
} from "./fakes";

export const FIXED_NOW = new Date(2024, 2, 9, 15, 30, 0); // local 2024-03-09

export const ALICE: PrincipalRecord = {
  username: "alice-laptop",
  name: "Alice",
  token: "test-secret",
};

export function basic(username: string, secret: string): string {
  return `Basic ${Buffer.from(`${username}:${secret}`, "utf8").toString("base64")}`;
}

export async function buildServer(overrides: Partial<FlockAppDeps> = {}) {
  const principals = new InMemoryPrincipalStore([ALICE]);
  const telemetry = new InMemoryTelemetryStore();
  const settings = new InMemorySettingsStore();
  const transport = new StubChatTransport();

  const app = new FlockApp({
    principals,
    telemetry,
    settings,
    transport,
    catalog: testCatalog(),
    storeTimeoutMs: 200,
    notifyTimeoutMs: 200,
    channelId: "test-channel",
    clock: () => FIXED_NOW,
    tokenFactory: () => "0123456789abcdef0123456789abcdef",
    ...overrides,
  });
  await app.boot();

  return {
    app,
    principals,
    telemetry,
    settings,
    transport,
    request: request(app.instance),
  };
}
