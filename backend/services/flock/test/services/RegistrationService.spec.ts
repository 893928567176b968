// backend/services/flock/test/services/RegistrationService.spec.ts
import { beforeEach, describe, it, expect } from "vitest";
import { DuplicateRegistrationError, UpstreamUnavailableError } from "../../src/errors";
import { NotificationConfigStore } from "../../src/notify/NotificationConfigStore";
import { NotificationDispatcher } from "../../src/notify/NotificationDispatcher";
import { RegistrationService, defaultTokenFactory } from "../../src/services/RegistrationService";
import { testCatalog } from "../fixtures/catalog.samples";
import { InMemoryPrincipalStore, InMemorySettingsStore, StubChatTransport } from "../helpers/fakes";
import { ALICE } from "../helpers/server";

const TOKEN = "fedcba9876543210fedcba9876543210";

describe("RegistrationService", () => {
  let principals: InMemoryPrincipalStore;
  let transport: StubChatTransport;
  let svc: RegistrationService;

  beforeEach(() => {
    principals = new InMemoryPrincipalStore([ALICE]);
    transport = new StubChatTransport();
    svc = new RegistrationService({
      principals,
      configStore: new NotificationConfigStore({
        catalog: testCatalog(),
        settings: new InMemorySettingsStore(),
      }),
      dispatcher: new NotificationDispatcher({ transport, timeoutMs: 50 }),
      timeoutMs: 50,
      tokenFactory: () => TOKEN,
    });
  });

  it("stores a new principal and returns its token", async () => {
    await expect(svc.register({ username: "bob-desktop", name: "Bob" })).resolves.toEqual({
      auth_token: TOKEN,
    });
    expect(principals.rows.get("bob-desktop")).toEqual({
      username: "bob-desktop",
      name: "Bob",
      token: TOKEN,
    });
    expect(transport.sent.map((s) => s.message)).toEqual(["Bob (bob-desktop) registered"]);
  });

  it("strips disallowed characters from the display name", async () => {
    await svc.register({ username: "bob-desktop", name: "B*o{b}! `Smith`_@#" });
    expect(principals.rows.get("bob-desktop")?.name).toBe("Bob Smith");
  });

  it("accepts a missing name as empty", async () => {
    await svc.register({ username: "bob_2" });
    expect(principals.rows.get("bob_2")?.name).toBe("");
  });

  it("refuses a duplicate and leaves the stored token alone", async () => {
    const attempt = svc.register({ username: "alice-laptop", name: "Imposter" });
    await expect(attempt).rejects.toBeInstanceOf(DuplicateRegistrationError);
    await expect(attempt).rejects.toThrow(
      "Your computer (alice-laptop) is already registered with this server"
    );
    expect(principals.rows.get("alice-laptop")?.token).toBe("test-secret");
    expect(transport.sent.map((s) => s.message)).toEqual([
      "Imposter (alice-laptop) is already registered",
    ]);
  });

  it.each([
    [{}, "Invalid JSON object"],
    [[], "Invalid JSON object"],
    ["alice", "Invalid JSON object"],
    [null, "Invalid JSON object"],
    [{ name: "Bob" }, "You must provide a username"],
    [{ username: "" }, "You must provide a username"],
    [{ username: 42 }, "You must provide a username"],
    [{ username: "bob desktop" }, "Usernames must only contain letters, numbers, '-', or '_'"],
    [{ username: "bob.desktop" }, "Usernames must only contain letters, numbers, '-', or '_'"],
  ])("rejects %j with %s", async (body, message) => {
    await expect(svc.register(body)).rejects.toThrow(message);
    expect(principals.rows.size).toBe(1);
    expect(transport.sent).toEqual([]);
  });

  it("reports an unreachable store as a registration failure", async () => {
    principals.failLookups = true;
    const attempt = svc.register({ username: "bob-desktop", name: "Bob" });
    await expect(attempt).rejects.toBeInstanceOf(UpstreamUnavailableError);
    await expect(attempt).rejects.toThrow("Registration failed");
  });

  it("still registers when the chat channel is down", async () => {
    transport.failWith = new Error("channel gone");
    await expect(svc.register({ username: "bob-desktop" })).resolves.toEqual({ auth_token: TOKEN });
  });
});

describe("defaultTokenFactory", () => {
  it("produces 32 lowercase hex characters", () => {
    const a = defaultTokenFactory();
    expect(a).toMatch(/^[0-9a-f]{32}$/);
    expect(defaultTokenFactory()).not.toBe(a);
  });
});
