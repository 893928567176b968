// backend/services/flock/test/notify/NotificationDispatcher.spec.ts
import { beforeEach, describe, it, expect } from "vitest";
import { NotificationConfigStore } from "../../src/notify/NotificationConfigStore";
import { NotificationDispatcher } from "../../src/notify/NotificationDispatcher";
import { testCatalog } from "../fixtures/catalog.samples";
import { InMemorySettingsStore, StubChatTransport } from "../helpers/fakes";

const registered = {
  kind: "user_registered",
  payload: { username: "bob-desktop", name: "Bob" },
};

describe("NotificationDispatcher", () => {
  let transport: StubChatTransport;
  let dispatcher: NotificationDispatcher;
  let store: NotificationConfigStore;

  beforeEach(() => {
    transport = new StubChatTransport();
    dispatcher = new NotificationDispatcher({ transport, timeoutMs: 30 });
    store = new NotificationConfigStore({
      catalog: testCatalog(),
      settings: new InMemorySettingsStore(),
      channelId: "chan-1",
    });
  });

  it("renders and sends an enabled kind to the configured channel", async () => {
    const outcome = await dispatcher.dispatch(registered, store.snapshot());
    expect(outcome).toBe("sent");
    expect(transport.sent).toEqual([
      { message: "Bob (bob-desktop) registered", channelId: "chan-1" },
    ]);
  });

  it("suppresses a disabled kind without touching the transport", async () => {
    const outcome = await dispatcher.dispatch(
      { kind: "listening_ports", payload: { columns: { port: 22 } } },
      store.snapshot()
    );
    expect(outcome).toBe("suppressed");
    expect(transport.sent).toEqual([]);
  });

  it("suppresses a kind missing from the catalog", async () => {
    const outcome = await dispatcher.dispatch({ kind: "mystery", payload: {} }, store.snapshot());
    expect(outcome).toBe("suppressed");
  });

  it("honours the snapshot it was given, not later toggles", async () => {
    const before = store.snapshot();
    await store.setEnabled("user_registered", false);

    expect(await dispatcher.dispatch(registered, before)).toBe("sent");
    expect(await dispatcher.dispatch(registered, store.snapshot())).toBe("suppressed");
  });

  it("reports a transport error as failed", async () => {
    transport.failWith = new Error("channel gone");
    expect(await dispatcher.dispatch(registered, store.snapshot())).toBe("failed");
  });

  it("reports a send past its deadline as failed", async () => {
    transport.hang = true;
    expect(await dispatcher.dispatch(registered, store.snapshot())).toBe("failed");
  });

  it("dispatches in order and totals outcomes", async () => {
    const report = await dispatcher.dispatchAll(
      [
        { kind: "server_enabled", payload: { username: "u", name: "Una" } },
        { kind: "mystery", payload: {} },
        registered,
      ],
      store.snapshot()
    );
    expect(report).toEqual({ sent: 2, suppressed: 1, failed: 0 });
    expect(transport.sent.map((s) => s.message)).toEqual([
      "Una enabled the server",
      "Bob (bob-desktop) registered",
    ]);

    transport.failWith = new Error("down");
    await dispatcher.dispatch(registered, store.snapshot());
    expect(dispatcher.stats()).toEqual({ sent: 2, suppressed: 1, failed: 1 });
  });
});
