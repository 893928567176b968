// backend/services/shared/test/withDeadline.spec.ts
import { describe, it, expect } from "vitest";
import { DeadlineExceededError, withDeadline } from "../src/utils/withDeadline";

describe("withDeadline", () => {
  it("passes through a result that arrives in time", async () => {
    await expect(withDeadline(async () => "done", 50)).resolves.toBe("done");
  });

  it("passes through the operation's own rejection", async () => {
    await expect(
      withDeadline(async () => {
        throw new Error("boom");
      }, 50)
    ).rejects.toThrow("boom");
  });

  it("rejects with DeadlineExceededError when the operation is too slow", async () => {
    const slow = withDeadline(() => new Promise<string>(() => undefined), 10, "store.append");
    await expect(slow).rejects.toBeInstanceOf(DeadlineExceededError);
    await expect(slow).rejects.toThrow("store.append exceeded deadline of 10ms");
  });
});
