import { describe, it, expect, afterEach, vi } from "vitest";
import { withTimeout } from "./timeout.js";
import { createDeferred } from "./deferred.js";

describe("withTimeout", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves with the promise's value when it settles first", async () => {
    await expect(withTimeout(Promise.resolve(42), 1000, "Lookup")).resolves.toBe(42);
  });

  it("passes the promise's rejection through", async () => {
    const pending = createDeferred<number>();

    const raced = withTimeout(pending.promise, 1000, "Lookup");
    pending.reject(new Error("boom"));

    await expect(raced).rejects.toThrow("boom");
  });

  it("rejects with a labelled error when the timer wins", async () => {
    vi.useFakeTimers();
    const pending = createDeferred<number>();

    const raced = withTimeout(pending.promise, 500, "Lookup");
    vi.advanceTimersByTime(500);

    await expect(raced).rejects.toThrow("Lookup timed out after 500ms");
  });

  it("clears its timer once the promise settles", async () => {
    vi.useFakeTimers();

    await withTimeout(Promise.resolve("done"), 500, "Lookup");

    expect(vi.getTimerCount()).toBe(0);
  });
});
