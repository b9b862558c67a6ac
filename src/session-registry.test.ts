// Unit tests for SessionRegistry
// Session creation and lookup, per-session serialization and idle expiry.

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { SessionRegistry } from "./session-registry.js";
import { SessionStage } from "./types.js";
import { InterviewError } from "./errors.js";
import { createDeferred } from "./utils/deferred.js";
import { makeEntry } from "./test-fixtures.js";

function createSilentLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const IDLE_TIMEOUT_MS = 60_000;

describe("SessionRegistry", () => {
  let clock: Date;
  let registry: SessionRegistry;

  beforeEach(() => {
    clock = new Date("2025-03-01T10:00:00.000Z");
    registry = new SessionRegistry({
      idleTimeoutMs: IDLE_TIMEOUT_MS,
      logger: createSilentLogger(),
      now: () => clock,
    });
  });

  function createSession() {
    return registry.create({ candidateName: "Ada", firstQuestion: makeEntry(1) });
  }

  // ─── create / lookup ────────────────────────────────────────────────────────

  describe("create()", () => {
    it("registers a session positioned on the seed question", () => {
      const session = createSession();

      expect(session.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
      expect(session.stage).toBe(SessionStage.AWAITING_ANSWER);
      expect(session.currentQuestion).toEqual({ id: 1, text: "Question 1?", difficulty: "medium" });
      expect(session.baseQuestion).toEqual(makeEntry(1));
      expect(session.askedQuestionIds).toEqual([1]);
      expect(session.createdAt).toBe(clock);
      expect(session.lastActivityAt).toBe(clock);
      expect(registry.get(session.id)).toBe(session);
    });
  });

  describe("get()", () => {
    it("throws UNKNOWN_SESSION for an unregistered id", () => {
      expect(() => registry.get("nope")).toThrow(InterviewError);
      expect(() => registry.get("nope")).toThrow("Session not found: nope");
    });
  });

  describe("peek() / has() / remove()", () => {
    it("reflects registration and removal", () => {
      const session = createSession();

      expect(registry.peek(session.id)).toBe(session);
      expect(registry.has(session.id)).toBe(true);
      expect(registry.size).toBe(1);

      expect(registry.remove(session.id)).toBe(true);
      expect(registry.remove(session.id)).toBe(false);
      expect(registry.peek(session.id)).toBeUndefined();
      expect(registry.has(session.id)).toBe(false);
      expect(registry.size).toBe(0);
    });
  });

  describe("touch()", () => {
    it("moves lastActivityAt to now", () => {
      const session = createSession();
      clock = new Date("2025-03-01T10:05:00.000Z");

      registry.touch(session);

      expect(session.lastActivityAt.toISOString()).toBe("2025-03-01T10:05:00.000Z");
    });
  });

  // ─── runExclusive ───────────────────────────────────────────────────────────

  describe("runExclusive()", () => {
    it("starts the task synchronously when nothing is queued", () => {
      let started = false;
      const run = registry.runExclusive("s1", async () => {
        started = true;
      });

      expect(started).toBe(true);
      return run;
    });

    it("runs tasks for the same id one at a time, in order", async () => {
      const gate = createDeferred<void>();
      const order: string[] = [];

      const first = registry.runExclusive("s1", async () => {
        order.push("first:start");
        await gate.promise;
        order.push("first:end");
      });
      const second = registry.runExclusive("s1", async () => {
        order.push("second");
      });

      await Promise.resolve();
      await Promise.resolve();
      expect(order).toEqual(["first:start"]);
      expect(registry.isBusy("s1")).toBe(true);

      gate.resolve();
      await Promise.all([first, second]);

      expect(order).toEqual(["first:start", "first:end", "second"]);
      expect(registry.isBusy("s1")).toBe(false);
    });

    it("does not block tasks for other ids", async () => {
      const gate = createDeferred<void>();
      const order: string[] = [];

      const slow = registry.runExclusive("s1", async () => {
        await gate.promise;
        order.push("s1");
      });
      await registry.runExclusive("s2", async () => {
        order.push("s2");
      });

      expect(order).toEqual(["s2"]);
      gate.resolve();
      await slow;
      expect(order).toEqual(["s2", "s1"]);
    });

    it("keeps running queued tasks after one fails", async () => {
      const failing = registry.runExclusive("s1", async () => {
        throw new Error("boom");
      });
      const next = registry.runExclusive("s1", async () => "ran");

      await expect(failing).rejects.toThrow("boom");
      await expect(next).resolves.toBe("ran");
      expect(registry.isBusy("s1")).toBe(false);
    });
  });

  // ─── stats ──────────────────────────────────────────────────────────────────

  describe("stats()", () => {
    it("counts active and busy sessions", async () => {
      const a = createSession();
      createSession();
      const gate = createDeferred<void>();

      const run = registry.runExclusive(a.id, () => gate.promise);
      expect(registry.stats()).toEqual({ active_sessions: 2, busy_sessions: 1 });

      gate.resolve();
      await run;
      expect(registry.stats()).toEqual({ active_sessions: 2, busy_sessions: 0 });
    });
  });

  // ─── Idle expiry ────────────────────────────────────────────────────────────

  describe("sweepIdle()", () => {
    it("removes sessions idle for longer than the timeout", () => {
      const stale = createSession();
      clock = new Date(clock.getTime() + 30_000);
      const fresh = createSession();

      const removed = registry.sweepIdle(new Date(stale.createdAt.getTime() + IDLE_TIMEOUT_MS + 1));

      expect(removed).toEqual([stale.id]);
      expect(registry.has(stale.id)).toBe(false);
      expect(registry.has(fresh.id)).toBe(true);
    });

    it("keeps a session idle for exactly the timeout", () => {
      const session = createSession();

      expect(registry.sweepIdle(new Date(session.createdAt.getTime() + IDLE_TIMEOUT_MS))).toEqual([]);
      expect(registry.has(session.id)).toBe(true);
    });

    it("skips sessions with work in flight", async () => {
      const session = createSession();
      const gate = createDeferred<void>();
      const run = registry.runExclusive(session.id, () => gate.promise);

      expect(registry.sweepIdle(new Date(session.createdAt.getTime() + IDLE_TIMEOUT_MS * 2))).toEqual([]);

      gate.resolve();
      await run;
    });
  });

  describe("startSweeper()", () => {
    beforeEach(() => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date("2025-03-01T10:00:00.000Z"));
    });

    afterEach(() => {
      registry.stopSweeper();
      vi.useRealTimers();
    });

    it("expires idle sessions on each interval", () => {
      registry = new SessionRegistry({ idleTimeoutMs: 1000, logger: createSilentLogger() });
      registry.create({ candidateName: "Ada", firstQuestion: makeEntry(1) });
      registry.startSweeper(500);

      vi.advanceTimersByTime(1000);
      expect(registry.size).toBe(1);

      vi.advanceTimersByTime(500);
      expect(registry.size).toBe(0);
    });

    it("stops sweeping after stopSweeper()", () => {
      registry = new SessionRegistry({ idleTimeoutMs: 1000, logger: createSilentLogger() });
      registry.create({ candidateName: "Ada", firstQuestion: makeEntry(1) });
      registry.startSweeper(500);
      registry.stopSweeper();

      vi.advanceTimersByTime(5000);
      expect(registry.size).toBe(1);
    });
  });
});
