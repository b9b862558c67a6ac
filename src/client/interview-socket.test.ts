// Unit tests for the client transport
// Runs InterviewSocket over an in-memory socket double.

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { InterviewSocket, parseServerMessage, SOCKET_OPEN } from "./interview-socket.js";
import type { ConnectionStatus, SocketHandlers, SocketLike } from "./interview-socket.js";
import type { ServerMessage } from "../types.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────────

class FakeSocket implements SocketLike {
  readyState = 0;
  readonly sent: string[] = [];
  readonly closeCalls: Array<{ code?: number; reason?: string }> = [];

  constructor(
    readonly url: string,
    readonly handlers: SocketHandlers,
  ) {}

  send(data: string): void {
    this.sent.push(data);
  }

  close(code?: number, reason?: string): void {
    this.closeCalls.push({ code, reason });
    this.readyState = 3;
  }

  open(): void {
    this.readyState = SOCKET_OPEN;
    this.handlers.onOpen();
  }

  receive(message: ServerMessage | string): void {
    this.handlers.onMessage(typeof message === "string" ? message : JSON.stringify(message));
  }

  drop(code = 1006): void {
    this.readyState = 3;
    this.handlers.onClose(code);
  }
}

function createSilentLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function sessionStarted(sessionId: string): ServerMessage {
  return {
    type: "session_started",
    data: {
      session_id: sessionId,
      candidate_name: "Ada",
      welcome: "Welcome, Ada!",
      first_question: { id: 1, text: "Question 1?", difficulty: "medium" },
      total_questions: 5,
    },
  };
}

describe("InterviewSocket", () => {
  let sockets: FakeSocket[];
  let logger: ReturnType<typeof createSilentLogger>;
  let statuses: ConnectionStatus[];

  function createClient(options: { maxReconnectAttempts?: number; reconnectDelayMs?: number } = {}) {
    const client = new InterviewSocket({
      url: "ws://interview.test",
      createSocket: (url, handlers) => {
        const socket = new FakeSocket(url, handlers);
        sockets.push(socket);
        return socket;
      },
      logger,
      ...options,
    });
    client.onStatusChange((status) => statuses.push(status));
    return client;
  }

  function latest(): FakeSocket {
    const socket = sockets[sockets.length - 1];
    if (!socket) throw new Error("no socket was created");
    return socket;
  }

  beforeEach(() => {
    sockets = [];
    statuses = [];
    logger = createSilentLogger();
  });

  // ─── Connection lifecycle ───────────────────────────────────────────────────

  describe("connect()", () => {
    it("opens one socket to the configured URL", () => {
      const client = createClient();

      client.connect();
      latest().open();

      expect(sockets).toHaveLength(1);
      expect(latest().url).toBe("ws://interview.test");
      expect(client.status).toBe("open");
      expect(statuses).toEqual(["connecting", "open"]);
    });

    it("is a no-op while a connection is active", () => {
      const client = createClient();

      client.connect();
      client.connect();

      expect(sockets).toHaveLength(1);
    });
  });

  describe("disconnect()", () => {
    it("closes normally and ignores the late close event", () => {
      const client = createClient();
      client.connect();
      const socket = latest();
      socket.open();

      client.disconnect();
      socket.drop(1000);

      expect(socket.closeCalls).toEqual([{ code: 1000, reason: "Client disconnect" }]);
      expect(client.status).toBe("closed");
      expect(statuses).toEqual(["connecting", "open", "closed"]);
    });
  });

  // ─── Sending ────────────────────────────────────────────────────────────────

  describe("send()", () => {
    it("frames client events as JSON", () => {
      const client = createClient();
      client.connect();
      latest().open();

      expect(client.startSession("Ada")).toBe(true);
      expect(client.sendAnswer("s-1", "An answer")).toBe(true);
      expect(client.endSession("s-1")).toBe(true);
      expect(client.ping()).toBe(true);

      expect(latest().sent.map((frame) => JSON.parse(frame))).toEqual([
        { type: "start_session", data: { candidate_name: "Ada" } },
        { type: "user_message", data: { session_id: "s-1", message: "An answer" } },
        { type: "end_session", data: { session_id: "s-1" } },
        { type: "ping", data: {} },
      ]);
    });

    it("returns false when the socket is not open", () => {
      const client = createClient();
      client.connect();

      expect(client.ping()).toBe(false);
      expect(latest().sent).toEqual([]);
      expect(logger.warn).toHaveBeenCalledWith('Cannot send "ping": socket is not connected');
    });
  });

  // ─── Receiving ──────────────────────────────────────────────────────────────

  describe("subscriptions", () => {
    it("delivers typed payloads to per-type handlers", () => {
      const client = createClient();
      client.connect();
      latest().open();
      const pongs: string[] = [];
      const unsubscribe = client.on("pong", (data) => pongs.push(data.timestamp));

      latest().receive({ type: "pong", data: { timestamp: "t1" } });
      latest().receive({ type: "bot_typing", data: { session_id: "s-1" } });
      unsubscribe();
      latest().receive({ type: "pong", data: { timestamp: "t2" } });

      expect(pongs).toEqual(["t1"]);
    });

    it("drops unrecognized frames with a warning", () => {
      const client = createClient();
      client.connect();
      latest().open();
      const handler = vi.fn();
      client.onMessage(handler);

      latest().receive("garbage");
      latest().receive(JSON.stringify({ type: "mystery", data: {} }));

      expect(handler).not.toHaveBeenCalled();
      expect(logger.warn).toHaveBeenCalledWith("Ignoring unrecognized server frame: garbage");
    });

    it("keeps a question frame without its question away from listeners", () => {
      const client = createClient();
      client.connect();
      latest().open();
      const handler = vi.fn();
      client.onMessage(handler);

      expect(() => latest().receive('{"type":"next_question","data":{"session_id":"s-1"}}')).not.toThrow();
      expect(handler).not.toHaveBeenCalled();
    });

    it("tracks the active session id", () => {
      const client = createClient();
      client.connect();
      latest().open();

      latest().receive(sessionStarted("s-1"));
      expect(client.sessionId).toBe("s-1");

      latest().receive({ type: "session_ended", data: { session_id: "s-1" } });
      expect(client.sessionId).toBeNull();
    });
  });

  // ─── Reconnects ─────────────────────────────────────────────────────────────

  describe("reconnect", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("reconnects after an abnormal close and resumes the session", () => {
      const client = createClient({ reconnectDelayMs: 1000 });
      client.connect();
      latest().open();
      latest().receive(sessionStarted("s-1"));

      latest().drop(1006);
      expect(client.status).toBe("reconnecting");

      vi.advanceTimersByTime(999);
      expect(sockets).toHaveLength(1);
      vi.advanceTimersByTime(1);
      expect(sockets).toHaveLength(2);

      latest().open();
      expect(client.status).toBe("open");
      expect(latest().sent.map((frame) => JSON.parse(frame))).toEqual([
        { type: "resume_session", data: { session_id: "s-1" } },
      ]);
      expect(statuses).toEqual(["connecting", "open", "reconnecting", "open"]);
    });

    it("backs off linearly and gives up after the maximum attempts", () => {
      const client = createClient({ maxReconnectAttempts: 2, reconnectDelayMs: 100 });
      client.connect();
      latest().open();

      latest().drop();
      vi.advanceTimersByTime(100);
      expect(sockets).toHaveLength(2);

      latest().drop();
      vi.advanceTimersByTime(199);
      expect(sockets).toHaveLength(2);
      vi.advanceTimersByTime(1);
      expect(sockets).toHaveLength(3);

      latest().drop();
      vi.advanceTimersByTime(10_000);
      expect(sockets).toHaveLength(3);
      expect(client.status).toBe("closed");
      expect(logger.error).toHaveBeenCalledWith("Connection lost (code 1006); giving up after 2 attempts");
    });

    it("does not reconnect after a normal closure", () => {
      const client = createClient();
      client.connect();
      latest().open();

      latest().drop(1000);
      vi.advanceTimersByTime(10_000);

      expect(sockets).toHaveLength(1);
      expect(client.status).toBe("closed");
    });

    it("cancels a pending reconnect on disconnect", () => {
      const client = createClient();
      client.connect();
      latest().open();

      latest().drop();
      client.disconnect();
      vi.advanceTimersByTime(10_000);

      expect(sockets).toHaveLength(1);
      expect(client.status).toBe("closed");
    });

    it("ignores events from a replaced socket", () => {
      const client = createClient({ reconnectDelayMs: 10 });
      const handler = vi.fn();
      client.onMessage(handler);
      client.connect();
      const stale = latest();
      stale.open();

      stale.drop();
      vi.advanceTimersByTime(10);
      latest().open();
      stale.receive({ type: "pong", data: { timestamp: "late" } });

      expect(handler).not.toHaveBeenCalled();
    });
  });
});

// ─── parseServerMessage ─────────────────────────────────────────────────────────

describe("parseServerMessage()", () => {
  it("accepts a known event envelope", () => {
    expect(parseServerMessage('{"type":"bot_typing","data":{"session_id":"s-1"}}')).toEqual({
      type: "bot_typing",
      data: { session_id: "s-1" },
    });
  });

  it("rejects invalid JSON, unknown types and missing data", () => {
    expect(parseServerMessage("{")).toBeNull();
    expect(parseServerMessage('{"type":"mystery","data":{}}')).toBeNull();
    expect(parseServerMessage('{"type":"pong"}')).toBeNull();
  });

  it("rejects events missing the fields listeners read", () => {
    expect(parseServerMessage('{"type":"next_question","data":{"session_id":"s-1"}}')).toBeNull();
    expect(parseServerMessage('{"type":"followup_question","data":{"session_id":"s-1","question":{"text":"Why?"}}}')).toBeNull();
    expect(parseServerMessage('{"type":"analysis","data":{"session_id":"s-1","analysis":{"score":7}}}')).toBeNull();
    expect(parseServerMessage('{"type":"feedback","data":{"feedback":"Nice."}}')).toBeNull();
    expect(parseServerMessage('{"type":"error","data":{"code":"ORACLE_FAILURE"}}')).toBeNull();
  });

  it("accepts a resumed session with no current question", () => {
    const raw = JSON.stringify({
      type: "session_resumed",
      data: { session_id: "s-1", stage: "complete", current_question: null, questions_answered: 5, total_questions: 5 },
    });

    expect(parseServerMessage(raw)?.type).toBe("session_resumed");
  });
});
