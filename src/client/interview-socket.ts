// DSA Interview Coach - Client transport
// Wraps one WebSocket to the interview server: typed event subscriptions,
// {type, data} framing and bounded reconnects that resume the session.
//
// The socket itself comes from an injected factory so the same class runs
// over a browser WebSocket, the `ws` package, or a test double.

import type {
  ClientMessage,
  ServerEventData,
  ServerMessage,
  ServerMessageType,
} from "../types.js";
import type { Logger } from "../logger.js";
import { createConsoleLogger } from "../logger.js";

// ─── Socket abstraction ─────────────────────────────────────────────────────────

/** WebSocket readyState value for an open connection. */
export const SOCKET_OPEN = 1;

/** Normal closure; any other close code triggers a reconnect. */
export const NORMAL_CLOSURE = 1000;

export interface SocketHandlers {
  onOpen(): void;
  onMessage(data: string): void;
  onClose(code: number): void;
  onError(message: string): void;
}

export interface SocketLike {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

/**
 * Opens a socket and forwards its events to `handlers`. A browser factory:
 *
 *   (url, h) => {
 *     const ws = new WebSocket(url);
 *     ws.onopen = () => h.onOpen();
 *     ws.onmessage = (e) => h.onMessage(String(e.data));
 *     ws.onclose = (e) => h.onClose(e.code);
 *     ws.onerror = () => h.onError("WebSocket error");
 *     return ws;
 *   }
 */
export type SocketFactory = (url: string, handlers: SocketHandlers) => SocketLike;

export type ConnectionStatus = "idle" | "connecting" | "open" | "reconnecting" | "closed";

export interface InterviewSocketOptions {
  url: string;
  createSocket: SocketFactory;
  /** Defaults to 5. */
  maxReconnectAttempts?: number;
  /** Base delay; attempt n waits n times this. Defaults to 1000 ms. */
  reconnectDelayMs?: number;
  logger?: Logger;
}

// ─── Inbound parsing ────────────────────────────────────────────────────────────

type Fields = Record<string, unknown>;

const isString = (value: unknown): value is string => typeof value === "string";

function isFields(value: unknown): value is Fields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isQuestion(value: unknown): boolean {
  return isFields(value) && typeof value.id === "number" && isString(value.text);
}

function isAnalysis(value: unknown): boolean {
  return (
    isFields(value) &&
    typeof value.score === "number" &&
    typeof value.normalized_score === "number" &&
    Array.isArray(value.concepts_covered) &&
    value.concepts_covered.every(isString) &&
    Array.isArray(value.missing_concepts) &&
    value.missing_concepts.every(isString)
  );
}

const hasSession = (data: Fields): boolean => isString(data.session_id);

/** Fields each event must carry before listeners see it. */
const PAYLOAD_CHECKS: Record<ServerMessageType, (data: Fields) => boolean> = {
  connected: (d) => isString(d.message),
  session_started: (d) => hasSession(d) && isString(d.welcome) && isQuestion(d.first_question),
  session_resumed: (d) =>
    hasSession(d) && isString(d.stage) && (d.current_question === null || isQuestion(d.current_question)),
  bot_typing: hasSession,
  feedback: (d) => hasSession(d) && isString(d.feedback),
  analysis: (d) => hasSession(d) && isAnalysis(d.analysis),
  next_question: (d) => hasSession(d) && isQuestion(d.question),
  followup_question: (d) => hasSession(d) && isQuestion(d.question),
  interview_summary: (d) => hasSession(d) && isString(d.summary) && isFields(d.details),
  session_ended: hasSession,
  pong: (d) => isString(d.timestamp),
  error: (d) => isString(d.message) && isString(d.code),
};

function isServerEventType(type: string): type is ServerMessageType {
  return Object.hasOwn(PAYLOAD_CHECKS, type);
}

/**
 * Parses one server frame. Returns null for anything that is not a
 * `{type, data}` envelope of a known event type carrying that event's fields.
 */
export function parseServerMessage(raw: string): ServerMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isFields(parsed)) return null;

  const { type, data } = parsed;
  if (!isString(type) || !isServerEventType(type)) return null;
  if (!isFields(data) || !PAYLOAD_CHECKS[type](data)) return null;

  return parsed as ServerMessage;
}

function isEvent<K extends ServerMessageType>(
  message: ServerMessage,
  type: K,
): message is Extract<ServerMessage, { type: K }> {
  return message.type === type;
}

// ─── InterviewSocket ────────────────────────────────────────────────────────────

export class InterviewSocket {
  private readonly url: string;
  private readonly createSocket: SocketFactory;
  private readonly maxReconnectAttempts: number;
  private readonly reconnectDelayMs: number;
  private readonly logger: Logger;

  private socket: SocketLike | null = null;
  private currentStatus: ConnectionStatus = "idle";
  private reconnectAttempts = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private hasConnected = false;
  private manualClose = false;
  private activeSessionId: string | null = null;

  private readonly listeners = new Set<(message: ServerMessage) => void>();
  private readonly statusListeners = new Set<(status: ConnectionStatus) => void>();

  constructor(options: InterviewSocketOptions) {
    this.url = options.url;
    this.createSocket = options.createSocket;
    this.maxReconnectAttempts = options.maxReconnectAttempts ?? 5;
    this.reconnectDelayMs = options.reconnectDelayMs ?? 1000;
    this.logger = options.logger ?? createConsoleLogger("InterviewSocket");
  }

  get status(): ConnectionStatus {
    return this.currentStatus;
  }

  /** Session started or resumed over this socket; cleared on session_ended. */
  get sessionId(): string | null {
    return this.activeSessionId;
  }

  // ─── Subscriptions ──────────────────────────────────────────────────────────

  /** Subscribes to one event type. Returns an unsubscribe function. */
  on<K extends ServerMessageType>(type: K, handler: (data: ServerEventData<K>) => void): () => void {
    return this.onMessage((message) => {
      if (isEvent(message, type)) {
        handler(message.data);
      }
    });
  }

  /** Subscribes to every inbound event. Returns an unsubscribe function. */
  onMessage(handler: (message: ServerMessage) => void): () => void {
    this.listeners.add(handler);
    return () => {
      this.listeners.delete(handler);
    };
  }

  onStatusChange(handler: (status: ConnectionStatus) => void): () => void {
    this.statusListeners.add(handler);
    return () => {
      this.statusListeners.delete(handler);
    };
  }

  // ─── Connection lifecycle ───────────────────────────────────────────────────

  connect(): void {
    if (this.socket && this.currentStatus !== "closed") return;
    this.clearReconnectTimer();
    this.manualClose = false;
    this.open("connecting");
  }

  /** Closes with code 1000 and cancels any pending reconnect. */
  disconnect(): void {
    this.manualClose = true;
    this.clearReconnectTimer();
    const socket = this.socket;
    this.socket = null;
    socket?.close(NORMAL_CLOSURE, "Client disconnect");
    this.setStatus("closed");
  }

  private open(status: ConnectionStatus): void {
    this.setStatus(status);
    const socket = this.createSocket(this.url, {
      onOpen: () => this.handleOpen(socket),
      onMessage: (data) => this.handleMessage(socket, data),
      onClose: (code) => this.handleClose(socket, code),
      onError: (message) => this.logger.warn(`WebSocket error: ${message}`),
    });
    this.socket = socket;
  }

  private handleOpen(socket: SocketLike): void {
    if (socket !== this.socket) return;
    const isReconnect = this.hasConnected;
    this.hasConnected = true;
    this.reconnectAttempts = 0;
    this.setStatus("open");

    if (isReconnect && this.activeSessionId) {
      this.logger.info(`Reconnected, resuming session ${this.activeSessionId}`);
      this.send({ type: "resume_session", data: { session_id: this.activeSessionId } });
    }
  }

  private handleMessage(socket: SocketLike, raw: string): void {
    if (socket !== this.socket) return;
    const message = parseServerMessage(raw);
    if (!message) {
      this.logger.warn(`Ignoring unrecognized server frame: ${raw.slice(0, 100)}`);
      return;
    }

    if (message.type === "session_started" || message.type === "session_resumed") {
      this.activeSessionId = message.data.session_id;
    } else if (message.type === "session_ended" && message.data.session_id === this.activeSessionId) {
      this.activeSessionId = null;
    }

    for (const listener of [...this.listeners]) {
      listener(message);
    }
  }

  private handleClose(socket: SocketLike, code: number): void {
    if (socket !== this.socket) return;
    this.socket = null;

    if (this.manualClose || code === NORMAL_CLOSURE) {
      this.setStatus("closed");
      return;
    }

    if (this.reconnectAttempts >= this.maxReconnectAttempts) {
      this.logger.error(`Connection lost (code ${code}); giving up after ${this.reconnectAttempts} attempts`);
      this.setStatus("closed");
      return;
    }

    this.reconnectAttempts++;
    const delay = this.reconnectDelayMs * this.reconnectAttempts;
    this.logger.warn(
      `Connection lost (code ${code}); reconnect attempt ${this.reconnectAttempts}/${this.maxReconnectAttempts} in ${delay}ms`,
    );
    this.setStatus("reconnecting");
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.open("reconnecting");
    }, delay);
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer !== null) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private setStatus(status: ConnectionStatus): void {
    if (status === this.currentStatus) return;
    this.currentStatus = status;
    for (const listener of [...this.statusListeners]) {
      listener(status);
    }
  }

  // ─── Sending ────────────────────────────────────────────────────────────────

  /** Sends one frame. Returns false, without throwing, when not connected. */
  send(message: ClientMessage): boolean {
    const socket = this.socket;
    if (!socket || socket.readyState !== SOCKET_OPEN) {
      this.logger.warn(`Cannot send "${message.type}": socket is not connected`);
      return false;
    }
    socket.send(JSON.stringify(message));
    return true;
  }

  startSession(candidateName: string): boolean {
    return this.send({ type: "start_session", data: { candidate_name: candidateName } });
  }

  sendAnswer(sessionId: string, message: string): boolean {
    return this.send({ type: "user_message", data: { session_id: sessionId, message } });
  }

  endSession(sessionId: string): boolean {
    return this.send({ type: "end_session", data: { session_id: sessionId } });
  }

  ping(): boolean {
    return this.send({ type: "ping", data: {} });
  }
}
