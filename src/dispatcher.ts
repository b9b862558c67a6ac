// DSA Interview Coach - Protocol Dispatcher
// Validates inbound {type, data} envelopes and binds each event type to one
// session-manager operation. Replies go to the originating connection; events
// of an answer cycle go to whichever connection holds the session when they are
// emitted, so a client that resumes mid-cycle still receives them. Every failure
// becomes an `error` event, never a dropped socket.

import type { ClientMessage, ErrorEventCode, ServerMessage } from "./types.js";
import type { SessionManager } from "./session-manager.js";
import { InterviewError, isInterviewError, toErrorMessage } from "./errors.js";
import type { Logger } from "./logger.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

export const MAX_MESSAGE_LENGTH = 10_000;
export const MAX_CANDIDATE_NAME_LENGTH = 100;
export const DEFAULT_CANDIDATE_NAME = "Candidate";

// ─── Per-Connection State ───────────────────────────────────────────────────────

export interface ConnectionContext {
  connectionId: string;
  /** Session this connection started or resumed, if any. */
  sessionId: string | null;
}

export type SendFn = (message: ServerMessage) => void;

interface Binding {
  connectionId: string;
  send: SendFn;
}

// ─── Envelope validation ────────────────────────────────────────────────────────

function malformed(message: string): InterviewError {
  return new InterviewError("MALFORMED_EVENT", message);
}

function requireString(data: Record<string, unknown>, field: string): string {
  const value = data[field];
  if (typeof value !== "string" || value.trim().length === 0) {
    throw malformed(`Malformed event: '${field}' is required`);
  }
  return value.trim();
}

function parseCandidateName(value: unknown): string {
  if (value === undefined || value === null) return DEFAULT_CANDIDATE_NAME;
  if (typeof value !== "string") {
    throw malformed("Malformed event: 'candidate_name' must be a string");
  }
  const name = value.trim().slice(0, MAX_CANDIDATE_NAME_LENGTH).trim();
  return name.length > 0 ? name : DEFAULT_CANDIDATE_NAME;
}

function parseAnswerText(value: unknown): string {
  if (typeof value !== "string") {
    throw malformed("Malformed event: 'message' is required");
  }
  const text = value.trim();
  if (text.length === 0) {
    throw malformed("Message cannot be empty");
  }
  if (text.length > MAX_MESSAGE_LENGTH) {
    throw malformed(`Message exceeds ${MAX_MESSAGE_LENGTH} characters`);
  }
  return text;
}

/**
 * Parses one text frame into a typed client message.
 * @throws InterviewError MALFORMED_EVENT on bad JSON, a bad envelope, an
 *   unknown event type or a payload missing required fields.
 */
export function parseClientMessage(raw: string): ClientMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw malformed("Malformed event: invalid JSON");
  }

  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw malformed("Malformed event: expected a {type, data} envelope");
  }
  const envelope = parsed as Record<string, unknown>;

  if (typeof envelope.type !== "string" || envelope.type.length === 0) {
    throw malformed("Malformed event: missing event type");
  }

  const rawData = envelope.data ?? {};
  if (typeof rawData !== "object" || rawData === null || Array.isArray(rawData)) {
    throw malformed("Malformed event: 'data' must be an object");
  }
  const data = rawData as Record<string, unknown>;

  switch (envelope.type) {
    case "start_session":
      return { type: "start_session", data: { candidate_name: parseCandidateName(data.candidate_name) } };
    case "user_message":
      return {
        type: "user_message",
        data: { session_id: requireString(data, "session_id"), message: parseAnswerText(data.message) },
      };
    case "end_session":
      return { type: "end_session", data: { session_id: requireString(data, "session_id") } };
    case "resume_session":
      return { type: "resume_session", data: { session_id: requireString(data, "session_id") } };
    case "ping":
      return { type: "ping", data: {} };
    default:
      throw malformed(`Unknown event type: ${envelope.type}`);
  }
}

// ─── Dispatcher ─────────────────────────────────────────────────────────────────

export class ProtocolDispatcher {
  /** Connection currently holding each session, set on start and resume. */
  private readonly bindings = new Map<string, Binding>();

  constructor(
    private readonly sessionManager: SessionManager,
    private readonly logger: Logger,
  ) {}

  /** Parses and dispatches one raw frame. Never rejects. */
  async handleRaw(raw: string, connection: ConnectionContext, send: SendFn): Promise<void> {
    let message: ClientMessage;
    try {
      message = parseClientMessage(raw);
    } catch (err) {
      this.sendError(send, err, connection);
      return;
    }
    await this.dispatch(message, connection, send);
  }

  /** Routes a validated message. Never rejects. */
  async dispatch(message: ClientMessage, connection: ConnectionContext, send: SendFn): Promise<void> {
    try {
      switch (message.type) {
        case "start_session":
          this.handleStartSession(message, connection, send);
          break;

        case "user_message":
          await this.handleUserMessage(message, connection, send);
          break;

        case "end_session":
          await this.handleEndSession(message, connection, send);
          break;

        case "resume_session":
          this.handleResumeSession(message, connection, send);
          break;

        case "ping":
          send({ type: "pong", data: { timestamp: new Date().toISOString() } });
          break;

        default: {
          const exhaustiveCheck: never = message;
          throw malformed(`Unknown event type: ${(exhaustiveCheck as { type: string }).type}`);
        }
      }
    } catch (err) {
      this.sendError(send, err, connection);
    }
  }

  // ─── Handlers ───────────────────────────────────────────────────────────────

  private handleStartSession(
    message: Extract<ClientMessage, { type: "start_session" }>,
    connection: ConnectionContext,
    send: SendFn,
  ): void {
    const { session, welcome } = this.sessionManager.startSession(message.data.candidate_name);
    this.bind(session.id, connection, send);
    this.logger.info(`Connection ${connection.connectionId} started session ${session.id}`);

    if (!session.currentQuestion) {
      throw new Error(`Session ${session.id} started without a question`);
    }
    send({
      type: "session_started",
      data: {
        session_id: session.id,
        candidate_name: session.candidateName,
        welcome,
        first_question: session.currentQuestion,
        total_questions: this.sessionManager.totalQuestions,
      },
    });
  }

  private async handleUserMessage(
    message: Extract<ClientMessage, { type: "user_message" }>,
    connection: ConnectionContext,
    send: SendFn,
  ): Promise<void> {
    const { session_id: sessionId, message: answer } = message.data;
    // Unknown ids are rejected here, before the state machine is involved
    this.sessionManager.getSession(sessionId);
    const emit = this.emitterFor(sessionId, send);
    try {
      await this.sessionManager.submitAnswer(sessionId, answer, emit);
    } catch (err) {
      this.sendError(emit, err, connection);
    }
  }

  private async handleEndSession(
    message: Extract<ClientMessage, { type: "end_session" }>,
    connection: ConnectionContext,
    send: SendFn,
  ): Promise<void> {
    const sessionId = message.data.session_id;
    const result = await this.sessionManager.endSession(sessionId);

    if (!result.alreadyComplete) {
      send({
        type: "interview_summary",
        data: { session_id: sessionId, summary: result.summaryText, details: result.summary },
      });
    }

    this.sessionManager.removeSession(sessionId);
    this.bindings.delete(sessionId);
    if (connection.sessionId === sessionId) {
      connection.sessionId = null;
    }
    send({ type: "session_ended", data: { session_id: sessionId } });
  }

  private handleResumeSession(
    message: Extract<ClientMessage, { type: "resume_session" }>,
    connection: ConnectionContext,
    send: SendFn,
  ): void {
    const state = this.sessionManager.describeSession(message.data.session_id);
    this.bind(state.session_id, connection, send);
    this.logger.info(`Connection ${connection.connectionId} resumed session ${state.session_id}`);
    send({ type: "session_resumed", data: state });
  }

  // ─── Session bindings ───────────────────────────────────────────────────────

  /** Drops the bindings a closed connection still holds. Sessions stay registered. */
  release(connection: ConnectionContext): void {
    for (const [sessionId, binding] of this.bindings) {
      if (binding.connectionId === connection.connectionId) {
        this.bindings.delete(sessionId);
      }
    }
    connection.sessionId = null;
  }

  private bind(sessionId: string, connection: ConnectionContext, send: SendFn): void {
    connection.sessionId = sessionId;
    this.bindings.set(sessionId, { connectionId: connection.connectionId, send });
  }

  /** Resolves the target per event; falls back to the sender while nothing holds the session. */
  private emitterFor(sessionId: string, fallback: SendFn): SendFn {
    return (event) => {
      const target = this.bindings.get(sessionId)?.send ?? fallback;
      target(event);
    };
  }

  // ─── Errors ─────────────────────────────────────────────────────────────────

  private sendError(send: SendFn, err: unknown, connection: ConnectionContext): void {
    let code: ErrorEventCode;
    let message: string;
    let sessionId: string | undefined;

    if (isInterviewError(err)) {
      code = err.code;
      message = err.message;
      sessionId = err.sessionId;
      this.logger.warn(`[${code}] ${message} (connection ${connection.connectionId})`);
    } else {
      code = "INTERNAL";
      message = "An unexpected error occurred. Please try again.";
      this.logger.error(`Unexpected error on connection ${connection.connectionId}: ${toErrorMessage(err)}`);
    }

    sessionId = sessionId ?? connection.sessionId ?? undefined;
    send({
      type: "error",
      data: sessionId === undefined ? { message, code } : { message, code, session_id: sessionId },
    });
  }
}
