// DSA Interview Coach - Transcript reconstruction
//
// Folds the server event stream into one linear, append-only transcript.
// Every question or follow-up opens a new cycle; a cycle renders at most one
// answer, one feedback and one analysis. Anything that would break that shape
// (late, duplicate or foreign events) is recorded as an anomaly instead of
// being rendered.

import { SessionStage } from "../types.js";
import type {
  AnswerAnalysis,
  ErrorEventCode,
  InterviewSummary,
  Question,
  ServerMessage,
  ServerMessageType,
} from "../types.js";

// ─── Transcript model ───────────────────────────────────────────────────────────

export type TranscriptTurn =
  | { kind: "welcome"; text: string }
  | { kind: "question"; cycle: number; question: Question; followUp: boolean }
  | { kind: "answer"; cycle: number; text: string }
  | { kind: "feedback"; cycle: number; text: string }
  | { kind: "analysis"; cycle: number; analysis: AnswerAnalysis }
  | { kind: "summary"; text: string; details: InterviewSummary };

/** Where one question cycle stands. */
export type CycleState =
  | { tag: "awaiting-answer" }
  | { tag: "awaiting-analysis"; feedbackShown: boolean }
  | { tag: "analyzed"; feedbackShown: boolean };

export interface Cycle {
  id: number;
  question: Question;
  state: CycleState;
}

export interface Notice {
  code: ErrorEventCode;
  message: string;
}

export interface Anomaly {
  event: ServerMessageType | "submission";
  reason: string;
}

export interface TranscriptSnapshot {
  sessionId: string | null;
  turns: TranscriptTurn[];
  notices: Notice[];
  anomalies: Anomaly[];
  typing: boolean;
  complete: boolean;
  ended: boolean;
  cycle: Cycle | null;
}

function sessionIdOf(message: ServerMessage): string | undefined {
  switch (message.type) {
    case "connected":
    case "pong":
      return undefined;
    default:
      return message.data.session_id;
  }
}

// ─── TranscriptReconstructor ────────────────────────────────────────────────────

export class TranscriptReconstructor {
  private sessionId: string | null = null;
  private readonly turns: TranscriptTurn[] = [];
  private readonly notices: Notice[] = [];
  private readonly anomalies: Anomaly[] = [];
  private typing = false;
  private complete = false;
  private ended = false;
  private cycle: Cycle | null = null;
  private nextCycleId = 1;

  /** Folds one inbound event into the transcript. */
  apply(message: ServerMessage): void {
    const eventSessionId = sessionIdOf(message);
    if (
      eventSessionId !== undefined &&
      this.sessionId !== null &&
      eventSessionId !== this.sessionId &&
      message.type !== "session_started"
    ) {
      this.anomaly(message.type, `event for session ${eventSessionId} while following ${this.sessionId}`);
      return;
    }

    switch (message.type) {
      case "connected":
      case "pong":
        break;

      case "session_started":
        this.sessionId = message.data.session_id;
        this.complete = false;
        this.ended = false;
        this.typing = false;
        this.turns.push({ kind: "welcome", text: message.data.welcome });
        this.openCycle(message.data.first_question, false);
        break;

      case "session_resumed": {
        this.sessionId = message.data.session_id;
        this.complete = message.data.stage === SessionStage.COMPLETE;
        const question = message.data.current_question;
        if (question && !this.isCurrentQuestion(question)) {
          this.openCycle(question, this.cycle?.question.id === question.id);
        } else if (
          message.data.stage === SessionStage.AWAITING_ANSWER &&
          this.cycle !== null &&
          this.cycle.state.tag !== "awaiting-answer"
        ) {
          // The answer never reached analysis or was rolled back; the same question is open again
          this.typing = false;
          this.cycle.state = { tag: "awaiting-answer" };
        }
        break;
      }

      case "bot_typing":
        this.typing = true;
        break;

      case "feedback": {
        const cycle = this.cycle;
        if (!cycle || cycle.state.tag !== "awaiting-analysis" || cycle.state.feedbackShown) {
          this.anomaly("feedback", "feedback outside an answer awaiting analysis");
          break;
        }
        this.typing = false;
        this.turns.push({ kind: "feedback", cycle: cycle.id, text: message.data.feedback });
        cycle.state = { tag: "awaiting-analysis", feedbackShown: true };
        break;
      }

      case "analysis": {
        const cycle = this.cycle;
        if (!cycle || cycle.state.tag !== "awaiting-analysis") {
          this.anomaly("analysis", "analysis for a cycle that is not awaiting one");
          break;
        }
        this.typing = false;
        this.turns.push({ kind: "analysis", cycle: cycle.id, analysis: message.data.analysis });
        cycle.state = { tag: "analyzed", feedbackShown: cycle.state.feedbackShown };
        break;
      }

      case "next_question":
      case "followup_question": {
        if (this.complete) {
          this.anomaly(message.type, "question after the interview summary");
          break;
        }
        if (this.isCurrentQuestion(message.data.question) && this.cycle?.state.tag === "awaiting-answer") {
          this.anomaly(message.type, "duplicate of the unanswered current question");
          break;
        }
        this.typing = false;
        this.openCycle(message.data.question, message.type === "followup_question");
        break;
      }

      case "interview_summary":
        if (this.complete) {
          this.anomaly("interview_summary", "summary already rendered");
          break;
        }
        this.typing = false;
        this.complete = true;
        this.turns.push({ kind: "summary", text: message.data.summary, details: message.data.details });
        break;

      case "session_ended":
        this.ended = true;
        this.complete = true;
        this.typing = false;
        break;

      case "error":
        this.typing = false;
        this.notices.push({ code: message.data.code, message: message.data.message });
        // The server rolled back to the same question; allow a new answer
        if (message.data.code === "ORACLE_FAILURE" && this.cycle?.state.tag === "awaiting-analysis") {
          this.cycle.state = { tag: "awaiting-answer" };
        }
        break;

      default: {
        const exhaustiveCheck: never = message;
        this.anomaly((exhaustiveCheck as { type: ServerMessageType }).type, "unknown event");
      }
    }
  }

  /**
   * Records the candidate's answer just before it is sent.
   * @returns false, recording nothing, when no question is awaiting an answer.
   */
  recordSubmission(text: string): boolean {
    const trimmed = text.trim();
    if (trimmed.length === 0) return false;
    if (this.complete || !this.cycle || this.cycle.state.tag !== "awaiting-answer") {
      this.anomaly("submission", "no question is awaiting an answer");
      return false;
    }
    this.turns.push({ kind: "answer", cycle: this.cycle.id, text: trimmed });
    this.cycle.state = { tag: "awaiting-analysis", feedbackShown: false };
    return true;
  }

  snapshot(): TranscriptSnapshot {
    return {
      sessionId: this.sessionId,
      turns: [...this.turns],
      notices: [...this.notices],
      anomalies: [...this.anomalies],
      typing: this.typing,
      complete: this.complete,
      ended: this.ended,
      cycle: this.cycle ? { ...this.cycle } : null,
    };
  }

  // ─── Helpers ────────────────────────────────────────────────────────────────

  private openCycle(question: Question, followUp: boolean): void {
    const id = this.nextCycleId++;
    this.cycle = { id, question, state: { tag: "awaiting-answer" } };
    this.turns.push({ kind: "question", cycle: id, question, followUp });
  }

  private isCurrentQuestion(question: Question): boolean {
    return (
      this.cycle !== null && this.cycle.question.id === question.id && this.cycle.question.text === question.text
    );
  }

  private anomaly(event: Anomaly["event"], reason: string): void {
    this.anomalies.push({ event, reason });
  }
}
