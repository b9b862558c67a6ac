// DSA Interview Coach - Shared TypeScript interfaces and types
//
// Wire payloads (protocol events, snapshots, exports) use snake_case field
// names; in-memory session state uses camelCase.

// ─── Session State Machine ──────────────────────────────────────────────────────

export enum SessionStage {
  AWAITING_ANSWER = "awaiting_answer",
  ANALYZING = "analyzing",
  DECIDING_FOLLOWUP = "deciding_followup",
  COMPLETE = "complete",
}

/** A promise settled from outside, used for per-session queue tails and held oracle calls. */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

// ─── Questions ──────────────────────────────────────────────────────────────────

export type Difficulty = "easy" | "medium" | "hard";

/** A question as posed to the candidate. Follow-ups share their parent's id. */
export interface Question {
  id: number; // 1-based, stable ordering
  text: string;
  difficulty: Difficulty;
}

/** A question as stored in the bank, with the material the oracle grades against. */
export interface QuestionBankEntry extends Question {
  keyConcepts: string[];
  followUps: string[]; // canned follow-up prompts, used when no concept is missing
}

// ─── Answer Analysis ────────────────────────────────────────────────────────────

export type AnswerQuality = "excellent" | "good" | "fair" | "poor";
export type AnswerDepth = "deep" | "adequate" | "shallow";

export interface AnswerAnalysis {
  score: number; // integer, 0-10
  normalized_score: number; // score / 10
  quality: AnswerQuality;
  depth: AnswerDepth;
  concepts_covered: string[];
  missing_concepts: string[];
  detailed_analysis: string;
}

// ─── Session ────────────────────────────────────────────────────────────────────

export interface PerformanceRecord {
  question: QuestionBankEntry; // base question, referenced from the bank
  analysis: AnswerAnalysis; // most recent analysis (a follow-up's supersedes its parent's)
  followupsUsed: number;
  answer: string;
  feedback: string | null;
  finalizedAt: Date;
}

export type ConversationRole = "user" | "bot";

export interface ConversationTurn {
  role: ConversationRole;
  text: string;
  timestamp: Date;
}

export interface InterviewConfig {
  totalQuestions: number;
  maxFollowups: number;
  followupThreshold: number; // normalized score below which a follow-up is considered
  oracleTimeoutMs: number;
}

export interface Session {
  id: string;
  candidateName: string;
  stage: SessionStage;
  currentQuestionIndex: number; // 0-based index into the base questions actually asked
  currentQuestion: Question | null; // null only in COMPLETE
  baseQuestion: QuestionBankEntry | null; // bank entry behind currentQuestion
  currentFollowupCount: number;
  askedQuestionIds: number[];
  performanceData: PerformanceRecord[];
  conversationHistory: ConversationTurn[];
  summary: InterviewSummary | null; // set once, on entering COMPLETE
  endedEarly: boolean;
  createdAt: Date;
  lastActivityAt: Date;
}

// ─── Summary ────────────────────────────────────────────────────────────────────

export interface QuestionBreakdownEntry {
  question_id: number;
  score: number;
  followups_used: number;
}

export interface InterviewSummary {
  session_id: string;
  average_score: number; // mean of final scores, 0-10
  normalized_average: number; // 0-1
  questions_answered: number;
  total_questions: number;
  followups_asked: number;
  strengths: string[];
  weaknesses: string[];
  recommendations: string[];
  question_breakdown: QuestionBreakdownEntry[];
  ended_early: boolean;
}

// ─── Snapshot / Export ──────────────────────────────────────────────────────────

export interface PerformanceRecordDocument {
  question: Question;
  analysis: AnswerAnalysis;
  followups_used: number;
  answer: string;
  feedback: string | null;
  finalized_at: string; // ISO-8601
}

export interface ConversationTurnDocument {
  role: ConversationRole;
  text: string;
  timestamp: string; // ISO-8601
}

export interface SessionSnapshot {
  session_id: string;
  candidate_name: string;
  stage: SessionStage;
  current_question_index: number;
  current_question: Question | null;
  current_followup_count: number;
  questions_answered: number;
  total_questions: number;
  ended_early: boolean;
  created_at: string;
  performance_data: PerformanceRecordDocument[];
  conversation_history: ConversationTurnDocument[];
}

export interface SessionExportDocument {
  format: "interview-session-export";
  version: 1;
  exported_at: string;
  session: SessionSnapshot;
  summary: InterviewSummary | null;
}

// ─── WebSocket Protocol ─────────────────────────────────────────────────────────

// Client → Server messages
export type ClientMessage =
  | { type: "start_session"; data: { candidate_name: string } }
  | { type: "user_message"; data: { session_id: string; message: string } }
  | { type: "end_session"; data: { session_id: string } }
  | { type: "resume_session"; data: { session_id: string } }
  | { type: "ping"; data: Record<string, never> };

export type ClientMessageType = ClientMessage["type"];

export type ErrorEventCode =
  | "UNKNOWN_SESSION"
  | "INVALID_TRANSITION"
  | "ORACLE_FAILURE"
  | "MALFORMED_EVENT"
  | "INTERNAL";

// Server → Client messages
export type ServerMessage =
  | { type: "connected"; data: { message: string } }
  | {
      type: "session_started";
      data: {
        session_id: string;
        candidate_name: string;
        welcome: string;
        first_question: Question;
        total_questions: number;
      };
    }
  | {
      type: "session_resumed";
      data: {
        session_id: string;
        stage: SessionStage;
        current_question: Question | null;
        questions_answered: number;
        total_questions: number;
      };
    }
  | { type: "bot_typing"; data: { session_id: string } }
  | { type: "feedback"; data: { session_id: string; feedback: string } }
  | { type: "analysis"; data: { session_id: string; analysis: AnswerAnalysis } }
  | { type: "next_question"; data: { session_id: string; question: Question } }
  | { type: "followup_question"; data: { session_id: string; question: Question } }
  | {
      type: "interview_summary";
      data: { session_id: string; summary: string; details: InterviewSummary };
    }
  | { type: "session_ended"; data: { session_id: string } }
  | { type: "pong"; data: { timestamp: string } }
  | {
      type: "error";
      data: { message: string; code: ErrorEventCode; session_id?: string };
    };

export type ServerMessageType = ServerMessage["type"];

/** Payload of a given server event, e.g. `ServerEventData<"analysis">`. */
export type ServerEventData<K extends ServerMessageType> = Extract<
  ServerMessage,
  { type: K }
>["data"];
