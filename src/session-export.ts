// DSA Interview Coach - Session snapshot and export documents
//
// A snapshot is the wire view of a live session; an export wraps a snapshot
// and the summary in a versioned, self-contained document. parseSessionExport
// reverses toExportDocument for any document this module produced.

import { SessionStage } from "./types.js";
import type {
  AnswerAnalysis,
  ConversationTurnDocument,
  InterviewSummary,
  PerformanceRecordDocument,
  Question,
  Session,
  SessionExportDocument,
  SessionSnapshot,
} from "./types.js";
import { toWireQuestion } from "./question-bank.js";

export { averageScore } from "./interview-summary.js";

export const EXPORT_FORMAT = "interview-session-export";
export const EXPORT_VERSION = 1;

// ─── Building ───────────────────────────────────────────────────────────────────

export function toSnapshot(session: Session, totalQuestions: number): SessionSnapshot {
  return {
    session_id: session.id,
    candidate_name: session.candidateName,
    stage: session.stage,
    current_question_index: session.currentQuestionIndex,
    current_question: session.currentQuestion,
    current_followup_count: session.currentFollowupCount,
    questions_answered: session.performanceData.length,
    total_questions: totalQuestions,
    ended_early: session.endedEarly,
    created_at: session.createdAt.toISOString(),
    performance_data: session.performanceData.map(
      (record): PerformanceRecordDocument => ({
        question: toWireQuestion(record.question),
        analysis: record.analysis,
        followups_used: record.followupsUsed,
        answer: record.answer,
        feedback: record.feedback,
        finalized_at: record.finalizedAt.toISOString(),
      }),
    ),
    conversation_history: session.conversationHistory.map(
      (turn): ConversationTurnDocument => ({
        role: turn.role,
        text: turn.text,
        timestamp: turn.timestamp.toISOString(),
      }),
    ),
  };
}

export function toExportDocument(
  session: Session,
  totalQuestions: number,
  exportedAt: Date = new Date(),
): SessionExportDocument {
  return {
    format: EXPORT_FORMAT,
    version: EXPORT_VERSION,
    exported_at: exportedAt.toISOString(),
    session: toSnapshot(session, totalQuestions),
    summary: session.summary,
  };
}

// ─── Parsing ────────────────────────────────────────────────────────────────────

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function fail(path: string, expected: string): never {
  throw new Error(`Invalid session export: '${path}' must be ${expected}`);
}

function readObject(value: unknown, path: string): JsonObject {
  return isObject(value) ? value : fail(path, "an object");
}

function readString(obj: JsonObject, key: string, path: string): string {
  const value = obj[key];
  return typeof value === "string" ? value : fail(`${path}.${key}`, "a string");
}

function readNumber(obj: JsonObject, key: string, path: string): number {
  const value = obj[key];
  return typeof value === "number" && Number.isFinite(value) ? value : fail(`${path}.${key}`, "a number");
}

function readBoolean(obj: JsonObject, key: string, path: string): boolean {
  const value = obj[key];
  return typeof value === "boolean" ? value : fail(`${path}.${key}`, "a boolean");
}

function readStringArray(obj: JsonObject, key: string, path: string): string[] {
  const value = obj[key];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
    return fail(`${path}.${key}`, "an array of strings");
  }
  return value;
}

function readArray(obj: JsonObject, key: string, path: string): unknown[] {
  const value = obj[key];
  return Array.isArray(value) ? value : fail(`${path}.${key}`, "an array");
}

function readTimestamp(obj: JsonObject, key: string, path: string): string {
  const value = readString(obj, key, path);
  return Number.isNaN(Date.parse(value)) ? fail(`${path}.${key}`, "an ISO-8601 timestamp") : value;
}

function readOneOf<T extends string>(obj: JsonObject, key: string, path: string, allowed: readonly T[]): T {
  const value = obj[key];
  const match = allowed.find((a) => a === value);
  return match ?? fail(`${path}.${key}`, `one of ${allowed.join(", ")}`);
}

const STAGES: readonly SessionStage[] = Object.values(SessionStage);

function parseQuestion(value: unknown, path: string): Question {
  const obj = readObject(value, path);
  return {
    id: readNumber(obj, "id", path),
    text: readString(obj, "text", path),
    difficulty: readOneOf(obj, "difficulty", path, ["easy", "medium", "hard"]),
  };
}

function parseAnalysis(value: unknown, path: string): AnswerAnalysis {
  const obj = readObject(value, path);
  return {
    score: readNumber(obj, "score", path),
    normalized_score: readNumber(obj, "normalized_score", path),
    quality: readOneOf(obj, "quality", path, ["excellent", "good", "fair", "poor"]),
    depth: readOneOf(obj, "depth", path, ["deep", "adequate", "shallow"]),
    concepts_covered: readStringArray(obj, "concepts_covered", path),
    missing_concepts: readStringArray(obj, "missing_concepts", path),
    detailed_analysis: readString(obj, "detailed_analysis", path),
  };
}

function parseRecord(value: unknown, path: string): PerformanceRecordDocument {
  const obj = readObject(value, path);
  const feedback = obj.feedback === null ? null : readString(obj, "feedback", path);
  return {
    question: parseQuestion(obj.question, `${path}.question`),
    analysis: parseAnalysis(obj.analysis, `${path}.analysis`),
    followups_used: readNumber(obj, "followups_used", path),
    answer: readString(obj, "answer", path),
    feedback,
    finalized_at: readTimestamp(obj, "finalized_at", path),
  };
}

function parseTurn(value: unknown, path: string): ConversationTurnDocument {
  const obj = readObject(value, path);
  return {
    role: readOneOf(obj, "role", path, ["user", "bot"]),
    text: readString(obj, "text", path),
    timestamp: readTimestamp(obj, "timestamp", path),
  };
}

function parseSnapshot(value: unknown, path: string): SessionSnapshot {
  const obj = readObject(value, path);
  const current = obj.current_question;
  return {
    session_id: readString(obj, "session_id", path),
    candidate_name: readString(obj, "candidate_name", path),
    stage: readOneOf(obj, "stage", path, STAGES),
    current_question_index: readNumber(obj, "current_question_index", path),
    current_question: current === null ? null : parseQuestion(current, `${path}.current_question`),
    current_followup_count: readNumber(obj, "current_followup_count", path),
    questions_answered: readNumber(obj, "questions_answered", path),
    total_questions: readNumber(obj, "total_questions", path),
    ended_early: readBoolean(obj, "ended_early", path),
    created_at: readTimestamp(obj, "created_at", path),
    performance_data: readArray(obj, "performance_data", path).map((r, i) =>
      parseRecord(r, `${path}.performance_data[${i}]`),
    ),
    conversation_history: readArray(obj, "conversation_history", path).map((t, i) =>
      parseTurn(t, `${path}.conversation_history[${i}]`),
    ),
  };
}

function parseSummary(value: unknown, path: string): InterviewSummary {
  const obj = readObject(value, path);
  return {
    session_id: readString(obj, "session_id", path),
    average_score: readNumber(obj, "average_score", path),
    normalized_average: readNumber(obj, "normalized_average", path),
    questions_answered: readNumber(obj, "questions_answered", path),
    total_questions: readNumber(obj, "total_questions", path),
    followups_asked: readNumber(obj, "followups_asked", path),
    strengths: readStringArray(obj, "strengths", path),
    weaknesses: readStringArray(obj, "weaknesses", path),
    recommendations: readStringArray(obj, "recommendations", path),
    question_breakdown: readArray(obj, "question_breakdown", path).map((entry, i) => {
      const entryPath = `${path}.question_breakdown[${i}]`;
      const e = readObject(entry, entryPath);
      return {
        question_id: readNumber(e, "question_id", entryPath),
        score: readNumber(e, "score", entryPath),
        followups_used: readNumber(e, "followups_used", entryPath),
      };
    }),
    ended_early: readBoolean(obj, "ended_early", path),
  };
}

/**
 * Parses and validates an export produced by toExportDocument.
 * @throws Error naming the first field that does not match the document shape.
 */
export function parseSessionExport(json: string): SessionExportDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new Error("Invalid session export: not valid JSON", { cause: err });
  }

  const doc = readObject(raw, "$");
  if (doc.format !== EXPORT_FORMAT) {
    fail("$.format", `"${EXPORT_FORMAT}"`);
  }
  if (doc.version !== EXPORT_VERSION) {
    fail("$.version", String(EXPORT_VERSION));
  }

  return {
    format: EXPORT_FORMAT,
    version: EXPORT_VERSION,
    exported_at: readTimestamp(doc, "exported_at", "$"),
    session: parseSnapshot(doc.session, "$.session"),
    summary: doc.summary === null ? null : parseSummary(doc.summary, "$.summary"),
  };
}
