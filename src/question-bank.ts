// DSA Interview Coach - Question Bank
// Static, ordered pool of questions. Pure lookup: the bank holds no session state.

import { readFileSync } from "node:fs";
import type { Difficulty, Question, QuestionBankEntry } from "./types.js";

const DIFFICULTIES: readonly Difficulty[] = ["easy", "medium", "hard"];

function isDifficulty(value: unknown): value is Difficulty {
  return DIFFICULTIES.some((d) => d === value);
}

/** Default pool shipped in data/questions.json (resolves from both src/ and dist/). */
export const DEFAULT_QUESTIONS_PATH = new URL("../data/questions.json", import.meta.url);

/** Strips grading material from a bank entry before it goes on the wire. */
export function toWireQuestion(entry: QuestionBankEntry): Question {
  return { id: entry.id, text: entry.text, difficulty: entry.difficulty };
}

export class QuestionBank {
  private readonly questions: readonly QuestionBankEntry[];

  constructor(questions: readonly QuestionBankEntry[]) {
    const seen = new Set<number>();
    for (const question of questions) {
      if (!Number.isInteger(question.id) || question.id < 1) {
        throw new Error(`Invalid question id: ${question.id}`);
      }
      if (seen.has(question.id)) {
        throw new Error(`Duplicate question id: ${question.id}`);
      }
      seen.add(question.id);
    }
    this.questions = [...questions].sort((a, b) => a.id - b.id);
  }

  get size(): number {
    return this.questions.length;
  }

  /**
   * Returns the lowest-id question not yet asked, or null when the pool is
   * exhausted.
   */
  next(askedIds: Iterable<number>): QuestionBankEntry | null {
    const asked = new Set(askedIds);
    return this.questions.find((q) => !asked.has(q.id)) ?? null;
  }

  get(id: number): QuestionBankEntry | null {
    return this.questions.find((q) => q.id === id) ?? null;
  }

  /**
   * Asserts the pool can serve a full interview. Called once during wiring;
   * running out of questions mid-session is therefore impossible.
   */
  assertCapacity(totalQuestions: number): void {
    if (this.questions.length < totalQuestions) {
      throw new Error(
        `Question bank holds ${this.questions.length} question(s) but ${totalQuestions} are configured per session`,
      );
    }
  }
}

// ─── Loading ────────────────────────────────────────────────────────────────────

function parseStringArray(value: unknown, field: string, index: number): string[] {
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
    throw new Error(`Question at index ${index} has an invalid '${field}' field`);
  }
  return value;
}

/**
 * Validates raw JSON into bank entries.
 * @throws Error naming the first offending entry and field.
 */
export function parseQuestions(raw: unknown): QuestionBankEntry[] {
  if (!Array.isArray(raw)) {
    throw new Error("Question file must contain a JSON array");
  }

  return raw.map((item: unknown, index): QuestionBankEntry => {
    if (!item || typeof item !== "object") {
      throw new Error(`Question at index ${index} is not an object`);
    }
    const obj = item as Record<string, unknown>;

    if (typeof obj.id !== "number") {
      throw new Error(`Question at index ${index} has an invalid 'id' field`);
    }
    if (typeof obj.text !== "string" || obj.text.trim().length === 0) {
      throw new Error(`Question at index ${index} has an invalid 'text' field`);
    }
    const difficulty = obj.difficulty;
    if (!isDifficulty(difficulty)) {
      throw new Error(`Question at index ${index} has an invalid 'difficulty' field`);
    }

    return {
      id: obj.id,
      text: obj.text.trim(),
      difficulty,
      keyConcepts: parseStringArray(obj.keyConcepts, "keyConcepts", index),
      followUps: parseStringArray(obj.followUps ?? [], "followUps", index),
    };
  });
}

export function loadQuestionBank(path: string | URL = DEFAULT_QUESTIONS_PATH): QuestionBank {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return new QuestionBank(parseQuestions(raw));
}
