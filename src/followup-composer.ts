// Follow-up prompt synthesis.
//
// Kept outside both the question bank and the state machine so the wording
// policy can change without touching either. Pure and deterministic.

import type { AnswerAnalysis, Question, QuestionBankEntry } from "./types.js";
import { joinList } from "./utils.js";

/** Number of missing concepts a single follow-up focuses on. */
export const MAX_FOCUS_CONCEPTS = 2;

export const GENERIC_FOLLOWUP =
  "Can you walk me through a concrete example, including its time and space complexity?";

/**
 * Builds a narrower re-prompt for the same base question.
 *
 * @param attempt 1 for the first follow-up on this base question, 2 for the second, ...
 * @returns A question with the base id and difficulty and a text different from the base text.
 */
export function composeFollowUp(
  base: QuestionBankEntry,
  analysis: AnswerAnalysis,
  attempt: number,
): Question {
  const focus = analysis.missing_concepts.slice(0, MAX_FOCUS_CONCEPTS);

  let text: string;
  if (focus.length > 0) {
    const pronoun = focus.length === 1 ? "it" : "them";
    text = `Your answer didn't cover ${joinList(focus)}. Can you explain ${pronoun} in the context of the original question: "${base.text}"`;
  } else {
    const canned = base.followUps.length > 0 ? base.followUps[(attempt - 1) % base.followUps.length] : undefined;
    text = canned ?? GENERIC_FOLLOWUP;
  }

  if (text === base.text) {
    text = GENERIC_FOLLOWUP;
  }

  return { id: base.id, text, difficulty: base.difficulty };
}
