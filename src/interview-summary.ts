// DSA Interview Coach - Interview Summary
// Builds the end-of-interview summary from a session's performance records and
// renders it as the text carried by the interview_summary event.
//
// Deterministic: the same records always yield the same summary. Concept
// rankings use case-insensitive counts with ties broken by first appearance.

import { readFileSync } from "node:fs";
import type { InterviewSummary, PerformanceRecord, Session } from "./types.js";
import { conceptKey, rankByFrequency, roundTo } from "./utils.js";

/** How many strengths and weaknesses the summary lists. */
export const TOP_CONCEPTS = 3;

export const DEFAULT_RECOMMENDATIONS_PATH = new URL("../data/recommendations.json", import.meta.url);

// ─── Recommendation catalog ─────────────────────────────────────────────────────

export class RecommendationCatalog {
  private readonly entries: ReadonlyMap<string, string>;

  constructor(entries: Record<string, string> = {}) {
    this.entries = new Map(Object.entries(entries).map(([concept, text]) => [conceptKey(concept), text]));
  }

  /** Canned suggestion for a concept, or the generic fallback. */
  recommend(concept: string): string {
    return this.entries.get(conceptKey(concept)) ?? `Review fundamentals of ${concept}.`;
  }
}

export function loadRecommendationCatalog(
  path: string | URL = DEFAULT_RECOMMENDATIONS_PATH,
): RecommendationCatalog {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    throw new Error("Recommendation file must contain a JSON object");
  }
  const entries: Record<string, string> = {};
  for (const [concept, text] of Object.entries(raw)) {
    if (typeof text !== "string") {
      throw new Error(`Recommendation for '${concept}' is not a string`);
    }
    entries[concept] = text;
  }
  return new RecommendationCatalog(entries);
}

// ─── Synthesis ──────────────────────────────────────────────────────────────────

/** Mean final score over the records; 0 when there are none. */
export function averageScore(records: readonly { analysis: { score: number } }[]): number {
  if (records.length === 0) return 0;
  const total = records.reduce((sum, r) => sum + r.analysis.score, 0);
  return total / records.length;
}

export function buildSummary(
  session: Pick<Session, "id" | "performanceData" | "endedEarly">,
  totalQuestions: number,
  catalog: RecommendationCatalog,
): InterviewSummary {
  const records: readonly PerformanceRecord[] = session.performanceData;
  const mean = averageScore(records);

  const covered = records.flatMap((r) => r.analysis.concepts_covered);
  const missing = records.flatMap((r) => r.analysis.missing_concepts);
  const weaknesses = rankByFrequency(missing, TOP_CONCEPTS);

  return {
    session_id: session.id,
    average_score: roundTo(mean, 2),
    normalized_average: roundTo(mean / 10, 3),
    questions_answered: records.length,
    total_questions: totalQuestions,
    followups_asked: records.reduce((sum, r) => sum + r.followupsUsed, 0),
    strengths: rankByFrequency(covered, TOP_CONCEPTS),
    weaknesses,
    recommendations: weaknesses.map((concept) => catalog.recommend(concept)),
    question_breakdown: records.map((r) => ({
      question_id: r.question.id,
      score: r.analysis.score,
      followups_used: r.followupsUsed,
    })),
    ended_early: session.endedEarly,
  };
}

// ─── Rendering ──────────────────────────────────────────────────────────────────

function bulletSection(title: string, items: readonly string[]): string[] {
  if (items.length === 0) return [];
  return ["", `${title}:`, ...items.map((item) => `- ${item}`)];
}

/**
 * Renders the summary as plain text, e.g.
 *
 *   Interview complete.
 *   Average score: 7.5/10 (75%)
 *   Questions answered: 5 of 5
 */
export function renderSummaryText(summary: InterviewSummary): string {
  const lines = [
    summary.ended_early ? "Interview ended early." : "Interview complete.",
    `Average score: ${summary.average_score}/10 (${Math.round(summary.normalized_average * 100)}%)`,
    `Questions answered: ${summary.questions_answered} of ${summary.total_questions}`,
    `Follow-up questions asked: ${summary.followups_asked}`,
    ...bulletSection("Strengths", summary.strengths),
    ...bulletSection("Areas to improve", summary.weaknesses),
    ...bulletSection("Recommendations", summary.recommendations),
  ];

  if (summary.question_breakdown.length > 0) {
    lines.push("", "Question breakdown:");
    for (const entry of summary.question_breakdown) {
      const followups = entry.followups_used === 1 ? "1 follow-up" : `${entry.followups_used} follow-ups`;
      lines.push(`- Question ${entry.question_id}: ${entry.score}/10 (${followups})`);
    }
  }

  return lines.join("\n");
}
