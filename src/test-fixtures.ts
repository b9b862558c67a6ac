// DSA Interview Coach - Test fixtures
// Small question pools, analysis builders and a scripted answer oracle shared
// by the state-machine, dispatcher and server tests.

import type { AnswerAnalysis, QuestionBankEntry } from "./types.js";
import type { AnalysisRequest, AnalysisResult, AnswerOracle } from "./answer-analyzer.js";
import { qualityForScore } from "./answer-analyzer.js";
import { QuestionBank } from "./question-bank.js";
import { createDeferred } from "./utils/deferred.js";

/** Entry `id`: "Question <id>?", concepts "concept <id>a" and "concept <id>b". */
export function makeEntry(id: number, overrides: Partial<QuestionBankEntry> = {}): QuestionBankEntry {
  return {
    id,
    text: `Question ${id}?`,
    difficulty: "medium",
    keyConcepts: [`concept ${id}a`, `concept ${id}b`],
    followUps: [`Follow-up for question ${id}?`],
    ...overrides,
  };
}

export function makeQuestionBank(size: number): QuestionBank {
  return new QuestionBank(Array.from({ length: size }, (_, i) => makeEntry(i + 1)));
}

export function makeAnalysis(score: number, overrides: Partial<AnswerAnalysis> = {}): AnswerAnalysis {
  return {
    score,
    normalized_score: score / 10,
    quality: qualityForScore(score),
    depth: "adequate",
    concepts_covered: [],
    missing_concepts: [],
    detailed_analysis: `Scored ${score}/10.`,
    ...overrides,
  };
}

export function makeResult(
  score: number,
  overrides: Partial<AnswerAnalysis> = {},
  feedback: string | null = "Thanks for the answer.",
): AnalysisResult {
  return { analysis: makeAnalysis(score, overrides), feedback };
}

/**
 * Answers each analyze() call with the next scripted step, in order.
 * Calls past the end of the script reject.
 */
export class ScriptedOracle implements AnswerOracle {
  readonly requests: AnalysisRequest[] = [];
  private readonly steps: Array<() => Promise<AnalysisResult>> = [];

  respond(...results: AnalysisResult[]): this {
    for (const result of results) {
      this.steps.push(() => Promise.resolve(result));
    }
    return this;
  }

  fail(error: Error): this {
    this.steps.push(() => Promise.reject(error));
    return this;
  }

  /** Queues a step that settles only when the returned function is called. */
  hold(): (result: AnalysisResult) => void {
    const deferred = createDeferred<AnalysisResult>();
    this.steps.push(() => deferred.promise);
    return deferred.resolve;
  }

  analyze(request: AnalysisRequest): Promise<AnalysisResult> {
    this.requests.push(request);
    const step = this.steps.shift();
    if (!step) {
      return Promise.reject(new Error("No scripted analysis left"));
    }
    return step();
  }
}
