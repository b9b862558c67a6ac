// Answer Analyzer — scores a free-text interview answer against a question's
// key concepts using an OpenAI chat model in JSON mode.
//
// The session state machine only depends on the AnswerOracle contract; this
// class is the production implementation of it. The reply is validated and
// normalized here so the state machine never sees an out-of-range score.

import type { AnswerAnalysis, AnswerDepth, AnswerQuality, Question } from "./types.js";
import { normalizeConcepts } from "./utils.js";

// ─── Oracle contract ────────────────────────────────────────────────────────────

export interface AnalysisRequest {
  question: Question;
  keyConcepts: string[];
  answer: string;
}

export interface AnalysisResult {
  analysis: AnswerAnalysis;
  feedback: string | null;
}

export interface AnswerOracle {
  analyze(request: AnalysisRequest): Promise<AnalysisResult>;
}

// ─── Chat completions surface ───────────────────────────────────────────────────

/**
 * The one OpenAI call the analyzer makes. Tests pass a stub with the same
 * shape instead of the SDK client.
 */
export interface OpenAIClient {
  chat: {
    completions: {
      create(params: {
        model: string;
        messages: Array<{ role: string; content: string }>;
        response_format?: { type: string };
        temperature?: number;
      }): Promise<{
        choices: Array<{
          message: {
            content: string | null;
          };
        }>;
      }>;
    };
  };
}

export interface AnswerAnalyzerOptions {
  model?: string;
  temperature?: number;
}

// ─── Label helpers ──────────────────────────────────────────────────────────────

const QUALITIES: readonly AnswerQuality[] = ["excellent", "good", "fair", "poor"];
const DEPTHS: readonly AnswerDepth[] = ["deep", "adequate", "shallow"];

/** Score bands: 0-3 poor, 4-7 fair, 8 good, 9-10 excellent. */
export function qualityForScore(score: number): AnswerQuality {
  if (score >= 9) return "excellent";
  if (score >= 8) return "good";
  if (score >= 4) return "fair";
  return "poor";
}

function parseQuality(value: unknown, score: number): AnswerQuality {
  const label = typeof value === "string" ? value.trim().toLowerCase() : "";
  return QUALITIES.find((q) => q === label) ?? qualityForScore(score);
}

function parseDepth(value: unknown): AnswerDepth {
  const label = typeof value === "string" ? value.trim().toLowerCase() : "";
  return DEPTHS.find((d) => d === label) ?? "adequate";
}

function parseConceptList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  const strings = value.filter((v): v is string => typeof v === "string");
  // Models sometimes answer "none" instead of an empty list
  return normalizeConcepts(strings).filter((c) => c.toLowerCase() !== "none");
}

// ─── Parsing ────────────────────────────────────────────────────────────────────

/**
 * Parse the raw LLM JSON reply into an AnalysisResult.
 * Throws if the reply is not JSON or carries no numeric score.
 */
export function parseAnalysisResponse(raw: string): AnalysisResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error(`Failed to parse LLM response as JSON: ${raw.slice(0, 200)}`);
  }

  if (!parsed || typeof parsed !== "object") {
    throw new Error("LLM response is not a JSON object");
  }
  const obj = parsed as Record<string, unknown>;

  const rawScore = typeof obj.score === "string" ? Number(obj.score) : obj.score;
  if (typeof rawScore !== "number" || !Number.isFinite(rawScore)) {
    throw new Error("LLM response missing or invalid 'score' field");
  }
  const score = Math.min(10, Math.max(0, Math.round(rawScore)));

  const detailed =
    typeof obj.detailed_analysis === "string" && obj.detailed_analysis.trim().length > 0
      ? obj.detailed_analysis.trim()
      : "Analysis unavailable.";

  const feedback =
    typeof obj.feedback === "string" && obj.feedback.trim().length > 0 ? obj.feedback.trim() : null;

  return {
    analysis: {
      score,
      normalized_score: score / 10,
      quality: parseQuality(obj.quality, score),
      depth: parseDepth(obj.depth),
      concepts_covered: parseConceptList(obj.concepts_covered),
      missing_concepts: parseConceptList(obj.missing_concepts),
      detailed_analysis: detailed,
    },
    feedback,
  };
}

// ─── LLMAnswerAnalyzer ──────────────────────────────────────────────────────────

export class LLMAnswerAnalyzer implements AnswerOracle {
  private readonly openai: OpenAIClient;
  private readonly model: string;
  private readonly temperature: number;

  constructor(openaiClient: OpenAIClient, options: AnswerAnalyzerOptions = {}) {
    this.openai = openaiClient;
    this.model = options.model ?? "gpt-4o-mini";
    this.temperature = options.temperature ?? 0.4;
  }

  async analyze(request: AnalysisRequest): Promise<AnalysisResult> {
    const raw = await this.callLLM(this.buildPrompt(request));
    return parseAnalysisResponse(raw);
  }

  buildPrompt(request: AnalysisRequest): { system: string; user: string } {
    const system = `You are a senior software engineer evaluating an answer given in a data structures and algorithms interview.
Judge technical accuracy, depth and coverage of the expected key concepts.

Scoring:
- 0-3: poor, missing key concepts or containing major inaccuracies
- 4-7: fair, covers some concepts but lacks depth or clarity
- 8-10: good to excellent

Quality must follow the score: 0-3 poor, 4-7 fair, 8 good, 9-10 excellent.

Respond with ONLY a JSON object of this shape:
{
  "score": <integer 0-10>,
  "quality": "excellent" | "good" | "fair" | "poor",
  "depth": "deep" | "adequate" | "shallow",
  "concepts_covered": [<expected concepts the answer covers>],
  "missing_concepts": [<expected concepts the answer misses>],
  "detailed_analysis": "<strengths and weaknesses, naming specific concepts>",
  "feedback": "<2-4 sentences of encouraging, specific, technical feedback; never address the candidate by name>"
}`;

    const user = `## Question
${request.question.text}

## Expected key concepts
${request.keyConcepts.length > 0 ? request.keyConcepts.join(", ") : "(none listed)"}

## Candidate's answer
${request.answer}`;

    return { system, user };
  }

  // ── LLM call ───────────────────────────────────────────────────────────────

  private async callLLM(prompt: { system: string; user: string }): Promise<string> {
    const response = await this.openai.chat.completions.create({
      model: this.model,
      messages: [
        { role: "system", content: prompt.system },
        { role: "user", content: prompt.user },
      ],
      response_format: { type: "json_object" },
      temperature: this.temperature,
    });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error("LLM returned empty response");
    }
    return content;
  }
}
