// DSA Interview Coach - Configuration
// Reads process environment into a typed config. Values are validated once,
// at start-up; a bad value is a configuration error, never a runtime one.

import type { InterviewConfig } from "./types.js";

export interface AppConfig {
  port: number;
  openaiApiKey: string | undefined;
  llmModel: string;
  llmTemperature: number;
  interview: InterviewConfig;
  sessionIdleTimeoutMs: number;
  sessionSweepIntervalMs: number;
  outputDir: string;
  staticDir: string;
}

export const DEFAULT_INTERVIEW_CONFIG: InterviewConfig = {
  totalQuestions: 5,
  maxFollowups: 1,
  followupThreshold: 0.5,
  oracleTimeoutMs: 30_000,
};

type Env = Record<string, string | undefined>;

function getOptionalTrimmed(env: Env, name: string): string | undefined {
  const value = env[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function parseInteger(env: Env, name: string, fallback: number, min: number): number {
  const raw = getOptionalTrimmed(env, name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`Invalid ${name} value: ${raw}`);
  }
  return value;
}

function parseNumberInRange(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = getOptionalTrimmed(env, name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < min || value > max) {
    throw new Error(`Invalid ${name} value: ${raw}. Expected number between ${min} and ${max}.`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const port = parseInteger(env, "PORT", 3000, 1);
  if (port > 65535) {
    throw new Error(`Invalid PORT value: ${port}`);
  }

  return {
    port,
    openaiApiKey: getOptionalTrimmed(env, "OPENAI_API_KEY"),
    llmModel: getOptionalTrimmed(env, "LLM_MODEL") ?? "gpt-4o-mini",
    llmTemperature: parseNumberInRange(env, "LLM_TEMPERATURE", 0.4, 0, 2),
    interview: {
      totalQuestions: parseInteger(env, "QUESTIONS_PER_SESSION", DEFAULT_INTERVIEW_CONFIG.totalQuestions, 1),
      maxFollowups: parseInteger(env, "MAX_FOLLOWUPS", DEFAULT_INTERVIEW_CONFIG.maxFollowups, 0),
      followupThreshold: parseNumberInRange(
        env,
        "FOLLOWUP_THRESHOLD",
        DEFAULT_INTERVIEW_CONFIG.followupThreshold,
        0,
        1,
      ),
      oracleTimeoutMs: parseInteger(env, "ORACLE_TIMEOUT_MS", DEFAULT_INTERVIEW_CONFIG.oracleTimeoutMs, 1),
    },
    sessionIdleTimeoutMs: parseInteger(env, "SESSION_IDLE_TIMEOUT_SECONDS", 1800, 1) * 1000,
    sessionSweepIntervalMs: parseInteger(env, "SESSION_SWEEP_INTERVAL_SECONDS", 60, 1) * 1000,
    outputDir: getOptionalTrimmed(env, "OUTPUT_DIR") ?? "output",
    staticDir: getOptionalTrimmed(env, "STATIC_DIR") ?? "public",
  };
}
