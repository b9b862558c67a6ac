// Unit tests for configuration loading

import { describe, it, expect } from "vitest";
import { DEFAULT_INTERVIEW_CONFIG, loadConfig } from "./config.js";

describe("loadConfig()", () => {
  it("returns defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      openaiApiKey: undefined,
      llmModel: "gpt-4o-mini",
      llmTemperature: 0.4,
      interview: DEFAULT_INTERVIEW_CONFIG,
      sessionIdleTimeoutMs: 1_800_000,
      sessionSweepIntervalMs: 60_000,
      outputDir: "output",
      staticDir: "public",
    });
  });

  it("reads interview settings", () => {
    const config = loadConfig({
      QUESTIONS_PER_SESSION: "3",
      MAX_FOLLOWUPS: "0",
      FOLLOWUP_THRESHOLD: "0.7",
      ORACLE_TIMEOUT_MS: "5000",
    });

    expect(config.interview).toEqual({
      totalQuestions: 3,
      maxFollowups: 0,
      followupThreshold: 0.7,
      oracleTimeoutMs: 5000,
    });
  });

  it("converts session timeouts from seconds to milliseconds", () => {
    const config = loadConfig({ SESSION_IDLE_TIMEOUT_SECONDS: "60", SESSION_SWEEP_INTERVAL_SECONDS: "5" });

    expect(config.sessionIdleTimeoutMs).toBe(60_000);
    expect(config.sessionSweepIntervalMs).toBe(5_000);
  });

  it("trims values and treats blank ones as unset", () => {
    const config = loadConfig({ OPENAI_API_KEY: "  test-secret  ", LLM_MODEL: "   ", PORT: " 8080 " });

    expect(config.openaiApiKey).toBe("test-secret");
    expect(config.llmModel).toBe("gpt-4o-mini");
    expect(config.port).toBe(8080);
  });

  it("rejects a non-numeric or out-of-range port", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow("Invalid PORT value: abc");
    expect(() => loadConfig({ PORT: "0" })).toThrow("Invalid PORT value: 0");
    expect(() => loadConfig({ PORT: "70000" })).toThrow("Invalid PORT value: 70000");
  });

  it("rejects a fractional question count", () => {
    expect(() => loadConfig({ QUESTIONS_PER_SESSION: "2.5" })).toThrow("Invalid QUESTIONS_PER_SESSION value: 2.5");
  });

  it("rejects a threshold outside 0..1", () => {
    expect(() => loadConfig({ FOLLOWUP_THRESHOLD: "1.5" })).toThrow(
      "Invalid FOLLOWUP_THRESHOLD value: 1.5. Expected number between 0 and 1.",
    );
  });

  it("rejects a temperature outside 0..2", () => {
    expect(() => loadConfig({ LLM_TEMPERATURE: "-1" })).toThrow(
      "Invalid LLM_TEMPERATURE value: -1. Expected number between 0 and 2.",
    );
  });
});
