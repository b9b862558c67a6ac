import { describe, it, expect, vi } from "vitest";
import { APP_NAME, APP_VERSION, buildApplication } from "./index.js";
import { loadConfig } from "./config.js";
import { ScriptedOracle } from "./test-fixtures.js";

function createSilentLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("Project setup", () => {
  it("should export app name", () => {
    expect(APP_NAME).toBe("DSA Interview Coach");
  });

  it("should export app version", () => {
    expect(APP_VERSION).toBe("0.1.0");
  });
});

describe("buildApplication()", () => {
  it("wires the components from config without listening", () => {
    const app = buildApplication(loadConfig({}), new ScriptedOracle(), { logger: createSilentLogger() });

    expect(app.sessionManager.totalQuestions).toBe(5);
    expect(app.server.sessionManager).toBe(app.sessionManager);
    expect(app.sessionManager.sessions).toBe(app.registry);
    expect(app.server.httpServer.listening).toBe(false);
  });

  it("starts sessions on the shipped question pool", () => {
    const app = buildApplication(loadConfig({}), new ScriptedOracle(), { logger: createSilentLogger() });

    const { session } = app.sessionManager.startSession("Ada");

    expect(session.currentQuestion?.text).toBe(
      "What's the difference between arrays and linked lists? When would you use each?",
    );
  });

  it("refuses a session length the question pool cannot serve", () => {
    expect(() =>
      buildApplication(loadConfig({ QUESTIONS_PER_SESSION: "9" }), new ScriptedOracle(), {
        logger: createSilentLogger(),
      }),
    ).toThrow("Question bank holds 8 question(s) but 9 are configured per session");
  });
});
