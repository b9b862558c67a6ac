import { describe, it, expect } from "vitest";
import { InterviewError, isInterviewError, toErrorMessage, unknownSession } from "./errors.js";

describe("InterviewError", () => {
  it("carries a code, a session id and a cause", () => {
    const cause = new Error("socket hang up");
    const err = new InterviewError("ORACLE_FAILURE", "Analysis failed", { sessionId: "s-1", cause });

    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("InterviewError");
    expect(err.code).toBe("ORACLE_FAILURE");
    expect(err.sessionId).toBe("s-1");
    expect(err.cause).toBe(cause);
  });

  it("is recognized by isInterviewError", () => {
    expect(isInterviewError(new InterviewError("MALFORMED_EVENT", "bad"))).toBe(true);
    expect(isInterviewError(new Error("bad"))).toBe(false);
  });
});

describe("unknownSession", () => {
  it("builds an UNKNOWN_SESSION error for the id", () => {
    const err = unknownSession("s-9");

    expect(err.code).toBe("UNKNOWN_SESSION");
    expect(err.message).toBe("Session not found: s-9");
    expect(err.sessionId).toBe("s-9");
  });
});

describe("toErrorMessage", () => {
  it("reads the message of errors and stringifies anything else", () => {
    expect(toErrorMessage(new Error("boom"))).toBe("boom");
    expect(toErrorMessage("plain")).toBe("plain");
    expect(toErrorMessage(404)).toBe("404");
  });
});
