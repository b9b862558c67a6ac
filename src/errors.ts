// DSA Interview Coach - Error kinds
//
// Every failure that can reach a client is an InterviewError carrying one of
// a closed set of codes. A dropped connection is not an error: it only
// triggers cleanup in the transport layer.

export type InterviewErrorCode =
  | "UNKNOWN_SESSION"
  | "INVALID_TRANSITION"
  | "ORACLE_FAILURE"
  | "MALFORMED_EVENT";

export class InterviewError extends Error {
  /** The error code for programmatic handling. */
  public readonly code: InterviewErrorCode;
  /** Session the failure is scoped to, when known. */
  public readonly sessionId: string | undefined;

  constructor(
    code: InterviewErrorCode,
    message: string,
    options: { sessionId?: string; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "InterviewError";
    this.code = code;
    this.sessionId = options.sessionId;
  }
}

export function isInterviewError(err: unknown): err is InterviewError {
  return err instanceof InterviewError;
}

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function unknownSession(sessionId: string): InterviewError {
  return new InterviewError("UNKNOWN_SESSION", `Session not found: ${sessionId}`, { sessionId });
}
