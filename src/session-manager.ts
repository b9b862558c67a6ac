// DSA Interview Coach - Session Manager
// The interview state machine: question progression, follow-up branching,
// performance aggregation and summary synthesis.
//
// Every mutation of a session runs inside registry.runExclusive, so events for
// one session are applied one at a time while other sessions proceed. The
// oracle call is the only await inside an answer cycle.

import { SessionStage } from "./types.js";
import type {
  ConversationRole,
  InterviewConfig,
  InterviewSummary,
  PerformanceRecord,
  ServerEventData,
  ServerMessage,
  Session,
  SessionExportDocument,
  SessionSnapshot,
} from "./types.js";
import type { AnalysisResult, AnswerOracle } from "./answer-analyzer.js";
import type { QuestionBank } from "./question-bank.js";
import { toWireQuestion } from "./question-bank.js";
import type { SessionRegistry } from "./session-registry.js";
import { composeFollowUp } from "./followup-composer.js";
import { buildSummary, RecommendationCatalog, renderSummaryText } from "./interview-summary.js";
import { toExportDocument, toSnapshot } from "./session-export.js";
import { InterviewError, toErrorMessage } from "./errors.js";
import { withTimeout } from "./utils/timeout.js";
import { DEFAULT_INTERVIEW_CONFIG } from "./config.js";
import { createConsoleLogger } from "./logger.js";
import type { Logger } from "./logger.js";

/** Receives the outbound events of one operation, in emission order. */
export type EmitFn = (message: ServerMessage) => void;

export type AnswerOutcome = "followup" | "next_question" | "complete" | "discarded";

export interface StartResult {
  session: Session;
  welcome: string;
}

export interface EndResult {
  summary: InterviewSummary;
  summaryText: string;
  /** True when the session had already completed before this call. */
  alreadyComplete: boolean;
}

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface SessionManagerDeps {
  registry: SessionRegistry;
  questionBank: QuestionBank;
  oracle: AnswerOracle;
  recommendations?: RecommendationCatalog;
  config?: Partial<InterviewConfig>;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Valid stage transitions.
 *
 * AWAITING_ANSWER → ANALYZING:          submitAnswer()
 * ANALYZING → DECIDING_FOLLOWUP:        oracle result ready
 * ANALYZING → AWAITING_ANSWER:          oracle failure (rollback)
 * DECIDING_FOLLOWUP → AWAITING_ANSWER:  follow-up or next question
 * DECIDING_FOLLOWUP → COMPLETE:         last question finalized
 * AWAITING_ANSWER → COMPLETE:           endSession() before the last question
 */
const VALID_TRANSITIONS: ReadonlyMap<SessionStage, readonly SessionStage[]> = new Map([
  [SessionStage.AWAITING_ANSWER, [SessionStage.ANALYZING, SessionStage.COMPLETE]],
  [SessionStage.ANALYZING, [SessionStage.DECIDING_FOLLOWUP, SessionStage.AWAITING_ANSWER]],
  [SessionStage.DECIDING_FOLLOWUP, [SessionStage.AWAITING_ANSWER, SessionStage.COMPLETE]],
  [SessionStage.COMPLETE, []],
]);

export class SessionManager {
  private readonly registry: SessionRegistry;
  private readonly questionBank: QuestionBank;
  private readonly oracle: AnswerOracle;
  private readonly recommendations: RecommendationCatalog;
  private readonly config: InterviewConfig;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: SessionManagerDeps) {
    this.registry = deps.registry;
    this.questionBank = deps.questionBank;
    this.oracle = deps.oracle;
    this.recommendations = deps.recommendations ?? new RecommendationCatalog();
    this.config = { ...DEFAULT_INTERVIEW_CONFIG, ...deps.config };
    this.logger = deps.logger ?? createConsoleLogger("SessionManager");
    this.now = deps.now ?? (() => new Date());

    this.questionBank.assertCapacity(this.config.totalQuestions);
  }

  get totalQuestions(): number {
    return this.config.totalQuestions;
  }

  get sessions(): SessionRegistry {
    return this.registry;
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────────────

  /**
   * Creates a session positioned on the first question.
   * The welcome and first question are recorded as bot turns.
   */
  startSession(candidateName: string): StartResult {
    const firstQuestion = this.questionBank.next([]);
    if (!firstQuestion) {
      throw new Error("Question bank is empty");
    }

    const session = this.registry.create({ candidateName, firstQuestion });
    const welcome =
      `Welcome to your data structures and algorithms interview, ${candidateName}! ` +
      `I'll ask you ${this.config.totalQuestions} questions. Answer in your own words; ` +
      `when an answer misses key concepts I may ask a follow-up before moving on.`;

    this.record(session, "bot", welcome);
    this.record(session, "bot", firstQuestion.text);
    return { session, welcome };
  }

  /**
   * Retrieves a session by ID.
   * @throws InterviewError UNKNOWN_SESSION if the session does not exist.
   */
  getSession(sessionId: string): Session {
    return this.registry.get(sessionId);
  }

  describeSession(sessionId: string): ServerEventData<"session_resumed"> {
    const session = this.registry.get(sessionId);
    this.registry.touch(session);
    return {
      session_id: session.id,
      stage: session.stage,
      current_question: session.currentQuestion,
      questions_answered: session.performanceData.length,
      total_questions: this.config.totalQuestions,
    };
  }

  getSnapshot(sessionId: string): SessionSnapshot {
    return toSnapshot(this.registry.get(sessionId), this.config.totalQuestions);
  }

  exportSession(sessionId: string): SessionExportDocument {
    return toExportDocument(this.registry.get(sessionId), this.config.totalQuestions, this.now());
  }

  removeSession(sessionId: string): boolean {
    return this.registry.remove(sessionId);
  }

  // ─── Answer cycle ───────────────────────────────────────────────────────────

  /**
   * Runs one answer cycle. Emits, in order: bot_typing, feedback (when the
   * oracle produced any), analysis, then exactly one of followup_question,
   * next_question or interview_summary.
   *
   * The stage check happens before queueing, so a replayed answer for a cycle
   * already under analysis is rejected rather than queued.
   *
   * @throws InterviewError UNKNOWN_SESSION, INVALID_TRANSITION or ORACLE_FAILURE.
   *   On ORACLE_FAILURE the session is back in AWAITING_ANSWER on the same
   *   question with no counters changed.
   */
  async submitAnswer(sessionId: string, answer: string, emit: EmitFn): Promise<AnswerOutcome> {
    const session = this.registry.get(sessionId);
    this.assertTransition(session, SessionStage.ANALYZING, "submit an answer");
    return this.registry.runExclusive(sessionId, () => this.runAnswerCycle(sessionId, answer, emit));
  }

  private async runAnswerCycle(sessionId: string, answer: string, emit: EmitFn): Promise<AnswerOutcome> {
    const session = this.registry.get(sessionId);
    this.assertTransition(session, SessionStage.ANALYZING, "submit an answer");

    const question = session.currentQuestion;
    const base = session.baseQuestion;
    if (!question || !base) {
      throw new Error(`Session ${sessionId} has no current question in "${session.stage}" state`);
    }

    this.moveTo(session, SessionStage.ANALYZING);
    this.registry.touch(session);
    emit({ type: "bot_typing", data: { session_id: sessionId } });

    let result: AnalysisResult;
    try {
      result = await withTimeout(
        this.oracle.analyze({ question, keyConcepts: base.keyConcepts, answer }),
        this.config.oracleTimeoutMs,
        "Answer analysis",
      );
    } catch (err) {
      if (this.registry.peek(sessionId) !== session) {
        this.logger.warn(`Session ${sessionId} was removed during analysis, discarding failure`);
        return "discarded";
      }
      this.logger.error(`Answer analysis failed for session ${sessionId}: ${toErrorMessage(err)}`);
      this.moveTo(session, SessionStage.AWAITING_ANSWER);
      throw new InterviewError(
        "ORACLE_FAILURE",
        "Sorry, I couldn't analyze that answer. Please try again.",
        { sessionId, cause: err },
      );
    }

    // No write to a session that left the registry while the oracle ran
    if (this.registry.peek(sessionId) !== session) {
      this.logger.warn(`Session ${sessionId} was removed during analysis, discarding result`);
      return "discarded";
    }

    this.moveTo(session, SessionStage.DECIDING_FOLLOWUP);
    this.registry.touch(session);

    const { analysis, feedback } = result;
    this.record(session, "user", answer);
    if (feedback) {
      this.record(session, "bot", feedback);
      emit({ type: "feedback", data: { session_id: sessionId, feedback } });
    }
    emit({ type: "analysis", data: { session_id: sessionId, analysis } });

    // ── Follow-up branch ──
    if (
      analysis.normalized_score < this.config.followupThreshold &&
      session.currentFollowupCount < this.config.maxFollowups
    ) {
      session.currentFollowupCount++;
      const followUp = composeFollowUp(base, analysis, session.currentFollowupCount);
      session.currentQuestion = followUp;
      this.moveTo(session, SessionStage.AWAITING_ANSWER);
      this.record(session, "bot", followUp.text);
      this.logger.info(
        `Session ${sessionId}: follow-up ${session.currentFollowupCount}/${this.config.maxFollowups} on question ${base.id} (score ${analysis.score}/10)`,
      );
      emit({ type: "followup_question", data: { session_id: sessionId, question: followUp } });
      return "followup";
    }

    // ── Finalize the base question ──
    const performanceRecord: PerformanceRecord = {
      question: base,
      analysis,
      followupsUsed: session.currentFollowupCount,
      answer,
      feedback,
      finalizedAt: this.now(),
    };
    session.performanceData.push(performanceRecord);
    session.currentFollowupCount = 0;

    if (session.performanceData.length >= this.config.totalQuestions) {
      const summary = this.complete(session);
      this.logger.info(`Session ${sessionId}: interview complete (average ${summary.average_score}/10)`);
      emit({
        type: "interview_summary",
        data: { session_id: sessionId, summary: renderSummaryText(summary), details: summary },
      });
      return "complete";
    }

    const next = this.questionBank.next(session.askedQuestionIds);
    if (!next) {
      throw new Error(`Question bank exhausted for session ${sessionId}`);
    }
    session.askedQuestionIds.push(next.id);
    session.baseQuestion = next;
    session.currentQuestion = toWireQuestion(next);
    session.currentQuestionIndex++;
    this.moveTo(session, SessionStage.AWAITING_ANSWER);
    this.record(session, "bot", next.text);
    this.logger.info(
      `Session ${sessionId}: question ${base.id} finalized (score ${analysis.score}/10), advancing to question ${next.id}`,
    );
    emit({ type: "next_question", data: { session_id: sessionId, question: session.currentQuestion } });
    return "next_question";
  }

  // ─── Termination ────────────────────────────────────────────────────────────

  /**
   * Forces the session into COMPLETE, summarizing whatever has been
   * finalized so far. Waits for an answer cycle in flight to finish first.
   * The session stays registered.
   */
  async endSession(sessionId: string): Promise<EndResult> {
    this.registry.get(sessionId);
    return this.registry.runExclusive(sessionId, async () => {
      const session = this.registry.get(sessionId);

      if (session.stage === SessionStage.COMPLETE && session.summary) {
        return {
          summary: session.summary,
          summaryText: renderSummaryText(session.summary),
          alreadyComplete: true,
        };
      }

      this.assertTransition(session, SessionStage.COMPLETE, "end the session");
      session.endedEarly = true;
      const summary = this.complete(session);
      this.logger.info(
        `Session ${sessionId}: ended early after ${summary.questions_answered} of ${summary.total_questions} questions`,
      );
      return { summary, summaryText: renderSummaryText(summary), alreadyComplete: false };
    });
  }

  // ─── Helpers ────────────────────────────────────────────────────────────────

  private complete(session: Session): InterviewSummary {
    this.moveTo(session, SessionStage.COMPLETE);
    session.currentQuestion = null;
    session.baseQuestion = null;
    session.currentFollowupCount = 0;

    const summary = buildSummary(session, this.config.totalQuestions, this.recommendations);
    session.summary = summary;
    this.record(session, "bot", renderSummaryText(summary));
    return summary;
  }

  private record(session: Session, role: ConversationRole, text: string): void {
    session.conversationHistory.push({ role, text, timestamp: this.now() });
  }

  private moveTo(session: Session, target: SessionStage): void {
    this.assertTransition(session, target, `move to "${target}"`);
    session.stage = target;
  }

  /**
   * Validates that a stage transition is allowed.
   * @throws InterviewError INVALID_TRANSITION with a descriptive message.
   */
  private assertTransition(session: Session, target: SessionStage, operation: string): void {
    const allowed = VALID_TRANSITIONS.get(session.stage) ?? [];
    if (!allowed.includes(target)) {
      const hint =
        session.stage === SessionStage.COMPLETE
          ? "The interview is already complete."
          : session.stage === SessionStage.AWAITING_ANSWER
            ? "The session is waiting for an answer."
            : "The previous answer is still being analyzed.";
      throw new InterviewError(
        "INVALID_TRANSITION",
        `Cannot ${operation} in "${session.stage}" stage. ${hint}`,
        { sessionId: session.id },
      );
    }
  }
}
