// DSA Interview Coach - Session Registry
// Owns every live Session, keyed by session id, and serializes work per key.
//
// Work for one session runs strictly one task at a time (runExclusive); work
// for different sessions interleaves freely. The map itself is the only
// structure touched by more than one flow.

import { v4 as uuidv4 } from "uuid";
import { SessionStage } from "./types.js";
import type { QuestionBankEntry, Session } from "./types.js";
import { toWireQuestion } from "./question-bank.js";
import { createDeferred } from "./utils/deferred.js";
import { unknownSession } from "./errors.js";
import type { Logger } from "./logger.js";

export interface SessionSeed {
  candidateName: string;
  firstQuestion: QuestionBankEntry;
}

export interface RegistryStats {
  active_sessions: number;
  busy_sessions: number;
}

export interface SessionRegistryOptions {
  idleTimeoutMs?: number;
  logger?: Logger;
  now?: () => Date;
}

export class SessionRegistry {
  private readonly sessions = new Map<string, Session>();
  /** Tail of each session's task queue. Present only while work is queued. */
  private readonly tails = new Map<string, Promise<void>>();
  private readonly idleTimeoutMs: number;
  private readonly logger: Logger | undefined;
  private readonly now: () => Date;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: SessionRegistryOptions = {}) {
    this.idleTimeoutMs = options.idleTimeoutMs ?? 30 * 60 * 1000;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  create(seed: SessionSeed): Session {
    const createdAt = this.now();
    const session: Session = {
      id: uuidv4(),
      candidateName: seed.candidateName,
      stage: SessionStage.AWAITING_ANSWER,
      currentQuestionIndex: 0,
      currentQuestion: toWireQuestion(seed.firstQuestion),
      baseQuestion: seed.firstQuestion,
      currentFollowupCount: 0,
      askedQuestionIds: [seed.firstQuestion.id],
      performanceData: [],
      conversationHistory: [],
      summary: null,
      endedEarly: false,
      createdAt,
      lastActivityAt: createdAt,
    };

    this.sessions.set(session.id, session);
    this.logger?.info(`Session ${session.id} created for "${session.candidateName}"`);
    return session;
  }

  /**
   * Retrieves a session by ID.
   * @throws InterviewError UNKNOWN_SESSION if the id is not registered.
   */
  get(sessionId: string): Session {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw unknownSession(sessionId);
    }
    return session;
  }

  peek(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  remove(sessionId: string): boolean {
    const removed = this.sessions.delete(sessionId);
    if (removed) {
      this.logger?.info(`Session ${sessionId} removed`);
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }

  isBusy(sessionId: string): boolean {
    return this.tails.has(sessionId);
  }

  stats(): RegistryStats {
    let busy = 0;
    for (const id of this.sessions.keys()) {
      if (this.isBusy(id)) busy++;
    }
    return { active_sessions: this.sessions.size, busy_sessions: busy };
  }

  touch(session: Session): void {
    session.lastActivityAt = this.now();
  }

  // ─── Per-session serialization ──────────────────────────────────────────────

  /**
   * Runs `task` once every task queued earlier for the same id has settled.
   * When nothing is queued the task starts synchronously. A failing task does
   * not block the ones behind it.
   */
  runExclusive<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(sessionId);
    const done = createDeferred<void>();
    const tail = done.promise;
    this.tails.set(sessionId, tail);

    const run = previous ? previous.then(task) : task();

    const release = (): void => {
      if (this.tails.get(sessionId) === tail) {
        this.tails.delete(sessionId);
      }
      done.resolve();
    };
    run.then(release, release);

    return run;
  }

  // ─── Idle expiry ────────────────────────────────────────────────────────────

  /**
   * Removes sessions idle for longer than the timeout. Sessions with work in
   * flight are skipped.
   * @returns ids of the removed sessions
   */
  sweepIdle(now: Date = this.now()): string[] {
    const expired: string[] = [];
    for (const [id, session] of this.sessions) {
      if (this.isBusy(id)) continue;
      if (now.getTime() - session.lastActivityAt.getTime() > this.idleTimeoutMs) {
        expired.push(id);
      }
    }
    for (const id of expired) {
      this.sessions.delete(id);
      this.logger?.info(`Session ${id} expired after inactivity`);
    }
    return expired;
  }

  startSweeper(intervalMs: number): void {
    this.stopSweeper();
    this.sweepTimer = setInterval(() => {
      this.sweepIdle();
    }, intervalMs);
    this.sweepTimer.unref();
  }

  stopSweeper(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }
}
