// DSA Interview Coach - Entry point
// Wires up the session pipeline and starts the server.

import "dotenv/config";
import path from "node:path";
import { pathToFileURL } from "node:url";
import OpenAI from "openai";
import { loadConfig, type AppConfig } from "./config.js";
import { createAppServer, type AppServer } from "./server.js";
import { SessionManager } from "./session-manager.js";
import { SessionRegistry } from "./session-registry.js";
import { loadQuestionBank } from "./question-bank.js";
import { loadRecommendationCatalog } from "./interview-summary.js";
import { LLMAnswerAnalyzer } from "./answer-analyzer.js";
import type { AnswerOracle, OpenAIClient } from "./answer-analyzer.js";
import { FilePersistence } from "./file-persistence.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { toErrorMessage } from "./errors.js";

export const APP_NAME = "DSA Interview Coach";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

export interface Application {
  config: AppConfig;
  registry: SessionRegistry;
  sessionManager: SessionManager;
  server: AppServer;
}

export interface BuildOptions {
  /** Defaults to a console logger per component. */
  logger?: Logger;
}

/**
 * Builds every component from config without listening or starting timers.
 * @throws Error when the question pool is smaller than the configured session length.
 */
export function buildApplication(config: AppConfig, oracle: AnswerOracle, options: BuildOptions = {}): Application {
  const loggerFor = (component: string): Logger => options.logger ?? createConsoleLogger(component);

  const questionBank = loadQuestionBank();
  const recommendations = loadRecommendationCatalog();

  const registry = new SessionRegistry({
    idleTimeoutMs: config.sessionIdleTimeoutMs,
    logger: loggerFor("SessionRegistry"),
  });

  const sessionManager = new SessionManager({
    registry,
    questionBank,
    oracle,
    recommendations,
    config: config.interview,
    logger: loggerFor("SessionManager"),
  });

  const server = createAppServer({
    sessionManager,
    staticDir: path.resolve(config.staticDir),
    logger: loggerFor("Server"),
    filePersistence: new FilePersistence(config.outputDir),
  });

  return { config, registry, sessionManager, server };
}

async function main(): Promise<void> {
  const config = loadConfig();

  if (!config.openaiApiKey) {
    throw new Error("OPENAI_API_KEY is not set. Add it to your .env file.");
  }
  logInit("Configuration loaded");

  logInit("Creating OpenAI client...");
  const openaiClient = new OpenAI({ apiKey: config.openaiApiKey });

  logInit(`Initializing answer analyzer (${config.llmModel})...`);
  const oracle = new LLMAnswerAnalyzer(openaiClient as unknown as OpenAIClient, {
    model: config.llmModel,
    temperature: config.llmTemperature,
  });

  logInit(
    `Wiring session pipeline (${config.interview.totalQuestions} questions, ` +
      `up to ${config.interview.maxFollowups} follow-up(s) below ${config.interview.followupThreshold})...`,
  );
  const app = buildApplication(config, oracle);
  app.registry.startSweeper(config.sessionSweepIntervalMs);

  const shutdown = (signal: string) => {
    logInit(`${signal} received, shutting down`);
    app.registry.stopSweeper();
    app.server
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logFatal(`Shutdown failed: ${toErrorMessage(err)}`);
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  await app.server.listen(config.port);
  logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${config.port}`);
  logInit("Ready for connections");
}

const entryPath = process.argv[1];
if (entryPath !== undefined && import.meta.url === pathToFileURL(entryPath).href) {
  main().catch((err: unknown) => {
    logFatal(toErrorMessage(err));
    process.exit(1);
  });
}
