// DSA Interview Coach - WebSocket Handler and Express Server
//
// One WebSocket connection per client carries the interview protocol; a small
// REST surface exposes stateless queries against the session registry.
// Sessions outlive their connections: a dropped socket only unbinds.

import express, { type Express, type Request, type Response } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import path from "node:path";
import { v4 as uuidv4 } from "uuid";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import type { SessionManager } from "./session-manager.js";
import { ProtocolDispatcher, type ConnectionContext } from "./dispatcher.js";
import { FilePersistence } from "./file-persistence.js";
import type { ServerMessage } from "./types.js";
import { InterviewError, isInterviewError, toErrorMessage } from "./errors.js";
import type { InterviewErrorCode } from "./errors.js";
import { createConsoleLogger } from "./logger.js";
import type { Logger } from "./logger.js";

// ─── Logging ────────────────────────────────────────────────────────────────────

export type ServerLogger = Logger;

const defaultLogger: ServerLogger = createConsoleLogger();

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  sessionManager: SessionManager;
  /** Static assets for the browser client. Defaults to ./public. */
  staticDir?: string;
  logger?: ServerLogger;
  /** Target of POST /api/sessions/:id/save. Defaults to ./output. */
  filePersistence?: FilePersistence;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  sessionManager: SessionManager;
  dispatcher: ProtocolDispatcher;
  /** Resolves once the HTTP server is bound; port 0 picks a free one. */
  listen(port: number): Promise<void>;
  /** Closes every socket, then the WebSocket and HTTP servers. */
  close(): Promise<void>;
}

/** Wires Express, the HTTP server and the WebSocket endpoint. Call `listen` to bind. */
export function createAppServer(options: CreateServerOptions): AppServer {
  const {
    sessionManager,
    staticDir = path.resolve(process.cwd(), "public"),
    logger = defaultLogger,
    filePersistence = new FilePersistence(),
  } = options;

  const app = express();
  const httpServer = createServer(app);
  const dispatcher = new ProtocolDispatcher(sessionManager, logger);

  app.use(express.static(staticDir));
  registerRoutes(app, sessionManager, filePersistence, logger);

  // WebSocket server attached to the HTTP server
  const wss = new WebSocketServer({ server: httpServer });

  wss.on("connection", (ws: WebSocket) => {
    handleConnection(ws, dispatcher, logger);
  });

  return {
    app,
    httpServer,
    wss,
    sessionManager,
    dispatcher,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.listen(port, () => {
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
        httpServer.on("error", reject);
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        for (const client of wss.clients) {
          client.close(1001, "Server shutting down");
        }
        wss.close(() => {
          httpServer.closeAllConnections();
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

// ─── HTTP Routes ────────────────────────────────────────────────────────────────

const STATUS_BY_CODE: Record<InterviewErrorCode, number> = {
  UNKNOWN_SESSION: 404,
  INVALID_TRANSITION: 409,
  MALFORMED_EVENT: 400,
  ORACLE_FAILURE: 502,
};

export function statusForError(err: unknown): number {
  return isInterviewError(err) ? STATUS_BY_CODE[err.code] : 500;
}

function sendSuccess(res: Response, data: unknown): void {
  res.json({ success: true, data, timestamp: new Date().toISOString() });
}

function sendFailure(res: Response, err: unknown, logger: ServerLogger): void {
  const status = statusForError(err);
  if (isInterviewError(err)) {
    res.status(status).json({ success: false, error: err.message, code: err.code });
    return;
  }
  logger.error(`Request failed: ${toErrorMessage(err)}`);
  res.status(status).json({ success: false, error: "Internal server error", code: "INTERNAL" });
}

function sessionIdParam(req: Request): string {
  const id = req.params.id;
  if (typeof id !== "string" || id.trim().length === 0) {
    throw new InterviewError("MALFORMED_EVENT", "Session id is required");
  }
  return id;
}

function registerRoutes(
  app: Express,
  sessionManager: SessionManager,
  filePersistence: FilePersistence,
  logger: ServerLogger,
): void {
  // Express 4 does not await handlers; rejections are routed to sendFailure here
  const route =
    (handler: (req: Request, res: Response) => Promise<void> | void) =>
    (req: Request, res: Response): void => {
      Promise.resolve()
        .then(() => handler(req, res))
        .catch((err: unknown) => {
          sendFailure(res, err, logger);
        });
    };

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get(
    "/api/sessions/stats",
    route((_req, res) => {
      sendSuccess(res, sessionManager.sessions.stats());
    }),
  );

  app.post(
    "/api/sessions/cleanup",
    route((_req, res) => {
      const cleaned = sessionManager.sessions.sweepIdle();
      logger.info(`Cleanup removed ${cleaned.length} idle session(s)`);
      sendSuccess(res, { cleaned_sessions: cleaned.length });
    }),
  );

  app.get(
    "/api/sessions/:id",
    route((req, res) => {
      sendSuccess(res, sessionManager.getSnapshot(sessionIdParam(req)));
    }),
  );

  app.get(
    "/api/sessions/:id/export",
    route((req, res) => {
      sendSuccess(res, sessionManager.exportSession(sessionIdParam(req)));
    }),
  );

  app.post(
    "/api/sessions/:id/end",
    route(async (req, res) => {
      const result = await sessionManager.endSession(sessionIdParam(req));
      sendSuccess(res, result.summary);
    }),
  );

  app.post(
    "/api/sessions/:id/save",
    route(async (req, res) => {
      const sessionId = sessionIdParam(req);
      const session = sessionManager.getSession(sessionId);
      const paths = await filePersistence.saveSession(session, sessionManager.exportSession(sessionId));
      logger.info(`Outputs saved for session ${sessionId}: ${paths.join(", ")}`);
      sendSuccess(res, { paths });
    }),
  );
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  if (Buffer.isBuffer(data)) return data.toString("utf-8");
  return Buffer.from(data).toString("utf-8");
}

function handleConnection(ws: WebSocket, dispatcher: ProtocolDispatcher, logger: ServerLogger): void {
  const connection: ConnectionContext = { connectionId: uuidv4(), sessionId: null };
  const send = (message: ServerMessage): void => sendMessage(ws, message);

  logger.info(`New WebSocket connection ${connection.connectionId}`);
  send({ type: "connected", data: { message: "Connected to the interview server" } });

  ws.on("message", (data: RawData, isBinary: boolean) => {
    if (isBinary) {
      send({
        type: "error",
        data: { message: "Binary frames are not supported; send JSON text frames.", code: "MALFORMED_EVENT" },
      });
      return;
    }

    dispatcher.handleRaw(rawDataToString(data), connection, send).catch((err: unknown) => {
      logger.error(`Unhandled error on connection ${connection.connectionId}: ${toErrorMessage(err)}`);
    });
  });

  ws.on("close", (code: number) => {
    // The session stays registered so the client can resume it
    logger.info(
      `WebSocket ${connection.connectionId} closed (code ${code})` +
        (connection.sessionId ? `, session ${connection.sessionId} kept` : ""),
    );
    dispatcher.release(connection);
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error on connection ${connection.connectionId}: ${err.message}`);
  });
}

// ─── Message Sending ────────────────────────────────────────────────────────────

/** Frames one event as JSON. Frames for a socket that is no longer open are dropped. */
export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}
