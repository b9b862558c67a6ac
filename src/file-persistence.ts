// DSA Interview Coach - File Persistence
// Opt-in saving of a session export to disk.
//
// Files are only written on an explicit save request. Until then session data
// lives in server memory only.

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { ConversationTurn, Session, SessionExportDocument } from "./types.js";
import { renderSummaryText } from "./interview-summary.js";

const pad2 = (n: number): string => String(n).padStart(2, "0");

/** `[MM:SS]` offset; minutes are not wrapped into hours. */
export function formatTimestamp(seconds: number): string {
  const whole = Math.max(0, Math.floor(seconds));
  return `[${pad2(Math.floor(whole / 60))}:${pad2(whole % 60)}]`;
}

/**
 * Renders the conversation into the transcript.txt format:
 *   [MM:SS] Interviewer: What is a hash table?
 *   [MM:SS] Candidate: A map from keys to buckets...
 *
 * Offsets are measured from session creation.
 */
export function formatTranscript(turns: readonly ConversationTurn[], startedAt: Date): string {
  return turns
    .map((turn) => {
      const offsetSeconds = (turn.timestamp.getTime() - startedAt.getTime()) / 1000;
      const speaker = turn.role === "bot" ? "Interviewer" : "Candidate";
      return `${formatTimestamp(offsetSeconds)} ${speaker}: ${turn.text}`;
    })
    .join("\n");
}

/**
 * Renders summary.txt: a metadata header followed by the summary text.
 */
export function formatSummary(session: Session): string {
  const lines = [
    "=== DSA Interview Summary ===",
    "",
    `Date: ${session.createdAt.toISOString().split("T")[0]}`,
    `Session ID: ${session.id}`,
    `Candidate: ${session.candidateName}`,
    "",
    "---",
    "",
  ];
  if (session.summary) {
    lines.push(renderSummaryText(session.summary));
  }
  return lines.join("\n");
}

/** `{YYYY-MM-DD_HH-mm-ss}_{sessionId}`, local time. */
export function buildDirectoryName(session: Pick<Session, "id" | "createdAt">): string {
  const d = session.createdAt;
  const day = `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`;
  const time = `${pad2(d.getHours())}-${pad2(d.getMinutes())}-${pad2(d.getSeconds())}`;
  return `${day}_${time}_${session.id}`;
}

/**
 * Writes a session to its own directory under `baseDir`:
 *   {baseDir}/{YYYY-MM-DD_HH-mm-ss}_{sessionId}/
 *     export.json
 *     transcript.txt
 *     summary.txt      (only once the session has a summary)
 */
export class FilePersistence {
  constructor(private readonly baseDir: string = "output") {}

  /** Returns the paths written, export first. */
  async saveSession(session: Session, document: SessionExportDocument): Promise<string[]> {
    const dirPath = join(this.baseDir, buildDirectoryName(session));
    await mkdir(dirPath, { recursive: true });

    const written: string[] = [];

    const exportPath = join(dirPath, "export.json");
    await writeFile(exportPath, JSON.stringify(document, null, 2), "utf-8");
    written.push(exportPath);

    const transcriptPath = join(dirPath, "transcript.txt");
    await writeFile(transcriptPath, formatTranscript(session.conversationHistory, session.createdAt), "utf-8");
    written.push(transcriptPath);

    if (session.summary) {
      const summaryPath = join(dirPath, "summary.txt");
      await writeFile(summaryPath, formatSummary(session), "utf-8");
      written.push(summaryPath);
    }

    return written;
  }
}
