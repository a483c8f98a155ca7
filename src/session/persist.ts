import fs from "node:fs/promises";
import type { SessionStore } from "../types";
import { renderTranscript } from "./format";

const RULE = "=".repeat(100);

export function renderSessionFile(sessions: SessionStore): string {
  let out = "";
  let ordinal = 0;
  for (const [questionId, session] of sessions) {
    const transcript = session.formattedOutput ?? renderTranscript(session);
    out += `${RULE}\nQuestion #${ordinal} (ID${questionId})\n${RULE}\n${transcript}\n\n\n`;
    ordinal++;
  }
  return out;
}

/** Truncates and rewrites `file`; no append, no atomic rename. */
export async function saveSessions(sessions: SessionStore, file: string): Promise<void> {
  await fs.writeFile(file, renderSessionFile(sessions), "utf8");
}
