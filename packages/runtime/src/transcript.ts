import { appendFile } from "node:fs/promises";
import path from "node:path";
import { type ErrorPayload, WORKSPACE_LAYOUT } from "@burrow/core";

export type TranscriptEntry =
  | { role: "user"; at: number; text: string; taskId?: string }
  | { role: "agent"; at: number; text: string }
  | { role: "agent"; at: number; error: ErrorPayload };

export interface TranscriptWriterOptions {
  /** Stamp entries in UTC instead of local time */
  utc?: boolean;
}

export function transcriptPath(workspaceRoot: string): string {
  return path.join(workspaceRoot, WORKSPACE_LAYOUT.transcriptFile);
}

/** Appends human-readable exchanges to a workspace's `transcript.log`. */
export class TranscriptWriter {
  private readonly utc: boolean;

  constructor(options: TranscriptWriterOptions = {}) {
    this.utc = options.utc ?? false;
  }

  async append(workspaceRoot: string, ...entries: TranscriptEntry[]): Promise<void> {
    const text = entries.map((entry) => this.format(entry)).join("");
    await appendFile(transcriptPath(workspaceRoot), text, "utf8");
  }

  format(entry: TranscriptEntry): string {
    return `--- ${formatTimestamp(entry.at, this.utc)} ---\n${formatBody(entry)}\n\n`;
  }
}

function formatBody(entry: TranscriptEntry): string {
  if (entry.role === "user") {
    const prefix = entry.taskId ? `[task:${entry.taskId}] ` : "";
    return `> ${prefix}${entry.text}`;
  }
  if ("error" in entry) {
    return `[error ${entry.error.code}] ${entry.error.message}`;
  }
  return entry.text;
}

function formatTimestamp(epochMs: number, utc: boolean): string {
  const date = new Date(epochMs);
  const parts = utc
    ? [date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate(), date.getUTCHours(), date.getUTCMinutes(), date.getUTCSeconds()]
    : [date.getFullYear(), date.getMonth() + 1, date.getDate(), date.getHours(), date.getMinutes(), date.getSeconds()];
  const [year, month, day, hours, minutes, seconds] = parts.map((part) => String(part).padStart(2, "0"));
  return `${year}-${month}-${day} ${hours}:${minutes}:${seconds}`;
}
