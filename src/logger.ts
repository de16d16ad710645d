import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

export type LlmCallLog = {
  model: string;
  research: boolean;
  thinkingEffort: string;
  systemInstruction: string;
  userInstruction: string;
  response: string;
  complete: boolean;
  timestamp: string;
};

export type SourceLog = {
  reference: string;
  videoId?: string;
  language?: string | null;
  charCount?: number;
  error?: string;
};

export type RunEvent = { timestamp: string; message: string; data?: Record<string, unknown> };

export type RunLog = {
  runId: string;
  timestamps: { startedAt: string; finishedAt?: string };
  sources: SourceLog[];
  events: RunEvent[];
  llm_call?: LlmCallLog;
  output?: { title: string; hashtags: string[]; file: string };
  error?: string;
};

export function createRunId(now: Date = new Date()): string {
  return now.toISOString().replace(/[:.]/g, "-");
}

export function createRunLog(runId: string): RunLog {
  return {
    runId,
    timestamps: { startedAt: new Date().toISOString() },
    sources: [],
    events: [],
  };
}

export function logEvent(log: RunLog, message: string, data?: Record<string, unknown>) {
  log.events.push({ timestamp: new Date().toISOString(), message, ...(data ? { data } : {}) });
}

export async function flushRunLog(logsDir: string, log: RunLog): Promise<string> {
  log.timestamps.finishedAt = new Date().toISOString();
  const dir = path.join(logsDir, log.runId);
  await mkdir(dir, { recursive: true });
  const file = path.join(dir, "run.log.json");
  await writeFile(file, JSON.stringify(log, null, 2), "utf-8");
  return file;
}
