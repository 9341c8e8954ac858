import { appendFile, mkdir, writeFile } from "fs/promises";
import path from "path";
import type { AgentRunProgressEvent, RunRecord } from "@/lib/server/agentRunner";
import type { AggregateMetrics, TaskMetrics } from "@/lib/server/metrics";
import type { ScoreRecord } from "@/lib/server/scorer";

export interface RunRecordExtras {
  score?: ScoreRecord;
  metrics?: TaskMetrics;
}

export interface SavedRunPaths {
  agentOutputPath: string;
  transcriptPath: string;
}

export interface RunEventWriter {
  readonly filePath: string;
  record(event: AgentRunProgressEvent): void;
  /** Appends everything recorded since the last flush. */
  flush(): Promise<void>;
}

export interface BenchmarkReport {
  config: Record<string, unknown>;
  aggregate: AggregateMetrics;
  tasks: TaskMetrics[];
  scores: Record<string, ScoreRecord>;
}

export function toFileStem(taskId: string): string {
  const stem = taskId.trim().replace(/[^\w.-]+/g, "_").replace(/^\.+/, "_");
  return stem || "task";
}

async function writeJson(filePath: string, payload: unknown): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(payload, null, 2), "utf-8");
}

export async function saveRunRecord(
  resultsDir: string,
  record: RunRecord,
  extras: RunRecordExtras = {}
): Promise<SavedRunPaths> {
  const stem = toFileStem(record.taskId);
  const agentOutputPath = path.join(resultsDir, "agent_outputs", `${stem}.json`);
  const transcriptPath = path.join(resultsDir, "transcripts", `${stem}.json`);

  await writeJson(agentOutputPath, record.verdict ?? {});
  await writeJson(transcriptPath, {
    ...record,
    score: extras.score ?? null,
    metrics: extras.metrics ?? null,
  });

  return { agentOutputPath, transcriptPath };
}

export function createRunEventWriter(resultsDir: string, taskId: string): RunEventWriter {
  const filePath = path.join(resultsDir, "runs", toFileStem(taskId), "events.jsonl");
  let pending: string[] = [];

  return {
    filePath,
    record(event) {
      pending.push(JSON.stringify({ at: new Date().toISOString(), ...event }));
    },
    async flush() {
      if (pending.length === 0) return;
      const lines = pending;
      pending = [];
      await mkdir(path.dirname(filePath), { recursive: true });
      await appendFile(filePath, `${lines.join("\n")}\n`, "utf-8");
    },
  };
}

export async function saveBenchmarkReport(
  resultsDir: string,
  report: BenchmarkReport
): Promise<string> {
  const reportPath = path.join(resultsDir, "benchmark_report.json");
  await writeJson(reportPath, report);
  return reportPath;
}
