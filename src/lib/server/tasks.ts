import { readFile } from "fs/promises";
import path from "path";
import { z } from "zod";
import { toErrorMessage } from "@/lib/server/model";
import type { GroundTruth } from "@/lib/server/scorer";
import { formatIssues, isPlainObject } from "@/lib/server/verdict";

/** Samples at or above this difficulty are asked for the advanced verdict fields. */
export const ADVANCED_DIFFICULTY = 13;

export interface BenchmarkTask {
  taskId: string;
  /** Directory mounted as the workspace; holds the sample. */
  workspaceDir: string;
  /** Sample file name, relative to the workspace. */
  sampleName: string;
  difficulty: number;
  /** Known binary format; narrows the declared tools to those that apply. */
  fileType?: string;
  groundTruth?: GroundTruth;
}

const manifestSchema = z.object({
  tasks: z.array(
    z.object({
      task_id: z.string().trim().min(1),
      binary_name: z.string().trim().min(1),
      ground_truth: z.string().trim().min(1).optional(),
      difficulty: z.number().int().min(0).default(1),
      file_type: z.string().trim().min(1).optional(),
    })
  ),
});

async function readJsonFile(filePath: string, label: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    throw new Error(`Could not read ${label} ${filePath}: ${toErrorMessage(err, "read failed")}`);
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new Error(`${label} is not valid JSON: ${filePath}`);
  }
}

/**
 * Reads a task manifest. Ground-truth paths are relative to the manifest;
 * every sample lives in the one workspace directory.
 */
export async function loadBenchmarkTasks(
  manifestPath: string,
  workspaceDir: string
): Promise<BenchmarkTask[]> {
  const parsed = manifestSchema.safeParse(await readJsonFile(manifestPath, "Task manifest"));
  if (!parsed.success) {
    throw new Error(`Invalid task manifest: ${formatIssues(parsed.error).join("; ")}`);
  }

  const manifestDir = path.dirname(path.resolve(manifestPath));
  const tasks: BenchmarkTask[] = [];
  for (const entry of parsed.data.tasks) {
    const task: BenchmarkTask = {
      taskId: entry.task_id,
      workspaceDir,
      sampleName: entry.binary_name,
      difficulty: entry.difficulty,
    };
    if (entry.file_type) {
      task.fileType = entry.file_type;
    }
    if (entry.ground_truth) {
      const groundTruth = await readJsonFile(
        path.resolve(manifestDir, entry.ground_truth),
        "Ground truth"
      );
      if (!isPlainObject(groundTruth)) {
        throw new Error(`Ground truth for ${entry.task_id} must be a JSON object`);
      }
      task.groundTruth = groundTruth;
    }
    tasks.push(task);
  }
  return tasks;
}

export function filterTasks(tasks: readonly BenchmarkTask[], taskId?: string): BenchmarkTask[] {
  if (!taskId) return [...tasks];
  const matching = tasks.filter((task) => task.taskId === taskId);
  if (matching.length === 0) {
    throw new Error(`No task found matching '${taskId}'`);
  }
  return matching;
}
