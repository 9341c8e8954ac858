import { realpath, stat } from "fs/promises";
import path from "path";

export class WorkspaceAccessError extends Error {
  workspace: string;

  constructor(message: string, workspace: string) {
    super(message);
    this.name = "WorkspaceAccessError";
    this.workspace = workspace;
  }
}

export function isPathWithinRoot(candidate: string, root: string): boolean {
  const resolvedCandidate = path.resolve(candidate);
  const resolvedRoot = path.resolve(root);
  return (
    resolvedCandidate === resolvedRoot ||
    resolvedCandidate.startsWith(`${resolvedRoot}${path.sep}`)
  );
}

/**
 * Resolves the directory holding the sample under analysis to its real location.
 * Containment checks compare real paths, so the root itself must not be a symlink alias.
 */
export async function resolveWorkspaceRoot(input: string): Promise<string> {
  const raw = input.trim();
  if (!raw) {
    throw new WorkspaceAccessError("Workspace path must not be empty", input);
  }

  const candidate = path.resolve(raw);

  let workspaceStat;
  try {
    workspaceStat = await stat(candidate);
  } catch {
    throw new WorkspaceAccessError(`Workspace directory does not exist: ${candidate}`, candidate);
  }

  if (!workspaceStat.isDirectory()) {
    throw new WorkspaceAccessError(`Workspace path must be a directory: ${candidate}`, candidate);
  }

  return realpath(candidate);
}

export function toRelativeWorkspacePath(absolutePath: string, workspace: string): string {
  return path.relative(path.resolve(workspace), absolutePath) || ".";
}
