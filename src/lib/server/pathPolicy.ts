import { lstat, realpath } from "fs/promises";
import path from "path";
import { isPathWithinRoot, toRelativeWorkspacePath } from "@/lib/server/workspace";

export const SANDBOX_MOUNT_PATH = "/workspace";

const MAX_PATH_LENGTH = 1024;

export type SandboxViolationReason = "invalid" | "escape" | "symlink_escape" | "not_found";

export class SandboxViolationError extends Error {
  reason: SandboxViolationReason;
  input: string;

  constructor(message: string, reason: SandboxViolationReason, input: string) {
    super(message);
    this.name = "SandboxViolationError";
    this.reason = reason;
    this.input = input;
  }
}

/** A path proven, at validation time, to resolve inside the workspace root. */
export interface SandboxedPath {
  absolutePath: string;
  relativePath: string;
}

/**
 * Models address the sample the way the container sees it ("/workspace/sample.bin")
 * or relative to the workspace ("sample.bin"); both must land on the same file.
 */
export function stripSandboxMountPrefix(
  input: string,
  mountPath: string = SANDBOX_MOUNT_PATH
): string {
  const trimmed = input.trim();
  if (trimmed === mountPath || trimmed === `${mountPath}/`) {
    return ".";
  }
  if (trimmed.startsWith(`${mountPath}/`)) {
    return trimmed.slice(mountPath.length + 1);
  }
  return trimmed;
}

function isMissingEntryError(err: unknown): boolean {
  if (!err || typeof err !== "object" || !("code" in err)) return false;
  return err.code === "ENOENT" || err.code === "ENOTDIR";
}

export async function validateSandboxPath(
  input: string,
  workspaceRoot: string
): Promise<SandboxedPath> {
  const root = path.resolve(workspaceRoot);
  const trimmed = input.trim();

  if (!trimmed) {
    throw new SandboxViolationError("Path must not be empty", "invalid", input);
  }
  if (trimmed.length > MAX_PATH_LENGTH) {
    throw new SandboxViolationError("Path is too long", "invalid", input);
  }
  if (/[\u0000-\u001F]/.test(trimmed)) {
    throw new SandboxViolationError("Path contains control characters", "invalid", input);
  }

  const candidate = path.resolve(root, trimmed);
  if (!isPathWithinRoot(candidate, root)) {
    throw new SandboxViolationError(
      `Path escapes workspace: ${JSON.stringify(input)} resolves outside the workspace root`,
      "escape",
      input
    );
  }

  let isSymlink: boolean;
  try {
    isSymlink = (await lstat(candidate)).isSymbolicLink();
  } catch (err) {
    if (isMissingEntryError(err)) {
      throw new SandboxViolationError(
        `File not found: ${toRelativeWorkspacePath(candidate, root)}`,
        "not_found",
        input
      );
    }
    throw err;
  }

  let target: string;
  try {
    target = await realpath(candidate);
  } catch (err) {
    if (isMissingEntryError(err)) {
      throw new SandboxViolationError(
        `Symlink target does not exist: ${JSON.stringify(input)}`,
        "not_found",
        input
      );
    }
    throw err;
  }

  // The root itself may be reached through a link (/tmp on macOS); compare real paths.
  const realRoot = await realpath(root);

  // A symlinked parent directory can redirect a path whose own entry is a regular file.
  if (!isPathWithinRoot(target, realRoot)) {
    throw new SandboxViolationError(
      isSymlink
        ? `Symlink ${JSON.stringify(input)} points outside the workspace`
        : `Path ${JSON.stringify(input)} passes through a link that leaves the workspace`,
      "symlink_escape",
      input
    );
  }

  return {
    absolutePath: target,
    relativePath: toRelativeWorkspacePath(target, realRoot),
  };
}
