import { mkdir, mkdtemp, realpath, rm, symlink, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  SandboxViolationError,
  stripSandboxMountPrefix,
  validateSandboxPath,
} from "@/lib/server/pathPolicy";

describe("stripSandboxMountPrefix", () => {
  it("maps container-view paths onto workspace-relative ones", () => {
    expect(stripSandboxMountPrefix("/workspace/sample.bin")).toBe("sample.bin");
    expect(stripSandboxMountPrefix("/workspace/nested/a.out")).toBe("nested/a.out");
    expect(stripSandboxMountPrefix("/workspace")).toBe(".");
    expect(stripSandboxMountPrefix("/workspace/")).toBe(".");
  });

  it("leaves other paths alone apart from surrounding whitespace", () => {
    expect(stripSandboxMountPrefix("  sample.bin ")).toBe("sample.bin");
    expect(stripSandboxMountPrefix("/workspacex/sample.bin")).toBe("/workspacex/sample.bin");
    expect(stripSandboxMountPrefix("/etc/passwd")).toBe("/etc/passwd");
  });
});

describe("validateSandboxPath", () => {
  let root: string;
  let outside: string;

  beforeEach(async () => {
    root = await realpath(await mkdtemp(path.join(os.tmpdir(), "binprobe-ws-")));
    outside = await realpath(await mkdtemp(path.join(os.tmpdir(), "binprobe-outside-")));
    await writeFile(path.join(root, "sample.bin"), "\u007fELF");
    await mkdir(path.join(root, "nested"));
    await writeFile(path.join(root, "nested", "inner.bin"), "inner");
    await writeFile(path.join(outside, "secret.txt"), "test-secret");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
    await rm(outside, { recursive: true, force: true });
  });

  it("accepts a file inside the workspace and returns its real path", async () => {
    await expect(validateSandboxPath("sample.bin", root)).resolves.toEqual({
      absolutePath: path.join(root, "sample.bin"),
      relativePath: "sample.bin",
    });
  });

  it("normalises dot segments that stay inside the workspace", async () => {
    const result = await validateSandboxPath("./nested/../nested/inner.bin", root);
    expect(result.absolutePath).toBe(path.join(root, "nested", "inner.bin"));
    expect(result.relativePath).toBe(path.join("nested", "inner.bin"));
  });

  it("rejects traversal that resolves outside the root", async () => {
    const attempt = validateSandboxPath("../../etc/passwd", root);
    await expect(attempt).rejects.toBeInstanceOf(SandboxViolationError);
    await expect(validateSandboxPath("../../etc/passwd", root)).rejects.toMatchObject({
      reason: "escape",
      message: 'Path escapes workspace: "../../etc/passwd" resolves outside the workspace root',
    });
  });

  it("rejects absolute paths outside the root", async () => {
    await expect(validateSandboxPath(path.join(outside, "secret.txt"), root)).rejects.toMatchObject({
      reason: "escape",
    });
  });

  it("rejects a symlink inside the workspace that points outside it", async () => {
    await symlink(path.join(outside, "secret.txt"), path.join(root, "link.bin"));

    await expect(validateSandboxPath("link.bin", root)).rejects.toMatchObject({
      name: "SandboxViolationError",
      reason: "symlink_escape",
      message: 'Symlink "link.bin" points outside the workspace',
    });
  });

  it("rejects a path routed through a symlinked directory that leaves the workspace", async () => {
    await symlink(outside, path.join(root, "dirlink"));

    await expect(validateSandboxPath("dirlink/secret.txt", root)).rejects.toMatchObject({
      reason: "symlink_escape",
    });
  });

  it("follows a symlink whose target stays inside the workspace", async () => {
    await symlink(path.join(root, "nested", "inner.bin"), path.join(root, "alias.bin"));

    await expect(validateSandboxPath("alias.bin", root)).resolves.toEqual({
      absolutePath: path.join(root, "nested", "inner.bin"),
      relativePath: path.join("nested", "inner.bin"),
    });
  });

  it("accepts files under a workspace root reached through a symlink", async () => {
    const aliasRoot = `${root}-link`;
    await symlink(root, aliasRoot);
    try {
      await expect(validateSandboxPath("sample.bin", aliasRoot)).resolves.toEqual({
        absolutePath: path.join(root, "sample.bin"),
        relativePath: "sample.bin",
      });
      await symlink(path.join(outside, "secret.txt"), path.join(root, "link.bin"));
      await expect(validateSandboxPath("link.bin", aliasRoot)).rejects.toMatchObject({
        reason: "symlink_escape",
      });
    } finally {
      await rm(aliasRoot, { force: true });
    }
  });

  it("reports missing files and dangling links as not found", async () => {
    await expect(validateSandboxPath("missing.bin", root)).rejects.toMatchObject({
      reason: "not_found",
      message: "File not found: missing.bin",
    });

    await symlink(path.join(root, "gone.bin"), path.join(root, "dangling.bin"));
    await expect(validateSandboxPath("dangling.bin", root)).rejects.toMatchObject({
      reason: "not_found",
    });
  });

  it("rejects empty paths and control characters", async () => {
    await expect(validateSandboxPath("   ", root)).rejects.toMatchObject({ reason: "invalid" });
    await expect(validateSandboxPath("sample\u0000.bin", root)).rejects.toMatchObject({
      reason: "invalid",
    });
  });
});
