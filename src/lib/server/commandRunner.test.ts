import { mkdtemp, realpath, rm } from "fs/promises";
import os from "os";
import path from "path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import {
  ABNORMAL_EXIT_CODE,
  COMMAND_NOT_FOUND_EXIT_CODE,
  OUTPUT_TRUNCATION_MARKER,
  buildContainerArgs,
  createContainerCommandRunner,
  createLocalCommandRunner,
} from "@/lib/server/commandRunner";

const node = process.execPath;

describe("createLocalCommandRunner", () => {
  let workspaceRoot: string;

  beforeAll(async () => {
    workspaceRoot = await realpath(await mkdtemp(path.join(os.tmpdir(), "binprobe-runner-")));
  });

  afterAll(async () => {
    await rm(workspaceRoot, { recursive: true, force: true });
  });

  it("captures stdout, stderr and the exit code", async () => {
    const runner = createLocalCommandRunner({ workspaceRoot });
    const result = await runner.run([
      node,
      "-e",
      "process.stdout.write('hello'); process.stderr.write('warn'); process.exitCode = 3;",
    ]);

    expect(result).toEqual({
      stdout: "hello",
      stderr: "warn",
      exitCode: 3,
      truncated: false,
      timedOut: false,
    });
  });

  it("runs rooted at the workspace", async () => {
    const runner = createLocalCommandRunner({ workspaceRoot });
    const result = await runner.run([node, "-e", "process.stdout.write(process.cwd())"]);

    expect(await realpath(result.stdout)).toBe(workspaceRoot);
  });

  it("does not pass credentials through to the child", async () => {
    const runner = createLocalCommandRunner({ workspaceRoot });
    const result = await runner.run([
      node,
      "-e",
      "process.stdout.write(String(process.env.ANTHROPIC_API_KEY))",
    ]);

    expect(result.stdout).toBe("undefined");
  });

  it("kills a command that outlives the timeout and keeps its partial output", async () => {
    const runner = createLocalCommandRunner({ workspaceRoot, timeoutMs: 1500 });
    const result = await runner.run([
      node,
      "-e",
      "process.stdout.write('partial'); setInterval(() => {}, 1000);",
    ]);

    expect(result.timedOut).toBe(true);
    expect(result.stdout).toBe("partial");
    expect(result.exitCode).toBe(ABNORMAL_EXIT_CODE);
    expect(result.truncated).toBe(false);
  });

  it("truncates oversized output to exactly the cap plus a marker", async () => {
    const runner = createLocalCommandRunner({ workspaceRoot, maxOutputChars: 1000 });
    const result = await runner.run([node, "-e", "process.stdout.write('x'.repeat(5000))"]);

    expect(result.stdout).toBe(`${"x".repeat(1000)}${OUTPUT_TRUNCATION_MARKER}`);
    expect(result.truncated).toBe(true);
    expect(result.exitCode).toBe(0);
    expect(result.timedOut).toBe(false);
  });

  it("caps stderr independently of stdout", async () => {
    const runner = createLocalCommandRunner({ workspaceRoot, maxOutputChars: 100 });
    const result = await runner.run([
      node,
      "-e",
      "process.stdout.write('ok'); process.stderr.write('e'.repeat(400)); process.exitCode = 1;",
    ]);

    expect(result.stdout).toBe("ok");
    expect(result.stderr).toBe(`${"e".repeat(100)}${OUTPUT_TRUNCATION_MARKER}`);
    expect(result.truncated).toBe(true);
    expect(result.exitCode).toBe(1);
  });

  it("reports a missing program instead of throwing", async () => {
    const runner = createLocalCommandRunner({ workspaceRoot });
    const result = await runner.run(["binprobe-no-such-program"]);

    expect(result.exitCode).toBe(COMMAND_NOT_FOUND_EXIT_CODE);
    expect(result.stderr).toBe("Command not found: binprobe-no-such-program");
    expect(result.stdout).toBe("");
  });

  it("refuses an empty argument vector", async () => {
    const runner = createLocalCommandRunner({ workspaceRoot });
    await expect(runner.run([])).rejects.toThrow("Command must include a program");
  });

  it("hands tools the real absolute path", () => {
    const runner = createLocalCommandRunner({ workspaceRoot });
    expect(
      runner.toCommandPath({
        absolutePath: path.join(workspaceRoot, "sample.bin"),
        relativePath: "sample.bin",
      })
    ).toBe(path.join(workspaceRoot, "sample.bin"));
  });
});

describe("container runner", () => {
  it("builds an isolated, read-only, network-less invocation", () => {
    const args = buildContainerArgs(
      { workspaceRoot: "/data/samples", image: "binprobe-tools:latest" },
      "binprobe-test",
      ["file", "/workspace/sample.bin"]
    );

    expect(args).toEqual([
      "run",
      "--rm",
      "--name",
      "binprobe-test",
      "--platform",
      "linux/amd64",
      "--network=none",
      "--read-only",
      "--memory=512m",
      "--cpus=1",
      "--pids-limit=128",
      "--security-opt",
      "no-new-privileges",
      "--cap-drop=ALL",
      "-v",
      "/data/samples:/workspace:ro",
      "-w",
      "/workspace",
      "binprobe-tools:latest",
      "file",
      "/workspace/sample.bin",
    ]);
  });

  it("renders validated paths as the container sees them", () => {
    const runner = createContainerCommandRunner({
      workspaceRoot: "/data/samples",
      image: "binprobe-tools:latest",
    });

    expect(runner.kind).toBe("container");
    expect(
      runner.toCommandPath({
        absolutePath: "/data/samples/nested/a.bin",
        relativePath: "nested/a.bin",
      })
    ).toBe("/workspace/nested/a.bin");
    expect(runner.toCommandPath({ absolutePath: "/data/samples", relativePath: "." })).toBe(
      "/workspace"
    );
  });

  it("reports a missing container runtime as a failed command", async () => {
    const runner = createContainerCommandRunner({
      workspaceRoot: os.tmpdir(),
      image: "binprobe-tools:latest",
      runtime: "binprobe-no-such-runtime",
    });
    const result = await runner.run(["file", "/workspace/sample.bin"]);

    expect(result.exitCode).toBe(COMMAND_NOT_FOUND_EXIT_CODE);
    expect(result.stderr).toBe("Command not found: binprobe-no-such-runtime");
    expect(result.timedOut).toBe(false);
  });
});
