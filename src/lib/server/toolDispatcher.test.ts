import { mkdtemp, realpath, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import type { CommandResult, CommandRunner } from "@/lib/server/commandRunner";
import {
  createToolDispatcher,
  formatCommandOutput,
  type DispatchOutcome,
} from "@/lib/server/toolDispatcher";
import { DEFAULT_ALLOWED_TOOLS } from "@/lib/server/tools";

const SAMPLE_PATH = "/workspace/sample.bin";

function createFakeRunner(workspaceRoot: string, result: Partial<CommandResult> = {}) {
  const calls: string[][] = [];
  const runner: CommandRunner = {
    kind: "container",
    workspaceRoot,
    toCommandPath: (sandboxed) => path.posix.join("/workspace", sandboxed.relativePath),
    async run(argv) {
      calls.push([...argv]);
      return {
        stdout: "tool output",
        stderr: "",
        exitCode: 0,
        truncated: false,
        timedOut: false,
        ...result,
      };
    },
  };
  return { runner, calls };
}

function expectResult(outcome: DispatchOutcome) {
  if (outcome.kind !== "result") {
    throw new Error(`Expected a tool result, got ${outcome.kind}`);
  }
  return outcome;
}

describe("createToolDispatcher", () => {
  let workspaceRoot: string;

  beforeAll(async () => {
    workspaceRoot = await realpath(await mkdtemp(path.join(os.tmpdir(), "binprobe-dispatch-")));
    await writeFile(path.join(workspaceRoot, "sample.bin"), "\u007fELF\u0002\u0001\u0001");
  });

  afterAll(async () => {
    await rm(workspaceRoot, { recursive: true, force: true });
  });

  function setup(result: Partial<CommandResult> = {}) {
    const fake = createFakeRunner(workspaceRoot, result);
    const dispatcher = createToolDispatcher({
      runner: fake.runner,
      allowedTools: DEFAULT_ALLOWED_TOOLS,
    });
    return { dispatcher, calls: fake.calls };
  }

  it("rejects traversal out of the workspace without spawning anything", async () => {
    const { dispatcher, calls } = setup();
    const outcome = expectResult(await dispatcher.dispatch("file", { path: "../../etc/passwd" }));

    expect(outcome.isError).toBe(true);
    expect(outcome.output).toBe(
      'Error: Path rejected: Path escapes workspace: "../../etc/passwd" resolves outside the workspace root'
    );
    expect(calls).toHaveLength(0);
  });

  it("refuses tools outside the allow-list", async () => {
    const { dispatcher, calls } = setup();

    const undeclared = expectResult(await dispatcher.dispatch("bash", { cmd: "id" }));
    expect(undeclared).toEqual({
      kind: "result",
      isError: true,
      output:
        "Error: Tool 'bash' is not allowed. Allowed tools: file, strings, readelf, objdump, nm, hexdump, xxd, entropy, final_answer",
    });

    const notEnabled = expectResult(await dispatcher.dispatch("pefile", { path: SAMPLE_PATH }));
    expect(notEnabled.isError).toBe(true);
    expect(notEnabled.output).toMatch(/^Error: Tool 'pefile' is not allowed\./);
    expect(calls).toHaveLength(0);
  });

  it("rejects a flag outside the declared enum", async () => {
    const { dispatcher, calls } = setup();
    const outcome = expectResult(
      await dispatcher.dispatch("readelf", { path: SAMPLE_PATH, flags: "--debug-dump" })
    );

    expect(outcome.isError).toBe(true);
    expect(outcome.output).toMatch(/^Error: Invalid arguments for readelf: flags: /);
    expect(calls).toHaveLength(0);
  });

  it("names a missing required argument", async () => {
    const { dispatcher } = setup();
    const outcome = expectResult(await dispatcher.dispatch("file", {}));

    expect(outcome.output).toBe("Error: Invalid arguments for file: path: Required");
  });

  it("rejects section names that would read as options", async () => {
    const { dispatcher, calls } = setup();
    const outcome = expectResult(
      await dispatcher.dispatch("objdump", { path: SAMPLE_PATH, flags: "-d", section: "-x" })
    );

    expect(outcome.output).toBe("Error: Invalid arguments for objdump: section: Invalid section name");
    expect(calls).toHaveLength(0);
  });

  it("accepts container-view and workspace-relative paths alike", async () => {
    const { dispatcher, calls } = setup();

    const mounted = expectResult(await dispatcher.dispatch("file", { path: SAMPLE_PATH }));
    await dispatcher.dispatch("nm", { path: "sample.bin" });

    expect(mounted).toMatchObject({ isError: false, output: "tool output" });
    expect(calls).toEqual([
      ["file", "/workspace/sample.bin"],
      ["nm", "/workspace/sample.bin"],
    ]);
  });

  it("builds command lines from validated arguments", async () => {
    const { dispatcher, calls } = setup();

    await dispatcher.dispatch("strings", { path: SAMPLE_PATH, min_length: 8 });
    await dispatcher.dispatch("readelf", { path: SAMPLE_PATH });
    await dispatcher.dispatch("objdump", { path: SAMPLE_PATH, flags: "-s", section: ".rodata" });
    await dispatcher.dispatch("xxd", { path: SAMPLE_PATH });

    expect(calls).toEqual([
      ["strings", "-n", "8", "/workspace/sample.bin"],
      ["readelf", "-h", "/workspace/sample.bin"],
      ["objdump", "-s", "-j", ".rodata", "/workspace/sample.bin"],
      ["xxd", "-s", "0", "-l", "256", "/workspace/sample.bin"],
    ]);
  });

  it("caps dump length and coerces numeric strings", async () => {
    const { dispatcher, calls } = setup();

    await dispatcher.dispatch("hexdump", { path: SAMPLE_PATH, offset: "64", length: 100000 });

    expect(calls).toEqual([
      ["hexdump", "-C", "-s", "64", "-n", "4096", "/workspace/sample.bin"],
    ]);
  });

  it("passes the sample to the entropy helper as an argument, not as code", async () => {
    const { dispatcher, calls } = setup();

    await dispatcher.dispatch("entropy", { path: SAMPLE_PATH, window_size: 512 });

    expect(calls).toHaveLength(1);
    const [argv] = calls;
    expect(argv.slice(0, 2)).toEqual(["python3", "-c"]);
    expect(argv[2]).toContain("import");
    expect(argv[2]).not.toContain("sample.bin");
    expect(argv.slice(3)).toEqual(["/workspace/sample.bin", "", "512"]);
  });

  it("recognises the submission without touching the runner", async () => {
    const { dispatcher, calls } = setup();
    const verdict = {
      file_type: "ELF64",
      encoded_strings: false,
      decoded_c2: "10.0.0.5:4444",
      techniques: ["socket_connect"],
      c2_protocol: "TCP",
    };

    await expect(dispatcher.dispatch("final_answer", verdict)).resolves.toEqual({
      kind: "verdict",
      verdict,
    });
    expect(dispatcher.isSubmission("final_answer")).toBe(true);
    expect(dispatcher.isSubmission("file")).toBe(false);
    expect(calls).toHaveLength(0);
  });

  it("declares the allowed tools plus the submission", () => {
    const { dispatcher } = setup();

    expect(dispatcher.declarations.map((declaration) => declaration.name)).toEqual([
      "file",
      "strings",
      "readelf",
      "objdump",
      "nm",
      "hexdump",
      "xxd",
      "entropy",
      "final_answer",
    ]);
  });

  it("makes timeouts and truncation visible in the result text", async () => {
    const { dispatcher } = setup({
      stdout: "partial",
      stderr: "still running",
      exitCode: -1,
      timedOut: true,
      truncated: true,
    });
    const outcome = expectResult(await dispatcher.dispatch("strings", { path: SAMPLE_PATH }));

    expect(outcome.isError).toBe(false);
    expect(outcome.output).toBe(
      "partial\n[stderr] still running\n[timed out]\n[output was truncated]"
    );
  });

  it("turns a runner failure into an error result", async () => {
    const runner: CommandRunner = {
      kind: "local",
      workspaceRoot,
      toCommandPath: (sandboxed) => sandboxed.absolutePath,
      run: async () => {
        throw new Error("spawn EACCES");
      },
    };
    const dispatcher = createToolDispatcher({ runner, allowedTools: ["file"] });
    const outcome = expectResult(await dispatcher.dispatch("file", { path: "sample.bin" }));

    expect(outcome.isError).toBe(true);
    expect(outcome.output).toBe("Error: Command could not be executed: spawn EACCES");
  });
});

describe("formatCommandOutput", () => {
  it("marks a non-zero exit and empty output", () => {
    expect(
      formatCommandOutput({ stdout: "", stderr: "", exitCode: 0, truncated: false, timedOut: false })
    ).toBe("(no output)");
    expect(
      formatCommandOutput({
        stdout: "",
        stderr: "not an ELF file",
        exitCode: 1,
        truncated: false,
        timedOut: false,
      })
    ).toBe("[stderr] not an ELF file\n[exit code 1]");
  });
});
