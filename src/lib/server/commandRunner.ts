import { spawn } from "child_process";
import { randomUUID } from "crypto";
import path from "path";
import { buildRestrictedExecutionEnv } from "@/lib/server/executionEnv";
import { SANDBOX_MOUNT_PATH, type SandboxedPath } from "@/lib/server/pathPolicy";

export const OUTPUT_TRUNCATION_MARKER = "\n... [output truncated]";
export const ABNORMAL_EXIT_CODE = -1;
export const COMMAND_NOT_FOUND_EXIT_CODE = 127;

const DEFAULT_TIMEOUT_MS = 30000;
const DEFAULT_MAX_OUTPUT_CHARS = 50000;
const CONTAINER_CLEANUP_TIMEOUT_MS = 10000;

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  truncated: boolean;
  timedOut: boolean;
}

export interface CommandRunner {
  readonly kind: "container" | "local";
  readonly workspaceRoot: string;
  /** Renders a validated path the way the executing process sees the workspace. */
  toCommandPath(sandboxed: SandboxedPath): string;
  run(argv: readonly string[]): Promise<CommandResult>;
}

export interface CommandLimits {
  timeoutMs?: number;
  maxOutputChars?: number;
}

interface ProcessOptions {
  cwd?: string;
  env: NodeJS.ProcessEnv;
  timeoutMs: number;
  maxOutputChars: number;
}

class CappedOutput {
  private chunks: string[] = [];
  private length = 0;
  private overflowed = false;

  constructor(private readonly maxChars: number) {}

  push(chunk: string) {
    if (this.overflowed) return;
    const room = this.maxChars - this.length;
    if (chunk.length > room) {
      this.chunks.push(chunk.slice(0, room));
      this.length = this.maxChars;
      this.overflowed = true;
      return;
    }
    this.chunks.push(chunk);
    this.length += chunk.length;
  }

  get truncated(): boolean {
    return this.overflowed;
  }

  toString(): string {
    const text = this.chunks.join("");
    return this.overflowed ? `${text}${OUTPUT_TRUNCATION_MARKER}` : text;
  }
}

function describeSpawnError(program: string, err: NodeJS.ErrnoException): string {
  if (err.code === "ENOENT") {
    return `Command not found: ${program}`;
  }
  return err.message || `Failed to start ${program}`;
}

/**
 * Runs one argument vector without a shell. On timeout the child is killed and
 * whatever it had already written is returned with `timedOut` set.
 */
export function runProcess(
  program: string,
  args: readonly string[],
  options: ProcessOptions
): Promise<CommandResult> {
  return new Promise((resolve) => {
    const stdout = new CappedOutput(options.maxOutputChars);
    const stderr = new CappedOutput(options.maxOutputChars);
    let timedOut = false;
    let settled = false;
    let timer: NodeJS.Timeout | undefined;

    const finish = (exitCode: number, spawnFailure?: string) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (spawnFailure) {
        stderr.push(spawnFailure);
      }
      resolve({
        stdout: stdout.toString(),
        stderr: stderr.toString(),
        exitCode,
        truncated: stdout.truncated || stderr.truncated,
        timedOut,
      });
    };

    const child = spawn(program, [...args], {
      cwd: options.cwd,
      env: options.env,
      shell: false,
      stdio: ["ignore", "pipe", "pipe"],
      windowsHide: true,
    });

    timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
    }, options.timeoutMs);

    child.stdout.setEncoding("utf-8");
    child.stderr.setEncoding("utf-8");
    child.stdout.on("data", (chunk: string) => stdout.push(chunk));
    child.stderr.on("data", (chunk: string) => stderr.push(chunk));

    child.on("error", (err: NodeJS.ErrnoException) => {
      finish(
        err.code === "ENOENT" ? COMMAND_NOT_FOUND_EXIT_CODE : ABNORMAL_EXIT_CODE,
        describeSpawnError(program, err)
      );
    });

    child.on("close", (code) => {
      finish(timedOut || code === null ? ABNORMAL_EXIT_CODE : code);
    });
  });
}

function resolveLimits(limits: CommandLimits): Required<CommandLimits> {
  return {
    timeoutMs: limits.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    maxOutputChars: limits.maxOutputChars ?? DEFAULT_MAX_OUTPUT_CHARS,
  };
}

export interface LocalCommandRunnerOptions extends CommandLimits {
  workspaceRoot: string;
  env?: NodeJS.ProcessEnv;
}

/** Direct child process rooted at the workspace. For trusted, local use only. */
export function createLocalCommandRunner(options: LocalCommandRunnerOptions): CommandRunner {
  const workspaceRoot = path.resolve(options.workspaceRoot);
  const limits = resolveLimits(options);
  const env = options.env ?? buildRestrictedExecutionEnv();

  return {
    kind: "local",
    workspaceRoot,
    toCommandPath: (sandboxed) => sandboxed.absolutePath,
    async run(argv) {
      const [program, ...args] = argv;
      if (!program) {
        throw new Error("Command must include a program");
      }
      return runProcess(program, args, {
        cwd: workspaceRoot,
        env,
        timeoutMs: limits.timeoutMs,
        maxOutputChars: limits.maxOutputChars,
      });
    },
  };
}

export interface ContainerCommandRunnerOptions extends CommandLimits {
  workspaceRoot: string;
  image: string;
  runtime?: string;
  platform?: string;
  memory?: string;
  cpus?: string;
  pidsLimit?: number;
}

export function buildContainerArgs(
  options: ContainerCommandRunnerOptions,
  containerName: string,
  argv: readonly string[]
): string[] {
  return [
    "run",
    "--rm",
    "--name",
    containerName,
    "--platform",
    options.platform || "linux/amd64",
    "--network=none",
    "--read-only",
    `--memory=${options.memory || "512m"}`,
    `--cpus=${options.cpus || "1"}`,
    `--pids-limit=${options.pidsLimit ?? 128}`,
    "--security-opt",
    "no-new-privileges",
    "--cap-drop=ALL",
    "-v",
    `${path.resolve(options.workspaceRoot)}:${SANDBOX_MOUNT_PATH}:ro`,
    "-w",
    SANDBOX_MOUNT_PATH,
    options.image,
    ...argv,
  ];
}

/**
 * Disposable, network-less, read-only container per command. Only the workspace
 * is mounted, read-only, at the sandbox mount path.
 */
export function createContainerCommandRunner(
  options: ContainerCommandRunnerOptions
): CommandRunner {
  const workspaceRoot = path.resolve(options.workspaceRoot);
  const limits = resolveLimits(options);
  const runtime = options.runtime || "docker";
  const env = buildRestrictedExecutionEnv();

  return {
    kind: "container",
    workspaceRoot,
    toCommandPath: (sandboxed) =>
      path.posix.join(SANDBOX_MOUNT_PATH, sandboxed.relativePath.split(path.sep).join("/")),
    async run(argv) {
      if (argv.length === 0) {
        throw new Error("Command must include a program");
      }
      const containerName = `binprobe-${randomUUID()}`;
      const result = await runProcess(
        runtime,
        buildContainerArgs({ ...options, workspaceRoot }, containerName, argv),
        {
          env,
          timeoutMs: limits.timeoutMs,
          maxOutputChars: limits.maxOutputChars,
        }
      );

      // Killing the client does not stop the container; remove it explicitly.
      if (result.timedOut) {
        await runProcess(runtime, ["rm", "-f", containerName], {
          env,
          timeoutMs: CONTAINER_CLEANUP_TIMEOUT_MS,
          maxOutputChars: 2000,
        });
      }

      return result;
    },
  };
}
