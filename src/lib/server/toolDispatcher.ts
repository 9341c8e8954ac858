import { readFile } from "fs/promises";
import type { z } from "zod";
import type { CommandResult, CommandRunner } from "@/lib/server/commandRunner";
import { toErrorMessage } from "@/lib/server/model";
import {
  SandboxViolationError,
  stripSandboxMountPrefix,
  validateSandboxPath,
} from "@/lib/server/pathPolicy";
import {
  DEFAULT_DUMP_LENGTH,
  FINAL_ANSWER_TOOL,
  MAX_DUMP_LENGTH,
  getToolDeclarations,
  isInvestigationTool,
  toolArgumentSchemas,
  type InvestigationToolName,
  type ToolDeclaration,
} from "@/lib/server/tools";
import { formatIssues, isPlainObject, type SubmittedVerdict } from "@/lib/server/verdict";

export class DispatchError extends Error {
  tool: string;

  constructor(message: string, tool: string) {
    super(message);
    this.name = "DispatchError";
    this.tool = tool;
  }
}

export type DispatchOutcome =
  | { kind: "verdict"; verdict: SubmittedVerdict }
  | {
      kind: "result";
      output: string;
      isError: boolean;
      argv?: string[];
      execution?: CommandResult;
    };

export interface ToolDispatcher {
  readonly allowedTools: readonly string[];
  readonly declarations: readonly ToolDeclaration[];
  isSubmission(name: string): boolean;
  /** Never throws: every failure comes back as an error-carrying result. */
  dispatch(name: string, args: unknown): Promise<DispatchOutcome>;
}

export interface ToolDispatcherOptions {
  runner: CommandRunner;
  allowedTools: readonly string[];
  declarations?: readonly ToolDeclaration[];
}

const SCRIPT_FILES = {
  entropy: new URL("./scripts/entropy.py", import.meta.url),
  pefile: new URL("./scripts/pe_dump.py", import.meta.url),
};

const scriptCache = new Map<keyof typeof SCRIPT_FILES, string>();

async function loadScript(name: keyof typeof SCRIPT_FILES): Promise<string> {
  const cached = scriptCache.get(name);
  if (cached !== undefined) return cached;
  const source = await readFile(SCRIPT_FILES[name], "utf-8");
  scriptCache.set(name, source);
  return source;
}

export function formatCommandOutput(result: CommandResult): string {
  const parts: string[] = [];
  if (result.stdout) {
    parts.push(result.stdout);
  }
  if (result.stderr) {
    parts.push(`[stderr] ${result.stderr}`);
  }
  if (result.timedOut) {
    parts.push("[timed out]");
  } else if (result.exitCode !== 0) {
    parts.push(`[exit code ${result.exitCode}]`);
  }
  if (result.truncated) {
    parts.push("[output was truncated]");
  }
  return parts.length > 0 ? parts.join("\n") : "(no output)";
}

function parseArguments<T extends z.ZodTypeAny>(
  name: InvestigationToolName,
  schema: T,
  args: unknown
): z.infer<T> {
  const parsed = schema.safeParse(isPlainObject(args) ? args : {});
  if (!parsed.success) {
    throw new DispatchError(
      `Invalid arguments for ${name}: ${formatIssues(parsed.error).join("; ")}`,
      name
    );
  }
  return parsed.data;
}

export function createToolDispatcher(options: ToolDispatcherOptions): ToolDispatcher {
  const { runner } = options;
  const allowedTools = options.allowedTools.filter(
    (name) => name !== FINAL_ANSWER_TOOL && isInvestigationTool(name)
  );
  const allowed = new Set<string>(allowedTools);
  const declarations = options.declarations ?? getToolDeclarations(allowedTools);

  const resolvePath = async (raw: string): Promise<string> => {
    const sandboxed = await validateSandboxPath(
      stripSandboxMountPrefix(raw),
      runner.workspaceRoot
    );
    return runner.toCommandPath(sandboxed);
  };

  const dumpWindow = (args: { offset?: number; length?: number }) => ({
    offset: String(args.offset ?? 0),
    length: String(Math.min(args.length ?? DEFAULT_DUMP_LENGTH, MAX_DUMP_LENGTH)),
  });

  async function buildCommand(name: InvestigationToolName, rawArgs: unknown): Promise<string[]> {
    switch (name) {
      case "file": {
        const args = parseArguments(name, toolArgumentSchemas[name], rawArgs);
        return ["file", await resolvePath(args.path)];
      }
      case "strings": {
        const args = parseArguments(name, toolArgumentSchemas[name], rawArgs);
        const target = await resolvePath(args.path);
        return args.min_length !== undefined
          ? ["strings", "-n", String(args.min_length), target]
          : ["strings", target];
      }
      case "readelf": {
        const args = parseArguments(name, toolArgumentSchemas[name], rawArgs);
        return ["readelf", args.flags, await resolvePath(args.path)];
      }
      case "objdump": {
        const args = parseArguments(name, toolArgumentSchemas[name], rawArgs);
        const target = await resolvePath(args.path);
        return args.section
          ? ["objdump", args.flags, "-j", args.section, target]
          : ["objdump", args.flags, target];
      }
      case "nm": {
        const args = parseArguments(name, toolArgumentSchemas[name], rawArgs);
        return ["nm", await resolvePath(args.path)];
      }
      case "hexdump": {
        const args = parseArguments(name, toolArgumentSchemas[name], rawArgs);
        const { offset, length } = dumpWindow(args);
        return ["hexdump", "-C", "-s", offset, "-n", length, await resolvePath(args.path)];
      }
      case "xxd": {
        const args = parseArguments(name, toolArgumentSchemas[name], rawArgs);
        const { offset, length } = dumpWindow(args);
        return ["xxd", "-s", offset, "-l", length, await resolvePath(args.path)];
      }
      case "entropy": {
        const args = parseArguments(name, toolArgumentSchemas[name], rawArgs);
        const target = await resolvePath(args.path);
        return [
          "python3",
          "-c",
          await loadScript("entropy"),
          target,
          args.section ?? "",
          String(args.window_size ?? 256),
        ];
      }
      case "pefile": {
        const args = parseArguments(name, toolArgumentSchemas[name], rawArgs);
        const target = await resolvePath(args.path);
        return ["python3", "-c", await loadScript("pefile"), target, args.flags];
      }
    }
  }

  return {
    allowedTools,
    declarations,
    isSubmission: (name) => name === FINAL_ANSWER_TOOL,
    async dispatch(name, args) {
      if (name === FINAL_ANSWER_TOOL) {
        return { kind: "verdict", verdict: isPlainObject(args) ? args : {} };
      }

      let argv: string[];
      try {
        if (!isInvestigationTool(name) || !allowed.has(name)) {
          throw new DispatchError(
            `Tool '${name}' is not allowed. Allowed tools: ${[...allowedTools, FINAL_ANSWER_TOOL].join(", ")}`,
            name
          );
        }
        argv = await buildCommand(name, args);
      } catch (err) {
        if (err instanceof DispatchError) {
          return { kind: "result", output: `Error: ${err.message}`, isError: true };
        }
        if (err instanceof SandboxViolationError) {
          return { kind: "result", output: `Error: Path rejected: ${err.message}`, isError: true };
        }
        return {
          kind: "result",
          output: `Error: ${toErrorMessage(err, "Unknown dispatch error")}`,
          isError: true,
        };
      }

      try {
        const execution = await runner.run(argv);
        return { kind: "result", output: formatCommandOutput(execution), isError: false, argv, execution };
      } catch (err) {
        return {
          kind: "result",
          output: `Error: Command could not be executed: ${toErrorMessage(err, "unknown error")}`,
          isError: true,
          argv,
        };
      }
    },
  };
}
