import { describe, expect, it } from "vitest";
import { buildBudgetWarning, buildSystemPrompt } from "@/lib/server/prompts";
import {
  DEFAULT_ALLOWED_TOOLS,
  getToolDeclarations,
  getToolDeclarationsForFormat,
  isInvestigationTool,
} from "@/lib/server/tools";

const names = (declarations: ReadonlyArray<{ name: string }>) =>
  declarations.map((declaration) => declaration.name);

describe("tool declarations", () => {
  it("always declares the submission tool", () => {
    expect(names(getToolDeclarations([]))).toEqual(["final_answer"]);
    expect(names(getToolDeclarations(["xxd", "file"]))).toEqual(["file", "xxd", "final_answer"]);
  });

  it("narrows the toolbox by binary format", () => {
    expect(names(getToolDeclarationsForFormat("ELF64", DEFAULT_ALLOWED_TOOLS))).toEqual([
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
    expect(names(getToolDeclarationsForFormat("pe32+", [...DEFAULT_ALLOWED_TOOLS, "pefile"]))).toEqual([
      "file",
      "strings",
      "hexdump",
      "xxd",
      "entropy",
      "pefile",
      "final_answer",
    ]);
    expect(names(getToolDeclarationsForFormat("Mach-O 64-bit", ["nm", "readelf"]))).toEqual([
      "nm",
      "final_answer",
    ]);
  });

  it("recognises investigation tools only", () => {
    expect(isInvestigationTool("objdump")).toBe(true);
    expect(isInvestigationTool("final_answer")).toBe(false);
    expect(isInvestigationTool("bash")).toBe(false);
  });
});

describe("prompts", () => {
  it("escalates the budget warning as calls run out", () => {
    expect(buildBudgetWarning(5)).toMatch(/^IMPORTANT: You have only 5 tool calls remaining\./);
    expect(buildBudgetWarning(2)).toMatch(/^CRITICAL: You have only 2 tool calls left\./);
  });

  it("describes the sample, budget and tools", () => {
    const prompt = buildSystemPrompt({
      sampleName: "level1_TCPServer",
      mountedPath: "/workspace/level1_TCPServer",
      maxToolCalls: 25,
      toolNames: ["file", "strings", "final_answer"],
    });

    expect(prompt.split("\n").slice(0, 6)).toEqual([
      "You are a reverse engineer analyzing a single compiled binary.",
      "The sample 'level1_TCPServer' is available at /workspace/level1_TCPServer.",
      "The workspace is read-only and has no network access.",
      "",
      "Available tools: file, strings, final_answer.",
      "You may make at most 25 tool calls, including the final submission.",
    ]);
    expect(prompt).not.toContain("encryption_details");
  });

  it("asks for the advanced fields on harder samples", () => {
    const prompt = buildSystemPrompt({
      sampleName: "level13",
      mountedPath: "/workspace/level13",
      maxToolCalls: 25,
      toolNames: ["file"],
      advanced: true,
    });

    expect(prompt).toContain("- anti_analysis: the anti-debugging and anti-analysis methods it uses");
  });
});
