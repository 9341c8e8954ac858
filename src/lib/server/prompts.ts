import { FINAL_ANSWER_TOOL } from "@/lib/server/tools";

export const SEED_INSTRUCTION = [
  "Analyze the binary file in the workspace and submit your findings",
  `using the ${FINAL_ANSWER_TOOL} tool. The binary is located at the path`,
  "shown in the system prompt. Use the available RE tools to examine it.",
].join(" ");

export const SUBMISSION_NUDGE = [
  `Please submit your analysis using the ${FINAL_ANSWER_TOOL} tool.`,
  `Do not respond with plain text; you must call the ${FINAL_ANSWER_TOOL} tool with your findings.`,
].join(" ");

export const CONTINUE_NUDGE = `Please continue your analysis and submit via the ${FINAL_ANSWER_TOOL} tool.`;

export function buildBudgetWarning(remaining: number): string {
  if (remaining <= 2) {
    return [
      `CRITICAL: You have only ${remaining} tool calls left.`,
      `You MUST call the ${FINAL_ANSWER_TOOL} tool NOW with your best analysis.`,
      "Do not use any more investigation tools.",
    ].join(" ");
  }
  return [
    `IMPORTANT: You have only ${remaining} tool calls remaining.`,
    `Start wrapping up your analysis and submit your findings using the ${FINAL_ANSWER_TOOL} tool soon.`,
    "Submit your best answer with what you've found so far rather than running out of tool calls.",
  ].join(" ");
}

export interface SystemPromptInput {
  sampleName: string;
  /** Location of the sample as the tools see it. */
  mountedPath: string;
  maxToolCalls: number;
  toolNames: readonly string[];
  /** Ask for encryption details, decoded strings and anti-analysis findings too. */
  advanced?: boolean;
}

const ADVANCED_FIELDS = [
  "This sample is expected to go further. Also report:",
  "- encryption_details: algorithm (e.g. RC4, AES), key, and how the key is stored",
  "- decoded_strings: encrypted or encoded strings you managed to recover",
  "- anti_analysis: the anti-debugging and anti-analysis methods it uses",
];

export function buildSystemPrompt(input: SystemPromptInput): string {
  const lines = [
    "You are a reverse engineer analyzing a single compiled binary.",
    `The sample '${input.sampleName}' is available at ${input.mountedPath}.`,
    "The workspace is read-only and has no network access.",
    "",
    `Available tools: ${input.toolNames.join(", ")}.`,
    `You may make at most ${input.maxToolCalls} tool calls, including the final submission.`,
    "",
    "Determine:",
    "- file_type: binary format (e.g. ELF64, PE32+, Mach-O 64-bit)",
    "- encoded_strings: whether strings are encoded or encrypted (true/false)",
    "- decoded_c2: the IP:port or URL the binary talks to",
    "- techniques: techniques observed, as identifiers like socket_connect or xor_encoding",
    "- c2_protocol: protocol used for C2 (TCP, HTTP, DNS, ICMP, ...)",
  ];
  if (input.advanced) {
    lines.push("", ...ADVANCED_FIELDS);
  }
  lines.push(
    "",
    `When you are done, call ${FINAL_ANSWER_TOOL} with your findings.`,
    "Only claim techniques the binary gives you evidence for."
  );
  return lines.join("\n");
}
