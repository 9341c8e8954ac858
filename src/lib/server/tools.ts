import { z } from "zod";

export const FINAL_ANSWER_TOOL = "final_answer";

export const INVESTIGATION_TOOLS = [
  "file",
  "strings",
  "readelf",
  "objdump",
  "nm",
  "hexdump",
  "xxd",
  "entropy",
  "pefile",
] as const;

export type InvestigationToolName = (typeof INVESTIGATION_TOOLS)[number];

export const DEFAULT_ALLOWED_TOOLS: InvestigationToolName[] = [
  "file",
  "strings",
  "readelf",
  "objdump",
  "nm",
  "hexdump",
  "xxd",
  "entropy",
];

export const READELF_FLAGS = ["-h", "-S", "-s", "-l", "-d", "-a"] as const;
export const OBJDUMP_FLAGS = ["-d", "-D", "-t", "-x", "-s"] as const;
export const PEFILE_MODES = ["headers", "sections", "imports", "exports", "resources", "all"] as const;

export const MAX_DUMP_LENGTH = 4096;
export const DEFAULT_DUMP_LENGTH = 256;

export interface JsonSchema {
  type?: "object" | "string" | "integer" | "number" | "boolean" | "array";
  description?: string;
  enum?: readonly string[];
  items?: JsonSchema;
  properties?: Record<string, JsonSchema>;
  required?: readonly string[];
  additionalProperties?: boolean | JsonSchema;
}

export interface ToolDeclaration {
  name: string;
  description: string;
  parameters: JsonSchema & { type: "object" };
}

const pathProperty = (description: string): JsonSchema => ({
  type: "string",
  description,
});

const dumpProperties: Record<string, JsonSchema> = {
  path: pathProperty("Path to the binary."),
  offset: { type: "integer", description: "Byte offset to start from (default 0)." },
  length: {
    type: "integer",
    description: `Number of bytes to dump (max ${MAX_DUMP_LENGTH}, default ${DEFAULT_DUMP_LENGTH}).`,
  },
};

export const TOOL_DECLARATIONS: readonly ToolDeclaration[] = [
  {
    name: "file",
    description: "Identify file type. Returns the output of the `file` command.",
    parameters: {
      type: "object",
      properties: { path: pathProperty("Path to the binary file (relative to workspace).") },
      required: ["path"],
    },
  },
  {
    name: "strings",
    description:
      "Extract printable strings from a binary. Returns readable ASCII/UTF-8 strings found in the file.",
    parameters: {
      type: "object",
      properties: {
        path: pathProperty("Path to the binary file."),
        min_length: { type: "integer", description: "Minimum string length (default 4)." },
      },
      required: ["path"],
    },
  },
  {
    name: "readelf",
    description: "Display information about ELF binary sections, headers, symbols, etc.",
    parameters: {
      type: "object",
      properties: {
        path: pathProperty("Path to the ELF binary."),
        flags: {
          type: "string",
          enum: READELF_FLAGS,
          description:
            "readelf flag: -h (header), -S (sections), -s (symbols), -l (program headers), -d (dynamic), -a (all).",
        },
      },
      required: ["path", "flags"],
    },
  },
  {
    name: "objdump",
    description:
      "Disassemble or dump information from a binary. Use -d for disassembly, -t for symbols, -x for all headers, -s for full contents.",
    parameters: {
      type: "object",
      properties: {
        path: pathProperty("Path to the binary."),
        flags: {
          type: "string",
          enum: OBJDUMP_FLAGS,
          description:
            "objdump flag: -d (disassemble), -D (disassemble all), -t (symbol table), -x (all headers), -s (full contents).",
        },
        section: {
          type: "string",
          description: "Optional section name to target (e.g. .text, .rodata).",
        },
      },
      required: ["path", "flags"],
    },
  },
  {
    name: "nm",
    description: "List symbols from an object file or binary.",
    parameters: {
      type: "object",
      properties: { path: pathProperty("Path to the binary.") },
      required: ["path"],
    },
  },
  {
    name: "hexdump",
    description:
      "Display a hex+ASCII dump of a binary file. Useful for examining raw bytes at specific offsets.",
    parameters: { type: "object", properties: dumpProperties, required: ["path"] },
  },
  {
    name: "xxd",
    description: "Create a hex dump of a file. Similar to hexdump but with a different output format.",
    parameters: { type: "object", properties: dumpProperties, required: ["path"] },
  },
  {
    name: "entropy",
    description:
      "Compute Shannon entropy (0.0-8.0) over a sliding window. High entropy (>7.0) indicates encrypted or compressed data. Low entropy (<4.0) indicates plaintext or sparse data. Optionally target a specific ELF section.",
    parameters: {
      type: "object",
      properties: {
        path: pathProperty("Path to the binary."),
        section: {
          type: "string",
          description: "Optional ELF section name (e.g. .text, .rodata, .data).",
        },
        window_size: { type: "integer", description: "Sliding window size in bytes (default 256)." },
      },
      required: ["path"],
    },
  },
  {
    name: "pefile",
    description:
      "Analyze Windows PE (Portable Executable) files: headers, sections, imports, exports and resources.",
    parameters: {
      type: "object",
      properties: {
        path: pathProperty("Path to the PE file (relative to workspace root)."),
        flags: {
          type: "string",
          enum: PEFILE_MODES,
          description:
            "What to dump: headers, sections, imports, exports, resources, or all (default headers).",
        },
      },
      required: ["path"],
    },
  },
  {
    name: FINAL_ANSWER_TOOL,
    description:
      "Submit your final reverse engineering analysis. Call this tool ONCE when you have completed your analysis.",
    parameters: {
      type: "object",
      properties: {
        file_type: { type: "string", description: "File format, e.g. 'ELF64'." },
        encoded_strings: {
          type: "boolean",
          description: "Whether the binary contains encoded/encrypted strings.",
        },
        decoded_c2: {
          type: "string",
          description:
            "The decoded command-and-control URL or address (e.g. '10.0.0.5:4444' or 'http://c2.example/payload').",
        },
        techniques: {
          type: "array",
          items: { type: "string" },
          description:
            "List of techniques observed (e.g. 'socket_connect', 'xor_encoding', 'anti_debug_ptrace').",
        },
        c2_protocol: {
          type: "string",
          description: "Protocol used for C2 communication (e.g. 'TCP', 'HTTP', 'DNS', 'ICMP').",
        },
        encryption_details: {
          type: "object",
          description: "Optional. Encryption details if applicable.",
          properties: {
            algorithm: { type: "string" },
            key: { type: "string" },
            key_storage: { type: "string" },
          },
        },
        decoded_strings: {
          type: "object",
          description: "Optional. Dictionary of decoded encrypted strings.",
          additionalProperties: { type: "string" },
        },
        anti_analysis: {
          type: "array",
          items: { type: "string" },
          description: "Optional. List of anti-analysis techniques found.",
        },
      },
      required: ["file_type", "encoded_strings", "decoded_c2", "techniques", "c2_protocol"],
    },
  },
];

const UNIVERSAL_TOOLS = new Set<string>(["file", "strings", "hexdump", "xxd", "entropy"]);

// Checked in order; the first prefix match wins.
const FORMAT_SPECIFIC_TOOLS: Array<{ prefix: string; tools: string[] }> = [
  { prefix: "ELF", tools: ["readelf", "objdump", "nm"] },
  { prefix: "MACH-O", tools: ["nm"] },
  { prefix: "PE", tools: ["pefile"] },
];

export function isInvestigationTool(name: string): name is InvestigationToolName {
  return INVESTIGATION_TOOLS.some((tool) => tool === name);
}

export function getToolDeclarations(allowedTools: readonly string[]): ToolDeclaration[] {
  const allowed = new Set(allowedTools);
  return TOOL_DECLARATIONS.filter(
    (declaration) => declaration.name === FINAL_ANSWER_TOOL || allowed.has(declaration.name)
  );
}

/** Narrows the toolbox to what can work on the given binary format. */
export function getToolDeclarationsForFormat(
  fileType: string,
  allowedTools: readonly string[]
): ToolDeclaration[] {
  const suitable = new Set(UNIVERSAL_TOOLS);
  const normalized = fileType.trim().toUpperCase();
  const match = FORMAT_SPECIFIC_TOOLS.find((entry) => normalized.startsWith(entry.prefix));
  for (const tool of match?.tools ?? []) {
    suitable.add(tool);
  }

  return getToolDeclarations(allowedTools.filter((name) => suitable.has(name)));
}

const optionalCount = z.coerce.number().int().nonnegative().optional();
const sectionName = z
  .string()
  .regex(/^[\w.$@][\w.$@-]{0,63}$/, "Invalid section name")
  .optional();

export const toolArgumentSchemas = {
  file: z.object({ path: z.string() }),
  strings: z.object({ path: z.string(), min_length: z.coerce.number().int().min(1).optional() }),
  readelf: z.object({ path: z.string(), flags: z.enum(READELF_FLAGS).default("-h") }),
  objdump: z.object({
    path: z.string(),
    flags: z.enum(OBJDUMP_FLAGS).default("-d"),
    section: sectionName,
  }),
  nm: z.object({ path: z.string() }),
  hexdump: z.object({ path: z.string(), offset: optionalCount, length: optionalCount }),
  xxd: z.object({ path: z.string(), offset: optionalCount, length: optionalCount }),
  entropy: z.object({
    path: z.string(),
    section: sectionName,
    window_size: z.coerce.number().int().min(16).max(65536).optional(),
  }),
  pefile: z.object({ path: z.string(), flags: z.enum(PEFILE_MODES).default("headers") }),
} satisfies Record<InvestigationToolName, z.ZodTypeAny>;
