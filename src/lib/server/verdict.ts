import { z } from "zod";

/** Key whose presence marks a free-text JSON object as a verdict candidate. */
export const VERDICT_DISCRIMINATOR = "file_type";

export const verdictSchema = z
  .object({
    file_type: z.string(),
    encoded_strings: z.boolean(),
    decoded_c2: z.string(),
    techniques: z.array(z.string()),
    c2_protocol: z.string(),
    encryption_details: z
      .object({
        algorithm: z.string().optional(),
        key: z.string().optional(),
        key_storage: z.string().optional(),
      })
      .passthrough()
      .optional(),
    decoded_strings: z.record(z.string()).optional(),
    anti_analysis: z.array(z.string()).optional(),
  })
  .passthrough();

export type Verdict = z.infer<typeof verdictSchema>;

/** What the model submitted, kept verbatim so scoring sees exactly that. */
export type SubmittedVerdict = Record<string, unknown>;

export type VerdictCheck = { ok: true; verdict: Verdict } | { ok: false; issues: string[] };

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const field = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${field}: ${issue.message}`;
  });
}

export function checkVerdict(value: unknown): VerdictCheck {
  const parsed = verdictSchema.safeParse(value);
  if (parsed.success) {
    return { ok: true, verdict: parsed.data };
  }
  return { ok: false, issues: formatIssues(parsed.error) };
}

function parseCandidate(raw: string): SubmittedVerdict | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.trim());
  } catch {
    return null;
  }
  if (isPlainObject(parsed) && Object.prototype.hasOwnProperty.call(parsed, VERDICT_DISCRIMINATOR)) {
    return parsed;
  }
  return null;
}

function fencedBlocks(text: string, labelPattern: RegExp): string[] {
  const blocks: string[] = [];
  for (const match of text.matchAll(labelPattern)) {
    blocks.push(match[1] ?? "");
  }
  return blocks;
}

/** Every balanced `{...}` span, outermost first, in order of their opening brace. */
function braceSpans(text: string): string[] {
  const spans: string[] = [];
  for (let start = text.indexOf("{"); start >= 0; start = text.indexOf("{", start + 1)) {
    let depth = 0;
    let inString = false;
    let escaped = false;
    for (let index = start; index < text.length; index += 1) {
      const char = text[index];
      if (inString) {
        if (escaped) escaped = false;
        else if (char === "\\") escaped = true;
        else if (char === '"') inString = false;
        continue;
      }
      if (char === '"') inString = true;
      else if (char === "{") depth += 1;
      else if (char === "}") {
        depth -= 1;
        if (depth === 0) {
          spans.push(text.slice(start, index + 1));
          break;
        }
      }
    }
  }
  return spans;
}

/**
 * Recovers a verdict from prose when the model answered without calling the
 * submission tool. Layers run in order and each is only tried once the previous
 * one found nothing: a ```json fence, any fence, then a bare object that
 * mentions the discriminator key.
 */
export function extractVerdictFromText(text: string): SubmittedVerdict | null {
  if (!text.trim()) return null;

  const layers: Array<() => string[]> = [
    () => fencedBlocks(text, /```json[^\S\r\n]*\r?\n?([\s\S]*?)```/gi),
    () => fencedBlocks(text, /```[\w+-]*[^\S\r\n]*\r?\n?([\s\S]*?)```/g),
    () => braceSpans(text).filter((span) => span.includes(`"${VERDICT_DISCRIMINATOR}"`)),
  ];

  for (const layer of layers) {
    for (const candidate of layer()) {
      const verdict = parseCandidate(candidate);
      if (verdict) return verdict;
    }
  }

  return null;
}
