import type { PolicySchema } from "../../schema/policy-schema.js";
import { policySchemaToTs } from "../schemas/utils.js";

// Appended to a chunk's user prompt when the first answer was not parseable
export const STRICT_RETRY_SUFFIX = `

IMPORTANT: your previous answer could not be parsed.
Return ONLY the JSON object. No prose, no explanations, no markdown fences.`;

export const CHINESE_NOTE =
  "Note: this excerpt contains Chinese text. Labels may be bilingual; take values from either language.";

export const REDACTION_NOTE =
  'Note: this excerpt contains redaction markers. Use "REDACTED" for those values, never guess them.';

const CHINESE_PATTERN = /[\u4e00-\u9fff]/;
const REDACTION_PATTERN = /REDACTED|\*\*\*|BLACKED|MASKED|████/i;

/**
 * Builds the system prompt shared by every chunk of a document.
 */
export function buildExtractionSystemPrompt(schema: PolicySchema): string {
  return `
You are an expert insurance-policy data extractor.

You receive an excerpt of a motor insurance policy (schedule, certificate,
endorsements). The text may come from OCR and contain errors.

Your task is to fill ONE JSON object following the interface below with
the values printed in the excerpt.

RULES:
- Use ONLY information present in the excerpt. Do NOT guess or infer.
- If a field does not appear in the excerpt, OMIT it.
- If a value is blacked out, masked, or shown as ***, set it to "REDACTED".
- Dates: DD/MM/YYYY.
- Money and percentages: plain numbers, without currency or % sign.
- Labels may be bilingual (English and Chinese); either may carry the value.
- Enumerated fields must use one of the listed options exactly.

OUTPUT FORMAT:

\`\`\`typescript
${policySchemaToTs(schema, schema.title)}
\`\`\`

Return ONLY a valid JSON object matching this interface.
`;
}

export function extractionNotes(text: string): string[] {
  const notes: string[] = [];
  if (CHINESE_PATTERN.test(text)) notes.push(CHINESE_NOTE);
  if (REDACTION_PATTERN.test(text)) notes.push(REDACTION_NOTE);
  return notes;
}

export interface UserPromptInput {
  text: string;
  /** 1-based part number */
  part: number;
  total: number;
  notes: readonly string[];
  strict: boolean;
}

/**
 * The excerpt is embedded verbatim, so the prompt length is always the
 * overhead for the same header/notes/suffix plus the excerpt length.
 */
export function buildExtractionUserPrompt(input: UserPromptInput): string {
  const lines = [
    `Policy document excerpt (part ${input.part} of ${input.total}):`,
    ...input.notes,
    "---",
    input.text,
    "---",
    "Return the JSON object for the fields found in this excerpt.",
  ];
  const prompt = lines.join("\n");
  return input.strict ? prompt + STRICT_RETRY_SUFFIX : prompt;
}
