/**
 * Naming Agent Prompt
 *
 * Asks the model for ONE short, descriptive file name for a PDF, based on a
 * text excerpt of its first pages.
 */
import { UNKNOWN_DATE_PLACEHOLDER } from '../../constants';

export type NamingPromptOptions = {
  datePrefix: boolean;
};

const BASE_RULES = `RULES:
- Describe what the document IS: its type, the issuer or main party, and the subject (e.g. "Invoice ACME Corp Office Chairs", "Lease Agreement 12 Elm Street").
- Use the document's own language for names and terms.
- At most 80 characters.
- No file extension, no folder names, no slashes.
- Do not use any of these characters: < > : " / \\ | ? *
- Avoid generic words like "document", "file", "scan", "pdf".`;

const DATE_RULES = `DATE:
- Start the name with the most relevant date in the document (issue date, invoice date, signing date) formatted as YYYY-MM-DD, followed by an underscore.
- If the document shows no date, start with ${UNKNOWN_DATE_PLACEHOLDER}_ instead.
- Example: "2024-03-15_Invoice ACME Corp Office Chairs".`;

const OUTPUT_FORMAT = `OUTPUT FORMAT:
Return ONLY a valid JSON object, no explanation, no markdown, no code fences:
{"filename": "<the name>"}`;

export function buildNamingSystemPrompt(options: NamingPromptOptions): string {
  const sections = [
    'You are a file naming assistant. You read the beginning of a PDF document and propose a concise, descriptive file name for it.',
    BASE_RULES,
  ];
  if (options.datePrefix) {
    sections.push(DATE_RULES);
  }
  sections.push(OUTPUT_FORMAT);
  return sections.join('\n\n');
}

export function buildNamingUserPrompt(input: {
  text: string;
  title: string | null;
  pages: number;
  truncated: boolean;
}): string {
  const lines = [`PDF pages: ${input.pages}`];
  if (input.title) {
    lines.push(`PDF title metadata: ${input.title}`);
  }
  lines.push(
    '',
    `Document text${input.truncated ? ' (beginning only)' : ''}:`,
    '"""',
    input.text,
    '"""'
  );
  return lines.join('\n');
}
