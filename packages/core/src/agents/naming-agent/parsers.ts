/**
 * NamingAgent - Response Parsing
 *
 * Turns the model's reply into a RenameSuggestion. The prompt asks for
 * {"filename": "..."} but replies wrapped in code fences, bare text, or names
 * with an extension or folder are accepted too.
 */
import { z } from 'zod';
import type { RenameSuggestion } from './types';
import { sanitizeFileName, stripExtension } from '../../renamer/sanitize';
import { PDF_EXTENSION, UNKNOWN_DATE_PLACEHOLDER } from '../../constants';

const NamingResponseSchema = z.object({
  filename: z.string(),
});

const FILENAME_FIELD_REGEX = /"filename"\s*:\s*"((?:[^"\\]|\\.)*)/;
const LABEL_PREFIX_REGEX = /^(?:file\s*name|name)\s*:\s*/i;
const SURROUNDING_QUOTES_REGEX = /^["'`“‘]+|["'`”’]+$/g;

/**
 * Pull the candidate name (unsanitized) out of a raw reply. Returns null when nothing usable is there.
 */
export function extractCandidateName(response: string): string | null {
  let text = response.trim();

  // Remove markdown code fences if present
  if (text.startsWith('```')) {
    text = text.replace(/```json\n?/g, '').replace(/```\n?/g, '').trim();
  }

  if (text.startsWith('{')) {
    try {
      const parsed = NamingResponseSchema.safeParse(JSON.parse(text));
      return parsed.success ? parsed.data.filename : null;
    } catch {
      // Truncated or otherwise broken JSON: salvage the field if it is there
      const match = text.match(FILENAME_FIELD_REGEX);
      return match ? match[1].replace(/\\(.)/g, '$1') : null;
    }
  }

  const firstLine = text
    .split('\n')
    .map((line) => line.trim())
    .find((line) => line.length > 0);
  if (!firstLine) {
    return null;
  }

  return firstLine.replace(LABEL_PREFIX_REGEX, '').replace(SURROUNDING_QUOTES_REGEX, '').trim();
}

/**
 * Parse a model reply into a suggestion
 */
export function parseNamingResponse(response: string): RenameSuggestion {
  const candidate = extractCandidateName(response);
  if (candidate === null) {
    return { baseName: '', valid: false, raw: response };
  }

  // Keep only the last path segment, and no extension
  const lastSegment = candidate.split(/[\\/]/).filter((part) => part.trim().length > 0).pop() ?? '';
  const baseName = sanitizeFileName(stripExtension(lastSegment.trim(), PDF_EXTENSION));

  return { baseName, valid: baseName.length > 0, raw: response };
}

/**
 * Format a date as YYYY-MM-DD in local time
 */
export function formatDate(date: Date): string {
  const yyyy = String(date.getFullYear());
  const mm = String(date.getMonth() + 1).padStart(2, '0');
  const dd = String(date.getDate()).padStart(2, '0');
  return `${yyyy}-${mm}-${dd}`;
}

/**
 * Replace the "no date found" placeholder at the start of a name with a real date.
 */
export function resolveDatePlaceholder(baseName: string, fallbackDate: Date): string {
  if (!baseName.startsWith(UNKNOWN_DATE_PLACEHOLDER)) {
    return baseName;
  }
  return formatDate(fallbackDate) + baseName.slice(UNKNOWN_DATE_PLACEHOLDER.length);
}
