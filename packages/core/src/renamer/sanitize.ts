import { MAX_BASENAME_BYTES, MAX_BASENAME_LENGTH } from '../constants';

// Illegal on Windows, and '/' everywhere. Control characters included.
const INVALID_FILENAME_CHARS_REGEX = /[<>:"/\\|?*\u0000-\u001f\u007f]/g;
const MULTIPLE_WHITESPACE_REGEX = /\s+/g;
const EDGE_DOTS_AND_SPACES_REGEX = /^[\s.]+|[\s.]+$/g;
const RESERVED_DEVICE_NAMES_REGEX = /^(con|prn|aux|nul|com[1-9]|lpt[1-9])$/i;

/**
 * Make a candidate name safe to use as a file base name.
 *
 * Illegal characters become spaces and whitespace runs collapse to one space.
 * The result is capped at maxLength characters and maxBytes UTF-8 bytes, cut on
 * a character boundary, then loses leading/trailing dots and spaces.
 * Reserved device names get a trailing underscore. Applying it twice gives the
 * same result as applying it once. May return ''.
 */
export function sanitizeFileName(
  name: string,
  maxLength: number = MAX_BASENAME_LENGTH,
  maxBytes: number = MAX_BASENAME_BYTES
): string {
  let sanitized = name
    .normalize('NFC')
    .replace(INVALID_FILENAME_CHARS_REGEX, ' ')
    .replace(MULTIPLE_WHITESPACE_REGEX, ' ');

  if (sanitized.length > maxLength) {
    sanitized = Array.from(sanitized).slice(0, maxLength).join('');
  }
  sanitized = truncateToByteLimit(sanitized, maxBytes);

  sanitized = sanitized.replace(EDGE_DOTS_AND_SPACES_REGEX, '');

  if (RESERVED_DEVICE_NAMES_REGEX.test(sanitized)) {
    sanitized = `${sanitized}_`;
  }

  return sanitized;
}

function truncateToByteLimit(text: string, maxBytes: number): string {
  if (Buffer.byteLength(text, 'utf8') <= maxBytes) {
    return text;
  }

  let result = '';
  let bytes = 0;
  for (const char of text) {
    const size = Buffer.byteLength(char, 'utf8');
    if (bytes + size > maxBytes) {
      break;
    }
    result += char;
    bytes += size;
  }
  return result;
}

/**
 * Drop a trailing extension (case-insensitive) if present.
 */
export function stripExtension(name: string, extension: string): string {
  return name.toLowerCase().endsWith(extension.toLowerCase())
    ? name.slice(0, name.length - extension.length)
    : name;
}
