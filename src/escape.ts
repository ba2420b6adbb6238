import type { DelimiterPair } from './schemas.js';

/** A delimiter preceded by this marker is literal text. */
export const ESCAPE_MARKER = '\\';

export function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Strip the escape marker from every escaped delimiter in `text`.
 *
 * Only call this on plain text that will not be scanned again. Span
 * payloads are handed to hooks with their escape markers intact.
 *
 * @param text - Finalized plain text
 * @param delimiters - The active delimiter pair
 * @returns Text with `\[[` and `\]]` (or the configured equivalents) replaced by the bare delimiters
 */
export function unescapeDelimiters(
  text: string,
  delimiters: DelimiterPair,
): string {
  if (!text.includes(ESCAPE_MARKER)) return text;
  const pattern = new RegExp(
    `${escapeRegex(ESCAPE_MARKER)}(${escapeRegex(delimiters.right)}|${escapeRegex(delimiters.left)})`,
    'g',
  );
  return text.replace(pattern, (_match, delimiter: string) => delimiter);
}
