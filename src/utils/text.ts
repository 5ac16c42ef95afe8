/**
 * Whitespace token count, matching a plain split on runs of whitespace
 */
export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed === '' ? 0 : trimmed.split(/\s+/).length;
}
