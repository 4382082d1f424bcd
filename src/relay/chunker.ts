/**
 * Split text into consecutive slices of exactly `maxLen` (the last may be
 * shorter). Text that fits, including the empty string, is a single chunk.
 * No word or grapheme boundaries are considered.
 */
export function chunkText(text: string, maxLen: number): string[] {
  if (!Number.isInteger(maxLen) || maxLen < 1) {
    throw new RangeError(`maxLen must be a positive integer, got ${maxLen}`);
  }
  if (text.length <= maxLen) return [text];

  const chunks: string[] = [];
  for (let i = 0; i < text.length; i += maxLen) {
    chunks.push(text.slice(i, i + maxLen));
  }
  return chunks;
}

/** First `maxLen` characters, with `...` appended when cut. */
export function preview(text: string, maxLen: number): string {
  return text.length > maxLen ? `${text.slice(0, maxLen)}...` : text;
}
