/**
 * Paragraph chunking and word counting for the post-fill procedure.
 *
 * @module summarizer/text-chunks
 */

const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;

export function countWords(text: string): number {
  if (!text) return 0;
  return text.match(WORD_PATTERN)?.length ?? 0;
}

/** Paragraphs separated by blank lines, trimmed, empty ones dropped. */
export function splitParagraphs(text: string): string[] {
  return (text ?? "")
    .replace(/\r\n/g, "\n")
    .split(/\n\s*\n/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

/**
 * Greedy paragraph packing: paragraphs are appended to the current chunk
 * while it stays within `maxChars`; a paragraph longer than the limit
 * forms a chunk of its own.
 */
export function packChunks(text: string, maxChars: number): string[] {
  if (!Number.isInteger(maxChars) || maxChars < 1) {
    throw new RangeError(`Chunk size must be a positive integer, got ${maxChars}`);
  }

  const chunks: string[] = [];
  let current = "";

  for (const paragraph of splitParagraphs(text)) {
    if (!current) {
      current = paragraph;
      continue;
    }
    const candidate = `${current}\n\n${paragraph}`;
    if (candidate.length <= maxChars) {
      current = candidate;
    } else {
      chunks.push(current);
      current = paragraph;
    }
  }
  if (current) chunks.push(current);
  return chunks;
}
