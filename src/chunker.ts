export interface Chunk {
  text: string;
  sourceId: string;
  ordinal: number; // Position within the source document
}

/**
 * Splits text into whitespace-delimited tokens
 * Every run of whitespace is a boundary, so the result never holds empty tokens
 */
export function tokenize(text: string): string[] {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return [];
  }
  return trimmed.split(/\s+/);
}

/**
 * Splits text into windows of at most `chunkSize` tokens where consecutive
 * windows share `chunkOverlap` tokens.
 *
 * Pure function of its inputs: the same text and parameters always give the
 * same chunks. Whitespace inside a chunk is normalized to single spaces.
 */
export function createChunks(
  text: string,
  chunkSize: number,
  chunkOverlap: number,
  sourceId: string = ''
): Chunk[] {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`chunkSize must be a positive integer: ${chunkSize}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    throw new RangeError(
      `chunkOverlap must be a non-negative integer: ${chunkOverlap}`
    );
  }
  if (chunkOverlap >= chunkSize) {
    throw new RangeError(
      `chunkOverlap (${chunkOverlap}) must be smaller than chunkSize (${chunkSize})`
    );
  }

  const tokens = tokenize(text);
  const chunks: Chunk[] = [];
  const step = chunkSize - chunkOverlap;

  for (let start = 0; start < tokens.length; start += step) {
    const end = Math.min(start + chunkSize, tokens.length);
    chunks.push({
      text: tokens.slice(start, end).join(' '),
      sourceId,
      ordinal: chunks.length,
    });
    // The window already reached the last token; another would only repeat the overlap
    if (end === tokens.length) {
      break;
    }
  }

  return chunks;
}
