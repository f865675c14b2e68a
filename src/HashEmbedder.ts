import { createHash } from 'crypto';
import { tokenize } from './chunker';
import type { Embedder } from './Embedder';

/**
 * Offline embedder based on the hashing trick: every lowercased token adds
 * ±1 to one bucket chosen by its SHA-256 digest, and the result is
 * L2-normalized. Texts sharing words land close together, which is enough
 * to exercise the pipeline end to end without a model server.
 */
export class HashEmbedder implements Embedder {
  constructor(readonly dimension: number) {
    if (!Number.isInteger(dimension) || dimension < 1) {
      throw new RangeError(`dimension must be a positive integer: ${dimension}`);
    }
  }

  async getEmbeddings(texts: string[]): Promise<number[][]> {
    return texts.map(text => this.embed(text));
  }

  async getEmbedding(text: string): Promise<number[]> {
    return this.embed(text);
  }

  private embed(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    for (const token of tokenize(text.toLowerCase())) {
      const digest = createHash('sha256').update(token).digest();
      const bucket = digest.readUInt32LE(0) % this.dimension;
      const sign = (digest[4] & 1) === 0 ? 1 : -1;
      vector[bucket] += sign;
    }

    const norm = Math.sqrt(vector.reduce((sum, x) => sum + x * x, 0));
    return norm === 0 ? vector : vector.map(x => x / norm);
  }
}
