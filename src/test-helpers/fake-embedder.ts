import { vi } from 'vitest';
import type { Embedder } from '../Embedder';

/**
 * Deterministic embedder for tests. Texts listed in `fixed` map to those
 * vectors; any other text maps to its length followed by ones.
 */
export class FakeEmbedder implements Embedder {
  readonly getEmbeddings = vi.fn(async (texts: string[]) =>
    texts.map(text => this.vector(text))
  );

  readonly getEmbedding = vi.fn(async (text: string) => this.vector(text));

  constructor(
    readonly dimension: number,
    private readonly fixed: Record<string, number[]> = {}
  ) {}

  private vector(text: string): number[] {
    const fixed = this.fixed[text];
    if (fixed) {
      return fixed;
    }
    return Array.from({ length: this.dimension }, (_, i) =>
      i === 0 ? text.length : 1
    );
  }
}
