import { describe, it, expect } from 'vitest';
import { HashEmbedder } from './HashEmbedder';

function norm(vector: number[]): number {
  return Math.sqrt(vector.reduce((sum, x) => sum + x * x, 0));
}

describe('HashEmbedder', () => {
  const embedder = new HashEmbedder(64);

  it('produces vectors of the configured width', async () => {
    const [a, b] = await embedder.getEmbeddings(['reset password', 'billing']);
    expect(a).toHaveLength(64);
    expect(b).toHaveLength(64);
  });

  it('is deterministic and ignores case', async () => {
    expect(await embedder.getEmbedding('Reset Password')).toEqual(
      await embedder.getEmbedding('reset password')
    );
  });

  it('returns unit vectors', async () => {
    const vector = await embedder.getEmbedding('how do I reset my password');
    expect(norm(vector)).toBeCloseTo(1, 10);
  });

  it('puts a single token into one bucket', async () => {
    const vector = await embedder.getEmbedding('password password');
    const nonZero = vector.filter(x => x !== 0);
    expect(nonZero).toHaveLength(1);
    expect(Math.abs(nonZero[0])).toBe(1);
  });

  it('maps empty text to the zero vector', async () => {
    expect(await embedder.getEmbedding('   ')).toEqual(new Array(64).fill(0));
  });

  it('agrees between single and batch calls', async () => {
    const [batched] = await embedder.getEmbeddings(['refund policy']);
    expect(batched).toEqual(await embedder.getEmbedding('refund policy'));
  });

  it('rejects a non-positive dimension', () => {
    expect(() => new HashEmbedder(0)).toThrow(RangeError);
  });
});
